/** Supported language codes, in discovery order. */
export const LANGUAGE_CODES = ['de', 'en', 'fr', 'it', 'nl'] as const;

export type LanguageCode = typeof LANGUAGE_CODES[number];

/** Narrows a folder name or query value to a supported language code. */
export function isLanguageCode(value: string): value is LanguageCode {
  return (LANGUAGE_CODES as readonly string[]).includes(value);
}
