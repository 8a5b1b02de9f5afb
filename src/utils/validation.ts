/**
 * Zod schemas for configuration, annotation responses and API queries.
 */

import { z } from 'zod';
import { LANGUAGE_CODES } from './languages.ts';

/** Endpoint used when config.ini has no API_URL. */
export const DEFAULT_API_URL = 'https://debias-api.ails.ece.ntua.gr/simple';

const TRUE_WORDS = ['1', 'yes', 'true', 'on'];
const FALSE_WORDS = ['0', 'no', 'false', 'off'];

/** Boolean from JSON, or from an ini word such as "yes" or "off". */
const iniBoolean = z.union([z.boolean(), z.string()]).transform((val, ctx) => {
  if (typeof val === 'boolean') return val;

  const word = val.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Must be a boolean (true/false, yes/no, on/off, 1/0)',
  });
  return z.NEVER;
});

/** Integer from JSON, or from a string of digits. */
const iniInteger = z.union([z.number(), z.string()]).transform((val, ctx) => {
  if (typeof val === 'number') return val;

  const digits = val.trim();
  if (/^\d+$/.test(digits)) return Number(digits);

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Must be a whole number',
  });
  return z.NEVER;
}).pipe(z.number().int({ message: 'Must be a whole number' }));

const folderPath = z.string().trim().min(1, { message: 'Folder path must not be empty' });

/**
 * The `[settings]` section of config.ini.
 *
 * Every key has a default, so a partial file is valid.
 */
export const SettingsSchema = z.object({
  INPUT_FOLDER: folderPath.default('./input'),
  OUTPUT_FOLDER: folderPath.default('./output'),
  USE_NER: iniBoolean.default(true),
  USE_LLM: iniBoolean.default(false),
  MAX_RETRIES: iniInteger.pipe(z.number().min(0, { message: 'MAX_RETRIES must not be negative' })).default(5),
  API_URL: z.string().trim().url({ message: 'API_URL must be a valid URL' }).default(DEFAULT_API_URL),
  REQUEST_TIMEOUT_SECONDS: iniInteger
    .pipe(z.number().positive({ message: 'REQUEST_TIMEOUT_SECONDS must be positive' }))
    .default(120),
});

/** Inferred TypeScript type from SettingsSchema. */
export type Settings = z.infer<typeof SettingsSchema>;

/** Text field that tolerates numbers and missing values. */
const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => (val === null || val === undefined ? '' : String(val)));

/** A tag as sent by the service; it names the description `issue`. */
const TagSchema = z
  .object({
    description: looseText,
    issue: looseText,
    literal: looseText,
    source: looseText,
  })
  .passthrough();

/** One entry of the `results` array. */
const EntrySchema = z
  .object({
    record_index: z.number().int().positive().optional(),
    literal: looseText,
    language: z.string().nullish(),
    tags: z.array(TagSchema).nullish(),
  })
  .passthrough();

/**
 * Annotation service response body.
 *
 * Only the fields the artifacts depend on are modelled; the rest pass through.
 */
export const AnnotationResponseSchema = z
  .object({
    results: z.array(EntrySchema).nullish(),
  })
  .passthrough();

/** Inferred TypeScript type from AnnotationResponseSchema. */
export type AnnotationResponse = z.infer<typeof AnnotationResponseSchema>;

/** GET /v1/analytics query parameters. */
export const AnalyticsQuerySchema = z.object({
  language: z.enum(LANGUAGE_CODES).optional(),
});

/** Flattens zod issues into one `path: message; ...` string. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}
