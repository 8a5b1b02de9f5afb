/**
 * config.ini loading and saving.
 *
 * The file holds a single `[settings]` section. Keys are matched
 * case-insensitively and validated with SettingsSchema; a run works from a
 * frozen RunConfiguration snapshot taken once at its start.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse, stringify } from 'ini';
import { writeFileAtomic } from '../storage/artifacts.ts';
import type { ConfigSettings, RunConfiguration } from '../types/config.ts';
import { ConfigError, errorMessage } from '../utils/errors.ts';
import { SettingsSchema, formatIssues } from '../utils/validation.ts';

const SETTINGS_SECTION = 'settings';

const FILE_HEADER = '#\n#   Default config\n#\n';

/**
 * Parses and validates config.ini text.
 *
 * @param text - Raw file contents
 * @returns Validated settings with defaults applied
 * @throws ConfigError if the section is missing or a value is invalid
 */
export function parseConfigText(text: string): ConfigSettings {
  const parsed: Record<string, unknown> = parse(text);
  const section = parsed[SETTINGS_SECTION];

  if (!section || typeof section !== 'object') {
    throw new ConfigError(`Invalid configuration: missing [${SETTINGS_SECTION}] section`);
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(section)) {
    normalized[key.toUpperCase()] = value;
  }

  const result = SettingsSchema.safeParse(normalized);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }

  return result.data;
}

/**
 * Reads and validates a config.ini file.
 *
 * @throws ConfigError if the file cannot be read or is invalid
 */
export async function loadSettings(path: string): Promise<ConfigSettings> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${errorMessage(error)}`);
  }
  return parseConfigText(text);
}

/**
 * Builds the immutable snapshot a run works from.
 *
 * Relative folders resolve against `cwd`.
 */
export function toRunConfiguration(
  settings: ConfigSettings,
  cwd: string = process.cwd(),
): RunConfiguration {
  return Object.freeze({
    inputRoot: resolve(cwd, settings.INPUT_FOLDER),
    outputRoot: resolve(cwd, settings.OUTPUT_FOLDER),
    useNer: settings.USE_NER,
    useLlm: settings.USE_LLM,
    maxRetries: settings.MAX_RETRIES,
    apiUrl: settings.API_URL,
    requestTimeoutMs: settings.REQUEST_TIMEOUT_SECONDS * 1000,
  });
}

/** Loads config.ini and takes a run snapshot from it. */
export async function loadConfig(path: string, cwd?: string): Promise<RunConfiguration> {
  return toRunConfiguration(await loadSettings(path), cwd);
}

/** Renders settings as config.ini text. */
export function formatConfigText(settings: ConfigSettings): string {
  const section = {
    INPUT_FOLDER: settings.INPUT_FOLDER,
    OUTPUT_FOLDER: settings.OUTPUT_FOLDER,
    USE_NER: String(settings.USE_NER),
    USE_LLM: String(settings.USE_LLM),
    MAX_RETRIES: String(settings.MAX_RETRIES),
    API_URL: settings.API_URL,
    REQUEST_TIMEOUT_SECONDS: String(settings.REQUEST_TIMEOUT_SECONDS),
  };
  return FILE_HEADER + stringify({ [SETTINGS_SECTION]: section });
}

/**
 * Writes settings to config.ini, replacing the file atomically.
 *
 * @throws ConfigError if the file cannot be written
 */
export async function saveSettings(path: string, settings: ConfigSettings): Promise<void> {
  try {
    await writeFileAtomic(path, formatConfigText(settings));
  } catch (error) {
    throw new ConfigError(`Cannot write configuration file ${path}: ${errorMessage(error)}`);
  }
}
