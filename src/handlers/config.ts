/**
 * GET/PUT /v1/config handlers.
 *
 * Edits land in config.ini and apply to the next run; a run in progress keeps
 * the snapshot it started with.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../env.d.ts';
import { loadSettings, saveSettings } from '../config/config.ts';
import { ValidationError } from '../utils/errors.ts';
import { SettingsSchema, formatIssues } from '../utils/validation.ts';

/**
 * Handles GET /v1/config requests.
 *
 * @returns JSON settings keyed by their config.ini names
 */
export async function handleGetConfig(c: Context<AppEnv>): Promise<Response> {
  const { configPath } = c.get('services');
  const settings = await loadSettings(configPath);
  return c.json(settings, 200);
}

/**
 * Handles PUT /v1/config requests.
 *
 * Missing keys take their defaults.
 *
 * @returns The saved settings
 * @throws ValidationError if the body is not valid settings JSON
 */
export async function handlePutConfig(c: Context<AppEnv>): Promise<Response> {
  const { configPath } = c.get('services');

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Invalid JSON body');
  }

  const result = SettingsSchema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid configuration', formatIssues(result.error));
  }

  await saveSettings(configPath, result.data);
  return c.json(result.data, 200);
}
