/**
 * GET /v1/analytics handler.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../env.d.ts';
import { summarizeResults } from '../analytics/summary.ts';
import { loadConfig } from '../config/config.ts';
import { ValidationError } from '../utils/errors.ts';
import { AnalyticsQuerySchema, formatIssues } from '../utils/validation.ts';

/**
 * Summarizes the artifacts in the configured output folder.
 *
 * @throws ValidationError on an unsupported `language` query value
 */
export async function handleGetAnalytics(c: Context<AppEnv>): Promise<Response> {
  const { configPath, cwd } = c.get('services');

  const query = AnalyticsQuerySchema.safeParse({ language: c.req.query('language') });
  if (!query.success) {
    throw new ValidationError('Invalid query parameters', formatIssues(query.error));
  }

  const config = await loadConfig(configPath, cwd);
  const summary = await summarizeResults(config.outputRoot, query.data.language);

  return c.json(summary, 200);
}
