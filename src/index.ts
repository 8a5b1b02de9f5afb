import { Hono } from 'hono';
import type { AppEnv, AppServices } from './env.d.ts';
import { handleGetAnalytics } from './handlers/analytics.ts';
import { handleGetConfig, handlePutConfig } from './handlers/config.ts';
import { handleCancelRun, handleGetCurrentRun, handleStartRun } from './handlers/runs.ts';
import { AppError } from './utils/errors.ts';
import { logEvent } from './utils/log.ts';

/**
 * Builds the control API around a set of services.
 *
 * Replaces the desktop shell: edit config.ini, start and watch a run, and
 * read the analytics of the output folder.
 */
export function createApp(services: AppServices): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });

  /** GET /v1/config -- current config.ini settings */
  app.get('/v1/config', handleGetConfig);

  /** PUT /v1/config -- validate and save settings for the next run */
  app.put('/v1/config', handlePutConfig);

  /** POST /v1/runs -- start a background run (409 if one is active) */
  app.post('/v1/runs', handleStartRun);

  /** GET /v1/runs/current -- status, events and totals of the latest run */
  app.get('/v1/runs/current', handleGetCurrentRun);

  /** POST /v1/runs/current/cancel -- stop the active run after its in-flight file */
  app.post('/v1/runs/current/cancel', handleCancelRun);

  /** GET /v1/analytics -- tag statistics over the output folder */
  app.get('/v1/analytics', handleGetAnalytics);

  /**
   * Hono error handler -- catches all uncaught errors and returns structured JSON.
   *
   * AppError subclasses get their specific status code and toJSON().
   * Unknown errors become 500 with a generic message.
   */
  app.onError((error, c) => {
    if (error instanceof AppError) {
      return c.json(error.toJSON(), error.statusCode as 400);
    }
    logEvent('error', 'unhandled_error', {
      message: error instanceof Error ? error.message : String(error),
    });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
