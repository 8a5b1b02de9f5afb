/**
 * Run control handlers: start, inspect and cancel the background run.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../env.d.ts';
import type { StartRunResponse } from '../types/api.ts';
import { NotFoundError } from '../utils/errors.ts';

/**
 * Handles POST /v1/runs requests.
 *
 * @returns 202 with the new run's ID
 * @throws ConflictError if a run is already in progress
 */
export async function handleStartRun(c: Context<AppEnv>): Promise<Response> {
  const { runs } = c.get('services');
  const run = await runs.start();

  const response: StartRunResponse = {
    run_id: run.run_id,
    status: run.status,
    started_at: run.started_at,
  };
  return c.json(response, 202);
}

/** Handles GET /v1/runs/current requests. */
export function handleGetCurrentRun(c: Context<AppEnv>): Response {
  const { runs } = c.get('services');
  const status = runs.status();

  if (!status) {
    throw new NotFoundError('No run has been started');
  }

  return c.json(status, 200);
}

/**
 * Handles POST /v1/runs/current/cancel requests.
 *
 * The run stops after its in-flight file; poll GET /v1/runs/current for the
 * final status.
 */
export function handleCancelRun(c: Context<AppEnv>): Response {
  const { runs } = c.get('services');
  return c.json(runs.cancel(), 202);
}
