/**
 * Hono context typing for the control API.
 *
 * Services are created once at startup and exposed to handlers as a
 * context variable.
 */

import type { RunManager } from './runner/run-session.ts';

export interface AppServices {
  /** Path of config.ini; read on every request so edits apply to the next run. */
  readonly configPath: string;

  /** Owner of the background run. */
  readonly runs: RunManager;

  /** Directory that relative folders in config.ini resolve against. */
  readonly cwd: string;
}

export interface AppEnv {
  readonly Variables: {
    services: AppServices;
  };
}
