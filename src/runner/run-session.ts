/**
 * Background runs for the control API: at most one run at a time, its
 * events kept for polling.
 */

import type { AnnotationClient } from '../client/annotation-client.ts';
import type { BackoffPolicy, Sleep } from '../client/retry.ts';
import type { RunStatus, RunStatusResponse, RunTotals } from '../types/api.ts';
import type { RunConfiguration } from '../types/config.ts';
import type { RunEvent, RunObserver } from '../types/events.ts';
import { ConflictError, errorMessage } from '../utils/errors.ts';
import { logEvent } from '../utils/log.ts';
import { generateRunId } from '../utils/run-id.ts';
import { runBatch } from './batch-runner.ts';

/** Oldest events are dropped beyond this many. */
const MAX_KEPT_EVENTS = 1000;

export interface RunManagerOptions {
  /** Loads a fresh configuration snapshot for each run. */
  readonly loadConfig: () => Promise<RunConfiguration>;
  readonly createClient: (config: RunConfiguration) => AnnotationClient;
  readonly observer?: RunObserver;
  readonly sleep?: Sleep;
  readonly policy?: BackoffPolicy;
}

interface RunState {
  readonly runId: string;
  readonly startedAt: string;
  readonly controller: AbortController;
  readonly events: RunEvent[];
  status: RunStatus;
  finishedAt: string | null;
  summary: RunTotals | null;
  errorMessage: string | null;
}

export class RunManager {
  private readonly options: RunManagerOptions;
  private current: RunState | null = null;
  private pending: Promise<void> | null = null;

  constructor(options: RunManagerOptions) {
    this.options = options;
  }

  /**
   * Starts a run in the background.
   *
   * The configuration is loaded before the run starts, so a broken
   * config.ini fails the request itself.
   *
   * @throws ConflictError if a run is already in progress
   * @throws ConfigError if the configuration cannot be loaded
   */
  async start(): Promise<RunStatusResponse> {
    this.assertIdle();

    const config = await this.options.loadConfig();

    // Another start may have won while the config was loading.
    this.assertIdle();

    const startedAt = new Date();
    const state: RunState = {
      runId: generateRunId(startedAt),
      startedAt: startedAt.toISOString(),
      controller: new AbortController(),
      events: [],
      status: 'running',
      finishedAt: null,
      summary: null,
      errorMessage: null,
    };
    this.current = state;
    this.pending = this.execute(state, config);

    return this.snapshot(state);
  }

  /** Status of the latest run, or null before the first one. */
  status(): RunStatusResponse | null {
    return this.current ? this.snapshot(this.current) : null;
  }

  /**
   * Requests cancellation of the active run.
   *
   * @throws ConflictError if no run is in progress
   */
  cancel(): RunStatusResponse {
    const state = this.activeRun();
    if (!state) {
      throw new ConflictError('No run is in progress');
    }
    state.controller.abort();
    return this.snapshot(state);
  }

  /**
   * Resolves once the active run, if any, has finished. The HTTP routes never
   * wait on a run; this is for in-process callers such as tests.
   */
  async whenIdle(): Promise<void> {
    await this.pending;
  }

  private activeRun(): RunState | null {
    return this.current?.status === 'running' ? this.current : null;
  }

  private assertIdle(): void {
    const running = this.activeRun();
    if (running) {
      throw new ConflictError(`Run ${running.runId} is already in progress`);
    }
  }

  private async execute(state: RunState, config: RunConfiguration): Promise<void> {
    const record: RunObserver = (event) => {
      state.events.push(event);
      if (state.events.length > MAX_KEPT_EVENTS) {
        state.events.shift();
      }
      this.options.observer?.(event);
    };

    try {
      const summary = await runBatch(config, {
        client: this.options.createClient(config),
        observer: record,
        sleep: this.options.sleep,
        policy: this.options.policy,
        signal: state.controller.signal,
        runId: state.runId,
      });
      state.summary = {
        total: summary.total,
        succeeded: summary.succeeded,
        reported: summary.reported,
        skipped: summary.skipped,
      };
      if (summary.cancelled) {
        state.status = 'cancelled';
      } else {
        state.status = summary.skipped > 0 ? 'completed_with_skips' : 'completed';
      }
    } catch (error) {
      state.status = 'failed';
      state.errorMessage = errorMessage(error);
      logEvent('error', 'run_failed', { run_id: state.runId, error: state.errorMessage });
    } finally {
      state.finishedAt = new Date().toISOString();
    }
  }

  private snapshot(state: RunState): RunStatusResponse {
    return {
      run_id: state.runId,
      status: state.status,
      started_at: state.startedAt,
      finished_at: state.finishedAt,
      summary: state.summary,
      error_message: state.errorMessage,
      events: [...state.events],
    };
  }
}
