/**
 * Run observers: sinks for the runner's progress events.
 *
 * The runner only knows the RunObserver callback; the CLI prints events and
 * the control API keeps them for its status endpoint.
 */

import type { RunEvent, RunObserver } from '../types/events.ts';
import { errorMessage } from '../utils/errors.ts';
import { logEvent } from '../utils/log.ts';

/**
 * Delivers an event to an observer. An observer that throws is logged and
 * does not interrupt the run.
 */
export function notify(observer: RunObserver, event: RunEvent): void {
  try {
    observer(event);
  } catch (error) {
    logEvent('error', 'observer_failed', {
      event_type: event.type,
      error: errorMessage(error),
    });
  }
}

/**
 * One human-readable log line per event.
 *
 * @example
 * formatRunEvent({ type: 'attempt-failed', file: 'en/batch_001.csv', attempt: 1, max_attempts: 3, retry_in_ms: 2000, ... })
 * // => "[en/batch_001.csv] Attempt 1/3 failed: ... Retrying in 2s..."
 */
export function formatRunEvent(event: RunEvent): string {
  switch (event.type) {
    case 'run-started':
      return `Starting processing of ${event.total_files} file(s) from ${event.input_root}...`;
    case 'file-started':
      return `[${event.file}] Processing...`;
    case 'attempt-failed':
      return `[${event.file}] Attempt ${event.attempt}/${event.max_attempts} failed: ${event.error}. Retrying in ${formatSeconds(event.retry_in_ms)}...`;
    case 'file-succeeded':
      return event.pdf_path
        ? `[${event.file}] Success. Output written to ${event.json_path}, report written to ${event.pdf_path}`
        : `[${event.file}] Success. Output written to ${event.json_path}, no flagged entries`;
    case 'report-failed':
      return `[${event.file}] Report failed: ${event.error}`;
    case 'file-skipped':
      return `[${event.file}] Skipped (${event.reason}): ${event.error}`;
    case 'run-completed':
      return event.cancelled
        ? `CANCELLED. ${event.succeeded}/${event.total} succeeded, ${event.skipped} skipped.`
        : `DONE. ${event.succeeded}/${event.total} succeeded, ${event.reported} report(s), ${event.skipped} skipped.`;
  }
}

/** Observer printing each event to stdout, as text or as a JSON line. */
export function createConsoleObserver(options: { json?: boolean } = {}): RunObserver {
  return (event) => {
    console.log(options.json ? JSON.stringify(event) : formatRunEvent(event));
  };
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return `${Number.isInteger(seconds) ? seconds : seconds.toFixed(1)}s`;
}
