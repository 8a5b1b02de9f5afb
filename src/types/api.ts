/**
 * Control API request/response types.
 */

import type { RunEvent } from './events.ts';

/** Lifecycle of a run started through the control API. */
export type RunStatus =
  | 'running'
  | 'completed'
  | 'completed_with_skips'
  | 'failed'
  | 'cancelled';

/** POST /v1/runs response body. */
export interface StartRunResponse {
  readonly run_id: string;
  readonly status: RunStatus;
  readonly started_at: string;
}

/** Totals reported once a run has finished. */
export interface RunTotals {
  readonly total: number;
  readonly succeeded: number;
  readonly reported: number;
  readonly skipped: number;
}

/** GET /v1/runs/current response body. */
export interface RunStatusResponse {
  readonly run_id: string;
  readonly status: RunStatus;
  readonly started_at: string;
  readonly finished_at: string | null;
  readonly summary: RunTotals | null;
  readonly error_message: string | null;
  readonly events: readonly RunEvent[];
}

/** Issue literal with how often it was tagged. */
export interface IssueCount {
  readonly literal: string;
  readonly count: number;
}

/** GET /v1/analytics response body. */
export interface AnalyticsSummary {
  readonly language: string | null;
  readonly files: number;
  readonly records: number;
  readonly flagged_records: number;
  readonly tags: number;
  readonly issues: readonly IssueCount[];
  /** Number of records per tag count, keyed by the count. */
  readonly tags_per_record: Readonly<Record<string, number>>;
}

/** Standard error response body. */
export interface ErrorResponse {
  readonly error: string;
  readonly details?: string;
}
