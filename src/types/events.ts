/**
 * Progress events streamed from the batch runner to its observer.
 *
 * Field names are snake_case: events are logged and served as JSON as-is.
 */

import type { LanguageCode } from '../utils/languages.ts';

/** Why a file produced no artifacts. */
export type SkipReason =
  | 'retries-exhausted'
  | 'permanent-failure'
  | 'filesystem-failure'
  | 'unexpected-error'
  | 'cancelled';

/** Fields shared by every per-file event. */
interface FileEventBase {
  readonly run_id: string;
  /** `<language>/<file name>`, e.g. "en/batch_001.csv". */
  readonly file: string;
  readonly language: LanguageCode;
  readonly base_name: string;
  readonly at: string;
}

export interface RunStartedEvent {
  readonly type: 'run-started';
  readonly run_id: string;
  readonly input_root: string;
  readonly output_root: string;
  readonly use_ner: boolean;
  readonly use_llm: boolean;
  readonly max_retries: number;
  readonly total_files: number;
  readonly at: string;
}

export interface FileStartedEvent extends FileEventBase {
  readonly type: 'file-started';
}

export interface AttemptFailedEvent extends FileEventBase {
  readonly type: 'attempt-failed';
  readonly attempt: number;
  readonly max_attempts: number;
  readonly retry_in_ms: number;
  readonly error: string;
}

export interface FileSucceededEvent extends FileEventBase {
  readonly type: 'file-succeeded';
  readonly json_path: string;
  readonly pdf_path: string | null;
  readonly records: number;
  readonly report_rows: number;
}

export interface ReportFailedEvent extends FileEventBase {
  readonly type: 'report-failed';
  readonly error: string;
}

export interface FileSkippedEvent extends FileEventBase {
  readonly type: 'file-skipped';
  readonly reason: SkipReason;
  readonly error: string;
}

export interface RunCompletedEvent {
  readonly type: 'run-completed';
  readonly run_id: string;
  readonly total: number;
  readonly succeeded: number;
  readonly reported: number;
  readonly skipped: number;
  readonly cancelled: boolean;
  readonly at: string;
}

export type RunEvent =
  | RunStartedEvent
  | FileStartedEvent
  | AttemptFailedEvent
  | FileSucceededEvent
  | ReportFailedEvent
  | FileSkippedEvent
  | RunCompletedEvent;

/** Receives every event of a run, in order. Must not throw. */
export type RunObserver = (event: RunEvent) => void;

/** Terminal state of one file. */
export type RunOutcome =
  | { readonly status: 'succeeded'; readonly file: string; readonly jsonPath: string; readonly pdfPath: string | null }
  | { readonly status: 'skipped'; readonly file: string; readonly reason: SkipReason };

/** Totals of a finished run. */
export interface RunSummary {
  readonly runId: string;
  readonly total: number;
  readonly succeeded: number;
  readonly reported: number;
  readonly skipped: number;
  readonly cancelled: boolean;
  readonly outcomes: readonly RunOutcome[];
}
