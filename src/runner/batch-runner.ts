/**
 * Batch orchestration: discover -> read -> annotate (with retry) -> write JSON
 * -> maybe write PDF, one file at a time.
 *
 * Per-file failures end as a Skipped outcome plus an event; only an
 * inaccessible input or output root aborts the run. A file with no records
 * makes no remote call and is written as an empty result.
 */

import { mkdir } from 'node:fs/promises';
import type { AnnotationClient } from '../client/annotation-client.ts';
import { invokeWithRetry } from '../client/retry.ts';
import type { BackoffPolicy, Sleep } from '../client/retry.ts';
import { notify } from '../events/observer.ts';
import { maybeBuildReport } from '../report/report-builder.ts';
import { collectRecords } from '../source/line-source.ts';
import { writeResult } from '../storage/result-writer.ts';
import type { AnnotationResult, FileJob, TextRecord } from '../types/annotation.ts';
import type { RunConfiguration } from '../types/config.ts';
import type {
  RunEvent,
  RunObserver,
  RunOutcome,
  RunSummary,
  SkipReason,
} from '../types/events.ts';
import {
  FilesystemFailure,
  OutputRootError,
  PermanentFailure,
  RetriesExhausted,
  RunCancelledError,
  errorMessage,
} from '../utils/errors.ts';
import { logEvent } from '../utils/log.ts';
import { generateRunId } from '../utils/run-id.ts';
import { discoverJobs } from './discovery.ts';

/** Result written for a file that has no records. */
const EMPTY_RESULT: AnnotationResult = { entries: [], payload: '{"results":[]}' };

export interface BatchRunnerDeps {
  readonly client: AnnotationClient;
  readonly observer?: RunObserver;
  readonly sleep?: Sleep;
  readonly policy?: BackoffPolicy;
  /** Cancels the run: no new file starts and in-flight waits are aborted. */
  readonly signal?: AbortSignal;
  readonly runId?: string;
  readonly now?: () => Date;
}

/** Per-run state threaded through file processing. */
interface RunContext {
  readonly runId: string;
  readonly config: RunConfiguration;
  readonly deps: BatchRunnerDeps;
  readonly emit: (event: RunEvent) => void;
  readonly now: () => Date;
}

/**
 * Processes every discovered file of a run, sequentially.
 *
 * @param config - Frozen run configuration
 * @param deps - Annotation client, observer and optional timing hooks
 * @returns Totals and per-file outcomes in discovery order
 * @throws InputRootError | OutputRootError when the run cannot start
 */
export async function runBatch(
  config: RunConfiguration,
  deps: BatchRunnerDeps,
): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const runId = deps.runId ?? generateRunId(now());

  const jobs = await discoverJobs(config.inputRoot);

  try {
    await mkdir(config.outputRoot, { recursive: true });
  } catch (error) {
    throw new OutputRootError(`Cannot create output folder ${config.outputRoot}: ${errorMessage(error)}`);
  }

  const observer = deps.observer;
  const ctx: RunContext = {
    runId,
    config,
    deps,
    now,
    emit: (event) => {
      if (observer) notify(observer, event);
    },
  };

  logEvent('info', 'run_started', { run_id: runId, files: jobs.length });
  ctx.emit({
    type: 'run-started',
    run_id: runId,
    input_root: config.inputRoot,
    output_root: config.outputRoot,
    use_ner: config.useNer,
    use_llm: config.useLlm,
    max_retries: config.maxRetries,
    total_files: jobs.length,
    at: now().toISOString(),
  });

  const outcomes: RunOutcome[] = [];
  let cancelled = false;

  for (const job of jobs) {
    if (deps.signal?.aborted) {
      cancelled = true;
      break;
    }

    const outcome = await processFile(ctx, job);
    outcomes.push(outcome);

    if (outcome.status === 'skipped' && outcome.reason === 'cancelled') {
      cancelled = true;
      break;
    }
  }

  const summary: RunSummary = {
    runId,
    total: jobs.length,
    succeeded: outcomes.filter((o) => o.status === 'succeeded').length,
    reported: outcomes.filter((o) => o.status === 'succeeded' && o.pdfPath !== null).length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    cancelled,
    outcomes,
  };

  logEvent('info', 'run_completed', {
    run_id: runId,
    total: summary.total,
    succeeded: summary.succeeded,
    reported: summary.reported,
    skipped: summary.skipped,
    cancelled,
  });
  ctx.emit({
    type: 'run-completed',
    run_id: runId,
    total: summary.total,
    succeeded: summary.succeeded,
    reported: summary.reported,
    skipped: summary.skipped,
    cancelled,
    at: now().toISOString(),
  });

  return summary;
}

/** Runs one file through the pipeline. Never throws. */
async function processFile(ctx: RunContext, job: FileJob): Promise<RunOutcome> {
  const { config, deps } = ctx;
  const base = fileEventBase(ctx, job);

  ctx.emit({ type: 'file-started', ...base });

  let records: TextRecord[];
  try {
    records = await collectRecords(job.sourcePath);
  } catch (error) {
    return skipFile(ctx, job, 'filesystem-failure', error);
  }

  let result: AnnotationResult;
  if (records.length === 0) {
    logEvent('info', 'file_without_records', { file: base.file });
    result = EMPTY_RESULT;
  } else {
    try {
      result = await invokeWithRetry(
        () => deps.client.annotate(job.language, records, {
          useNer: config.useNer,
          useLlm: config.useLlm,
          signal: deps.signal,
        }),
        {
          maxRetries: config.maxRetries,
          policy: deps.policy,
          sleep: deps.sleep,
          signal: deps.signal,
          onRetry: (notice) => {
            logEvent('warn', 'annotation_attempt_failed', {
              file: base.file,
              attempt: notice.attempt,
              max_attempts: notice.maxAttempts,
              retry_in_ms: notice.delayMs,
              error: notice.error.message,
            });
            ctx.emit({
              type: 'attempt-failed',
              ...base,
              attempt: notice.attempt,
              max_attempts: notice.maxAttempts,
              retry_in_ms: notice.delayMs,
              error: notice.error.message,
            });
          },
        },
      );
    } catch (error) {
      return skipFile(ctx, job, skipReasonFor(error), error);
    }
  }

  let jsonPath: string;
  try {
    jsonPath = await writeResult(config.outputRoot, job.baseName, result);
  } catch (error) {
    return skipFile(ctx, job, 'filesystem-failure', error);
  }

  let pdfPath: string | null = null;
  let reportRows = 0;
  try {
    const report = await maybeBuildReport(config.outputRoot, job.baseName, result, records);
    if (report) {
      pdfPath = report.path;
      reportRows = report.rows;
    }
  } catch (error) {
    logEvent('error', 'report_failed', { file: base.file, error: errorMessage(error) });
    ctx.emit({ type: 'report-failed', ...base, error: errorMessage(error) });
  }

  logEvent('info', 'file_succeeded', { file: base.file, json_path: jsonPath, pdf_path: pdfPath });
  ctx.emit({
    type: 'file-succeeded',
    ...base,
    json_path: jsonPath,
    pdf_path: pdfPath,
    records: records.length,
    report_rows: reportRows,
  });

  return { status: 'succeeded', file: base.file, jsonPath, pdfPath };
}

/** Maps a per-file failure to the reason reported for the skip. */
export function skipReasonFor(error: unknown): SkipReason {
  if (error instanceof RetriesExhausted) return 'retries-exhausted';
  if (error instanceof PermanentFailure) return 'permanent-failure';
  if (error instanceof RunCancelledError) return 'cancelled';
  if (error instanceof FilesystemFailure) return 'filesystem-failure';
  return 'unexpected-error';
}

function skipFile(ctx: RunContext, job: FileJob, reason: SkipReason, error: unknown): RunOutcome {
  const base = fileEventBase(ctx, job);
  const message = errorMessage(error);

  logEvent(reason === 'cancelled' ? 'info' : 'error', 'file_skipped', {
    file: base.file,
    reason,
    error: message,
  });
  ctx.emit({ type: 'file-skipped', ...base, reason, error: message });

  return { status: 'skipped', file: base.file, reason };
}

function fileEventBase(ctx: RunContext, job: FileJob) {
  return {
    run_id: ctx.runId,
    file: `${job.language}/${job.fileName}`,
    language: job.language,
    base_name: job.baseName,
    at: ctx.now().toISOString(),
  };
}
