/**
 * HTTP client for the remote annotation service.
 *
 * One POST per input file carries every record text of that file. Failures
 * are classified so the retry policy can tell what is worth another attempt:
 * - network error, timeout, 408, 5xx -> TransientFailure
 * - 429                              -> ThrottledFailure
 * - other 4xx, unreadable 2xx body   -> PermanentFailure
 */

import type {
  AnnotationFlags,
  AnnotationResult,
  Entry,
  TextRecord,
} from '../types/annotation.ts';
import {
  PermanentFailure,
  RunCancelledError,
  ThrottledFailure,
  TransientFailure,
  errorMessage,
} from '../utils/errors.ts';
import type { LanguageCode } from '../utils/languages.ts';
import { logEvent } from '../utils/log.ts';
import { AnnotationResponseSchema, formatIssues } from '../utils/validation.ts';

/** The subset of fetch the client needs; tests pass an in-process app. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface AnnotationClientOptions {
  readonly apiUrl: string;
  readonly timeoutMs: number;
  readonly fetch?: FetchLike;
}

export interface AnnotateOptions extends AnnotationFlags {
  /** Aborts the request when the run is cancelled. */
  readonly signal?: AbortSignal;
}

export interface AnnotationClient {
  annotate(
    language: LanguageCode,
    records: readonly TextRecord[],
    options: AnnotateOptions,
  ): Promise<AnnotationResult>;
}

/** JSON body of an annotation request. */
export interface AnnotationRequest {
  readonly language: LanguageCode;
  readonly useNER: boolean;
  readonly useLLM: boolean;
  readonly values: string[];
}

/** Longest response excerpt kept in a PermanentFailure's details. */
const MAX_DETAILS_LENGTH = 200;

/** Builds the request body: the full ordered batch of record texts. */
export function buildAnnotationRequest(
  language: LanguageCode,
  records: readonly TextRecord[],
  flags: AnnotationFlags,
): AnnotationRequest {
  return {
    language,
    useNER: flags.useNer,
    useLLM: flags.useLlm,
    values: records.map((record) => record.text),
  };
}

/**
 * Parses a response body into an AnnotationResult.
 *
 * Entries without a record_index take their 1-based position. A tag's
 * description falls back to its `issue` field.
 *
 * @throws PermanentFailure if the body is not JSON or has the wrong shape
 */
export function parseAnnotationPayload(payload: string): AnnotationResult {
  let body: unknown;
  try {
    body = JSON.parse(payload);
  } catch {
    throw new PermanentFailure('Invalid annotation response: not valid JSON');
  }

  const parsed = AnnotationResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new PermanentFailure('Invalid annotation response', formatIssues(parsed.error));
  }

  const entries: Entry[] = (parsed.data.results ?? []).map((result, position) => ({
    recordIndex: result.record_index ?? position + 1,
    literal: result.literal,
    language: result.language ?? null,
    tags: (result.tags ?? []).map((tag) => ({
      description: tag.description || tag.issue,
      literal: tag.literal,
      source: tag.source,
    })),
  }));

  return { entries, payload };
}

/**
 * Converts a Retry-After header (seconds or HTTP date) to milliseconds.
 *
 * @returns Delay in ms, or undefined when the header is absent or unreadable
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = new Date(trimmed).getTime();
  if (isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Maps a non-2xx response to its failure class.
 */
export function classifyHttpFailure(
  status: number,
  body: string,
  retryAfterHeader: string | null,
): TransientFailure | ThrottledFailure | PermanentFailure {
  if (status === 429) {
    return new ThrottledFailure(
      'Annotation service rate limit reached (HTTP 429)',
      parseRetryAfter(retryAfterHeader),
    );
  }

  if (status === 408 || status >= 500) {
    return new TransientFailure(`Annotation service returned HTTP ${status}`);
  }

  return new PermanentFailure(
    `Annotation service rejected the request (HTTP ${status})`,
    body ? body.slice(0, MAX_DETAILS_LENGTH) : undefined,
  );
}

/**
 * Creates an annotation client bound to one endpoint.
 *
 * @example
 * const client = createAnnotationClient({ apiUrl: DEFAULT_API_URL, timeoutMs: 120_000 });
 * const result = await client.annotate('en', records, { useNer: true, useLlm: false });
 */
export function createAnnotationClient(options: AnnotationClientOptions): AnnotationClient {
  const fetchFn: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  return {
    async annotate(language, records, annotateOptions) {
      const request = buildAnnotationRequest(language, records, annotateOptions);
      const runSignal = annotateOptions.signal;

      if (runSignal?.aborted) {
        throw new RunCancelledError();
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs);
      const onRunAbort = (): void => controller.abort();
      runSignal?.addEventListener('abort', onRunAbort, { once: true });

      logEvent('debug', 'annotation_request', {
        api_url: options.apiUrl,
        language,
        records: records.length,
      });

      let status: number;
      let ok: boolean;
      let retryAfter: string | null;
      let text: string;
      try {
        const response = await fetchFn(options.apiUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify(request),
          signal: controller.signal,
        });
        status = response.status;
        ok = response.ok;
        retryAfter = response.headers.get('Retry-After');
        text = await response.text();
      } catch (error) {
        if (runSignal?.aborted) {
          throw new RunCancelledError();
        }
        if (timedOut) {
          throw new TransientFailure(`Annotation request timed out after ${options.timeoutMs}ms`);
        }
        throw new TransientFailure(`Annotation request failed: ${errorMessage(error)}`);
      } finally {
        clearTimeout(timer);
        runSignal?.removeEventListener('abort', onRunAbort);
      }

      if (!ok) {
        throw classifyHttpFailure(status, text, retryAfter);
      }

      return parseAnnotationPayload(text);
    },
  };
}
