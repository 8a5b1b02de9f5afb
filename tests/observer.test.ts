import { describe, it, expect, vi } from 'vitest';
import {
  createConsoleObserver,
  formatRunEvent,
  notify,
} from '../src/events/observer.ts';
import type { RunEvent } from '../src/types/events.ts';

const AT = '2026-02-22T14:30:27.000Z';

const FILE = {
  run_id: 'run-1',
  file: 'en/batch_001.csv',
  language: 'en',
  base_name: 'batch_001',
  at: AT,
} as const;

describe('formatRunEvent', () => {
  it('formats run start', () => {
    expect(formatRunEvent({
      type: 'run-started',
      run_id: 'run-1',
      input_root: '/data/in',
      output_root: '/data/out',
      use_ner: true,
      use_llm: false,
      max_retries: 5,
      total_files: 3,
      at: AT,
    })).toBe('Starting processing of 3 file(s) from /data/in...');
  });

  it('formats a failed attempt with its retry delay', () => {
    expect(formatRunEvent({
      type: 'attempt-failed',
      ...FILE,
      attempt: 1,
      max_attempts: 3,
      retry_in_ms: 2000,
      error: 'Annotation service returned HTTP 503',
    })).toBe('[en/batch_001.csv] Attempt 1/3 failed: Annotation service returned HTTP 503. Retrying in 2s...');
  });

  it('shows fractional retry delays', () => {
    expect(formatRunEvent({
      type: 'attempt-failed',
      ...FILE,
      attempt: 2,
      max_attempts: 3,
      retry_in_ms: 1500,
      error: 'x',
    })).toBe('[en/batch_001.csv] Attempt 2/3 failed: x. Retrying in 1.5s...');
  });

  it('formats success with and without a report', () => {
    const base = { type: 'file-succeeded', ...FILE, json_path: '/out/batch_001.json', records: 2 } as const;
    expect(formatRunEvent({ ...base, pdf_path: '/out/batch_001.pdf', report_rows: 1 }))
      .toBe('[en/batch_001.csv] Success. Output written to /out/batch_001.json, report written to /out/batch_001.pdf');
    expect(formatRunEvent({ ...base, pdf_path: null, report_rows: 0 }))
      .toBe('[en/batch_001.csv] Success. Output written to /out/batch_001.json, no flagged entries');
  });

  it('formats a skipped file', () => {
    expect(formatRunEvent({
      type: 'file-skipped',
      ...FILE,
      reason: 'permanent-failure',
      error: 'Annotation service rejected the request (HTTP 400)',
    })).toBe('[en/batch_001.csv] Skipped (permanent-failure): Annotation service rejected the request (HTTP 400)');
  });

  it('formats run completion and cancellation', () => {
    const base = { type: 'run-completed', run_id: 'run-1', total: 4, succeeded: 3, reported: 1, skipped: 1, at: AT } as const;
    expect(formatRunEvent({ ...base, cancelled: false })).toBe('DONE. 3/4 succeeded, 1 report(s), 1 skipped.');
    expect(formatRunEvent({ ...base, cancelled: true })).toBe('CANCELLED. 3/4 succeeded, 1 skipped.');
  });
});

describe('notify', () => {
  it('logs and swallows an observer error', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const event: RunEvent = { type: 'file-started', ...FILE };

    expect(() => notify(() => {
      throw new Error('observer broke');
    }, event)).not.toThrow();

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const logged: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(logged).toMatchObject({
      level: 'error',
      event: 'observer_failed',
      event_type: 'file-started',
      error: 'observer broke',
    });
  });
});

describe('createConsoleObserver', () => {
  it('prints the formatted line', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createConsoleObserver()({ type: 'file-started', ...FILE });
    expect(logSpy).toHaveBeenCalledWith('[en/batch_001.csv] Processing...');
  });

  it('prints JSON lines when asked', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const event: RunEvent = { type: 'file-started', ...FILE };
    createConsoleObserver({ json: true })(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });
});
