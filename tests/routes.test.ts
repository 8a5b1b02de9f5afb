import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAnnotationClient } from '../src/client/annotation-client.ts';
import { loadConfig } from '../src/config/config.ts';
import { createApp } from '../src/index.ts';
import { RunManager } from '../src/runner/run-session.ts';
import { ConflictError } from '../src/utils/errors.ts';
import type { Responder } from './fake-annotation-service.ts';
import {
  TEST_API_URL,
  createFakeAnnotationService,
  deferred,
  flagging,
  jsonResponse,
  unflagged,
} from './fake-annotation-service.ts';

const CONFIG_TEXT = `[settings]
INPUT_FOLDER = input
OUTPUT_FOLDER = output
USE_NER = true
USE_LLM = false
MAX_RETRIES = 0
API_URL = ${TEST_API_URL}
REQUEST_TIMEOUT_SECONDS = 5
`;

let dir: string;
let configPath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'routes-'));
  configPath = join(dir, 'config.ini');
  await writeFile(configPath, CONFIG_TEXT);
  await mkdir(join(dir, 'input', 'en'), { recursive: true });
  await writeFile(join(dir, 'input', 'en', 'batch_001.csv'), '101,The man was aggressive\n102,She was calm\n');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

/** Control API wired to a fake annotation service and instant backoff. */
function setup(respond: Responder) {
  const service = createFakeAnnotationService(respond);
  const runs = new RunManager({
    loadConfig: () => loadConfig(configPath, dir),
    createClient: (config) => createAnnotationClient({
      apiUrl: config.apiUrl,
      timeoutMs: config.requestTimeoutMs,
      fetch: service.fetch,
    }),
    sleep: async () => {},
  });
  const app = createApp({ configPath, runs, cwd: dir });
  return { app, runs, service };
}

describe('GET /v1/config', () => {
  it('returns the settings of config.ini', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/config');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      INPUT_FOLDER: 'input',
      OUTPUT_FOLDER: 'output',
      USE_NER: true,
      USE_LLM: false,
      MAX_RETRIES: 0,
      API_URL: TEST_API_URL,
      REQUEST_TIMEOUT_SECONDS: 5,
    });
  });

  it('returns 500 with details when config.ini is invalid', async () => {
    await writeFile(configPath, '[settings]\nUSE_NER = maybe\n');
    const { app } = setup(unflagged);

    const res = await app.request('/v1/config');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Invalid configuration',
      details: 'USE_NER: Must be a boolean (true/false, yes/no, on/off, 1/0)',
    });
  });
});

describe('PUT /v1/config', () => {
  it('saves valid settings for the next run', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/config', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ INPUT_FOLDER: 'input', OUTPUT_FOLDER: 'reports', USE_LLM: true, MAX_RETRIES: 3 }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ OUTPUT_FOLDER: 'reports', USE_LLM: true, MAX_RETRIES: 3, USE_NER: true });

    const config = await loadConfig(configPath, dir);
    expect(config.outputRoot).toBe(join(dir, 'reports'));
    expect(config.useLlm).toBe(true);
    expect(config.maxRetries).toBe(3);
  });

  it('rejects invalid settings and leaves the file alone', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/config', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ MAX_RETRIES: -2 }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid configuration',
      details: 'MAX_RETRIES: MAX_RETRIES must not be negative',
    });
    expect(await readFile(configPath, 'utf-8')).toBe(CONFIG_TEXT);
  });

  it('rejects a body that is not JSON', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/config', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: 'USE_NER=true',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });
});

describe('runs', () => {
  it('GET /v1/runs/current returns 404 before the first run', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/runs/current');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'No run has been started' });
  });

  it('POST /v1/runs starts a run whose status can be polled', async () => {
    const { app, runs } = setup(flagging('aggressive'));

    const res = await app.request('/v1/runs', { method: 'POST' });
    expect(res.status).toBe(202);
    expect(await res.json()).toMatchObject({
      status: 'running',
      run_id: expect.stringMatching(/^\d{8}-\d{6}-GMT-/),
    });

    await runs.whenIdle();

    const statusRes = await app.request('/v1/runs/current');
    expect(statusRes.status).toBe(200);
    expect(await statusRes.json()).toMatchObject({
      run_id: runs.status()?.run_id,
      status: 'completed',
      finished_at: expect.any(String),
      summary: { total: 1, succeeded: 1, reported: 1, skipped: 0 },
      error_message: null,
      events: [
        { type: 'run-started' },
        { type: 'file-started' },
        { type: 'file-succeeded', report_rows: 1 },
        { type: 'run-completed' },
      ],
    });
  });

  it('reports completed_with_skips when a file is skipped', async () => {
    const { app, runs } = setup(() => jsonResponse({ error: 'bad request' }, 400));

    await app.request('/v1/runs', { method: 'POST' });
    await runs.whenIdle();

    expect(await (await app.request('/v1/runs/current')).json()).toMatchObject({
      status: 'completed_with_skips',
      summary: { total: 1, succeeded: 0, reported: 0, skipped: 1 },
    });
  });

  it('reports failed when the input folder is missing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await rm(join(dir, 'input'), { recursive: true });
    const { app, runs } = setup(unflagged);

    await app.request('/v1/runs', { method: 'POST' });
    await runs.whenIdle();

    expect(await (await app.request('/v1/runs/current')).json()).toMatchObject({
      status: 'failed',
      error_message: expect.stringMatching(/^Input folder not found: /),
      summary: null,
    });
  });

  it('POST /v1/runs returns 409 while a run is in progress', async () => {
    const gate = deferred();
    const { app, runs, service } = setup(async (request) => {
      await gate.promise;
      return unflagged(request);
    });

    expect((await app.request('/v1/runs', { method: 'POST' })).status).toBe(202);
    await vi.waitFor(() => expect(service.requests).toHaveLength(1));

    const second = await app.request('/v1/runs', { method: 'POST' });
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ error: expect.stringMatching(/ is already in progress$/) });

    gate.release();
    await runs.whenIdle();
    expect((await app.request('/v1/runs', { method: 'POST' })).status).toBe(202);
    await runs.whenIdle();
  });

  it('lets only one of two simultaneous starts through', async () => {
    const { runs } = setup(unflagged);

    const [first, second] = await Promise.allSettled([runs.start(), runs.start()]);
    const outcomes = [first.status, second.status].sort();
    expect(outcomes).toEqual(['fulfilled', 'rejected']);

    const rejected = first.status === 'rejected' ? first : second;
    if (rejected.status === 'rejected') {
      expect(rejected.reason).toBeInstanceOf(ConflictError);
    }
    await runs.whenIdle();
  });

  it('POST /v1/runs returns 500 when config.ini is invalid', async () => {
    await writeFile(configPath, '[other]\n');
    const { app } = setup(unflagged);

    const res = await app.request('/v1/runs', { method: 'POST' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Invalid configuration: missing [settings] section' });
  });

  it('POST /v1/runs/current/cancel returns 409 when nothing is running', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/runs/current/cancel', { method: 'POST' });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'No run is in progress' });
  });

  it('POST /v1/runs/current/cancel stops the active run', async () => {
    await writeFile(join(dir, 'input', 'en', 'batch_002.csv'), '201,Another line\n');
    const { app, runs, service } = setup(() => new Promise<Response>(() => {}));

    await app.request('/v1/runs', { method: 'POST' });
    await vi.waitFor(() => expect(service.requests).toHaveLength(1));

    const res = await app.request('/v1/runs/current/cancel', { method: 'POST' });
    expect(res.status).toBe(202);

    await runs.whenIdle();
    expect(await (await app.request('/v1/runs/current')).json()).toMatchObject({
      status: 'cancelled',
      summary: { total: 2, succeeded: 0, skipped: 1 },
    });
    expect(service.requests).toHaveLength(1);
  });
});

describe('GET /v1/analytics', () => {
  it('summarizes the output folder after a run', async () => {
    const { app, runs } = setup(flagging('aggressive'));
    await app.request('/v1/runs', { method: 'POST' });
    await runs.whenIdle();

    const res = await app.request('/v1/analytics?language=en');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      language: 'en',
      files: 1,
      records: 2,
      flagged_records: 1,
      tags: 1,
      issues: [{ literal: 'aggressive', count: 1 }],
      tags_per_record: { 0: 1, 1: 1 },
    });
  });

  it('rejects an unsupported language', async () => {
    const { app } = setup(unflagged);

    const res = await app.request('/v1/analytics?language=xx');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid query parameters',
      details: expect.stringMatching(/^language: /),
    });
  });
});
