/**
 * debias-batch command line.
 *
 *   run        process the input folder once
 *   serve      start the control API
 *   analytics  print tag statistics of the output folder
 */

import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { Command, InvalidArgumentError } from 'commander';
import { summarizeResults } from './analytics/summary.ts';
import { createAnnotationClient } from './client/annotation-client.ts';
import { loadConfig } from './config/config.ts';
import { createConsoleObserver } from './events/observer.ts';
import { createApp } from './index.ts';
import { runBatch } from './runner/batch-runner.ts';
import { RunManager } from './runner/run-session.ts';
import type { RunConfiguration } from './types/config.ts';
import { errorMessage } from './utils/errors.ts';
import { isLanguageCode } from './utils/languages.ts';
import type { LanguageCode } from './utils/languages.ts';
import { logEvent } from './utils/log.ts';

/** Exit code when the run finished but some files were skipped or it was cancelled. */
const EXIT_WITH_SKIPS = 2;

const DEFAULT_PORT = 8787;

function clientFor(config: RunConfiguration) {
  return createAnnotationClient({ apiUrl: config.apiUrl, timeoutMs: config.requestTimeoutMs });
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parseLanguage(value: string): LanguageCode {
  if (!isLanguageCode(value)) {
    throw new InvalidArgumentError('Language must be one of: de, en, fr, it, nl.');
  }
  return value;
}

async function runCommand(options: { config: string; json?: boolean }): Promise<void> {
  const config = await loadConfig(resolve(options.config));

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const summary = await runBatch(config, {
      client: clientFor(config),
      observer: createConsoleObserver({ json: options.json }),
      signal: controller.signal,
    });
    if (summary.skipped > 0 || summary.cancelled) {
      process.exitCode = EXIT_WITH_SKIPS;
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function serveCommand(options: { config: string; port: number }): void {
  const configPath = resolve(options.config);
  const cwd = process.cwd();

  const runs = new RunManager({
    loadConfig: () => loadConfig(configPath, cwd),
    createClient: clientFor,
    observer: createConsoleObserver({ json: true }),
  });
  const app = createApp({ configPath, runs, cwd });

  serve({ fetch: app.fetch, port: options.port }, (info) => {
    logEvent('info', 'server_started', { port: info.port, config_path: configPath });
  });
}

async function analyticsCommand(options: { config: string; language?: LanguageCode }): Promise<void> {
  const config = await loadConfig(resolve(options.config));
  const summary = await summarizeResults(config.outputRoot, options.language);
  console.log(JSON.stringify(summary, null, 2));
}

const program = new Command();

program
  .name('debias-batch')
  .description('Annotate line-delimited text files and report flagged entries');

program
  .command('run', { isDefault: true })
  .description('Process every file under the input folder once')
  .option('-c, --config <path>', 'configuration file', 'config.ini')
  .option('--json', 'print progress events as JSON lines')
  .action(runCommand);

program
  .command('serve')
  .description('Start the control API')
  .option('-c, --config <path>', 'configuration file', 'config.ini')
  .option('-p, --port <port>', 'port to listen on', parsePort, DEFAULT_PORT)
  .action(serveCommand);

program
  .command('analytics')
  .description('Print tag statistics of the output folder as JSON')
  .option('-c, --config <path>', 'configuration file', 'config.ini')
  .option('-l, --language <code>', 'only count entries of this language', parseLanguage)
  .action(analyticsCommand);

process.env.LOG_LEVEL ??= 'warn';

try {
  await program.parseAsync(process.argv);
} catch (error) {
  logEvent('error', 'fatal_error', { error: errorMessage(error) });
  process.exitCode = 1;
}
