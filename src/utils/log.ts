/**
 * Structured JSON-line logging.
 *
 * Each line is `{ level, event, ...fields, at }`. Debug and info go to
 * stdout, warn and error to stderr. LOG_LEVEL sets the threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function thresholdFromEnv(): LogLevel {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return 'info';
}

/** Writes one structured log line if `level` passes the LOG_LEVEL threshold. */
export function logEvent(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> = {},
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[thresholdFromEnv()]) {
    return;
  }

  const line = JSON.stringify({ level, event, ...fields, at: new Date().toISOString() });

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}
