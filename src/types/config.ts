/**
 * Configuration shapes: the config.ini `[settings]` section and the frozen
 * snapshot a run works from.
 */

/** Settings as stored in config.ini, keyed by their file names. */
export interface ConfigSettings {
  readonly INPUT_FOLDER: string;
  readonly OUTPUT_FOLDER: string;
  readonly USE_NER: boolean;
  readonly USE_LLM: boolean;
  readonly MAX_RETRIES: number;
  readonly API_URL: string;
  readonly REQUEST_TIMEOUT_SECONDS: number;
}

/** Immutable per-run snapshot. Paths are absolute. */
export interface RunConfiguration {
  readonly inputRoot: string;
  readonly outputRoot: string;
  readonly useNer: boolean;
  readonly useLlm: boolean;
  /** Extra attempts after the first one. */
  readonly maxRetries: number;
  readonly apiUrl: string;
  readonly requestTimeoutMs: number;
}
