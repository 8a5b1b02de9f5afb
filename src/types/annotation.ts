/**
 * Domain types for the annotation pipeline: input records, the parsed
 * service response and the per-file job.
 */

import type { LanguageCode } from '../utils/languages.ts';

/** One non-empty line of an input file, indexed densely from 1. */
export interface TextRecord {
  readonly index: number;
  readonly text: string;
}

/** One flagged-language finding attached to an entry. */
export interface Tag {
  readonly description: string;
  readonly literal: string;
  readonly source: string;
}

/** One annotated record in the service response. */
export interface Entry {
  readonly recordIndex: number;
  readonly literal: string;
  readonly language: string | null;
  readonly tags: readonly Tag[];
}

/**
 * Parsed annotation response.
 *
 * `payload` is the response body exactly as received; it is what the JSON
 * artifact contains, so fields this type does not model are preserved.
 */
export interface AnnotationResult {
  readonly entries: readonly Entry[];
  readonly payload: string;
}

/** Feature flags sent with every annotation request. */
export interface AnnotationFlags {
  readonly useNer: boolean;
  readonly useLlm: boolean;
}

/** A discovered input file, consumed once per run. */
export interface FileJob {
  readonly sourcePath: string;
  readonly language: LanguageCode;
  /** File name without its extension; names the output artifacts. */
  readonly baseName: string;
  readonly fileName: string;
}
