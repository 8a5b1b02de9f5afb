/**
 * Persists annotation responses as JSON artifacts.
 */

import type { AnnotationResult } from '../types/annotation.ts';
import { FilesystemFailure, errorMessage } from '../utils/errors.ts';
import { logEvent } from '../utils/log.ts';
import { buildArtifactPath, writeFileAtomic } from './artifacts.ts';

/**
 * Writes the response body verbatim to `{outputRoot}/{baseName}.json`.
 *
 * Runs for every successful result, flagged or not.
 *
 * @returns Path of the written artifact
 * @throws FilesystemFailure if the path is invalid or the write fails
 */
export async function writeResult(
  outputRoot: string,
  baseName: string,
  result: AnnotationResult,
): Promise<string> {
  let jsonPath: string;
  try {
    jsonPath = buildArtifactPath(outputRoot, baseName, 'json');
    await writeFileAtomic(jsonPath, result.payload);
  } catch (error) {
    throw new FilesystemFailure(`Cannot write result for ${baseName}: ${errorMessage(error)}`);
  }

  logEvent('debug', 'result_written', { base_name: baseName, json_path: jsonPath });
  return jsonPath;
}
