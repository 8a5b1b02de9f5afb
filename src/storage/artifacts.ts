/**
 * Output artifact paths and atomic writes.
 *
 * All artifacts of a file live directly under the output root:
 *   {output_root}/{base_name}.{artifact_type}
 */

import { rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

/** Valid artifact types. */
export const ARTIFACT_TYPES = ['json', 'pdf'] as const;

export type ArtifactType = typeof ARTIFACT_TYPES[number];

/**
 * Builds the output path of an artifact.
 *
 * @param outputRoot - Output directory
 * @param baseName - Input file name without extension
 * @param artifactType - "json" or "pdf"
 * @returns Full path: {outputRoot}/{baseName}.{artifactType}
 *
 * @example
 * buildArtifactPath("/data/out", "batch_001", "pdf")
 * // => "/data/out/batch_001.pdf"
 */
export function buildArtifactPath(
  outputRoot: string,
  baseName: string,
  artifactType: ArtifactType,
): string {
  validateSegment(outputRoot, 'outputRoot');
  validateBaseName(baseName);
  validateArtifactType(artifactType);

  return join(outputRoot, `${baseName}.${artifactType}`);
}

/**
 * Writes data beside `path` under a unique temp name, then renames it into place.
 *
 * Readers of the output directory see either the old file or the new one.
 * The temp file is removed if the write fails.
 */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${uuidv4()}.tmp`);
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/** Validates that a value is non-empty. */
function validateSegment(value: string, name: string): void {
  if (!value || value.trim() === '') {
    throw new Error(`${name} must not be empty`);
  }
}

/** Validates that a base name stays inside the output root. */
function validateBaseName(value: string): void {
  validateSegment(value, 'baseName');
  if (value === '.' || value === '..') {
    throw new Error(`Path traversal detected: "${value}" is not a valid baseName`);
  }
  if (value.includes('/') || value.includes('\\')) {
    throw new Error('baseName must not contain path separators');
  }
}

/** Validates that the artifact type is one of the known types. */
function validateArtifactType(value: string): void {
  if (!(ARTIFACT_TYPES as readonly string[]).includes(value)) {
    throw new Error(
      `Invalid artifact type: "${value}". Must be one of: ${ARTIFACT_TYPES.join(', ')}`,
    );
  }
}
