/**
 * Input discovery: `{input_root}/{language}/*.csv`.
 *
 * Language folders are visited in LANGUAGE_CODES order and files in
 * lexicographic order, which fixes the order of a run's events. Folders
 * named after unsupported languages are never read.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { FileJob } from '../types/annotation.ts';
import { InputRootError, errorMessage } from '../utils/errors.ts';
import { LANGUAGE_CODES } from '../utils/languages.ts';
import { logEvent } from '../utils/log.ts';

const INPUT_EXTENSION = '.csv';

/**
 * Lists the jobs of a run.
 *
 * Missing and empty language folders contribute nothing.
 *
 * @param inputRoot - Directory holding one folder per language
 * @returns Jobs in processing order
 * @throws InputRootError if the input root is missing or not a directory
 */
export async function discoverJobs(inputRoot: string): Promise<FileJob[]> {
  await assertDirectory(inputRoot);

  const jobs: FileJob[] = [];

  for (const language of LANGUAGE_CODES) {
    const folder = join(inputRoot, language);
    const entries = await listFolder(folder);

    const fileNames = entries
      .filter((entry) => entry.isFile() && isInputFile(entry.name))
      .map((entry) => entry.name)
      .sort();

    if (fileNames.length === 0) {
      logEvent('debug', 'language_folder_empty', { language, folder });
      continue;
    }

    for (const fileName of fileNames) {
      jobs.push({
        sourcePath: join(folder, fileName),
        language,
        baseName: basename(fileName, extname(fileName)),
        fileName,
      });
    }
  }

  return jobs;
}

/** True for visible `*.csv` files (extension matched case-insensitively). */
export function isInputFile(fileName: string): boolean {
  return !fileName.startsWith('.') && extname(fileName).toLowerCase() === INPUT_EXTENSION;
}

async function assertDirectory(inputRoot: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputRoot)).isDirectory();
  } catch (error) {
    throw new InputRootError(`Input folder not found: ${inputRoot} (${errorMessage(error)})`);
  }
  if (!isDirectory) {
    throw new InputRootError(`Input folder is not a directory: ${inputRoot}`);
  }
}

/** Reads a language folder; a folder that cannot be listed has no files. */
async function listFolder(folder: string): Promise<Dirent[]> {
  try {
    return await readdir(folder, { withFileTypes: true });
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    const level = code === 'ENOENT' || code === 'ENOTDIR' ? 'debug' : 'warn';
    logEvent(level, 'language_folder_unreadable', { folder, error: errorMessage(error) });
    return [];
  }
}
