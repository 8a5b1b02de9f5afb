/**
 * Aggregates the JSON artifacts of an output folder: how many records were
 * flagged, which literals were tagged most, and how tags spread per record.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { parseAnnotationPayload } from '../client/annotation-client.ts';
import type { Entry } from '../types/annotation.ts';
import type { AnalyticsSummary, IssueCount } from '../types/api.ts';
import { FilesystemFailure, PermanentFailure, errorMessage } from '../utils/errors.ts';
import type { LanguageCode } from '../utils/languages.ts';
import { logEvent } from '../utils/log.ts';

/**
 * Summarizes every `*.json` artifact under `outputRoot`.
 *
 * Artifacts that are not annotation responses are skipped. `files` counts
 * the artifacts that contributed at least one entry.
 *
 * @param outputRoot - Folder holding the JSON artifacts
 * @param language - Only count entries whose `language` matches
 * @throws FilesystemFailure if the folder exists but cannot be read
 */
export async function summarizeResults(
  outputRoot: string,
  language?: LanguageCode,
): Promise<AnalyticsSummary> {
  const fileNames = await listArtifacts(outputRoot);

  let files = 0;
  let records = 0;
  let flaggedRecords = 0;
  let tags = 0;
  const issueCounts = new Map<string, number>();
  const tagsPerRecord: Record<string, number> = {};

  for (const fileName of fileNames) {
    const path = join(outputRoot, fileName);

    let entries: readonly Entry[];
    try {
      entries = parseAnnotationPayload(await readFile(path, 'utf-8')).entries;
    } catch (error) {
      if (!(error instanceof PermanentFailure)) {
        throw new FilesystemFailure(`Cannot read ${path}: ${errorMessage(error)}`);
      }
      logEvent('warn', 'analytics_artifact_ignored', { path, error: error.message });
      continue;
    }

    const matching = language ? entries.filter((entry) => entry.language === language) : entries;
    if (matching.length === 0) continue;

    files += 1;
    for (const entry of matching) {
      const count = entry.tags.length;
      records += 1;
      tags += count;
      if (count > 0) flaggedRecords += 1;
      tagsPerRecord[count] = (tagsPerRecord[count] ?? 0) + 1;

      for (const tag of entry.tags) {
        issueCounts.set(tag.literal, (issueCounts.get(tag.literal) ?? 0) + 1);
      }
    }
  }

  return {
    language: language ?? null,
    files,
    records,
    flagged_records: flaggedRecords,
    tags,
    issues: sortIssues(issueCounts),
    tags_per_record: tagsPerRecord,
  };
}

/** Most frequent first; ties by literal. */
function sortIssues(counts: Map<string, number>): IssueCount[] {
  return [...counts.entries()]
    .map(([literal, count]) => ({ literal, count }))
    .sort((a, b) => b.count - a.count || (a.literal < b.literal ? -1 : a.literal > b.literal ? 1 : 0));
}

async function listArtifacts(outputRoot: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(outputRoot);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw new FilesystemFailure(`Cannot list ${outputRoot}: ${errorMessage(error)}`);
  }

  return names
    .filter((name) => !name.startsWith('.') && extname(name).toLowerCase() === '.json')
    .sort();
}
