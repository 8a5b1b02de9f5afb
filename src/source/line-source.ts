/**
 * Reads an input file as a sequence of text records.
 *
 * Each non-empty line is one record. Whitespace-only lines are skipped and
 * do not consume an index. Calling readRecords again re-reads the file.
 */

import { open } from 'node:fs/promises';
import type { TextRecord } from '../types/annotation.ts';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Streams the records of a file in file order.
 *
 * @param path - Input file path
 * @returns Lazy sequence of records with dense 1-based indexes
 */
export async function* readRecords(path: string): AsyncGenerator<TextRecord> {
  const handle = await open(path, 'r');
  const lines = handle.readLines({ encoding: 'utf-8' });

  let index = 0;
  let first = true;

  try {
    for await (const rawLine of lines) {
      const line = first && rawLine.startsWith(BYTE_ORDER_MARK) ? rawLine.slice(1) : rawLine;
      first = false;

      if (line.trim() === '') continue;

      index += 1;
      yield { index, text: line };
    }
  } finally {
    lines.close();
    await handle.close();
  }
}

/** Reads every record of a file into memory. */
export async function collectRecords(path: string): Promise<TextRecord[]> {
  const records: TextRecord[] = [];
  for await (const record of readRecords(path)) {
    records.push(record);
  }
  return records;
}
