import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ARTIFACT_TYPES, buildArtifactPath, writeFileAtomic } from '../src/storage/artifacts.ts';
import type { ArtifactType } from '../src/storage/artifacts.ts';

describe('buildArtifactPath', () => {
  it('constructs the path for every artifact type', () => {
    const types: ArtifactType[] = ['json', 'pdf'];
    for (const type of types) {
      expect(buildArtifactPath('/data/out', 'batch_001', type)).toBe(join('/data/out', `batch_001.${type}`));
    }
    expect(types.length).toBe(ARTIFACT_TYPES.length);
  });

  it('rejects path traversal in baseName', () => {
    expect(() => buildArtifactPath('/data/out', '..', 'json'))
      .toThrow('Path traversal detected');
    expect(() => buildArtifactPath('/data/out', '.', 'pdf'))
      .toThrow('Path traversal detected');
  });

  it('accepts a baseName that merely contains two dots', () => {
    expect(buildArtifactPath('/data/out', 'batch..v2', 'json')).toBe(join('/data/out', 'batch..v2.json'));
  });

  it('rejects path separators in baseName', () => {
    expect(() => buildArtifactPath('/data/out', 'en/batch_001', 'json'))
      .toThrow('baseName must not contain path separators');
  });

  it('rejects empty segments', () => {
    expect(() => buildArtifactPath('', 'batch_001', 'json'))
      .toThrow('outputRoot must not be empty');
    expect(() => buildArtifactPath('/data/out', ' ', 'json'))
      .toThrow('baseName must not be empty');
  });

  it('rejects invalid artifact type', () => {
    expect(() => buildArtifactPath('/data/out', 'batch_001', 'csv' as ArtifactType))
      .toThrow('Invalid artifact type: "csv". Must be one of: json, pdf');
  });
});

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the content and leaves no temp file behind', async () => {
    const path = join(dir, 'batch_001.json');
    await writeFileAtomic(path, '{"results":[]}');

    expect(await readFile(path, 'utf-8')).toBe('{"results":[]}');
    expect(await readdir(dir)).toEqual(['batch_001.json']);
  });

  it('replaces an existing file', async () => {
    const path = join(dir, 'batch_001.json');
    await writeFile(path, 'old');
    await writeFileAtomic(path, 'new');

    expect(await readFile(path, 'utf-8')).toBe('new');
    expect(await readdir(dir)).toEqual(['batch_001.json']);
  });

  it('removes the temp file when the rename fails', async () => {
    // Renaming a file onto a directory fails
    const path = join(dir, 'batch_001.pdf');
    await mkdir(path);

    await expect(writeFileAtomic(path, 'pdf bytes')).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['batch_001.pdf']);
  });

  it('rejects when the directory does not exist', async () => {
    await expect(writeFileAtomic(join(dir, 'missing', 'a.json'), '{}')).rejects.toThrow(/ENOENT/);
  });
});
