import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CatalogFetchError } from '../errors';
import { DirectoryArchive } from './local';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'pricedrift-archive-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('DirectoryArchive', () => {
  it('lists zip files as entries tagged by file name', async () => {
    writeFileSync(join(dir, 'data-2026-01-05.zip'), 'b');
    writeFileSync(join(dir, 'data-2026-01-04.ZIP'), 'a');
    writeFileSync(join(dir, 'notes.txt'), 'ignored');

    const entries = await new DirectoryArchive(dir).listEntries();

    expect(entries.map((e) => e.tag)).toEqual(['data-2026-01-04', 'data-2026-01-05']);
    expect(entries[0].assets).toEqual([
      { name: 'data-2026-01-04.ZIP', url: join(dir, 'data-2026-01-04.ZIP') },
    ]);
  });

  it('downloads by reading the file', async () => {
    writeFileSync(join(dir, 'data-2026-01-04.zip'), 'zip-bytes');
    const archive = new DirectoryArchive(dir);
    const [entry] = await archive.listEntries();

    const data = await archive.download(entry.assets[0]);

    expect(data.toString('utf8')).toBe('zip-bytes');
  });

  it('raises CatalogFetchError for a missing directory', async () => {
    await expect(new DirectoryArchive(join(dir, 'missing')).listEntries()).rejects.toThrow(
      CatalogFetchError,
    );
  });
});
