/**
 * Directory archive - an offline mirror of the release catalog.
 *
 * Every `*.zip` file in the directory is one entry, tagged with its file
 * name (minus extension) and carrying itself as the only asset.
 */

import { readdir, readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { CatalogFetchError, errorMessage } from '../errors';
import type { CatalogAsset, CatalogEntry } from '../types';
import { createLogger } from '../utils/logger';
import type { SnapshotArchive } from './types';

const logger = createLogger('directory-archive');

export class DirectoryArchive implements SnapshotArchive {
  readonly kind = 'directory';
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async listEntries(): Promise<CatalogEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      throw new CatalogFetchError(`Cannot read archive directory ${this.dir}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const entries = names
      .filter((name) => name.toLowerCase().endsWith('.zip'))
      .sort()
      .map((name) => ({
        tag: name.replace(/\.zip$/i, ''),
        assets: [{ name, url: join(this.dir, name) }],
      }));

    logger.info({ dir: this.dir, entries: entries.length }, 'Archive directory listed');
    return entries;
  }

  async download(asset: CatalogAsset): Promise<Buffer> {
    try {
      return await readFile(asset.url);
    } catch (err) {
      throw new CatalogFetchError(`Cannot read archive ${asset.url}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
