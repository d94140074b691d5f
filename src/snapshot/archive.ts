/**
 * Archive extraction - pull the region's dated table out of a snapshot zip.
 *
 * Tables follow `<...>/<region>/<prefix>_<region>_<YYYY-MM-DD>.csv`.
 */

import AdmZip from 'adm-zip';
import { ArchiveExtractionError, errorMessage } from '../errors';
import type { SnapshotArchive } from '../catalog/types';
import type { DatedEntry } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('archive');

export interface TableSelector {
  /** Opaque region marker, e.g. `madrid` */
  region: string;
  /** File name prefix before `_<region>_`; any word when omitted */
  filePrefix?: string;
}

export interface ExtractedTable {
  path: string;
  text: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function tableNamePattern(selector: TableSelector): RegExp {
  const prefix = selector.filePrefix ? escapeRegExp(selector.filePrefix) : '[A-Za-z0-9-]+';
  const region = escapeRegExp(selector.region);
  return new RegExp(`^${prefix}_${region}_\\d{4}-\\d{2}-\\d{2}\\.csv$`, 'i');
}

/** True when `path` sits in a `<region>` directory and has a dated table name. */
export function matchesTablePath(path: string, selector: TableSelector): boolean {
  const segments = path.split(/[\\/]/).filter(Boolean);
  const fileName = segments.pop();
  if (!fileName) return false;
  return segments.includes(selector.region) && tableNamePattern(selector).test(fileName);
}

/**
 * Read the first matching table from a zip buffer.
 *
 * @throws ArchiveExtractionError when the zip is unreadable, holds no match,
 * or the matching entry fails to decompress
 */
export function extractSnapshotTable(data: Buffer, selector: TableSelector, tag: string): ExtractedTable {
  let zip: AdmZip;
  try {
    zip = new AdmZip(data);
  } catch (err) {
    throw new ArchiveExtractionError(tag, `Unreadable archive for ${tag}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const entry = zip
    .getEntries()
    .find((e) => !e.isDirectory && matchesTablePath(e.entryName, selector));

  if (!entry) {
    throw new ArchiveExtractionError(
      tag,
      `No ${selector.region} table found in archive for ${tag}`,
    );
  }

  // Inflate and CRC failures only surface when the entry is read.
  try {
    return { path: entry.entryName, text: entry.getData().toString('utf8') };
  } catch (err) {
    throw new ArchiveExtractionError(
      tag,
      `Corrupt ${entry.entryName} in archive for ${tag}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/**
 * Download an entry's zip assets in order until one yields the table.
 */
export async function fetchSnapshotTable(
  archive: SnapshotArchive,
  dated: DatedEntry,
  selector: TableSelector,
): Promise<ExtractedTable> {
  const { entry } = dated;
  const zipAssets = entry.assets.filter((a) => a.name.toLowerCase().endsWith('.zip'));
  if (zipAssets.length === 0) {
    throw new ArchiveExtractionError(entry.tag, `Entry ${entry.tag} has no zip asset`);
  }

  let lastError: ArchiveExtractionError | null = null;
  for (const asset of zipAssets) {
    const data = await archive.download(asset);
    try {
      const table = extractSnapshotTable(data, selector, entry.tag);
      logger.info({ tag: entry.tag, asset: asset.name, path: table.path }, 'Snapshot table extracted');
      return table;
    } catch (err) {
      if (!(err instanceof ArchiveExtractionError)) throw err;
      logger.debug({ tag: entry.tag, asset: asset.name, error: err.message }, 'Asset has no usable table');
      lastError = err;
    }
  }

  throw lastError ?? new ArchiveExtractionError(entry.tag, `No table extracted for ${entry.tag}`);
}
