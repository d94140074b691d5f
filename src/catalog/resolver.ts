/**
 * Snapshot Catalog Resolver
 *
 * Picks the three snapshots a report compares:
 * - baseline: earliest snapshot on or after the configured baseline date
 * - latest:   most recent snapshot
 * - week-ago: nearest snapshot at or before `today - lookbackDays`
 */

import { SnapshotNotFoundError } from '../errors';
import type { CatalogEntry, DatedEntry, IsoDate, SnapshotSelection } from '../types';
import { createLogger } from '../utils/logger';
import { addDays, extractEntryDate } from './dates';

const logger = createLogger('resolver');

export interface ResolveOptions {
  baselineDate: IsoDate;
  today: IsoDate;
  lookbackDays: number;
}

/** Dateable entries, oldest first; same-day entries ordered by tag. */
export function datedEntries(entries: readonly CatalogEntry[]): DatedEntry[] {
  const dated: DatedEntry[] = [];
  let skipped = 0;

  for (const entry of entries) {
    const date = extractEntryDate(entry);
    if (date) {
      dated.push({ date, entry });
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.debug({ skipped }, 'Catalog entries without a date ignored');
  }

  return dated.sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    if (a.entry.tag === b.entry.tag) return 0;
    return a.entry.tag < b.entry.tag ? -1 : 1;
  });
}

export function findBaseline(dated: readonly DatedEntry[], baselineDate: IsoDate): DatedEntry {
  const found = dated.find((d) => d.date >= baselineDate);
  if (!found) {
    throw new SnapshotNotFoundError(
      'baseline',
      `No snapshot dated on or after baseline ${baselineDate}`,
    );
  }
  return found;
}

export function findLatest(dated: readonly DatedEntry[]): DatedEntry {
  const last = dated[dated.length - 1];
  if (!last) {
    throw new SnapshotNotFoundError('latest', 'Catalog has no dateable snapshots');
  }
  return last;
}

/** Nearest at-or-before `target`; null when every snapshot is newer. */
export function findAtOrBefore(dated: readonly DatedEntry[], target: IsoDate): DatedEntry | null {
  let best: DatedEntry | null = null;
  for (const d of dated) {
    if (d.date > target) break;
    best = d;
  }
  return best;
}

export function resolveSnapshots(
  entries: readonly CatalogEntry[],
  options: ResolveOptions,
): SnapshotSelection {
  const dateable = datedEntries(entries);
  const latest = findLatest(dateable);
  const baseline = findBaseline(dateable, options.baselineDate);

  const weekTarget = addDays(options.today, -options.lookbackDays);
  const weekAgo = findAtOrBefore(dateable, weekTarget);

  logger.info(
    {
      entries: entries.length,
      dateable: dateable.length,
      baseline: baseline.date,
      latest: latest.date,
      weekTarget,
      weekAgo: weekAgo?.date ?? null,
    },
    'Snapshots resolved',
  );

  return { baseline, latest, weekAgo, dateable };
}
