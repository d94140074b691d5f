/**
 * Calendar date helpers for catalog resolution.
 *
 * Dates travel as `YYYY-MM-DD` strings so they compare lexicographically.
 */

import type { CatalogEntry, IsoDate } from '../types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DATE_PATTERN = /(\d{4})-(\d{2})-(\d{2})/g;

export function isValidIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const parsed = new Date(Date.UTC(year, month - 1, day));
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

/**
 * First real calendar date embedded in `text`, or null.
 * `2026-02-30` is skipped in favour of a later valid match.
 */
export function findIsoDate(text: string): IsoDate | null {
  for (const match of text.matchAll(DATE_PATTERN)) {
    if (isValidIsoDate(match[0])) return match[0];
  }
  return null;
}

/**
 * Derive an entry's date: tag first, then its label, then asset names.
 * Entries with no date anywhere cannot take part in resolution.
 */
export function extractEntryDate(entry: CatalogEntry): IsoDate | null {
  const fromTag = findIsoDate(entry.tag);
  if (fromTag) return fromTag;

  if (entry.label) {
    const fromLabel = findIsoDate(entry.label);
    if (fromLabel) return fromLabel;
  }

  for (const asset of entry.assets) {
    const fromAsset = findIsoDate(asset.name);
    if (fromAsset) return fromAsset;
  }
  return null;
}

export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const [year, month, day] = date.split('-').map(Number);
  return toIsoDate(new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY));
}

/** Today's UTC calendar date. */
export function todayUtc(now: Date = new Date()): IsoDate {
  return toIsoDate(now);
}
