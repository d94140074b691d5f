/**
 * Report Formatter - composes the fixed-order report sections.
 *
 * Layout:
 *   title / blank / since-baseline / aggregate     <- header
 *   blank / gainers block / blank / losers block
 *   blank / weekly block                           <- body
 *   blank / hashtags                               <- footer
 */

import type { AggregateChange, DiffRecord, MovementSummary, RankedMovers } from '../types';
import { getReportCopy, type ReportCopy, type ReportLocale } from './copy';

export interface ReportInput {
  regionLabel: string;
  storeName?: string;
  baselineLabel: string;
  aggregate: AggregateChange;
  movers: RankedMovers;
  /** null when no week-ago snapshot could be compared */
  weekly: MovementSummary | null;
}

export interface FormatOptions {
  locale?: ReportLocale;
  currency?: string;
  hashtags?: readonly string[];
}

export interface ReportDocument {
  lines: string[];
  /** Leading lines kept verbatim by truncation */
  headerLineCount: number;
  footer: string;
}

export const DEFAULT_HASHTAGS = ['#Prices', '#Inflation'] as const;

/** `+10.0%`, `-5.0%`; anything that rounds to zero renders unsigned. */
export function formatSignedPct(value: number, digits: number): string {
  const magnitude = Math.abs(value).toFixed(digits);
  if (Number(magnitude) === 0) return `${magnitude}%`;
  const sign = value > 0 ? '+' : '-';
  return `${sign}${magnitude}%`;
}

export function formatPrice(value: number, currency: string): string {
  return `${value.toFixed(2)}${currency}`;
}

/** `castilla_y_leon` -> `Castilla Y Leon` */
export function regionDisplayName(region: string): string {
  return region
    .split(/[_\s-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function moverLines(records: readonly DiffRecord[], copy: ReportCopy, currency: string): string[] {
  if (records.length === 0) return [copy.noChanges];
  return records.map(
    (r) =>
      `• ${r.name} (${formatSignedPct(r.pctChange, 1)}): ` +
      `${formatPrice(r.priceBefore, currency)} → ${formatPrice(r.priceAfter, currency)}`,
  );
}

function weeklyLines(weekly: MovementSummary | null, copy: ReportCopy): string[] {
  if (!weekly) return [copy.lastWeek, copy.insufficientHistory];
  return [copy.lastWeek, copy.weeklyRose(weekly.rose), copy.weeklyFell(weekly.fell)];
}

export function buildReport(input: ReportInput, options: FormatOptions = {}): ReportDocument {
  const copy = getReportCopy(options.locale ?? 'en');
  const currency = options.currency ?? '€';
  const hashtags = options.hashtags ?? DEFAULT_HASHTAGS;

  const header = [
    copy.title(input.regionLabel, input.storeName),
    '',
    copy.since(input.baselineLabel),
    copy.averagePrice(formatSignedPct(input.aggregate.pctChange, 2)),
  ];

  const body = [
    '',
    copy.topGainers(input.baselineLabel),
    ...moverLines(input.movers.gainers, copy, currency),
    '',
    copy.topLosers(input.baselineLabel),
    ...moverLines(input.movers.losers, copy, currency),
    '',
    ...weeklyLines(input.weekly, copy),
  ];

  return {
    lines: [...header, ...body],
    headerLineCount: header.length,
    footer: hashtags.join(' '),
  };
}

/** Full report text, no length limit. */
export function renderReport(doc: ReportDocument): string {
  return [...doc.lines, '', doc.footer].join('\n');
}
