/**
 * Report truncation under a hard character budget.
 *
 * The header (title + aggregate line) and the footer (hashtags) survive
 * verbatim; the body is cut to its longest whole-line prefix that fits.
 * Lengths are counted in Unicode code points, so an emoji is never split.
 */

import { renderReport, type ReportDocument } from './formatter';

export const ELLIPSIS = '…';

/** Below this much room for body text only header and footer are emitted. */
export const MIN_BODY_CHARS = 20;

export type TruncationOutcome = 'complete' | 'truncated' | 'degenerate';

export interface TruncationResult {
  text: string;
  outcome: TruncationOutcome;
  keptBodyLines: number;
  droppedBodyLines: number;
}

export function charLength(text: string): number {
  return Array.from(text).length;
}

/** Cut to `budget - 1` code points plus an ellipsis, only when over budget. */
export function hardTruncate(text: string, budget: number): string {
  const chars = Array.from(text);
  if (chars.length <= budget) return text;
  return chars.slice(0, Math.max(0, budget - 1)).join('') + ELLIPSIS;
}

export function truncateReport(doc: ReportDocument, budget: number): TruncationResult {
  if (!Number.isInteger(budget) || budget < 1) {
    throw new RangeError(`Character budget must be a positive integer, got ${budget}`);
  }

  const header = doc.lines.slice(0, doc.headerLineCount);
  const body = doc.lines.slice(doc.headerLineCount);
  const headerBlock = header.join('\n');
  const footerBlock = `\n\n${doc.footer}`;

  const available = budget - charLength(headerBlock) - charLength(footerBlock);

  if (available < MIN_BODY_CHARS) {
    return {
      text: hardTruncate(headerBlock + footerBlock, budget),
      outcome: 'degenerate',
      keptBodyLines: 0,
      droppedBodyLines: body.length,
    };
  }

  const kept: string[] = [];
  let used = 0;
  for (const line of body) {
    const cost = 1 + charLength(line);
    if (used + cost > available) break;
    kept.push(line);
    used += cost;
  }
  // A kept prefix ending on a section gap would double the blank before the footer.
  while (kept.length > 0 && kept[kept.length - 1].trim() === '') {
    kept.pop();
  }
  const droppedBodyLines = body.length - kept.length;

  const text = headerBlock + kept.map((line) => `\n${line}`).join('') + footerBlock;

  return {
    text: hardTruncate(text, budget),
    outcome: droppedBodyLines === 0 ? 'complete' : 'truncated',
    keptBodyLines: kept.length,
    droppedBodyLines,
  };
}

/**
 * Final report text: verbatim without a budget, truncated with one.
 */
export function formatReport(doc: ReportDocument, maxChars: number | null): TruncationResult {
  if (maxChars === null) {
    return {
      text: renderReport(doc),
      outcome: 'complete',
      keptBodyLines: doc.lines.length - doc.headerLineCount,
      droppedBodyLines: 0,
    };
  }
  return truncateReport(doc, maxChars);
}
