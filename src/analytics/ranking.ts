/**
 * Ranking Engine - top gainers and losers of a diff.
 */

import type { DiffRecord, RankedMovers } from '../types';

export const DEFAULT_TOP_N = 3;

function byProductId(a: DiffRecord, b: DiffRecord): number {
  if (a.productId === b.productId) return 0;
  return a.productId < b.productId ? -1 : 1;
}

/**
 * Unchanged prices never rank. Ties on pctChange go to the smaller productId
 * in both lists.
 */
export function rankMovers(records: readonly DiffRecord[], topN: number = DEFAULT_TOP_N): RankedMovers {
  const changed = records.filter((r) => r.pctChange !== 0);
  const limit = Math.max(0, Math.floor(topN));

  const gainers = [...changed]
    .sort((a, b) => b.pctChange - a.pctChange || byProductId(a, b))
    .slice(0, limit);
  const losers = [...changed]
    .sort((a, b) => a.pctChange - b.pctChange || byProductId(a, b))
    .slice(0, limit);

  return { gainers, losers };
}
