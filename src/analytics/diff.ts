/**
 * Diff Engine - compares two aggregated snapshots product by product.
 *
 * Products present on only one side are catalog churn, not price change,
 * and are left out of both the per-product records and the aggregate.
 */

import type {
  AggregateChange,
  AggregatedProduct,
  AggregatedSnapshot,
  DiffRecord,
  MovementSummary,
  SnapshotDiff,
} from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('diff');

/** Aggregate changes smaller than this many percentage points read as zero. */
export const AGGREGATE_EPSILON = 1e-4;

export function pctChange(before: number, after: number): number {
  return ((after - before) / before) * 100;
}

function mean(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Percentage change between the mean "after" price and the mean "before"
 * price of the matched set. Not the mean of per-product percentages.
 */
export function aggregateChange(records: readonly DiffRecord[]): AggregateChange {
  if (records.length === 0) {
    return { matchedProducts: 0, meanBefore: 0, meanAfter: 0, pctChange: 0 };
  }

  const meanBefore = mean(records.map((r) => r.priceBefore));
  const meanAfter = mean(records.map((r) => r.priceAfter));
  const raw = pctChange(meanBefore, meanAfter);

  return {
    matchedProducts: records.length,
    meanBefore,
    meanAfter,
    pctChange: Math.abs(raw) < AGGREGATE_EPSILON ? 0 : raw,
  };
}

/**
 * Inner-join `before` and `after` on productId, in `after` order.
 */
export function joinProducts(
  before: readonly AggregatedProduct[],
  after: readonly AggregatedProduct[],
): DiffRecord[] {
  const beforeById = new Map(before.map((p) => [p.productId, p]));
  const records: DiffRecord[] = [];

  for (const current of after) {
    const previous = beforeById.get(current.productId);
    if (!previous) continue;
    records.push({
      productId: current.productId,
      name: current.representativeName,
      priceBefore: previous.meanPrice,
      priceAfter: current.meanPrice,
      pctChange: pctChange(previous.meanPrice, current.meanPrice),
    });
  }
  return records;
}

export function diffSnapshots(before: AggregatedSnapshot, after: AggregatedSnapshot): SnapshotDiff {
  const records = joinProducts(before.products, after.products);
  const aggregate = aggregateChange(records);

  if (records.length === 0) {
    logger.warn({ before: before.date, after: after.date }, 'Snapshots share no products');
  }
  logger.debug(
    {
      before: before.date,
      after: after.date,
      matched: records.length,
      onlyBefore: before.products.length - records.length,
      onlyAfter: after.products.length - records.length,
      aggregatePct: aggregate.pctChange,
    },
    'Snapshots diffed',
  );

  return { beforeDate: before.date, afterDate: after.date, records, aggregate };
}

export function summarizeMovement(records: readonly DiffRecord[]): MovementSummary {
  const summary: MovementSummary = { rose: 0, fell: 0, unchanged: 0 };
  for (const r of records) {
    if (r.pctChange > 0) summary.rose++;
    else if (r.pctChange < 0) summary.fell++;
    else summary.unchanged++;
  }
  return summary;
}
