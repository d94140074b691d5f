/**
 * Per-Product Aggregator
 *
 * A snapshot can observe the same product several times (one per warehouse
 * or sub-catalog query). Collapse them to one record per product_id: the
 * first name seen in source order, and the mean of all prices.
 */

import type { AggregatedProduct, AggregatedSnapshot, ProductPriceRecord, Snapshot } from '../types';

interface Accumulator {
  name: string;
  sum: number;
  count: number;
}

export function aggregateByProduct(records: readonly ProductPriceRecord[]): AggregatedProduct[] {
  // Map iteration follows insertion order, i.e. first encounter.
  const groups = new Map<string, Accumulator>();

  for (const record of records) {
    const acc = groups.get(record.productId);
    if (acc) {
      acc.sum += record.price;
      acc.count++;
    } else {
      groups.set(record.productId, { name: record.productName, sum: record.price, count: 1 });
    }
  }

  return Array.from(groups, ([productId, acc]) => ({
    productId,
    representativeName: acc.name,
    meanPrice: acc.sum / acc.count,
    observations: acc.count,
  }));
}

export function aggregateSnapshot(snapshot: Snapshot): AggregatedSnapshot {
  return { date: snapshot.date, products: aggregateByProduct(snapshot.records) };
}
