/**
 * Shared domain types
 */

/** Calendar date in ISO form, `YYYY-MM-DD` (UTC). */
export type IsoDate = string;

// =============================================================================
// CATALOG
// =============================================================================

export interface CatalogAsset {
  name: string;
  url: string;
}

export interface CatalogEntry {
  /** Release tag or file name; identifies the entry within the catalog */
  tag: string;
  /** Human-readable release title, when the archive has one */
  label?: string;
  assets: CatalogAsset[];
}

export interface DatedEntry {
  date: IsoDate;
  entry: CatalogEntry;
}

export interface SnapshotSelection {
  baseline: DatedEntry;
  latest: DatedEntry;
  /** Absent when no snapshot is old enough for the weekly comparison */
  weekAgo: DatedEntry | null;
  /** Every entry a date could be derived from, oldest first */
  dateable: DatedEntry[];
}

// =============================================================================
// SNAPSHOTS
// =============================================================================

export interface ProductPriceRecord {
  productId: string;
  productName: string;
  price: number;
}

export interface Snapshot {
  date: IsoDate;
  records: readonly ProductPriceRecord[];
}

export interface AggregatedProduct {
  productId: string;
  representativeName: string;
  meanPrice: number;
  /** Number of observations folded into the mean */
  observations: number;
}

export interface AggregatedSnapshot {
  date: IsoDate;
  products: readonly AggregatedProduct[];
}

// =============================================================================
// ANALYTICS
// =============================================================================

export interface DiffRecord {
  productId: string;
  /** Display name taken from the later snapshot */
  name: string;
  priceBefore: number;
  priceAfter: number;
  pctChange: number;
}

export interface AggregateChange {
  matchedProducts: number;
  meanBefore: number;
  meanAfter: number;
  /** Percentage change of the mean prices, clamped to 0 below the noise floor */
  pctChange: number;
}

export interface SnapshotDiff {
  beforeDate: IsoDate;
  afterDate: IsoDate;
  records: DiffRecord[];
  aggregate: AggregateChange;
}

export interface RankedMovers {
  gainers: DiffRecord[];
  losers: DiffRecord[];
}

export interface MovementSummary {
  rose: number;
  fell: number;
  unchanged: number;
}
