/**
 * Snapshot Loader & Normalizer
 *
 * Turns one raw snapshot table into validated ProductPriceRecords. Bad rows
 * are dropped one by one and only their counts leave this module.
 */

import { NoDataError, RowParseError, type RowDropReason } from '../errors';
import type { IsoDate, ProductPriceRecord, Snapshot } from '../types';
import { createLogger } from '../utils/logger';
import { columnIndex, parseDelimited } from './csv-parser';

const logger = createLogger('snapshot-loader');

export const REQUIRED_COLUMNS = ['product_id', 'product_name', 'price'] as const;

export interface LoadStats {
  totalRows: number;
  validRows: number;
  dropped: Record<RowDropReason, number>;
}

export interface LoadResult {
  snapshot: Snapshot;
  stats: LoadStats;
}

export interface LoadOptions {
  date: IsoDate;
  delimiter?: string;
}

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce a price written with either `.` or `,` as decimal separator.
 * Returns NaN for anything that is not a plain number.
 */
export function parsePrice(raw: string): number {
  const cleaned = raw.trim().replace(',', '.');
  if (!NUMERIC_PATTERN.test(cleaned)) return NaN;
  return Number(cleaned);
}

interface ColumnLayout {
  width: number;
  id: number;
  name: number;
  price: number;
}

function normalizeRow(fields: readonly string[], line: number, layout: ColumnLayout): ProductPriceRecord {
  if (fields.length !== layout.width) {
    throw new RowParseError(
      line,
      'malformed',
      `Expected ${layout.width} fields, found ${fields.length}`,
    );
  }

  const productId = fields[layout.id].trim();
  if (!productId) {
    throw new RowParseError(line, 'missing_id', 'Empty product_id');
  }

  const rawPrice = fields[layout.price];
  const price = parsePrice(rawPrice);
  if (!Number.isFinite(price) || price <= 0) {
    throw new RowParseError(line, 'invalid_price', `Unusable price "${rawPrice}"`);
  }

  return { productId, productName: fields[layout.name].trim(), price };
}

/**
 * Parse and clean one snapshot table.
 *
 * @throws NoDataError when a required column is missing or no row survives
 */
export function loadSnapshot(text: string, options: LoadOptions): LoadResult {
  const table = parseDelimited(text, { delimiter: options.delimiter });

  const layout: ColumnLayout = {
    width: table.header.length,
    id: columnIndex(table.header, 'product_id'),
    name: columnIndex(table.header, 'product_name'),
    price: columnIndex(table.header, 'price'),
  };

  const missing = REQUIRED_COLUMNS.filter((c) => columnIndex(table.header, c) === -1);
  if (missing.length > 0) {
    throw new NoDataError(`Snapshot ${options.date} is missing columns: ${missing.join(', ')}`);
  }

  const records: ProductPriceRecord[] = [];
  const dropped: Record<RowDropReason, number> = { malformed: 0, missing_id: 0, invalid_price: 0 };

  for (const row of table.rows) {
    try {
      records.push(normalizeRow(row.fields, row.line, layout));
    } catch (err) {
      if (!(err instanceof RowParseError)) throw err;
      dropped[err.reason]++;
    }
  }

  const stats: LoadStats = {
    totalRows: table.rows.length,
    validRows: records.length,
    dropped,
  };

  logger.info({ date: options.date, ...stats }, 'Snapshot table cleaned');

  if (records.length === 0) {
    throw new NoDataError(`Snapshot ${options.date} has no valid rows`);
  }

  return { snapshot: { date: options.date, records }, stats };
}
