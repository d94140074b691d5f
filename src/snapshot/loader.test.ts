import { describe, it, expect } from 'vitest';
import { NoDataError } from '../errors';
import { loadSnapshot, parsePrice } from './loader';

const HEADER = 'date;warehouse;product_id;product_name;price;unit_size';

function table(...rows: string[]): string {
  return [HEADER, ...rows].join('\n');
}

describe('parsePrice', () => {
  it('accepts dot and comma decimal separators', () => {
    expect(parsePrice('1.25')).toBe(1.25);
    expect(parsePrice(' 0,95 ')).toBe(0.95);
    expect(parsePrice('3')).toBe(3);
  });

  it('returns NaN for non-numeric text', () => {
    expect(parsePrice('')).toBeNaN();
    expect(parsePrice('n/a')).toBeNaN();
    expect(parsePrice('1.234,50')).toBeNaN();
    expect(parsePrice('2€')).toBeNaN();
  });
});

describe('loadSnapshot', () => {
  it('keeps the three required columns and ignores extras', () => {
    const { snapshot, stats } = loadSnapshot(
      table('2026-01-04;mad1;  101 ;Whole milk;0,95;1L', '2026-01-04;mad1;102;Bread;1.20;'),
      { date: '2026-01-04' },
    );

    expect(snapshot).toEqual({
      date: '2026-01-04',
      records: [
        { productId: '101', productName: 'Whole milk', price: 0.95 },
        { productId: '102', productName: 'Bread', price: 1.2 },
      ],
    });
    expect(stats).toEqual({
      totalRows: 2,
      validRows: 2,
      dropped: { malformed: 0, missing_id: 0, invalid_price: 0 },
    });
  });

  it('drops bad rows and counts them by reason', () => {
    const { snapshot, stats } = loadSnapshot(
      table(
        '2026-01-04;mad1;101;Milk;0,95;1L',
        '2026-01-04;mad1;102;Bread',
        '2026-01-04;mad1;103;Rice;1.10;1kg;extra',
        '2026-01-04;mad1;   ;Ghost;2.00;1u',
        '2026-01-04;mad1;104;Free sample;0;1u',
        '2026-01-04;mad1;105;Refund;-1.5;1u',
        '2026-01-04;mad1;106;Unknown;n/a;1u',
      ),
      { date: '2026-01-04' },
    );

    expect(snapshot.records.map((r) => r.productId)).toEqual(['101']);
    expect(stats).toEqual({
      totalRows: 7,
      validRows: 1,
      dropped: { malformed: 2, missing_id: 1, invalid_price: 3 },
    });
  });

  it('finds columns regardless of order and case', () => {
    const { snapshot } = loadSnapshot('Price;Product_Name;Product_ID\n2,5;Tea;T1', { date: '2026-01-04' });
    expect(snapshot.records).toEqual([{ productId: 'T1', productName: 'Tea', price: 2.5 }]);
  });

  it('throws NoDataError when a required column is missing', () => {
    expect(() => loadSnapshot('product_id;price\n1;2', { date: '2026-01-04' })).toThrow(
      'Snapshot 2026-01-04 is missing columns: product_name',
    );
  });

  it('throws NoDataError when no row survives cleaning', () => {
    const run = () => loadSnapshot(table('2026-01-04;mad1;1;Milk;0;1L'), { date: '2026-01-04' });
    expect(run).toThrow(NoDataError);
    expect(run).toThrow('Snapshot 2026-01-04 has no valid rows');
  });

  it('throws NoDataError for an empty table', () => {
    expect(() => loadSnapshot('', { date: '2026-01-04' })).toThrow(NoDataError);
  });
});
