import { describe, it, expect } from 'vitest';
import type { DiffRecord } from '../types';
import { buildReport, formatPrice, formatSignedPct, regionDisplayName, renderReport, type ReportInput } from './formatter';

// =============================================================================
// Helpers
// =============================================================================

function mover(productId: string, name: string, priceBefore: number, priceAfter: number): DiffRecord {
  return {
    productId,
    name,
    priceBefore,
    priceAfter,
    pctChange: ((priceAfter - priceBefore) / priceBefore) * 100,
  };
}

function input(overrides: Partial<ReportInput> = {}): ReportInput {
  return {
    regionLabel: 'Madrid',
    baselineLabel: 'January 2026',
    aggregate: { matchedProducts: 2, meanBefore: 1.5, meanAfter: 1.5, pctChange: 0 },
    movers: {
      gainers: [mover('P1', 'Milk', 1.0, 1.1)],
      losers: [mover('P2', 'Bread', 2.0, 1.9)],
    },
    weekly: null,
    ...overrides,
  };
}

// =============================================================================
// Tests
// =============================================================================

describe('formatSignedPct', () => {
  it('signs non-zero values and leaves zero unsigned', () => {
    expect(formatSignedPct(10.000000000000009, 1)).toBe('+10.0%');
    expect(formatSignedPct(-5.000000000000004, 1)).toBe('-5.0%');
    expect(formatSignedPct(0, 2)).toBe('0.00%');
    expect(formatSignedPct(1.23456, 2)).toBe('+1.23%');
    expect(formatSignedPct(-0.001, 2)).toBe('0.00%');
    expect(formatSignedPct(0.004, 2)).toBe('0.00%');
    expect(formatSignedPct(-0.04, 1)).toBe('0.0%');
    expect(formatSignedPct(0.005001, 2)).toBe('+0.01%');
  });
});

describe('formatPrice / regionDisplayName', () => {
  it('formats prices with two decimals and the currency', () => {
    expect(formatPrice(1.1, '€')).toBe('1.10€');
    expect(formatPrice(12, '$')).toBe('12.00$');
  });

  it('title-cases region markers', () => {
    expect(regionDisplayName('madrid')).toBe('Madrid');
    expect(regionDisplayName('castilla_y_leon')).toBe('Castilla Y Leon');
  });
});

describe('buildReport', () => {
  it('renders every section in order', () => {
    const doc = buildReport(input());

    expect(doc.headerLineCount).toBe(4);
    expect(doc.footer).toBe('#Prices #Inflation');
    expect(renderReport(doc)).toBe(
      [
        '📊 Prices · Madrid',
        '',
        'Since January 2026:',
        '📈 Average price 0.00%',
        '',
        '⬆️ Top increases since January 2026:',
        '• Milk (+10.0%): 1.00€ → 1.10€',
        '',
        '⬇️ Top decreases since January 2026:',
        '• Bread (-5.0%): 2.00€ → 1.90€',
        '',
        'Last week:',
        'Insufficient history',
        '',
        '#Prices #Inflation',
      ].join('\n'),
    );
  });

  it('renders the weekly counts when a week-ago comparison exists', () => {
    const doc = buildReport(input({ weekly: { rose: 12, fell: 1, unchanged: 40 } }));

    expect(doc.lines.slice(-3)).toEqual(['Last week:', '🔺 12 products up', '🔻 1 product down']);
  });

  it('uses placeholders instead of empty mover sections', () => {
    const doc = buildReport(input({ movers: { gainers: [], losers: [] } }));

    expect(doc.lines.slice(4, 10)).toEqual([
      '',
      '⬆️ Top increases since January 2026:',
      'No relevant changes',
      '',
      '⬇️ Top decreases since January 2026:',
      'No relevant changes',
    ]);
  });

  it('signs a non-zero aggregate with two decimals', () => {
    const doc = buildReport(input({ aggregate: { matchedProducts: 2, meanBefore: 1, meanAfter: 1.02, pctChange: 2.004 } }));
    expect(doc.lines[3]).toBe('📈 Average price +2.00%');
  });

  it('prints an aggregate that rounds to zero without a sign', () => {
    const doc = buildReport(
      input({ aggregate: { matchedProducts: 1, meanBefore: 1000, meanAfter: 999.99, pctChange: -0.001 } }),
    );
    expect(doc.lines[3]).toBe('📈 Average price 0.00%');
  });

  it('supports the Spanish wording, a store name and custom hashtags', () => {
    const doc = buildReport(
      input({ storeName: 'Mercado', weekly: { rose: 3, fell: 2, unchanged: 0 } }),
      { locale: 'es', currency: ' EUR', hashtags: ['#Precios', '#Inflación'] },
    );

    expect(doc.lines[0]).toBe('📊 Precios Mercado · Madrid');
    expect(doc.lines[2]).toBe('Desde January 2026:');
    expect(doc.lines[6]).toBe('• Milk (+10.0%): 1.00 EUR → 1.10 EUR');
    expect(doc.lines.slice(-3)).toEqual(['Última semana:', '🔺 3 productos suben', '🔻 2 productos bajan']);
    expect(doc.footer).toBe('#Precios #Inflación');
  });
});
