/**
 * Report wording. `es` keeps the phrasing the published reports started with.
 */

export type ReportLocale = 'en' | 'es';

export interface ReportCopy {
  title(regionLabel: string, storeName?: string): string;
  since(baselineLabel: string): string;
  averagePrice(pct: string): string;
  topGainers(baselineLabel: string): string;
  topLosers(baselineLabel: string): string;
  noChanges: string;
  lastWeek: string;
  weeklyRose(count: number): string;
  weeklyFell(count: number): string;
  insufficientHistory: string;
}

const en: ReportCopy = {
  title: (region, store) => (store ? `📊 ${store} prices · ${region}` : `📊 Prices · ${region}`),
  since: (label) => `Since ${label}:`,
  averagePrice: (pct) => `📈 Average price ${pct}`,
  topGainers: (label) => `⬆️ Top increases since ${label}:`,
  topLosers: (label) => `⬇️ Top decreases since ${label}:`,
  noChanges: 'No relevant changes',
  lastWeek: 'Last week:',
  weeklyRose: (n) => `🔺 ${n} ${n === 1 ? 'product' : 'products'} up`,
  weeklyFell: (n) => `🔻 ${n} ${n === 1 ? 'product' : 'products'} down`,
  insufficientHistory: 'Insufficient history',
};

const es: ReportCopy = {
  title: (region, store) => (store ? `📊 Precios ${store} · ${region}` : `📊 Precios · ${region}`),
  since: (label) => `Desde ${label}:`,
  averagePrice: (pct) => `📈 Precio medio ${pct}`,
  topGainers: (label) => `⬆️ Top subidas desde ${label}:`,
  topLosers: (label) => `⬇️ Top bajadas desde ${label}:`,
  noChanges: 'Sin cambios relevantes',
  lastWeek: 'Última semana:',
  weeklyRose: (n) => `🔺 ${n} productos suben`,
  weeklyFell: (n) => `🔻 ${n} productos bajan`,
  insufficientHistory: 'Sin histórico suficiente',
};

export const REPORT_COPY: Record<ReportLocale, ReportCopy> = { en, es };

export function getReportCopy(locale: ReportLocale): ReportCopy {
  return REPORT_COPY[locale];
}
