/**
 * pricedrift - regional price drift reports from archived snapshots
 */

export * from './types';
export * from './errors';

export { extractEntryDate, findIsoDate, isValidIsoDate, addDays, todayUtc } from './catalog/dates';
export { resolveSnapshots, datedEntries, type ResolveOptions } from './catalog/resolver';
export { GitHubReleaseArchive } from './catalog/github';
export { DirectoryArchive } from './catalog/local';
export type { SnapshotArchive, GitHubArchiveOptions } from './catalog/types';

export { parseDelimited } from './snapshot/csv-parser';
export { loadSnapshot, parsePrice, type LoadStats, type LoadResult } from './snapshot/loader';
export { aggregateByProduct, aggregateSnapshot } from './snapshot/aggregator';
export { extractSnapshotTable, fetchSnapshotTable, type TableSelector } from './snapshot/archive';

export { diffSnapshots, joinProducts, aggregateChange, summarizeMovement, pctChange } from './analytics/diff';
export { rankMovers, DEFAULT_TOP_N } from './analytics/ranking';

export { buildReport, renderReport, type ReportDocument, type ReportInput } from './report/formatter';
export { truncateReport, formatReport, charLength, type TruncationResult } from './report/truncate';
export { REPORT_COPY, type ReportCopy, type ReportLocale } from './report/copy';

export { runPipeline, writeReport, deliverReport, createArchive, type PipelineResult, type Delivery } from './pipeline/run';
export { loadConfig, configSchema, ConfigError, type PipelineConfig } from './utils/config';
export { createLogger } from './utils/logger';
