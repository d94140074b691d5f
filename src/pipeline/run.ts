/**
 * Report pipeline
 *
 * list catalog -> resolve baseline/latest/week-ago -> load + aggregate each
 * -> diff (latest vs baseline, latest vs week-ago) -> rank -> format.
 *
 * Baseline and latest are mandatory: any failure on them rejects the run and
 * no text is produced. A week-ago failure only degrades the weekly section.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { diffSnapshots, summarizeMovement } from '../analytics/diff';
import { rankMovers } from '../analytics/ranking';
import { todayUtc } from '../catalog/dates';
import { GitHubReleaseArchive } from '../catalog/github';
import { DirectoryArchive } from '../catalog/local';
import { resolveSnapshots } from '../catalog/resolver';
import type { SnapshotArchive } from '../catalog/types';
import { errorMessage, isPipelineError } from '../errors';
import { buildReport, regionDisplayName, type ReportDocument } from '../report/formatter';
import { formatReport, type TruncationOutcome } from '../report/truncate';
import { aggregateSnapshot } from '../snapshot/aggregator';
import { fetchSnapshotTable } from '../snapshot/archive';
import { loadSnapshot, type LoadStats } from '../snapshot/loader';
import type {
  AggregatedSnapshot,
  DatedEntry,
  IsoDate,
  MovementSummary,
  RankedMovers,
  SnapshotDiff,
  SnapshotSelection,
} from '../types';
import type { PipelineConfig } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('pipeline');

export interface PipelineDeps {
  archive: SnapshotArchive;
  /** Reference date for the week-ago lookup (default: today, UTC) */
  today?: IsoDate;
}

export interface LoadedSnapshot {
  tag: string;
  aggregated: AggregatedSnapshot;
  stats: LoadStats;
}

export interface PipelineResult {
  text: string;
  outcome: TruncationOutcome;
  document: ReportDocument;
  selection: SnapshotSelection;
  historical: { diff: SnapshotDiff; movers: RankedMovers };
  weekly: { diff: SnapshotDiff; summary: MovementSummary } | null;
  loaded: LoadedSnapshot[];
}

export function createArchive(config: PipelineConfig): SnapshotArchive {
  if (config.catalog.directory) {
    return new DirectoryArchive(config.catalog.directory);
  }
  return new GitHubReleaseArchive({
    repository: config.catalog.repository,
    token: config.catalog.token,
    apiUrl: config.catalog.apiUrl,
    timeoutMs: config.catalog.timeoutMs,
    maxAttempts: config.catalog.maxAttempts,
  });
}

export async function loadAggregated(
  archive: SnapshotArchive,
  dated: DatedEntry,
  config: PipelineConfig,
): Promise<LoadedSnapshot> {
  const table = await fetchSnapshotTable(archive, dated, {
    region: config.region,
    filePrefix: config.archive.filePrefix,
  });
  const { snapshot, stats } = loadSnapshot(table.text, {
    date: dated.date,
    delimiter: config.archive.delimiter,
  });
  return { tag: dated.entry.tag, aggregated: aggregateSnapshot(snapshot), stats };
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<PipelineResult> {
  const today = deps.today ?? todayUtc();
  const entries = await deps.archive.listEntries();

  const selection = resolveSnapshots(entries, {
    baselineDate: config.baseline.date,
    today,
    lookbackDays: config.lookbackDays,
  });

  // Independent reads; nothing downstream starts until all have settled.
  const [baselineResult, latestResult, weekResult] = await Promise.allSettled([
    loadAggregated(deps.archive, selection.baseline, config),
    loadAggregated(deps.archive, selection.latest, config),
    selection.weekAgo ? loadAggregated(deps.archive, selection.weekAgo, config) : Promise.resolve(null),
  ]);

  if (baselineResult.status === 'rejected') throw baselineResult.reason;
  if (latestResult.status === 'rejected') throw latestResult.reason;

  const baseline = baselineResult.value;
  const latest = latestResult.value;
  const loaded = [baseline, latest];

  let weekAgo: LoadedSnapshot | null = null;
  if (weekResult.status === 'fulfilled') {
    weekAgo = weekResult.value;
    if (weekAgo) loaded.push(weekAgo);
  } else {
    const reason: unknown = weekResult.reason;
    if (!isPipelineError(reason)) throw reason;
    logger.warn(
      { tag: selection.weekAgo?.entry.tag, code: reason.code, error: reason.message },
      'Week-ago snapshot unusable; weekly section degraded',
    );
  }

  const historicalDiff = diffSnapshots(baseline.aggregated, latest.aggregated);
  const movers = rankMovers(historicalDiff.records, config.topN);

  let weekly: PipelineResult['weekly'] = null;
  if (weekAgo) {
    const weeklyDiff = diffSnapshots(weekAgo.aggregated, latest.aggregated);
    weekly = { diff: weeklyDiff, summary: summarizeMovement(weeklyDiff.records) };
  }

  const document = buildReport(
    {
      regionLabel: config.report.regionLabel ?? regionDisplayName(config.region),
      storeName: config.report.storeName,
      baselineLabel: config.baseline.label,
      aggregate: historicalDiff.aggregate,
      movers,
      weekly: weekly?.summary ?? null,
    },
    {
      locale: config.report.locale,
      currency: config.report.currency,
      hashtags: config.report.hashtags,
    },
  );
  const formatted = formatReport(document, config.maxChars);

  logger.info(
    {
      baseline: selection.baseline.date,
      latest: selection.latest.date,
      weekAgo: weekAgo ? selection.weekAgo?.date : null,
      matched: historicalDiff.aggregate.matchedProducts,
      aggregatePct: historicalDiff.aggregate.pctChange,
      outcome: formatted.outcome,
      droppedBodyLines: formatted.droppedBodyLines,
    },
    'Report generated',
  );

  return {
    text: formatted.text,
    outcome: formatted.outcome,
    document,
    selection,
    historical: { diff: historicalDiff, movers },
    weekly,
    loaded,
  };
}

export interface WriteReportOptions {
  dir: string;
  region: string;
  date: IsoDate;
}

/** Persist the text as `<dir>/report_<region>_<date>.txt`; returns the path. */
export async function writeReport(text: string, options: WriteReportOptions): Promise<string> {
  await mkdir(options.dir, { recursive: true });
  const path = join(options.dir, `report_${options.region}_${options.date}.txt`);
  try {
    await writeFile(path, text, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to write report to ${path}: ${errorMessage(err)}`, { cause: err });
  }
  logger.info({ path }, 'Report written');
  return path;
}

export interface DeliverOptions extends WriteReportOptions {
  write: boolean;
}

export interface Delivery {
  path: string | null;
  writeError: Error | null;
}

/**
 * Print the report, then persist it. The text is already out when the write
 * fails, so a write error is reported on its own instead of losing the report.
 */
export async function deliverReport(
  text: string,
  options: DeliverOptions,
  print: (chunk: string) => void,
): Promise<Delivery> {
  print(`${text}\n`);
  if (!options.write) return { path: null, writeError: null };

  try {
    const path = await writeReport(text, options);
    return { path, writeError: null };
  } catch (err) {
    const writeError = err instanceof Error ? err : new Error(String(err));
    logger.error({ dir: options.dir, error: writeError.message }, 'Report file not written');
    return { path: null, writeError };
  }
}
