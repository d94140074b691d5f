#!/usr/bin/env node
/**
 * pricedrift CLI
 *
 * Commands:
 * - pricedrift report - Build the price movement report and print it
 * - pricedrift resolve - Show which snapshots a report would compare
 */

import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

import { Command, InvalidArgumentError } from 'commander';
import { isValidIsoDate, todayUtc } from '../catalog/dates';
import { resolveSnapshots } from '../catalog/resolver';
import { errorMessage, isPipelineError } from '../errors';
import { createArchive, deliverReport, runPipeline } from '../pipeline/run';
import { loadConfig, parseMaxChars, type PipelineConfig } from '../utils/config';
import { logger } from '../utils/logger';

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  process.exitCode = 1;
});

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseDateOption(value: string): string {
  if (!isValidIsoDate(value)) {
    throw new InvalidArgumentError('Expected a YYYY-MM-DD date.');
  }
  return value;
}

function parseBudget(value: string): number | null {
  const parsed = parseMaxChars(value);
  if (parsed === undefined || (parsed !== null && (!Number.isInteger(parsed) || parsed < 1))) {
    throw new InvalidArgumentError('Expected a positive integer or "none".');
  }
  return parsed;
}

interface CommonOptions {
  config?: string;
  region?: string;
  repository?: string;
  archiveDir?: string;
  baselineDate?: string;
  lookback?: number;
  today?: string;
}

interface ReportOptions extends CommonOptions {
  top?: number;
  baselineLabel?: string;
  maxChars?: number | null;
  limit: boolean;
  locale?: string;
  output?: string;
  write: boolean;
  failOnError?: boolean;
}

function commonOverrides(options: CommonOptions): Record<string, unknown> {
  return {
    region: options.region,
    lookbackDays: options.lookback,
    baseline: { date: options.baselineDate },
    catalog: { repository: options.repository, directory: options.archiveDir },
  };
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to a JSON config file')
    .option('-r, --region <region>', 'Region marker of the snapshot tables')
    .option('--repository <owner/name>', 'GitHub repository whose releases hold the snapshots')
    .option('--archive-dir <dir>', 'Read snapshot zips from a local directory instead')
    .option('--baseline-date <date>', 'Baseline snapshot date (YYYY-MM-DD)', parseDateOption)
    .option('--lookback <days>', 'Days back for the weekly comparison', parseInteger)
    .option('--today <date>', 'Reference date instead of today (YYYY-MM-DD)', parseDateOption);
}

const program = new Command();

program
  .name('pricedrift')
  .description('Track regional retail price drift across archived snapshots')
  .version('0.1.0');

// ============================================================================
// report - Build, print and store the report
// ============================================================================
withCommonOptions(program.command('report'))
  .description('Build the price movement report')
  .option('-n, --top <count>', 'Number of top gainers/losers', parseInteger)
  .option('--baseline-label <label>', 'How the baseline is named in the report')
  .option('--max-chars <count>', 'Character budget, or "none"', parseBudget)
  .option('--no-limit', 'Disable the character budget')
  .option('--locale <locale>', 'Report wording (en, es)')
  .option('-o, --output <dir>', 'Directory the report file is written to')
  .option('--no-write', 'Print only, do not write a report file')
  .option('--fail-on-error', 'Exit non-zero when the report cannot be built')
  .action(async (options: ReportOptions) => {
    let config: PipelineConfig;
    try {
      config = loadConfig({
        configPath: options.config,
        overrides: {
          ...commonOverrides(options),
          topN: options.top,
          baseline: { date: options.baselineDate, label: options.baselineLabel },
          maxChars: options.limit ? options.maxChars : null,
          failOnError: options.failOnError,
          report: { locale: options.locale },
          output: { dir: options.output, write: options.write ? undefined : false },
        },
      });
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Configuration rejected');
      process.exitCode = 1;
      return;
    }

    const today = options.today ?? todayUtc();
    try {
      const result = await runPipeline(config, { archive: createArchive(config), today });
      const delivery = await deliverReport(
        result.text,
        { write: config.output.write, dir: config.output.dir, region: config.region, date: today },
        (chunk) => process.stdout.write(chunk),
      );
      if (delivery.writeError && config.failOnError) process.exitCode = 1;
    } catch (err) {
      const details = {
        code: isPipelineError(err) ? err.code : undefined,
        error: errorMessage(err),
      };
      if (config.failOnError) {
        logger.error(details, 'Report failed');
        process.exitCode = 1;
      } else {
        logger.warn(details, 'Report failed; continuing without a report');
      }
    }
  });

// ============================================================================
// resolve - Show the snapshot selection
// ============================================================================
withCommonOptions(program.command('resolve'))
  .description('Show which snapshots the report would compare')
  .action(async (options: CommonOptions) => {
    try {
      const config = loadConfig({ configPath: options.config, overrides: commonOverrides(options) });
      const entries = await createArchive(config).listEntries();
      const selection = resolveSnapshots(entries, {
        baselineDate: config.baseline.date,
        today: options.today ?? todayUtc(),
        lookbackDays: config.lookbackDays,
      });

      const describe = (label: string, value: { date: string; entry: { tag: string } } | null) =>
        `  ${label.padEnd(9)} ${value ? `${value.date}  (${value.entry.tag})` : '—'}`;

      console.log(`\nSnapshots (${selection.dateable.length} dateable of ${entries.length})\n`);
      console.log(describe('baseline', selection.baseline));
      console.log(describe('latest', selection.latest));
      console.log(describe('week-ago', selection.weekAgo));
      console.log('');
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Snapshot resolution failed');
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ error: errorMessage(err) }, 'Command failed');
  process.exitCode = 1;
});
