#!/usr/bin/env node
/**
 * Usage attribution CLI
 *
 * Commands:
 *   attribution run       --config <path> [--sources <ids>] [--start <iso> --end <iso>] [--out <dir>] [--json]
 *   attribution normalize --source <id> --input <path> --start <iso> --end <iso> [--output <path>] [--json]
 *   attribution reconcile --store <dir> --ground-truth <path> [--tolerance <pct>] [--out <dir>] [--json]
 *   attribution backfill  --store <dir> --source <id> --start <date> --end <date> [--out <dir>] [--json]
 *   attribution health    [--json]
 *
 * Exit codes:
 *   0  success
 *   1  partial success (some sources failed or degraded)
 *   2  validation error (bad input, schema mismatch)
 *   3  dependency failure (storage, merge conflict, all sources failed, aborted)
 *   4  unexpected bug
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { FactDateSchema, FetchWindowSchema, type FetchWindow, type ReconciliationReport } from './contracts/index.js';
import {
  loadGroundTruth,
  loadIdentityMapping,
  loadRunConfig,
  loadSourceInputs,
  readJsonFile,
  resolveCliPath,
  type ResolvedRunConfig,
  type SourceConfig,
} from './config/index.js';
import { getCapabilityMetadata, getHealthStatus } from './health/index.js';
import { FactMerger, JsonFileFactStore } from './merge/index.js';
import { normalize, summarizeNormalization } from './normalize/index.js';
import { runPipeline } from './pipeline/index.js';
import { reconcile, reconciledFactKeys } from './reconcile/index.js';
import {
  buildIdempotencyKey,
  createArtifactWriter,
  createLogger,
  EXIT_PARTIAL,
  EXIT_SUCCESS,
  exitCodeForEnvelope,
  PipelineError,
  wrapError,
  type ArtifactWriter,
  type RunnerErrorEnvelope,
  type StructuredLogger,
} from './runner/index.js';

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('attribution')
  .description('Usage & cost attribution - normalize vendor usage, attribute it to people, reconcile against invoices')
  .version('0.1.0');

interface RunCommandOptions {
  config: string;
  sources?: string;
  start?: string;
  end?: string;
  out?: string;
  json?: boolean;
}

interface NormalizeCommandOptions {
  source: string;
  input: string;
  start: string;
  end: string;
  output?: string;
  json?: boolean;
}

interface ReconcileCommandOptions {
  store: string;
  groundTruth: string;
  tolerance?: string;
  out: string;
  json?: boolean;
}

interface BackfillCommandOptions {
  store: string;
  source: string;
  start: string;
  end: string;
  out: string;
  json?: boolean;
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

program
  .command('run')
  .description('Run the daily attribution pipeline over the configured sources')
  .addHelpText('after', '\nExample:\n  attribution run --config ./attribution.config.json --sources cursor.spend\n')
  .requiredOption('--config <path>', 'Path to run config JSON')
  .option('--sources <ids>', 'Comma-separated source ids to run (default: all configured)')
  .option('--start <iso>', 'Override every fetch window start')
  .option('--end <iso>', 'Override every fetch window end')
  .option('--out <dir>', 'Artifact base directory (default: artifacts_dir from config)')
  .option('--json', 'Emit run summary as JSON to stdout')
  .action(async (options: RunCommandOptions) => {
    const startedAt = new Date().toISOString();
    const config = loadConfigOrExit(options.config, options.json);

    const aw = createArtifactWriter(options.out ? resolveCliPath(options.out) : config.artifacts_dir);
    const log = createLogger({
      module: 'run',
      filePath: aw.logsPath,
      json: options.json,
      minLevel: config.log_level,
      runId: aw.runId,
    });

    try {
      const selected = selectSources(config.sources, options);
      const mapping = loadIdentityMapping(config.identity_mapping_path);
      const groundTruth = loadGroundTruth(config.ground_truth_path);
      const sources = loadSourceInputs(selected);

      const controller = new AbortController();
      process.once('SIGINT', () => {
        log.warn('run.abort', 'Interrupt received; stopping after the current source');
        controller.abort();
      });

      const summary = await runPipeline(
        { sources, profile: config.profile, mapping, groundTruth },
        {
          store: new JsonFileFactStore(config.store_dir),
          logger: log,
          artifacts: aw,
          signal: controller.signal,
          runId: aw.runId,
        },
      );

      const idempotencyKey = buildIdempotencyKey([
        'run',
        config.profile.profile_id,
        mapping.version,
        ...sources.map((s) => `${s.source_id}@${s.fetch_window.start}/${s.fetch_window.end}`),
      ]);

      aw.finalize({
        command: 'run',
        startedAt,
        exitCode: summary.exit_code,
        idempotencyKey,
        ...(summary.fatal_error && { error: summary.fatal_error }),
        stats: {
          status: summary.status,
          sources: summary.sources.length,
          issue_counts: summary.issue_counts,
          attribution_rate: summary.attribution.attribution_rate,
          anomalies: summary.anomalies.length,
        },
      });

      if (options.json) {
        process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
      } else {
        console.log(`\nRun ${summary.run_id}: ${summary.status}`);
        for (const source of summary.sources) {
          const merge = source.merge
            ? ` +${source.merge.inserted} ~${source.merge.replaced} =${source.merge.unchanged}`
            : '';
          console.log(`  ${source.source_id}: ${source.status}${merge}${source.error ? ` (${source.error})` : ''}`);
        }
        console.log(`  Attribution rate: ${(summary.attribution.attribution_rate * 100).toFixed(1)}%`);
        for (const report of summary.reconciliation) {
          console.log(`  ${formatReport(report)}`);
        }
        console.log(`  Anomalies: ${summary.anomalies.length}`);
        for (const issue of summary.issues.slice(0, 10)) {
          console.log(`  [${issue.category}] ${issue.source_id ? `${issue.source_id}: ` : ''}${issue.message}`);
        }
        console.log(`\n  Artifacts: ${aw.dir}`);
      }

      process.exit(summary.exit_code);
    } catch (err) {
      handleError(err, 'run', startedAt, aw, log, options.json);
    }
  });

// ---------------------------------------------------------------------------
// normalize
// ---------------------------------------------------------------------------

program
  .command('normalize')
  .description('Normalize one raw source response into canonical records')
  .addHelpText(
    'after',
    '\nExample:\n  attribution normalize --source anthropic.usage_report --input ./usage.json --start 2026-03-01T00:00:00Z --end 2026-03-02T00:00:00Z\n',
  )
  .requiredOption('--source <id>', 'Source id')
  .requiredOption('--input <path>', 'Path to the raw response JSON')
  .requiredOption('--start <iso>', 'Fetch window start')
  .requiredOption('--end <iso>', 'Fetch window end')
  .option('--output <path>', 'Write normalized records to this file')
  .option('--json', 'Emit structured JSON to stdout')
  .action((options: NormalizeCommandOptions) => {
    try {
      const window = parseWindow(options.start, options.end);
      const response = readJsonFile(resolveCliPath(options.input));
      const records = normalize(options.source, response, window);
      const stats = summarizeNormalization(records);
      const diagnostics = records.flatMap((r) => r.raw_payload.diagnostics);

      if (options.output) {
        writeFileSync(resolveCliPath(options.output), JSON.stringify(records, null, 2) + '\n', 'utf-8');
      }

      if (options.json) {
        process.stdout.write(JSON.stringify({ stats, diagnostics: diagnostics.slice(0, 20) }, null, 2) + '\n');
      } else {
        console.log(`\nNormalization Results (${options.source}):`);
        console.log(`  Total records: ${stats.total}`);
        console.log(`  Parsed: ${stats.parsed}`);
        console.log(`  Unparseable: ${stats.unparseable}`);
        console.log(`  By kind:`, stats.byKind);
        if (diagnostics.length > 0) {
          console.log(`\n  Diagnostics (${diagnostics.length}):`);
          diagnostics.slice(0, 5).forEach((d) => console.log(`    ${d}`));
          if (diagnostics.length > 5) console.log(`    ... and ${diagnostics.length - 5} more`);
        }
        if (options.output) console.log(`\n  Written to: ${resolveCliPath(options.output)}`);
      }

      process.exit(stats.unparseable > 0 ? EXIT_PARTIAL : EXIT_SUCCESS);
    } catch (err) {
      handleCliError(err, options.json);
    }
  });

// ---------------------------------------------------------------------------
// reconcile
// ---------------------------------------------------------------------------

program
  .command('reconcile')
  .description('Reconcile stored cost facts against ground-truth totals')
  .requiredOption('--store <dir>', 'Fact store directory')
  .requiredOption('--ground-truth <path>', 'Ground-truth totals JSON')
  .option('--tolerance <pct>', 'Variance tolerance percent', '5')
  .option('--out <dir>', 'Artifact base directory', '.')
  .option('--json', 'Emit reports as JSON to stdout')
  .action(async (options: ReconcileCommandOptions) => {
    const startedAt = new Date().toISOString();
    const aw = createArtifactWriter(resolveCliPath(options.out));
    const log = createLogger({ module: 'reconcile', filePath: aw.logsPath, json: options.json, runId: aw.runId });

    try {
      const tolerancePercent = Number(options.tolerance ?? '5');
      if (!Number.isFinite(tolerancePercent) || tolerancePercent < 0) {
        throw new PipelineError('VALIDATION_ERROR', `--tolerance must be a non-negative number, got '${options.tolerance}'`);
      }
      const store = new JsonFileFactStore(resolveCliPath(options.store));
      const merger = new FactMerger(store, { logger: log });
      const totals = loadGroundTruth(resolveCliPath(options.groundTruth));

      const reports: ReconciliationReport[] = [];
      for (const truth of totals) {
        const facts = await store.readFacts({
          fact_type: 'cost',
          start_date: truth.period_start,
          end_date: truth.period_end,
        });
        const report = reconcile(truth, facts, truth, { tolerancePercent });
        await merger.annotateReconciliation(reconciledFactKeys(facts, truth), report.status);
        log.info('reconcile.report', `Reconciled ${truth.label}`, {
          report_id: report.report_id,
          status: report.status,
          variance_percent: report.variance_percent,
        });
        reports.push(report);
      }

      aw.writeEvidence('reconciliation', reports);
      const flagged = reports.filter((r) => r.status === 'variance_flagged').length;
      aw.finalize({
        command: 'reconcile',
        startedAt,
        exitCode: EXIT_SUCCESS,
        idempotencyKey: buildIdempotencyKey(['reconcile', ...reports.map((r) => r.report_hash)]),
        stats: { reports: reports.length, flagged },
      });

      if (options.json) {
        process.stdout.write(JSON.stringify(reports, null, 2) + '\n');
      } else {
        console.log(`\nReconciliation (${reports.length} total(s), ${flagged} flagged):`);
        for (const report of reports) console.log(`  ${formatReport(report)}`);
      }

      process.exit(EXIT_SUCCESS);
    } catch (err) {
      handleError(err, 'reconcile', startedAt, aw, log, options.json);
    }
  });

// ---------------------------------------------------------------------------
// backfill
// ---------------------------------------------------------------------------

program
  .command('backfill')
  .description('Delete a source\'s facts in [start, end) so the range can be rebuilt')
  .addHelpText('after', '\nExample:\n  attribution backfill --store ./.attribution-store --source cursor.spend --start 2026-03-01 --end 2026-03-08\n')
  .requiredOption('--store <dir>', 'Fact store directory')
  .requiredOption('--source <id>', 'Source id')
  .requiredOption('--start <date>', 'First fact date (YYYY-MM-DD)')
  .requiredOption('--end <date>', 'End fact date, exclusive (YYYY-MM-DD)')
  .option('--out <dir>', 'Artifact base directory', '.')
  .option('--json', 'Emit result as JSON to stdout')
  .action(async (options: BackfillCommandOptions) => {
    const startedAt = new Date().toISOString();
    const aw = createArtifactWriter(resolveCliPath(options.out));
    const log = createLogger({ module: 'backfill', filePath: aw.logsPath, json: options.json, runId: aw.runId });

    try {
      const range = parseDateRange(options.start, options.end);
      const merger = new FactMerger(new JsonFileFactStore(resolveCliPath(options.store)), { logger: log });
      const deleted = await merger.backfill(options.source, range);

      const result = { source_id: options.source, ...range, deleted };
      aw.finalize({
        command: 'backfill',
        startedAt,
        exitCode: EXIT_SUCCESS,
        idempotencyKey: buildIdempotencyKey(['backfill', options.source, range.start_date, range.end_date]),
        stats: result,
      });

      if (options.json) {
        process.stdout.write(JSON.stringify(result, null, 2) + '\n');
      } else {
        console.log(`\nDeleted ${deleted} fact(s) for ${options.source} in [${range.start_date}, ${range.end_date})`);
      }

      process.exit(EXIT_SUCCESS);
    } catch (err) {
      handleError(err, 'backfill', startedAt, aw, log, options.json);
    }
  });

// ---------------------------------------------------------------------------
// health
// ---------------------------------------------------------------------------

program
  .command('health')
  .description('Display module health status and capabilities')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    try {
      const health = getHealthStatus();
      const capabilities = getCapabilityMetadata();

      if (options.json) {
        process.stdout.write(JSON.stringify({ health, capabilities }, null, 2) + '\n');
      } else {
        console.log('\nHealth Status:');
        console.log(`  Module: ${health.module_id}@${health.module_version}`);
        console.log(`  Status: ${health.status}`);
        console.log(`  Timestamp: ${health.timestamp}`);
        console.log(`  Checks: profiles=${health.checks.profiles}, parsers=${health.checks.parsers}`);
        console.log('\nCapabilities:');
        console.log(`  Sources: ${capabilities.sources.join(', ')}`);
        console.log(`  Profiles: ${capabilities.profiles.join(', ')}`);
        console.log(`  Features: ${capabilities.features.join(', ')}`);
        console.log('\nIssue categories:');
        for (const { category, fatal } of capabilities.issue_categories) {
          console.log(`  ${category}${fatal ? ' (fatal)' : ''}`);
        }
      }
    } catch (err) {
      handleCliError(err, options.json);
    }
  });

// ---------------------------------------------------------------------------
// Input helpers
// ---------------------------------------------------------------------------

function parseWindow(start: string, end: string): FetchWindow {
  const result = FetchWindowSchema.safeParse({ start, end });
  if (!result.success) {
    throw new PipelineError(
      'VALIDATION_ERROR',
      `Invalid fetch window: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function parseDateRange(start: string, end: string): { start_date: string; end_date: string } {
  if (!FactDateSchema.safeParse(start).success || !FactDateSchema.safeParse(end).success) {
    throw new PipelineError('VALIDATION_ERROR', `Dates must be YYYY-MM-DD, got '${start}' and '${end}'`);
  }
  if (start >= end) {
    throw new PipelineError('VALIDATION_ERROR', `--start must be before --end`);
  }
  return { start_date: start, end_date: end };
}

/** Narrow configured sources to `--sources` and apply a window override. */
function selectSources(configured: readonly SourceConfig[], options: RunCommandOptions): SourceConfig[] {
  let selected = [...configured];
  if (options.sources) {
    const ids = options.sources.split(',').map((s) => s.trim()).filter(Boolean);
    const unknown = ids.filter((id) => !configured.some((s) => s.source_id === id));
    if (unknown.length > 0) {
      throw new PipelineError('VALIDATION_ERROR', `Sources not in config: ${unknown.join(', ')}`);
    }
    selected = selected.filter((s) => ids.includes(s.source_id));
  }

  if (options.start !== undefined || options.end !== undefined) {
    if (options.start === undefined || options.end === undefined) {
      throw new PipelineError('VALIDATION_ERROR', '--start and --end must be given together');
    }
    const window = parseWindow(options.start, options.end);
    selected = selected.map((s) => ({ ...s, fetch_window: window }));
  }
  return selected;
}

function loadConfigOrExit(path: string, json?: boolean): ResolvedRunConfig {
  try {
    return loadRunConfig(resolveCliPath(path));
  } catch (err) {
    handleCliError(err, json);
  }
}

function formatReport(report: ReconciliationReport): string {
  return `${report.label} [${report.period_start}, ${report.period_end}) ${report.currency}: ` +
    `${report.aggregated_minor_units} vs ${report.ground_truth_minor_units} ` +
    `(${report.variance_percent}%, ${report.status})`;
}

// ---------------------------------------------------------------------------
// Error handling helpers
// ---------------------------------------------------------------------------

function exitWithEnvelope(envelope: RunnerErrorEnvelope, json?: boolean): never {
  if (json) {
    process.stderr.write(JSON.stringify({ error: envelope }, null, 2) + '\n');
  } else {
    console.error(`Error [${envelope.code}]: ${envelope.userMessage}`);
    if (process.env.DEBUG && envelope.cause) {
      console.error(`  cause: ${envelope.cause}`);
    }
  }
  process.exit(exitCodeForEnvelope(envelope));
}

function handleError(
  err: unknown,
  command: string,
  startedAt: string,
  aw: ArtifactWriter,
  log: StructuredLogger,
  json?: boolean,
): never {
  const envelope = wrapError(err);
  log.error(`${command}.error`, envelope.userMessage, { code: envelope.code });

  aw.finalize({
    command,
    startedAt,
    exitCode: exitCodeForEnvelope(envelope),
    idempotencyKey: '',
    error: envelope,
  });

  exitWithEnvelope(envelope, json);
}

function handleCliError(err: unknown, json?: boolean): never {
  exitWithEnvelope(wrapError(err), json);
}

program.parseAsync().catch((err: unknown) => handleCliError(err));
