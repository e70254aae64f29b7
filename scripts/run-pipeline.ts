/**
 * MATT Enrichment Pipeline
 * ========================
 * Reads the raw MATT report export and the Hub/Plan reference files,
 * enriches the sales rows, and writes the analysis-ready table.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [options]
 *
 * Options:
 *   --matt <file>                 MATT report CSV (default from config)
 *   --hub <file>                  Hub reference CSV
 *   --plan <file>                 Plan reference CSV
 *   --output <file>               Enriched CSV to write
 *   --investor-names <file>       JSON array of investor NHC names
 *   --invalid-community fail|null Malformed COMMUNITY handling (default: fail)
 *   --sql-table <name>            Also bulk insert into this SQL Server table ($SQLSERVER)
 *   --dry-run                     Transform only, write nothing
 *   --debug                       Print configuration and debug output
 *
 * Steps:
 *   1. Load MATT, Hub and Plan CSVs
 *   2. Check reference keys for duplicates (row multiplication warning)
 *   3. Enrich (Comm_# key, hub/plan joins, DOW, weekday group, investor tag, ...)
 *   4. Write enriched CSV
 *   5. Export to SQL Server (optional)
 */

import * as dotenv from 'dotenv';
import {
  ConfigOverrides,
  ETLConfig,
  loadConfig,
  parseInvalidCommunityPolicy,
  printConfig,
  validateConfig
} from './lib/config-loader';
import { readCsvTable, writeCsvTable } from './lib/csv-io';
import { ConfigError, formatError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { exportToSqlServer } from './lib/sql-export';
import { DEFAULT_INVESTOR_NAMES, loadInvestorNames } from './transforms/investor-classifier';
import { normalizePlanCode, toIntegerKey, transformWithReport } from './transforms/process-matt';
import { findDuplicateKeys } from './transforms/table-join';
import { DataTable, RowIssue } from './transforms/types';

export interface PipelineOptions {
  dryRun: boolean;
}

export interface PipelineSummary {
  inputRows: number;
  outputRows: number;
  issues: RowIssue[];
  investorSales: number;
  outputPath: string | null;
  sqlRowsInserted: number | null;
  table: DataTable;
}

export interface CliArgs {
  overrides: ConfigOverrides;
  dryRun: boolean;
}

/**
 * Parse command-line arguments into config overrides
 */
export function parseArgs(args: string[]): CliArgs {
  const valueOf = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    if (index === -1) return undefined;
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError([`${flag} requires a value`]);
    }
    return value;
  };

  const invalidCommunity = valueOf('--invalid-community');
  const investorNamesFile = valueOf('--investor-names');

  const overrides: ConfigOverrides = {
    inputFiles: {
      matt: valueOf('--matt'),
      hub: valueOf('--hub'),
      plan: valueOf('--plan'),
    },
    output: {
      csvPath: valueOf('--output'),
      sqlTable: valueOf('--sql-table'),
    },
    transform: {
      invalidCommunity: invalidCommunity === undefined ? undefined : parseInvalidCommunityPolicy(invalidCommunity),
      investorNamesFile,
    },
  };

  if (args.includes('--debug')) {
    overrides.debugMode = true;
  }

  return { overrides, dryRun: args.includes('--dry-run') };
}

function elapsed(start: number): number {
  return (Date.now() - start) / 1000;
}

/**
 * Run the pipeline for a loaded configuration
 */
export async function runPipeline(
  config: ETLConfig,
  options: PipelineOptions,
  reporter: ProgressReporter = new ProgressReporter(config.debugMode)
): Promise<PipelineSummary> {
  const totalSteps = 5;
  const runStart = Date.now();
  reporter.logRunStart(`matt-enrichment-${new Date().toISOString()}`, totalSteps);

  let stepName = 'Load input files';
  try {
    // Step 1: Load inputs
    reporter.logStep(stepName, 1, totalSteps, config.inputFiles.matt);
    let stepStart = Date.now();
    const sales = await readCsvTable(config.inputFiles.matt);
    const hub = await readCsvTable(config.inputFiles.hub);
    const plan = await readCsvTable(config.inputFiles.plan);
    reporter.logDebug(`MATT columns: ${sales.columns.join(', ')}`);
    reporter.logInfo(`Hub: ${hub.rows.length} rows, Plan: ${plan.rows.length} rows`);
    reporter.logStepComplete(stepName, elapsed(stepStart), sales.rows.length);

    // Step 2: Reference key checks
    stepName = 'Check reference keys';
    reporter.logStep(stepName, 2, totalSteps);
    stepStart = Date.now();
    const duplicateCommunities = findDuplicateKeys(hub, row => toIntegerKey(row['Community Number']));
    const duplicatePlans = findDuplicateKeys(plan, row => normalizePlanCode(row['Plan Code']));
    if (duplicateCommunities.length > 0) {
      reporter.logWarning(`Duplicate Community Number in hub file, matching rows will be repeated: ${duplicateCommunities.join(', ')}`);
    }
    if (duplicatePlans.length > 0) {
      reporter.logWarning(`Duplicate Plan Code in plan file, matching rows will be repeated: ${duplicatePlans.join(', ')}`);
    }
    reporter.logStepComplete(stepName, elapsed(stepStart));

    // Step 3: Enrich
    stepName = 'Enrich MATT rows';
    reporter.logStep(stepName, 3, totalSteps);
    stepStart = Date.now();
    const investorNames = config.transform.investorNamesFile
      ? loadInvestorNames(config.transform.investorNamesFile)
      : DEFAULT_INVESTOR_NAMES;
    reporter.logDebug(`Investor names: ${investorNames.size}`);

    const { table, issues } = transformWithReport(sales, hub, plan, {
      investorNames,
      invalidCommunity: config.transform.invalidCommunity,
    });

    for (const issue of issues) {
      reporter.logWarning(`Row ${issue.row}: ${issue.column} ${JSON.stringify(issue.value)} ${issue.message}, Comm_# left empty`);
    }
    const investorSales = table.rows.filter(row => row['Investor Sale'] === 'Investor').length;
    reporter.logRecords({ processed: table.rows.length, total: sales.rows.length });
    reporter.logInfo(`Investor sales: ${investorSales}`);
    reporter.logStepComplete(stepName, elapsed(stepStart), table.rows.length);

    // Step 4: CSV output
    stepName = 'Write enriched CSV';
    reporter.logStep(stepName, 4, totalSteps, config.output.csvPath);
    let outputPath: string | null = null;
    if (options.dryRun) {
      reporter.logInfo('Dry run, skipping CSV output');
    } else {
      stepStart = Date.now();
      await writeCsvTable(config.output.csvPath, table);
      outputPath = config.output.csvPath;
      reporter.logStepComplete(stepName, elapsed(stepStart), table.rows.length);
    }

    // Step 5: SQL Server export
    stepName = 'Export to SQL Server';
    reporter.logStep(stepName, 5, totalSteps, config.output.sqlTable ?? undefined);
    let sqlRowsInserted: number | null = null;
    if (!config.output.sqlTable) {
      reporter.logInfo('No output.sqlTable configured, skipping');
    } else if (options.dryRun) {
      reporter.logInfo('Dry run, skipping SQL Server export');
    } else {
      const result = await exportToSqlServer(config, table);
      sqlRowsInserted = result.rowsInserted;
      reporter.logStepComplete(stepName, result.duration, result.rowsInserted);
    }

    reporter.logRunComplete(totalSteps, elapsed(runStart));

    return {
      inputRows: sales.rows.length,
      outputRows: table.rows.length,
      issues,
      investorSales,
      outputPath,
      sqlRowsInserted,
      table,
    };
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    reporter.logStepFailure(stepName, failure);
    reporter.logRunFailure(failure);
    throw error;
  }
}

async function main(): Promise<void> {
  dotenv.config();

  const { overrides, dryRun } = parseArgs(process.argv.slice(2));
  const config = loadConfig(overrides);

  if (config.debugMode) {
    printConfig(config);
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError(validation.errors);
  }

  await runPipeline(config, { dryRun });
}

if (require.main === module) {
  main().catch(error => {
    console.error(formatError(error));
    process.exit(1);
  });
}
