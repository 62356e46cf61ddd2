/**
 * Run Command
 *
 * Audit every catalog dataset matching a filter and write the status report.
 *
 * Usage:
 *   location-audit run [options]
 *
 * Options:
 *   --filter <fq>               Catalog filter query (default: groups:"tur")
 *   -o, --output <file>         Report path (default: datasets_location_status.csv)
 *   --config <path>             Config file (default: .location-auditrc)
 *   --temp-dir <dir>            Parent of the run's scratch directory
 *   --timeout <ms>              Catalog request timeout
 *   --accumulate-geo-layers     Classify every geo layer, not only the last
 *   -v, --verbose               Debug logging
 *   --json                      Print the summary as JSON
 *
 * Examples:
 *   location-audit run --filter 'groups:"ken"' --output reports/ken.csv
 */

import type { Command } from 'commander';
import { HTTPError, HTTPJSONParseError, HTTPNetworkError, HTTPTimeoutError } from '../../catalog/http-client.js';
import { errorMessage } from '../../core/errors.js';
import type { StatusRow } from '../../core/types.js';
import { loadConfig, validateConfig, type CLIConfig } from '../lib/config.js';
import { createAuditContext, EXIT_CODES } from '../lib/context.js';

interface RunOptions {
  readonly filter?: string;
  readonly output?: string;
  readonly config?: string;
  readonly tempDir?: string;
  readonly timeout?: string;
  readonly accumulateGeoLayers?: boolean;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

export interface RunSummary {
  readonly filter: string;
  readonly output: string;
  readonly resources: number;
  readonly pcoded: number;
  readonly latlonged: number;
  readonly errors: number;
}

/**
 * Register the run command
 */
export function registerRunCommand(parent: Command): void {
  parent
    .command('run')
    .description('Audit catalog datasets for p-code and lat/long columns')
    .option('--filter <fq>', 'Catalog filter query')
    .option('-o, --output <file>', 'Status report path')
    .option('--config <path>', 'Path to config file (default: .location-auditrc)')
    .option('--temp-dir <dir>', 'Parent directory for scratch files')
    .option('--timeout <ms>', 'Catalog request timeout in milliseconds')
    .option('--accumulate-geo-layers', 'Classify every geo layer instead of only the last one')
    .option('-v, --verbose', 'Verbose output')
    .option('--json', 'Output summary as JSON')
    .action(async (options: RunOptions) => {
      process.exitCode = await executeRun(options);
    });
}

/**
 * Count verdicts and errors over report rows
 */
export function summarize(config: CLIConfig, rows: readonly StatusRow[]): RunSummary {
  return {
    filter: config.catalog.filter,
    output: config.paths.output,
    resources: rows.length,
    pcoded: rows.filter((row) => row.pcoded === true).length,
    latlonged: rows.filter((row) => row.latlonged === true).length,
    errors: rows.filter((row) => row.error !== null).length,
  };
}

async function executeRun(options: RunOptions): Promise<number> {
  let config: CLIConfig;
  try {
    config = await loadConfig({
      configPath: options.config,
      overrides: {
        filter: options.filter,
        output: options.output,
        tempDir: options.tempDir,
        timeout: options.timeout === undefined ? undefined : parseInt(options.timeout, 10),
        accumulateGeoLayers: options.accumulateGeoLayers,
        verbose: options.verbose,
        json: options.json,
      },
    });
    validateConfig(config);
  } catch (error) {
    console.error(`Configuration error: ${errorMessage(error)}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  const { logger, runner } = await createAuditContext(config);
  const startTime = Date.now();

  try {
    const rows = await runner.run(config.catalog.filter);
    const summary = summarize(config, rows);

    if (config.json) {
      console.log(JSON.stringify({ success: true, ...summary, duration_ms: Date.now() - startTime }, null, 2));
    } else {
      console.log(`\nLocation audit: ${summary.filter}`);
      console.log('='.repeat(50));
      console.log(`Resources:  ${summary.resources}`);
      console.log(`P-coded:    ${summary.pcoded}`);
      console.log(`Lat/long:   ${summary.latlonged}`);
      console.log(`Errors:     ${summary.errors}`);
      console.log(`Report:     ${summary.output}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error('Run failed', { error: errorMessage(error), duration_ms: Date.now() - startTime });
    if (config.json) {
      console.log(JSON.stringify({ success: false, error: errorMessage(error) }, null, 2));
    }
    return isNetworkError(error) ? EXIT_CODES.NETWORK_ERROR : EXIT_CODES.ERRORS;
  }
}

function isNetworkError(error: unknown): boolean {
  return (
    error instanceof HTTPError ||
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPNetworkError ||
    error instanceof HTTPJSONParseError
  );
}
