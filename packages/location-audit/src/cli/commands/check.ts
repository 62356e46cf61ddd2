/**
 * Check Command
 *
 * Classify a single local file.
 *
 * Usage:
 *   location-audit check <file> --type <fileType> [options]
 *
 * Examples:
 *   location-audit check admin1.csv --type csv
 *   location-audit check boundaries.zip --type shp --json
 */

import type { Command } from 'commander';
import { errorMessage } from '../../core/errors.js';
import type { LocationCheckResult, Verdict } from '../../core/types.js';
import { loadConfig, type CLIConfig } from '../lib/config.js';
import { createAuditContext, EXIT_CODES } from '../lib/context.js';

interface CheckOptions {
  readonly type: string;
  readonly config?: string;
  readonly countries?: string;
  readonly accumulateGeoLayers?: boolean;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

/**
 * Register the check command
 */
export function registerCheckCommand(parent: Command): void {
  parent
    .command('check <file>')
    .description('Classify one local file for p-code and lat/long columns')
    .requiredOption('-t, --type <fileType>', 'Declared file type (csv, xlsx, shp, geopackage, ...)')
    .option('--config <path>', 'Path to config file (default: .location-auditrc)')
    .option('--countries <file>', 'Country reference file')
    .option('--accumulate-geo-layers', 'Classify every geo layer instead of only the last one')
    .option('-v, --verbose', 'Verbose output')
    .option('--json', 'Output result as JSON')
    .action(async (file: string, options: CheckOptions) => {
      process.exitCode = await executeCheck(file, options);
    });
}

async function executeCheck(file: string, options: CheckOptions): Promise<number> {
  let config: CLIConfig;
  try {
    config = await loadConfig({
      configPath: options.config,
      overrides: {
        countries: options.countries,
        accumulateGeoLayers: options.accumulateGeoLayers,
        verbose: options.verbose,
        json: options.json,
      },
    });
  } catch (error) {
    console.error(`Configuration error: ${errorMessage(error)}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  const { runner } = await createAuditContext(config);
  const result = await runner.checkFile(file, options.type);

  if (config.json) {
    console.log(JSON.stringify({ file, type: options.type, ...result }, null, 2));
  } else {
    printResult(file, result);
  }

  return result.error === null ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

function printResult(file: string, result: LocationCheckResult): void {
  console.log(`\n${file}`);
  console.log(`  P-coded:  ${renderVerdict(result.pcoded)}`);
  console.log(`  Lat/long: ${renderVerdict(result.latlonged)}`);
  if (result.error !== null) {
    console.log(`  Error:    ${result.error}`);
  }
}

function renderVerdict(verdict: Verdict): string {
  if (verdict === null) return 'unknown';
  return verdict ? 'yes' : 'no';
}
