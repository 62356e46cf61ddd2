/**
 * Wiring shared by the CLI commands
 *
 * Builds the logger, checker, catalog client and runner from a loaded
 * configuration.
 *
 * @module cli/lib/context
 */

import { CkanCatalog } from '../../catalog/ckan-catalog.js';
import { HTTPClient } from '../../catalog/http-client.js';
import { createLogger, type Logger } from '../../core/utils/logger.js';
import { DEFAULT_COUNTRIES_PATH, loadCountryReference } from '../../reference/country-reference.js';
import { StatusReportWriter } from '../../reporting/status-report.js';
import { LocationAuditRunner } from '../../services/location-audit-runner.js';
import { LocationChecker } from '../../services/location-checker.js';
import { resolveConfigPath, type CLIConfig } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface AuditContext {
  readonly config: CLIConfig;
  readonly logger: Logger;
  readonly runner: LocationAuditRunner;
}

export async function createAuditContext(config: CLIConfig): Promise<AuditContext> {
  const logger = createLogger('cli', config.verbose ? 'debug' : 'info');

  const countriesPath = config.paths.countries
    ? resolveConfigPath(config, config.paths.countries)
    : DEFAULT_COUNTRIES_PATH;
  const countries = await loadCountryReference(countriesPath);

  const checker = new LocationChecker({
    countries,
    accumulateGeoLayers: config.accumulateGeoLayers,
    logger,
  });

  const catalog = new CkanCatalog({
    baseUrl: config.catalog.baseUrl,
    httpClient: new HTTPClient({
      timeoutMs: config.catalog.timeout,
      userAgent: config.catalog.userAgent,
      maxRetries: 2,
    }),
    logger,
  });

  const runner = new LocationAuditRunner({
    catalog,
    checker,
    reportWriter: new StatusReportWriter(),
    outputPath: resolveConfigPath(config, config.paths.output),
    tempDir: config.paths.tempDir ? resolveConfigPath(config, config.paths.tempDir) : undefined,
    logger,
  });

  return { config, logger, runner };
}
