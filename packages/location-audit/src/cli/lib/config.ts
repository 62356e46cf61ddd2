/**
 * Location Audit CLI Configuration Management
 *
 * Loads configuration from .location-auditrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (LOCATION_AUDIT_*)
 * 3. Config file (.location-auditrc or --config path)
 * 4. Default values
 *
 * Example .location-auditrc:
 * ```yaml
 * version: 1
 * catalog:
 *   base_url: https://data.humdata.org
 *   filter: 'groups:"ken"'
 *   timeout: 60000
 * paths:
 *   output: reports/ken.csv
 * checks:
 *   accumulate_geo_layers: true
 * ```
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CatalogConfig {
  /** CKAN portal root */
  readonly baseUrl: string;
  /** Solr filter query selecting the datasets to audit */
  readonly filter: string;
  /** Request timeout in milliseconds */
  readonly timeout: number;
  readonly userAgent: string;
}

export interface PathsConfig {
  /** Status report destination */
  readonly output: string;
  /** Parent of the per-run temporary directory; OS temp dir when null */
  readonly tempDir: string | null;
  /** Country reference file; bundled data/countries.json when null */
  readonly countries: string | null;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly catalog: CatalogConfig;
  readonly paths: PathsConfig;
  /** Classify every geo layer instead of only the last one read */
  readonly accumulateGeoLayers: boolean;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    catalog: z
      .object({
        base_url: z.string().url().optional(),
        filter: z.string().min(1).optional(),
        timeout: z.number().int().positive().optional(),
        user_agent: z.string().min(1).optional(),
      })
      .optional(),
    paths: z
      .object({
        output: z.string().min(1).optional(),
        temp_dir: z.string().min(1).optional(),
        countries: z.string().min(1).optional(),
      })
      .optional(),
    checks: z
      .object({
        accumulate_geo_layers: z.boolean().optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  catalog: {
    baseUrl: 'https://data.humdata.org',
    filter: 'groups:"tur"',
    timeout: 60000,
    userAgent: 'LocationExploration',
  },

  paths: {
    output: 'datasets_location_status.csv',
    tempDir: null,
    countries: null,
  },

  accumulateGeoLayers: false,
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.location-auditrc',
  '.location-auditrc.yaml',
  '.location-auditrc.yml',
  '.location-auditrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 *
 * @throws {Error} When the content does not match the config file schema
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, so one parser covers every file name
  const raw: unknown = parseYaml(content) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new Error(`Invalid config file ${filePath}: ${where}${issue?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`LOCATION_AUDIT_${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    filter?: string;
    output?: string;
    tempDir?: string;
    countries?: string;
    timeout?: number;
    accumulateGeoLayers?: boolean;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {Error} When an explicit config file is missing or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    catalog: {
      baseUrl: getEnvVar('CATALOG_URL') ?? fileConfig.catalog?.base_url ?? DEFAULT_CONFIG.catalog.baseUrl,
      filter:
        overrides.filter ??
        getEnvVar('FILTER') ??
        fileConfig.catalog?.filter ??
        DEFAULT_CONFIG.catalog.filter,
      timeout:
        overrides.timeout ??
        getEnvNumber('TIMEOUT') ??
        fileConfig.catalog?.timeout ??
        DEFAULT_CONFIG.catalog.timeout,
      userAgent:
        getEnvVar('USER_AGENT') ?? fileConfig.catalog?.user_agent ?? DEFAULT_CONFIG.catalog.userAgent,
    },

    paths: {
      output:
        overrides.output ?? getEnvVar('OUTPUT') ?? fileConfig.paths?.output ?? DEFAULT_CONFIG.paths.output,
      tempDir:
        overrides.tempDir ??
        getEnvVar('TEMP_DIR') ??
        fileConfig.paths?.temp_dir ??
        DEFAULT_CONFIG.paths.tempDir,
      countries:
        overrides.countries ??
        getEnvVar('COUNTRIES_FILE') ??
        fileConfig.paths?.countries ??
        DEFAULT_CONFIG.paths.countries,
    },

    accumulateGeoLayers:
      overrides.accumulateGeoLayers ??
      getEnvBool('ACCUMULATE_GEO_LAYERS') ??
      fileConfig.checks?.accumulate_geo_layers ??
      DEFAULT_CONFIG.accumulateGeoLayers,

    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };
}

/**
 * Resolve a configured path against the config file's directory, or the
 * working directory when no config file was used
 */
export function resolveConfigPath(config: CLIConfig, path: string): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, path);
}

/**
 * Validate configuration
 *
 * @throws {Error} If configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!Number.isFinite(config.catalog.timeout) || config.catalog.timeout <= 0) {
    throw new Error('Timeout must be a positive number');
  }

  if (config.catalog.filter.trim().length === 0) {
    throw new Error('Search filter must not be empty');
  }
}
