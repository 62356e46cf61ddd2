/**
 * Sampled Table Loader
 *
 * Loads a row-capped sample from every candidate file, dispatching on the
 * format family of the file extension.
 *
 * MERGE POLICY:
 * - Spreadsheet and delimited families accumulate: every sheet/file becomes
 *   a sample.
 * - Geo families replace: each candidate's samples replace those read
 *   before, so only the last successfully read layer is classified. Set
 *   `accumulateGeoLayers` to inspect every layer instead.
 *
 * ERRORS: a candidate that fails to read contributes no samples and records
 * "Unable to read resource <name>". Later failures overwrite earlier ones;
 * only the last message is returned.
 */

import { basename } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { SAMPLE_ROW_LIMIT } from '../core/constants.js';
import { ReadError } from '../core/errors.js';
import { formatFamilyOf, type FileExtension, type FormatFamily } from '../core/formats.js';
import type { CandidateFile, SampleSet, Table } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { normalizeHeaders } from '../transformation/header-normalizer.js';
import { readContainerLayer } from './readers/container-reader.js';
import { readDelimited } from './readers/delimited-reader.js';
import { readSpreadsheet } from './readers/spreadsheet-reader.js';
import type { TableReader } from './readers/types.js';
import { readVectorFile } from './readers/vector-reader.js';

export type MergePolicy = 'accumulate' | 'replace';

interface FamilyLoader {
  readonly read: TableReader;
  readonly merge: MergePolicy;
  /** Tabular families get their headers rebuilt; geo attributes are already named */
  readonly normalizesHeaders: boolean;
}

const FAMILY_LOADERS: Readonly<Record<FormatFamily, FamilyLoader>> = {
  spreadsheet: { read: readSpreadsheet, merge: 'accumulate', normalizesHeaders: true },
  delimited: { read: readDelimited, merge: 'accumulate', normalizesHeaders: true },
  'single-layer-geo': { read: readVectorFile, merge: 'replace', normalizesHeaders: false },
  'multi-layer-geo': { read: readContainerLayer, merge: 'replace', normalizesHeaders: false },
};

export interface LoadOptions {
  /** Data rows per sample (default: 100) */
  readonly rowLimit?: number;
  /** Keep every geo layer's sample instead of only the last one read */
  readonly accumulateGeoLayers?: boolean;
  readonly logger?: Logger;
}

export interface LoadResult {
  readonly samples: SampleSet;
  readonly error: string | null;
}

/**
 * Display name of a candidate in messages: the layer name for container
 * layers, the file name otherwise
 */
export function candidateName(candidate: CandidateFile): string {
  return candidate.layer ?? basename(candidate.path);
}

export async function loadSamples(
  candidates: readonly CandidateFile[],
  extension: FileExtension,
  options: LoadOptions = {}
): Promise<LoadResult> {
  const log = options.logger ?? createLogger('loader');
  const loader = FAMILY_LOADERS[formatFamilyOf(extension)];
  const merge: MergePolicy = options.accumulateGeoLayers ? 'accumulate' : loader.merge;
  const rowLimit = options.rowLimit ?? SAMPLE_ROW_LIMIT;

  let samples = new Map<string, Table>();
  let error: string | null = null;

  for (const candidate of candidates) {
    let tables: Table[];
    try {
      tables = await loader.read(candidate, extension, rowLimit);
    } catch (cause) {
      const readError = new ReadError(candidateName(candidate), { cause });
      log.warn('Candidate read failed', {
        candidate: candidateName(candidate),
        extension,
        error: cause instanceof Error ? cause.message : String(cause),
      });
      error = readError.message;
      continue;
    }

    if (merge === 'replace') {
      samples = new Map();
    }
    for (const table of tables) {
      samples.set(uuidv4(), table);
    }

    log.debug('Candidate sampled', {
      candidate: candidateName(candidate),
      samples: tables.length,
    });
  }

  return { samples, error };
}

/**
 * Run the header normalizer over every sample of a tabular family
 */
export function normalizeSamples(samples: SampleSet, extension: FileExtension): SampleSet {
  const family = formatFamilyOf(extension);
  if (!FAMILY_LOADERS[family].normalizesHeaders) {
    return samples;
  }

  const normalized = new Map<string, Table>();
  for (const [id, table] of samples) {
    normalized.set(id, normalizeHeaders(table, family));
  }
  return normalized;
}
