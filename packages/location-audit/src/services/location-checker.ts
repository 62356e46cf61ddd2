/**
 * Location Checker
 *
 * Runs the acquisition and classification pipeline over the resources of a
 * dataset (or a single-resource view of one) and reduces them to one
 * verdict pair.
 *
 * FLOW PER TARGET:
 * 1. File type gate: nothing checkable → "Can't check formats", no I/O
 * 2. Scratch directory created for this invocation
 * 3. Resources in listing order: resolve → load → normalize → pcode → lat/long
 *    - A download/extraction failure, or a load that produced only an
 *      error, ends the check with that error
 *    - The first resource with a p-code column ends the scan
 * 4. Finalize: without an error, unconfirmed verdicts become `false`
 *    (lat/long only once pcode is `false`)
 * 5. Scratch directory removed, whatever happened
 */

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { resolveCandidates } from '../acquisition/archive-resolver.js';
import { loadSamples, normalizeSamples } from '../acquisition/sampled-table-loader.js';
import type { LocationCheckTarget, ResourceHandle } from '../catalog/types.js';
import { LatLongClassifier } from '../classification/latlong-classifier.js';
import { PcodeClassifier } from '../classification/pcode-classifier.js';
import { STATUS_MESSAGES } from '../core/constants.js';
import { LocationAuditError } from '../core/errors.js';
import {
  checksLatLong,
  fileExtensionFor,
  isAllowedFileType,
  type FileType,
} from '../core/formats.js';
import type { CandidateFile, LocationCheckResult } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { CountryCodes } from '../reference/country-reference.js';

export interface LocationCheckerOptions {
  /** Country reference used to build the p-code pattern */
  readonly countries: readonly CountryCodes[];
  /** Classify every geo layer instead of only the last one read */
  readonly accumulateGeoLayers?: boolean;
  /** Data rows sampled per file (default: 100) */
  readonly rowLimit?: number;
  readonly logger?: Logger;
}

type ResourceOutcome =
  | { readonly status: 'failed'; readonly error: string }
  | {
      readonly status: 'checked';
      readonly pcoded: boolean;
      readonly latlonged: boolean;
      readonly error: string | null;
    };

export class LocationChecker {
  private readonly pcodeClassifier: PcodeClassifier;
  private readonly latLongClassifier = new LatLongClassifier();
  private readonly log: Logger;

  constructor(private readonly options: LocationCheckerOptions) {
    this.pcodeClassifier = new PcodeClassifier(options.countries);
    this.log = options.logger ?? createLogger('checker');
  }

  /**
   * Classify a dataset's resources for p-code and lat/long columns
   *
   * @param target - Dataset, or single-resource view of one
   * @param tempRoot - Directory under which the scratch directory is created
   */
  async checkLocation(target: LocationCheckTarget, tempRoot: string): Promise<LocationCheckResult> {
    if (!target.getFileTypes().some(isAllowedFileType)) {
      return { pcoded: null, latlonged: null, error: STATUS_MESSAGES.CANT_CHECK_FORMATS };
    }

    const scratch = join(tempRoot, uuidv4());
    await mkdir(scratch, { recursive: true });

    try {
      return await this.checkResources(target.getResources(), scratch);
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }

  private async checkResources(
    resources: readonly ResourceHandle[],
    scratch: string
  ): Promise<LocationCheckResult> {
    let latlongFound = false;
    let error: string | null = null;

    for (const resource of resources) {
      const fileType = resource.getFileType();
      if (!isAllowedFileType(fileType)) continue;

      this.log.info('Checking resource', { resource: resource.name, fileType });

      const outcome = await this.checkResource(resource, fileType, scratch, latlongFound);
      if (outcome.status === 'failed') {
        this.log.warn('Resource check failed', { resource: resource.name, error: outcome.error });
        return { pcoded: null, latlonged: latlongFound ? true : null, error: outcome.error };
      }

      error = outcome.error;
      latlongFound = latlongFound || outcome.latlonged;

      if (outcome.pcoded) {
        return finalize(true, latlongFound, error);
      }
    }

    return finalize(false, latlongFound, error);
  }

  private async checkResource(
    resource: ResourceHandle,
    fileType: FileType,
    scratch: string,
    latlongFound: boolean
  ): Promise<ResourceOutcome> {
    const extension = fileExtensionFor(fileType);

    let candidates: CandidateFile[];
    try {
      candidates = await resolveCandidates(resource, extension, scratch, { logger: this.log });
    } catch (error) {
      if (error instanceof LocationAuditError) {
        return { status: 'failed', error: error.message };
      }
      throw error;
    }

    const { samples, error } = await loadSamples(candidates, extension, {
      rowLimit: this.options.rowLimit,
      accumulateGeoLayers: this.options.accumulateGeoLayers,
      logger: this.log,
    });

    if (samples.size === 0 && error !== null) {
      return { status: 'failed', error };
    }

    const normalized = normalizeSamples(samples, extension);

    if (this.pcodeClassifier.hasPcode(normalized)) {
      return { status: 'checked', pcoded: true, latlonged: false, error };
    }

    const latlonged =
      !latlongFound && checksLatLong(fileType) && this.latLongClassifier.hasLatLong(normalized);

    return { status: 'checked', pcoded: false, latlonged, error };
  }
}

function finalize(pcodeFound: boolean, latlongFound: boolean, error: string | null): LocationCheckResult {
  const pcoded = pcodeFound ? true : error === null ? false : null;
  const latlonged = latlongFound ? true : pcoded === false ? false : null;
  return { pcoded, latlonged, error };
}
