/**
 * Location Audit Runner
 *
 * Drives a full audit: searches the catalog, checks every resource of every
 * matching dataset in listing order and writes one status row per resource.
 *
 * Resources are skipped without downloading when their declared type is not
 * checkable or their declared size exceeds MAX_RESOURCE_BYTES.
 */

import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Catalog, DatasetHandle, ResourceHandle } from '../catalog/types.js';
import { LocalResource, singleResourceTarget } from '../catalog/local-resource.js';
import { MAX_RESOURCE_BYTES, STATUS_MESSAGES } from '../core/constants.js';
import { errorMessage } from '../core/errors.js';
import { isAllowedFileType } from '../core/formats.js';
import type { LocationCheckResult, StatusRow } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { StatusReportWriter } from '../reporting/status-report.js';
import type { LocationChecker } from './location-checker.js';

export interface LocationAuditRunnerOptions {
  readonly catalog: Catalog;
  readonly checker: LocationChecker;
  readonly reportWriter?: StatusReportWriter;
  /** Report destination; no report is written without one */
  readonly outputPath?: string;
  /** Parent of the per-run temporary directory (default: OS temp dir) */
  readonly tempDir?: string;
  readonly logger?: Logger;
}

export class LocationAuditRunner {
  private readonly log: Logger;

  constructor(private readonly options: LocationAuditRunnerOptions) {
    this.log = options.logger ?? createLogger('runner');
  }

  /**
   * Audit every dataset matching `filter`
   */
  async run(filter: string): Promise<StatusRow[]> {
    const datasets = await this.options.catalog.searchDatasets(filter);
    this.log.info('Found datasets', { filter, count: datasets.length });

    const rows = await this.withTempRoot(async (tempRoot) => {
      const collected: StatusRow[] = [];
      for (const dataset of datasets) {
        this.log.info('Checking dataset', { dataset: dataset.name, locations: dataset.getLocationCodes() });
        for (const resource of dataset.getResources()) {
          collected.push(await this.checkResource(dataset, resource, tempRoot));
        }
      }
      return collected;
    });

    const { reportWriter, outputPath } = this.options;
    if (reportWriter && outputPath) {
      await reportWriter.write(outputPath, rows);
      this.log.info('Report written', { path: outputPath, rows: rows.length });
    }

    return rows;
  }

  /**
   * Classify one local file through the same pipeline
   */
  async checkFile(filePath: string, fileType: string): Promise<LocationCheckResult> {
    const resource = await LocalResource.fromFile(filePath, fileType);
    return this.withTempRoot((tempRoot) =>
      this.options.checker.checkLocation(singleResourceTarget(resource), tempRoot)
    );
  }

  private async checkResource(
    dataset: DatasetHandle,
    resource: ResourceHandle,
    tempRoot: string
  ): Promise<StatusRow> {
    const format = resource.getFileType();
    const row = (result: LocationCheckResult): StatusRow => ({
      datasetName: dataset.name,
      resourceName: resource.name,
      format,
      pcoded: result.pcoded,
      latlonged: result.latlonged,
      error: result.error,
    });

    if (!isAllowedFileType(format)) {
      return row({ pcoded: null, latlonged: null, error: STATUS_MESSAGES.NOT_CHECKING_FORMAT });
    }

    const size = resource.getSize();
    if (size !== null && size > MAX_RESOURCE_BYTES) {
      return row({ pcoded: null, latlonged: null, error: STATUS_MESSAGES.NOT_CHECKING_SIZE });
    }

    try {
      return row(await this.options.checker.checkLocation(singleResourceTarget(resource), tempRoot));
    } catch (error) {
      this.log.error('Unexpected failure checking resource', {
        dataset: dataset.name,
        resource: resource.name,
        error: errorMessage(error),
      });
      return row({ pcoded: null, latlonged: null, error: errorMessage(error) });
    }
  }

  private async withTempRoot<T>(fn: (tempRoot: string) => Promise<T>): Promise<T> {
    const parent = this.options.tempDir ?? tmpdir();
    await mkdir(parent, { recursive: true });
    const tempRoot = await mkdtemp(join(parent, 'location-audit-'));
    try {
      return await fn(tempRoot);
    } finally {
      await rm(tempRoot, { recursive: true, force: true });
    }
  }
}
