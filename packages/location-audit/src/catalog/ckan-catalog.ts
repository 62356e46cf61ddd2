/**
 * CKAN catalog client
 *
 * Searches a CKAN portal (HDX by default) through `package_search` and
 * exposes each result as a DatasetHandle whose resources download through
 * the shared HTTP client.
 *
 * Responses are validated with zod; anything the pipeline does not read is
 * passed through untouched.
 */

import { basename, join } from 'node:path';
import { z } from 'zod';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { HTTPClient } from './http-client.js';
import type { Catalog, DatasetHandle, ResourceHandle } from './types.js';

// ============================================================================
// Response Schemas
// ============================================================================

const CkanResourceSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  format: z.string().nullish(),
  size: z.number().nullish(),
  url: z.string(),
});

const CkanDatasetSchema = z.object({
  name: z.string(),
  groups: z.array(z.object({ name: z.string() })).default([]),
  resources: z.array(CkanResourceSchema).default([]),
});

const PackageSearchSchema = z.object({
  success: z.boolean(),
  result: z.object({
    count: z.number(),
    results: z.array(CkanDatasetSchema),
  }),
});

export type CkanResource = z.infer<typeof CkanResourceSchema>;
export type CkanDataset = z.infer<typeof CkanDatasetSchema>;

// ============================================================================
// Configuration
// ============================================================================

export interface CkanCatalogConfig {
  /** Portal root, e.g. https://data.humdata.org */
  readonly baseUrl: string;
  /** Datasets requested per search page (default: 1000) */
  readonly pageSize?: number;
  readonly httpClient?: HTTPClient;
  readonly logger?: Logger;
}

export const DEFAULT_PAGE_SIZE = 1000;

// ============================================================================
// Handles
// ============================================================================

export class CkanResourceHandle implements ResourceHandle {
  readonly name: string;

  constructor(
    private readonly resource: CkanResource,
    private readonly httpClient: HTTPClient
  ) {
    this.name = resource.name ?? resource.id;
  }

  getFileType(): string {
    return (this.resource.format ?? '').toLowerCase();
  }

  getSize(): number | null {
    return this.resource.size ?? null;
  }

  async download(targetFolder: string): Promise<string> {
    const destination = join(targetFolder, downloadFileName(this.resource));
    await this.httpClient.downloadToFile(this.resource.url, destination);
    return destination;
  }
}

export class CkanDatasetHandle implements DatasetHandle {
  readonly name: string;
  private readonly resources: readonly CkanResourceHandle[];

  constructor(
    private readonly dataset: CkanDataset,
    httpClient: HTTPClient
  ) {
    this.name = dataset.name;
    this.resources = dataset.resources.map((resource) => new CkanResourceHandle(resource, httpClient));
  }

  getFileTypes(): readonly string[] {
    return this.resources.map((resource) => resource.getFileType());
  }

  getResources(): readonly ResourceHandle[] {
    return this.resources;
  }

  getLocationCodes(): readonly string[] {
    return this.dataset.groups.map((group) => group.name.toUpperCase());
  }
}

// ============================================================================
// Catalog
// ============================================================================

export class CkanCatalog implements Catalog {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly httpClient: HTTPClient;
  private readonly log: Logger;

  constructor(config: CkanCatalogConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.httpClient = config.httpClient ?? new HTTPClient({ maxRetries: 2 });
    this.log = config.logger ?? createLogger('catalog');
  }

  /**
   * Every dataset matching a Solr filter query, across all result pages
   *
   * @throws {Error} When the portal reports failure or returns an unexpected shape
   */
  async searchDatasets(filter: string): Promise<readonly DatasetHandle[]> {
    const datasets: CkanDatasetHandle[] = [];

    for (let start = 0; ; start += this.pageSize) {
      const page = await this.fetchPage(filter, start);
      datasets.push(...page.results.map((dataset) => new CkanDatasetHandle(dataset, this.httpClient)));

      this.log.debug('Search page fetched', { filter, start, received: page.results.length, total: page.count });

      if (page.results.length === 0 || start + page.results.length >= page.count) {
        break;
      }
    }

    this.log.info('Datasets found', { filter, count: datasets.length });
    return datasets;
  }

  private async fetchPage(filter: string, start: number): Promise<{ count: number; results: CkanDataset[] }> {
    const params = new URLSearchParams({
      fq: filter,
      rows: String(this.pageSize),
      start: String(start),
    });
    const url = `${this.baseUrl}/api/3/action/package_search?${params.toString()}`;

    const parsed = PackageSearchSchema.safeParse(await this.httpClient.fetchJSON(url));
    if (!parsed.success) {
      throw new Error(`Unexpected package_search response: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    if (!parsed.data.success) {
      throw new Error(`package_search failed for filter ${filter}`);
    }
    return parsed.data.result;
  }
}

/**
 * Last segment of the decoded URL path, or the resource id when the URL has
 * none. Encoded separators are decoded before the segment is taken, so the
 * name never leaves the target folder.
 */
export function downloadFileName(resource: Pick<CkanResource, 'id' | 'url'>): string {
  let name: string;
  try {
    name = basename(decodeURIComponent(new URL(resource.url).pathname));
  } catch {
    name = '';
  }
  return name === '' || name === '.' || name === '..' ? basename(resource.id) : name;
}
