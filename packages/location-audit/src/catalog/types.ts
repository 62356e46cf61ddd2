/**
 * Catalog collaborator contracts
 *
 * Narrow views of the data catalog the pipeline depends on. The CKAN client
 * implements them for live runs; tests substitute in-memory fakes.
 */

/**
 * A published file belonging to a dataset
 */
export interface ResourceHandle {
  readonly name: string;
  /** Declared file type, lower case (e.g. `csv`, `geodatabase`, `pdf`) */
  getFileType(): string;
  /** Size in bytes, when the catalog declares it */
  getSize(): number | null;
  /**
   * Fetch the resource into `targetFolder`
   *
   * @returns Path of the downloaded file
   */
  download(targetFolder: string): Promise<string>;
}

/**
 * Anything `checkLocation` can inspect: a dataset, or a single-resource view
 */
export interface LocationCheckTarget {
  getFileTypes(): readonly string[];
  getResources(): readonly ResourceHandle[];
}

export interface DatasetHandle extends LocationCheckTarget {
  readonly name: string;
  /** ISO3 codes of the countries the dataset covers */
  getLocationCodes(): readonly string[];
}

export interface Catalog {
  searchDatasets(filter: string): Promise<readonly DatasetHandle[]>;
}
