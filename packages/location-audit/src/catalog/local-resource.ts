/**
 * Resource handle over a file already on disk
 *
 * Lets a single local file go through the same pipeline as a catalog
 * resource: "downloading" copies it into the scratch directory.
 */

import { copyFile, mkdir, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { LocationCheckTarget, ResourceHandle } from './types.js';

export class LocalResource implements ResourceHandle {
  readonly name: string;
  private readonly path: string;

  constructor(
    filePath: string,
    private readonly fileType: string,
    private readonly size: number | null = null
  ) {
    this.path = resolve(filePath);
    this.name = basename(filePath);
  }

  /**
   * Create a handle with the size read from disk
   */
  static async fromFile(filePath: string, fileType: string): Promise<LocalResource> {
    const stats = await stat(filePath);
    return new LocalResource(filePath, fileType, stats.size);
  }

  getFileType(): string {
    return this.fileType.toLowerCase();
  }

  getSize(): number | null {
    return this.size;
  }

  async download(targetFolder: string): Promise<string> {
    await mkdir(targetFolder, { recursive: true });
    const destination = join(targetFolder, this.name);
    await copyFile(this.path, destination);
    return destination;
  }
}

/**
 * View of one resource as a check target
 */
export function singleResourceTarget(resource: ResourceHandle): LocationCheckTarget {
  return {
    getFileTypes: () => [resource.getFileType()],
    getResources: () => [resource],
  };
}
