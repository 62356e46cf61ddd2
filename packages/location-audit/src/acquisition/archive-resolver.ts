/**
 * Archive Resolver
 *
 * Downloads a resource into the scratch directory and turns it into the list
 * of candidate data files:
 *
 * - Plain files are their own sole candidate.
 * - ZIP archives (by signature or `.zip` in the name) are extracted into a
 *   fresh subdirectory and searched recursively for entries ending in the
 *   declared extension. Directories matched alongside files inside them are
 *   dropped.
 * - A spreadsheet archive without spreadsheet entries falls back to the
 *   downloaded file itself (mislabeled archives).
 * - GeoPackage/geodatabase containers expand into one candidate per layer.
 */

import AdmZip from 'adm-zip';
import { open, readdir } from 'node:fs/promises';
import { basename, join, sep } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { ResourceHandle } from '../catalog/types.js';
import { DownloadError, ExtractionError } from '../core/errors.js';
import { formatFamilyOf, type FileExtension } from '../core/formats.js';
import type { CandidateFile } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { listContainerLayers } from './readers/container-reader.js';

/**
 * ZIP local-file, empty-archive and spanned-archive signatures
 */
const ZIP_SIGNATURES: readonly (readonly number[])[] = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
  [0x50, 0x4b, 0x07, 0x08],
];

export interface ResolveOptions {
  readonly logger?: Logger;
}

/**
 * Download a resource and resolve its candidate data files
 *
 * @throws {DownloadError} When the download fails
 * @throws {ExtractionError} When the archive cannot be unpacked, holds no
 *   matching files, or a container's layers cannot be listed
 */
export async function resolveCandidates(
  resource: ResourceHandle,
  extension: FileExtension,
  scratchRoot: string,
  options: ResolveOptions = {}
): Promise<CandidateFile[]> {
  const log = options.logger ?? createLogger('resolver');

  let downloaded: string;
  try {
    downloaded = await resource.download(scratchRoot);
  } catch (cause) {
    throw new DownloadError(resource.name, { cause });
  }

  const family = formatFamilyOf(extension);

  if (!(await isArchive(downloaded))) {
    const candidates = [{ path: downloaded }];
    return family === 'multi-layer-geo' ? expandLayers(candidates, extension, resource.name) : candidates;
  }

  const destination = join(scratchRoot, uuidv4());
  try {
    new AdmZip(downloaded).extractAllTo(destination, true);
  } catch (cause) {
    throw new ExtractionError(`Could not unzip resource ${resource.name}`, { cause });
  }

  const matches = removeContainingPaths(await findBySuffix(destination, `.${extension}`));
  log.debug('Archive extracted', {
    resource: resource.name,
    extension,
    matches: matches.length,
  });

  if (matches.length === 0) {
    if (family === 'spreadsheet') {
      return [{ path: downloaded }];
    }
    throw new ExtractionError(`No .${extension} files found in resource ${resource.name}`);
  }

  const candidates = matches.map((path) => ({ path }));
  return family === 'multi-layer-geo' ? expandLayers(candidates, extension, resource.name) : candidates;
}

/**
 * ZIP signature in the first four bytes, or `.zip` in the file name
 */
export async function isArchive(filePath: string): Promise<boolean> {
  if (basename(filePath).toLowerCase().includes('.zip')) {
    return true;
  }

  const handle = await open(filePath, 'r');
  try {
    const header = Buffer.alloc(4);
    const { bytesRead } = await handle.read(header, 0, 4, 0);
    if (bytesRead < 4) return false;
    return ZIP_SIGNATURES.some((signature) => signature.every((byte, i) => header[i] === byte));
  } finally {
    await handle.close();
  }
}

/**
 * Recursively list files and directories whose name ends with `suffix`
 * (case-insensitive). Hidden entries are skipped.
 */
export async function findBySuffix(directory: string, suffix: string): Promise<string[]> {
  const wanted = suffix.toLowerCase();
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const found: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;

    const fullPath = join(directory, entry.name);
    if (entry.name.toLowerCase().endsWith(wanted)) {
      found.push(fullPath);
    }
    if (entry.isDirectory()) {
      found.push(...(await findBySuffix(fullPath, suffix)));
    }
  }

  return found;
}

/**
 * Drop any path that has another match beneath it
 */
export function removeContainingPaths(paths: readonly string[]): string[] {
  if (paths.length <= 1) {
    return [...paths];
  }
  return paths.filter((path) => !paths.some((other) => other !== path && other.startsWith(path + sep)));
}

async function expandLayers(
  candidates: readonly CandidateFile[],
  extension: FileExtension,
  resourceName: string
): Promise<CandidateFile[]> {
  const layers: CandidateFile[] = [];
  for (const candidate of candidates) {
    let names: string[];
    try {
      names = await listContainerLayers(candidate.path, extension);
    } catch (cause) {
      throw new ExtractionError(`Could not list layers in ${basename(candidate.path)}`, { cause });
    }
    layers.push(...names.map((layer) => ({ path: candidate.path, layer })));
  }

  if (layers.length === 0) {
    throw new ExtractionError(`No layers found in resource ${resourceName}`);
  }
  return layers;
}
