/**
 * Single-layer geo readers
 *
 * Reads the attribute table of a vector file: feature properties for
 * GeoJSON, TopoJSON and shapefiles, records for plain JSON. Geometry is not
 * sampled; the classifiers only look at attribute columns.
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { Feature, FeatureCollection } from 'geojson';
import shapefile from 'shapefile';
import { feature as topojsonFeature } from 'topojson-client';
import type { Topology } from 'topojson-specification';
import type { FileExtension } from '../../core/formats.js';
import type { CandidateFile, Table } from '../../core/types.js';
import { createTableFromRecords } from '../../transformation/table.js';

type AttributeRecord = Readonly<Record<string, unknown>>;

/**
 * Keys under which JSON APIs commonly wrap an array of records
 */
const RECORD_ARRAY_KEYS = ['data', 'records', 'rows', 'results', 'items'] as const;

export async function readVectorFile(
  candidate: CandidateFile,
  extension: FileExtension,
  rowLimit: number
): Promise<Table[]> {
  const records =
    extension === 'shp'
      ? await readShapefileRecords(candidate.path, rowLimit)
      : extractRecords(JSON.parse(await readFile(candidate.path, 'utf-8')), rowLimit);

  return [createTableFromRecords(records)];
}

/**
 * Read the first `rowLimit` feature property records of a shapefile
 * (attributes come from the sibling .dbf, matched without regard to case)
 */
export async function readShapefileRecords(
  shpPath: string,
  rowLimit: number
): Promise<AttributeRecord[]> {
  const dbfPath = await findSidecar(shpPath, '.dbf');
  const source = await shapefile.open(
    await readFile(shpPath),
    dbfPath === null ? undefined : await readFile(dbfPath),
    { encoding: 'utf-8' }
  );
  const records: AttributeRecord[] = [];

  let result = await source.read();
  while (!result.done && records.length < rowLimit) {
    records.push(result.value.properties ?? {});
    result = await source.read();
  }

  if (!result.done) {
    await source.cancel();
  }

  return records;
}

/**
 * Path of the file beside `filePath` with the same stem and the given
 * extension, compared case-insensitively, or null when there is none
 */
export async function findSidecar(filePath: string, extension: string): Promise<string | null> {
  const folder = dirname(filePath);
  const stem = basename(filePath, extname(filePath));
  const wanted = `${stem}${extension}`.toLowerCase();

  const match = (await readdir(folder)).find((name) => name.toLowerCase() === wanted);
  return match === undefined ? null : join(folder, match);
}

/**
 * Turn parsed GeoJSON, TopoJSON or plain JSON into attribute records
 *
 * @throws {Error} When the document holds no recognizable records
 */
export function extractRecords(document: unknown, rowLimit: number): AttributeRecord[] {
  if (isFeatureCollection(document)) {
    return document.features.slice(0, rowLimit).map(propertiesOf);
  }

  if (isFeature(document)) {
    return [propertiesOf(document)];
  }

  if (isTopology(document)) {
    return topologyRecords(document, rowLimit);
  }

  if (Array.isArray(document) && document.every(isRecord)) {
    return document.slice(0, rowLimit);
  }

  if (isRecord(document)) {
    for (const key of RECORD_ARRAY_KEYS) {
      const nested = document[key];
      if (Array.isArray(nested) && nested.length > 0 && nested.every(isRecord)) {
        return nested.slice(0, rowLimit);
      }
    }
  }

  throw new Error('Document holds no features or records');
}

function topologyRecords(topology: Topology, rowLimit: number): AttributeRecord[] {
  const records: AttributeRecord[] = [];

  for (const name of Object.keys(topology.objects)) {
    if (records.length >= rowLimit) break;

    const converted = topojsonFeature(topology, topology.objects[name]);
    const features = 'features' in converted ? converted.features : [converted];
    for (const item of features) {
      if (records.length >= rowLimit) break;
      records.push(item.properties ?? {});
    }
  }

  return records;
}

function propertiesOf(item: Feature): AttributeRecord {
  return item.properties ?? {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFeatureCollection(value: unknown): value is FeatureCollection {
  return isRecord(value) && value.type === 'FeatureCollection' && Array.isArray(value.features);
}

function isFeature(value: unknown): value is Feature {
  return isRecord(value) && value.type === 'Feature';
}

function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === 'Topology' && isRecord(value.objects);
}
