/**
 * Multi-layer geo containers
 *
 * A GeoPackage is a SQLite database: layers are listed in `gpkg_contents`
 * and each layer is a table whose geometry column is named in
 * `gpkg_geometry_columns`. Layers are read directly with better-sqlite3,
 * without the geometry blobs.
 *
 * An Esri file geodatabase is parsed whole by fgdb into one
 * FeatureCollection per layer; only feature properties are sampled.
 */

import Database from 'better-sqlite3';
import fgdb from 'fgdb';
import { z } from 'zod';
import type { FileExtension } from '../../core/formats.js';
import { UnsupportedFormatError } from '../../core/errors.js';
import type { CandidateFile, Cell, Table } from '../../core/types.js';
import { coerceValue, createTable, createTableFromRecords } from '../../transformation/table.js';

const TableInfoSchema = z.array(
  z.object({
    name: z.string(),
    type: z.string(),
    pk: z.number(),
  })
);

export async function listContainerLayers(containerPath: string, extension: FileExtension): Promise<string[]> {
  switch (extension) {
    case 'gpkg':
      return listGeoPackageLayers(containerPath);
    case 'gdb':
      return Object.keys(await fgdb(containerPath));
    default:
      throw new UnsupportedFormatError(extension, 'Not a multi-layer container');
  }
}

export async function readContainerLayer(
  candidate: CandidateFile,
  extension: FileExtension,
  rowLimit: number
): Promise<Table[]> {
  if (!candidate.layer) {
    throw new Error(`No layer given for container ${candidate.path}`);
  }
  switch (extension) {
    case 'gpkg':
      return [readGeoPackageLayer(candidate.path, candidate.layer, rowLimit)];
    case 'gdb':
      return [await readGeodatabaseLayer(candidate.path, candidate.layer, rowLimit)];
    default:
      throw new UnsupportedFormatError(extension, 'Not a multi-layer container');
  }
}

/**
 * Read the feature properties of one geodatabase layer
 */
export async function readGeodatabaseLayer(gdbPath: string, layer: string, rowLimit: number): Promise<Table> {
  const layers = await fgdb(gdbPath);
  const collection = Object.hasOwn(layers, layer) ? layers[layer] : undefined;
  if (!collection) {
    throw new Error(`Layer ${layer} not found`);
  }
  return createTableFromRecords(collection.features.slice(0, rowLimit).map((item) => item.properties ?? {}));
}

export function listGeoPackageLayers(gpkgPath: string): string[] {
  return withDatabase(gpkgPath, (db) =>
    db
      .prepare(
        `SELECT table_name FROM gpkg_contents
         WHERE data_type IN ('features', 'attributes')
         ORDER BY rowid`
      )
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string')
  );
}

/**
 * Read the attribute columns of one layer, excluding geometry and the
 * integer feature id
 */
export function readGeoPackageLayer(gpkgPath: string, layer: string, rowLimit: number): Table {
  return withDatabase(gpkgPath, (db) => {
    const geometryColumns = new Set(
      db
        .prepare('SELECT column_name FROM gpkg_geometry_columns WHERE table_name = ?')
        .pluck()
        .all(layer)
        .filter((name): name is string => typeof name === 'string')
    );

    const info = TableInfoSchema.parse(db.prepare(`PRAGMA table_info(${quoteIdentifier(layer)})`).all());
    if (info.length === 0) {
      throw new Error(`Layer ${layer} not found`);
    }

    const columns = info
      .filter((column) => !geometryColumns.has(column.name))
      .filter((column) => !(column.pk > 0 && column.type.toUpperCase() === 'INTEGER'))
      .map((column) => column.name);

    if (columns.length === 0) {
      return createTable([], []);
    }

    const rows = db
      .prepare(`SELECT ${columns.map(quoteIdentifier).join(', ')} FROM ${quoteIdentifier(layer)} LIMIT ?`)
      .raw(true)
      .all(rowLimit)
      .map((row): Cell[] => (Array.isArray(row) ? row.map(coerceValue) : []));

    return createTable(columns, rows);
  });
}

function withDatabase<T>(filePath: string, fn: (db: Database.Database) => T): T {
  const db = new Database(filePath, { readonly: true, fileMustExist: true });
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
