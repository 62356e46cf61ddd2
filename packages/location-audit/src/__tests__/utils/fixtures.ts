/**
 * Shared test fixtures
 *
 * Temporary directories, a two-country reference and in-memory stand-ins
 * for the catalog collaborators. Fake resources "download" by copying a
 * local file, or fail when they have none.
 */

import AdmZip from 'adm-zip';
import Database from 'better-sqlite3';
import { copyFile, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import * as XLSX from 'xlsx';
import type { Catalog, DatasetHandle, ResourceHandle } from '../../catalog/types.js';
import type { Cell, Table } from '../../core/types.js';
import { Logger } from '../../core/utils/logger.js';
import type { CountryCodes } from '../../reference/country-reference.js';
import { createTable } from '../../transformation/table.js';

export const TEST_COUNTRIES: readonly CountryCodes[] = [
  { iso3: 'KEN', iso2: 'KE', name: 'Kenya' },
  { iso3: 'TUR', iso2: 'TR', name: 'Turkiye' },
];

/**
 * Logger that only reports errors, to keep test output readable
 */
export function quietLogger(): Logger {
  return new Logger({ level: 'error', service: 'location-audit:test', pretty: true });
}

export async function createTempDir(prefix = 'location-audit-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a text file under `dir`, creating parent directories
 */
export async function writeTextFile(dir: string, relativePath: string, content: string): Promise<string> {
  const filePath = join(dir, relativePath);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Build a raw table the way a reader would
 */
export function tableOf(header: readonly Cell[], rows: readonly (readonly Cell[])[]): Table {
  return createTable(header, rows);
}

/**
 * CSV body with `count` rows produced by `row(i)`
 */
export function csvLines(header: string, count: number, row: (index: number) => string): string {
  const lines = [header];
  for (let i = 0; i < count; i++) {
    lines.push(row(i));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write an xlsx workbook with one sheet per entry (array-of-arrays content)
 */
export async function writeWorkbook(filePath: string, sheets: Record<string, unknown[][]>): Promise<string> {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, data);
  return filePath;
}

/**
 * Write a ZIP archive; entry names ending in `/` become directories
 */
export function writeZip(filePath: string, entries: Record<string, string | Buffer>): string {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
  }
  zip.writeZip(filePath);
  return filePath;
}

export interface PointShapefile {
  readonly shpPath: string;
  readonly dbfPath: string;
  /** Name of the single text attribute */
  readonly field: string;
  readonly values: readonly string[];
}

/**
 * Write a point shapefile (.shp and .dbf only) with one text attribute;
 * every point sits at the origin
 */
export async function writePointShapefile({ shpPath, dbfPath, field, values }: PointShapefile): Promise<void> {
  const shpHeader = Buffer.alloc(100);
  shpHeader.writeInt32BE(9994, 0);
  shpHeader.writeInt32BE((100 + values.length * 28) / 2, 24);
  shpHeader.writeInt32LE(1000, 28);
  shpHeader.writeInt32LE(1, 32);

  const shpRecords = values.map((_, index) => {
    const record = Buffer.alloc(28);
    record.writeInt32BE(index + 1, 0);
    record.writeInt32BE(10, 4);
    record.writeInt32LE(1, 8);
    return record;
  });

  const width = 10;
  const dbfHeader = Buffer.alloc(32);
  dbfHeader.writeUInt8(0x03, 0);
  dbfHeader.writeUInt32LE(values.length, 4);
  dbfHeader.writeUInt16LE(32 + 32 + 1, 8);
  dbfHeader.writeUInt16LE(1 + width, 10);

  const descriptor = Buffer.alloc(32);
  descriptor.write(field.slice(0, 10), 0, 'ascii');
  descriptor.write('C', 11, 'ascii');
  descriptor.writeUInt8(width, 16);

  const dbfRecords = values.map((value) => Buffer.from(` ${value.padEnd(width, ' ')}`, 'ascii'));

  await mkdir(dirname(shpPath), { recursive: true });
  await writeFile(shpPath, Buffer.concat([shpHeader, ...shpRecords]));
  await writeFile(
    dbfPath,
    Buffer.concat([dbfHeader, descriptor, Buffer.from([0x0d]), ...dbfRecords, Buffer.from([0x1a])])
  );
}

export interface GeoPackageLayer {
  readonly name: string;
  readonly dataType?: 'features' | 'attributes';
  readonly rows: readonly Readonly<Record<string, string | number | null>>[];
}

/**
 * Create a minimal GeoPackage: `gpkg_contents`, `gpkg_geometry_columns` and
 * one table per layer with an integer `fid` key and a `geom` blob column
 */
export function writeGeoPackage(filePath: string, layers: readonly GeoPackageLayer[]): string {
  const db = new Database(filePath);
  try {
    db.exec(`
      CREATE TABLE gpkg_contents (table_name TEXT PRIMARY KEY, data_type TEXT NOT NULL);
      CREATE TABLE gpkg_geometry_columns (table_name TEXT NOT NULL, column_name TEXT NOT NULL);
    `);

    for (const layer of layers) {
      const dataType = layer.dataType ?? 'features';
      const columns = Object.keys(layer.rows[0] ?? {});
      const definitions = columns.map((column) => `"${column}" TEXT`).join(', ');

      db.exec(
        `CREATE TABLE "${layer.name}" (fid INTEGER PRIMARY KEY, geom BLOB${definitions ? `, ${definitions}` : ''})`
      );
      db.prepare('INSERT INTO gpkg_contents (table_name, data_type) VALUES (?, ?)').run(layer.name, dataType);
      if (dataType === 'features') {
        db.prepare('INSERT INTO gpkg_geometry_columns (table_name, column_name) VALUES (?, ?)').run(
          layer.name,
          'geom'
        );
      }

      const insert = db.prepare(
        `INSERT INTO "${layer.name}" (geom${columns.map((column) => `, "${column}"`).join('')}) VALUES (?${columns.map(() => ', ?').join('')})`
      );
      for (const row of layer.rows) {
        insert.run(Buffer.from([0x47, 0x50]), ...columns.map((column) => row[column] ?? null));
      }
    }
  } finally {
    db.close();
  }
  return filePath;
}

export class FakeResource implements ResourceHandle {
  downloads = 0;

  constructor(
    readonly name: string,
    private readonly fileType: string,
    private readonly sourcePath: string | null,
    private readonly size: number | null = null
  ) {}

  getFileType(): string {
    return this.fileType;
  }

  getSize(): number | null {
    return this.size;
  }

  async download(targetFolder: string): Promise<string> {
    this.downloads += 1;
    if (this.sourcePath === null) {
      throw new Error('connection refused');
    }
    const destination = join(targetFolder, this.name);
    await copyFile(this.sourcePath, destination);
    return destination;
  }
}

export class FakeDataset implements DatasetHandle {
  constructor(
    readonly name: string,
    private readonly resources: readonly ResourceHandle[],
    private readonly locationCodes: readonly string[] = ['KEN']
  ) {}

  getFileTypes(): readonly string[] {
    return this.resources.map((resource) => resource.getFileType());
  }

  getResources(): readonly ResourceHandle[] {
    return this.resources;
  }

  getLocationCodes(): readonly string[] {
    return this.locationCodes;
  }
}

export class FakeCatalog implements Catalog {
  readonly filters: string[] = [];

  constructor(private readonly datasets: readonly DatasetHandle[]) {}

  async searchDatasets(filter: string): Promise<readonly DatasetHandle[]> {
    this.filters.push(filter);
    return this.datasets;
  }
}
