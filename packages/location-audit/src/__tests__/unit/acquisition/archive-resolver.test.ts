/**
 * Archive Resolver Test Suite
 *
 * - Plain downloads and download failures
 * - ZIP extraction, suffix search and containment filtering
 * - Spreadsheet fallback for archives without spreadsheet entries
 * - Layer expansion for multi-layer containers (geodatabase parsing is
 *   mocked)
 */

import type { FeatureCollection } from 'geojson';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  findBySuffix,
  isArchive,
  removeContainingPaths,
  resolveCandidates,
} from '../../../acquisition/archive-resolver.js';
import { DownloadError, ExtractionError } from '../../../core/errors.js';
import {
  createTempDir,
  FakeResource,
  quietLogger,
  removeTempDir,
  writeGeoPackage,
  writeTextFile,
  writeWorkbook,
  writeZip,
} from '../../utils/fixtures.js';

const fgdbMock = vi.hoisted(() => vi.fn<(source: string) => Promise<Record<string, FeatureCollection>>>());

vi.mock('fgdb', () => ({ default: fgdbMock }));

let sources: string;
let scratch: string;
const logger = quietLogger();

beforeEach(async () => {
  sources = await createTempDir();
  scratch = await createTempDir();
});

afterEach(async () => {
  fgdbMock.mockReset();
  await removeTempDir(sources);
  await removeTempDir(scratch);
});

describe('resolveCandidates', () => {
  describe('Plain files', () => {
    it('returns the downloaded file as the only candidate', async () => {
      const source = await writeTextFile(sources, 'admin1.csv', 'Pcode\nKE01\n');
      const resource = new FakeResource('admin1.csv', 'csv', source);

      const candidates = await resolveCandidates(resource, 'csv', scratch, { logger });

      expect(candidates).toEqual([{ path: join(scratch, 'admin1.csv') }]);
      expect(resource.downloads).toBe(1);
    });

    it('wraps download failures', async () => {
      const resource = new FakeResource('admin1.csv', 'csv', null);

      const attempt = resolveCandidates(resource, 'csv', scratch, { logger });

      await expect(attempt).rejects.toBeInstanceOf(DownloadError);
      await expect(attempt).rejects.toThrow('Could not download file admin1.csv');
    });
  });

  describe('ZIP archives', () => {
    it('finds matching entries in sorted order', async () => {
      const source = writeZip(join(sources, 'bundle.zip'), {
        'data/admin2.csv': 'Pcode\nKE0101\n',
        'data/admin1.csv': 'Pcode\nKE01\n',
        'readme.txt': 'notes',
      });
      const resource = new FakeResource('bundle.zip', 'csv', source);

      const candidates = await resolveCandidates(resource, 'csv', scratch, { logger });

      expect(candidates.map((candidate) => basename(candidate.path))).toEqual(['admin1.csv', 'admin2.csv']);
      expect(candidates.every((candidate) => candidate.path.startsWith(scratch))).toBe(true);
    });

    it('reports archives without matching entries', async () => {
      const source = writeZip(join(sources, 'bundle.zip'), { 'readme.txt': 'notes' });
      const resource = new FakeResource('bundle.zip', 'csv', source);

      await expect(resolveCandidates(resource, 'csv', scratch, { logger })).rejects.toThrow(
        'No .csv files found in resource bundle.zip'
      );
    });

    it('reports archives that cannot be unpacked', async () => {
      const source = await writeTextFile(sources, 'broken.zip', 'not really a zip');
      const resource = new FakeResource('broken.zip', 'csv', source);

      const attempt = resolveCandidates(resource, 'csv', scratch, { logger });

      await expect(attempt).rejects.toBeInstanceOf(ExtractionError);
      await expect(attempt).rejects.toThrow('Could not unzip resource broken.zip');
    });

    it('falls back to the download for a workbook without nested workbooks', async () => {
      const source = await writeWorkbook(join(sources, 'admin.xlsx'), { Sheet1: [['Pcode'], ['KE01']] });
      const resource = new FakeResource('admin.xlsx', 'xlsx', source);

      const candidates = await resolveCandidates(resource, 'xlsx', scratch, { logger });

      expect(candidates).toEqual([{ path: join(scratch, 'admin.xlsx') }]);
    });
  });

  describe('Multi-layer containers', () => {
    it('expands a zipped GeoPackage into its layers', async () => {
      const gpkg = writeGeoPackage(join(sources, 'admin.gpkg'), [
        { name: 'admin1', rows: [{ pcode: 'KE01' }] },
        { name: 'admin2', rows: [{ pcode: 'KE0101' }] },
      ]);
      const source = writeZip(join(sources, 'admin_gpkg.zip'), { 'admin.gpkg': await readFile(gpkg) });
      const resource = new FakeResource('admin_gpkg.zip', 'geopackage', source);

      const candidates = await resolveCandidates(resource, 'gpkg', scratch, { logger });

      expect(candidates.map((candidate) => [basename(candidate.path), candidate.layer])).toEqual([
        ['admin.gpkg', 'admin1'],
        ['admin.gpkg', 'admin2'],
      ]);
    });

    it('expands a plain GeoPackage download', async () => {
      const source = writeGeoPackage(join(sources, 'admin.gpkg'), [{ name: 'admin1', rows: [{ pcode: 'KE01' }] }]);
      const resource = new FakeResource('admin.gpkg', 'geopackage', source);

      const candidates = await resolveCandidates(resource, 'gpkg', scratch, { logger });

      expect(candidates).toEqual([{ path: join(scratch, 'admin.gpkg'), layer: 'admin1' }]);
    });

    it('expands a zipped file geodatabase folder into its layers', async () => {
      const empty: FeatureCollection = { type: 'FeatureCollection', features: [] };
      fgdbMock.mockResolvedValue({ admin1: empty, admin2: empty });
      const source = writeZip(join(sources, 'admin_gdb.zip'), { 'admin.gdb/a00000001.gdbtable': 'table' });
      const resource = new FakeResource('admin_gdb.zip', 'geodatabase', source);

      const candidates = await resolveCandidates(resource, 'gdb', scratch, { logger });

      expect(candidates.map((candidate) => [basename(candidate.path), candidate.layer])).toEqual([
        ['admin.gdb', 'admin1'],
        ['admin.gdb', 'admin2'],
      ]);
      expect(fgdbMock).toHaveBeenCalledTimes(1);
    });

    it('reports containers whose layers cannot be listed', async () => {
      const source = await writeTextFile(sources, 'admin.gpkg', 'not a geopackage');
      const resource = new FakeResource('admin.gpkg', 'geopackage', source);

      await expect(resolveCandidates(resource, 'gpkg', scratch, { logger })).rejects.toThrow(
        'Could not list layers in admin.gpkg'
      );
    });
  });
});

describe('isArchive', () => {
  it('detects ZIP content by signature', async () => {
    const path = writeZip(join(sources, 'download'), { 'a.csv': 'a\n1\n' });
    expect(await isArchive(path)).toBe(true);
  });

  it('detects ZIP by name', async () => {
    const path = await writeTextFile(sources, 'admin.zip.part', 'text');
    expect(await isArchive(path)).toBe(true);
  });

  it('rejects other files', async () => {
    const path = await writeTextFile(sources, 'admin.csv', 'Pcode\nKE01\n');
    expect(await isArchive(path)).toBe(false);
  });
});

describe('findBySuffix', () => {
  it('matches case-insensitively, recursing into directories and skipping hidden entries', async () => {
    await mkdir(join(sources, 'exports.csv'), { recursive: true });
    await writeFile(join(sources, 'exports.csv', 'admin1.CSV'), 'Pcode\n');
    await writeFile(join(sources, '.hidden.csv'), 'Pcode\n');
    await writeFile(join(sources, 'notes.txt'), 'text');

    const found = await findBySuffix(sources, '.csv');

    expect(found).toEqual([join(sources, 'exports.csv'), join(sources, 'exports.csv', 'admin1.CSV')]);
  });
});

describe('removeContainingPaths', () => {
  it('drops directories that contain other matches', () => {
    expect(removeContainingPaths([join('/x', 'a.gdb'), join('/x', 'a.gdb', 'b.gdb'), join('/x', 'c.gdb')])).toEqual([
      join('/x', 'a.gdb', 'b.gdb'),
      join('/x', 'c.gdb'),
    ]);
  });

  it('keeps a single match', () => {
    expect(removeContainingPaths(['/x/a.gdb'])).toEqual(['/x/a.gdb']);
  });
});
