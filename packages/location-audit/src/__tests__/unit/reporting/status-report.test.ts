import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { StatusRow } from '../../../core/types.js';
import { StatusReportWriter } from '../../../reporting/status-report.js';
import { createTempDir, removeTempDir } from '../../utils/fixtures.js';

const ROWS: StatusRow[] = [
  {
    datasetName: 'tur-admin',
    resourceName: 'admin1.csv',
    format: 'csv',
    pcoded: true,
    latlonged: null,
    error: null,
  },
  {
    datasetName: 'tur-health',
    resourceName: 'facilities.xlsx',
    format: 'xlsx',
    pcoded: false,
    latlonged: true,
    error: null,
  },
  {
    datasetName: 'tur-health',
    resourceName: 'report.pdf',
    format: 'pdf',
    pcoded: null,
    latlonged: null,
    error: 'Not checking format',
  },
  {
    datasetName: 'tur-roads',
    resourceName: 'roads, primary.csv',
    format: 'csv',
    pcoded: null,
    latlonged: null,
    error: 'Unable to read resource roads, primary.csv',
  },
];

describe('StatusReportWriter', () => {
  const writer = new StatusReportWriter();

  it('renders verdicts as True/False and unknowns as empty cells', () => {
    expect(writer.render(ROWS).split('\n')).toEqual([
      'dataset name,resource name,format,pcoded,mis_pcoded,error',
      'tur-admin,admin1.csv,csv,True,,',
      'tur-health,facilities.xlsx,xlsx,False,True,',
      'tur-health,report.pdf,pdf,,,Not checking format',
      'tur-roads,"roads, primary.csv",csv,,,"Unable to read resource roads, primary.csv"',
    ]);
  });

  it('renders only the header for no rows', () => {
    expect(writer.render([])).toBe('dataset name,resource name,format,pcoded,mis_pcoded,error');
  });

  describe('write', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('creates parent directories and ends with a newline', async () => {
      const path = join(dir, 'out', 'status.csv');

      await writer.write(path, ROWS.slice(0, 1));

      expect(await readFile(path, 'utf-8')).toBe(
        'dataset name,resource name,format,pcoded,mis_pcoded,error\ntur-admin,admin1.csv,csv,True,,\n'
      );
    });
  });
});
