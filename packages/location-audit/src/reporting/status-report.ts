/**
 * Status report writer
 *
 * One CSV row per checked (or skipped) resource, under the fixed
 * REPORT_COLUMNS header. Unknown verdicts and absent errors are empty cells;
 * known verdicts are written as `True`/`False`.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Papa from 'papaparse';
import { REPORT_COLUMNS } from '../core/constants.js';
import type { StatusRow, Verdict } from '../core/types.js';

export class StatusReportWriter {
  /**
   * Render rows as CSV text, header included
   */
  render(rows: readonly StatusRow[]): string {
    return Papa.unparse(
      {
        fields: [...REPORT_COLUMNS],
        data: rows.map(toRecord),
      },
      { newline: '\n' }
    );
  }

  async write(filePath: string, rows: readonly StatusRow[]): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, `${this.render(rows)}\n`, 'utf-8');
  }
}

function toRecord(row: StatusRow): string[] {
  return [
    row.datasetName,
    row.resourceName,
    row.format,
    renderVerdict(row.pcoded),
    renderVerdict(row.latlonged),
    row.error ?? '',
  ];
}

function renderVerdict(verdict: Verdict): string {
  if (verdict === null) return '';
  return verdict ? 'True' : 'False';
}
