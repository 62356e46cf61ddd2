import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { Cell, CandidateFile, Table } from '../../core/types.js';
import { coerceValue, createTable, isEmptyTable } from '../../transformation/table.js';

/**
 * Read every sheet of an Excel workbook (xls or xlsx)
 *
 * - The first non-blank row of each sheet is the header.
 * - At most `rowLimit` data rows per sheet.
 * - Sheets without data rows or columns are skipped.
 */
export async function readSpreadsheet(
  candidate: CandidateFile,
  _extension: string,
  rowLimit: number
): Promise<Table[]> {
  const data = await readFile(candidate.path);
  const workbook = XLSX.read(data, { type: 'buffer', sheetRows: rowLimit + 1, dense: false });

  const tables: Table[] = [];
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;

    const table = sheetToTable(sheet, rowLimit);
    if (!isEmptyTable(table)) {
      tables.push(table);
    }
  }

  return tables;
}

function sheetToTable(sheet: XLSX.WorkSheet, rowLimit: number): Table {
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  const [header = [], ...body] = matrix;
  const rows: Cell[][] = body.slice(0, rowLimit).map((row) => row.map(coerceValue));
  return createTable(header.map(coerceValue), rows);
}
