import { open } from 'node:fs/promises';
import Papa from 'papaparse';
import type { CandidateFile, Table } from '../../core/types.js';
import { coerceText, createTable } from '../../transformation/table.js';

/**
 * Bytes read from the start of a delimited file. A 100-row sample fits in
 * this comfortably; the partial last line of a longer file is discarded.
 */
const PREFIX_BYTES = 16 * 1024 * 1024;

/**
 * Read the header and the first `rowLimit` data rows of a delimited text file
 *
 * Blank lines are skipped and a UTF-8 byte order mark is stripped.
 */
export async function readDelimited(
  candidate: CandidateFile,
  _extension: string,
  rowLimit: number
): Promise<Table[]> {
  const text = await readPrefix(candidate.path, PREFIX_BYTES);

  const result = Papa.parse<string[]>(text, {
    preview: rowLimit + 1,
    skipEmptyLines: 'greedy',
  });

  const [header, ...body] = result.data;
  if (!header || header.length === 0) {
    throw new Error('No columns to parse from file');
  }

  const rows = body.map((row) => row.map(coerceText));
  return [createTable(header, rows)];
}

async function readPrefix(filePath: string, maxBytes: number): Promise<string> {
  const handle = await open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    const length = Math.min(size, maxBytes);
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, 0);

    let text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
    if (size > maxBytes) {
      const lastNewline = text.lastIndexOf('\n');
      text = lastNewline >= 0 ? text.slice(0, lastNewline) : text;
    }
    return text;
  } finally {
    await handle.close();
  }
}
