import type { FileExtension } from '../../core/formats.js';
import type { CandidateFile, Table } from '../../core/types.js';

/**
 * Reads one candidate into zero or more raw samples (a workbook yields one
 * per non-empty sheet). Throws on any read failure.
 */
export type TableReader = (
  candidate: CandidateFile,
  extension: FileExtension,
  rowLimit: number
) => Promise<Table[]>;
