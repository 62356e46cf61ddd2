/**
 * File types, file extensions and format families
 *
 * The catalog declares a file type per resource; the pipeline works on the
 * file extension derived from it, and dispatches readers by format family.
 */

/**
 * File types the pipeline can check (case-sensitive)
 */
export const ALLOWED_FILE_TYPES = [
  'csv',
  'geodatabase',
  'geojson',
  'geopackage',
  'json',
  'shp',
  'topojson',
  'xls',
  'xlsx',
] as const;

export type FileType = (typeof ALLOWED_FILE_TYPES)[number];

export type FileExtension =
  | 'csv'
  | 'gdb'
  | 'geojson'
  | 'gpkg'
  | 'json'
  | 'shp'
  | 'topojson'
  | 'xls'
  | 'xlsx';

export type FormatFamily = 'spreadsheet' | 'delimited' | 'single-layer-geo' | 'multi-layer-geo';

const FILE_EXTENSIONS: Record<FileType, FileExtension> = {
  csv: 'csv',
  geodatabase: 'gdb',
  geojson: 'geojson',
  geopackage: 'gpkg',
  json: 'json',
  shp: 'shp',
  topojson: 'topojson',
  xls: 'xls',
  xlsx: 'xlsx',
};

const FORMAT_FAMILIES: Record<FileExtension, FormatFamily> = {
  csv: 'delimited',
  xls: 'spreadsheet',
  xlsx: 'spreadsheet',
  geojson: 'single-layer-geo',
  json: 'single-layer-geo',
  shp: 'single-layer-geo',
  topojson: 'single-layer-geo',
  gdb: 'multi-layer-geo',
  gpkg: 'multi-layer-geo',
};

/**
 * File types whose samples are text tables worth a lat/long column scan.
 * Geo formats carry coordinates in their geometry instead.
 */
const LATLONG_FILE_TYPES: ReadonlySet<FileType> = new Set<FileType>(['csv', 'json', 'xls', 'xlsx']);

export function isAllowedFileType(fileType: string): fileType is FileType {
  return (ALLOWED_FILE_TYPES as readonly string[]).includes(fileType);
}

export function fileExtensionFor(fileType: FileType): FileExtension {
  return FILE_EXTENSIONS[fileType];
}

export function formatFamilyOf(extension: FileExtension): FormatFamily {
  return FORMAT_FAMILIES[extension];
}

export function checksLatLong(fileType: FileType): boolean {
  return LATLONG_FILE_TYPES.has(fileType);
}
