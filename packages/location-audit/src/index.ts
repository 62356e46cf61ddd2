/**
 * Location Audit - p-code and coordinate column detection for catalog datasets
 *
 * location-audit provides:
 * - Archive resolution and row-capped sampling of tabular and geo files
 * - Header normalization for spreadsheets and HXL-tagged tables
 * - P-code and latitude/longitude column classification
 * - A CKAN catalog client and CSV status reporting
 *
 * @packageDocumentation
 */

// Orchestration
export { LocationChecker, type LocationCheckerOptions } from './services/location-checker.js';
export { LocationAuditRunner, type LocationAuditRunnerOptions } from './services/location-audit-runner.js';

// Acquisition
export { resolveCandidates, isArchive, findBySuffix, removeContainingPaths } from './acquisition/archive-resolver.js';
export {
    loadSamples,
    normalizeSamples,
    type LoadOptions,
    type LoadResult,
    type MergePolicy,
} from './acquisition/sampled-table-loader.js';

// Transformation
export { normalizeHeaders, findTagRow, isPlaceholder } from './transformation/header-normalizer.js';
export { createTable, createTableFromRecords } from './transformation/table.js';

// Classification
export { PcodeClassifier, buildPcodePattern } from './classification/pcode-classifier.js';
export { LatLongClassifier } from './classification/latlong-classifier.js';

// Catalog
export {
    CkanCatalog,
    CkanDatasetHandle,
    CkanResourceHandle,
    type CkanCatalogConfig,
} from './catalog/ckan-catalog.js';
export {
    HTTPClient,
    HTTPError,
    HTTPTimeoutError,
    HTTPNetworkError,
    HTTPJSONParseError,
    type HTTPClientConfig,
} from './catalog/http-client.js';
export { LocalResource, singleResourceTarget } from './catalog/local-resource.js';
export type { Catalog, DatasetHandle, LocationCheckTarget, ResourceHandle } from './catalog/types.js';

// Reference data and reporting
export { loadCountryReference, DEFAULT_COUNTRIES_PATH, type CountryCodes } from './reference/country-reference.js';
export { StatusReportWriter } from './reporting/status-report.js';

// Core
export {
    LocationAuditError,
    DownloadError,
    ExtractionError,
    ReadError,
    UnsupportedFormatError,
} from './core/errors.js';
export {
    ALLOWED_FILE_TYPES,
    isAllowedFileType,
    fileExtensionFor,
    formatFamilyOf,
    type FileType,
    type FileExtension,
    type FormatFamily,
} from './core/formats.js';
export type {
    Cell,
    ColumnType,
    Table,
    NormalizedTable,
    SampleSet,
    CandidateFile,
    Verdict,
    LocationCheckResult,
    StatusRow,
} from './core/types.js';
export { Logger, createLogger, type LogLevel } from './core/utils/logger.js';
