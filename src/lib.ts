/**
 * Library exports for programmatic usage
 */
export { CatalogImporter, detectEnvironmentType, serviceFromDocument } from './catalog-importer.js';
export type { CatalogImporterOptions } from './catalog-importer.js';
export { InMemoryCatalogStore, emptySnapshot } from './catalog-store.js';
export type { CatalogStore, CatalogSnapshot } from './catalog-store.js';
export { FileCatalogStore, parseSnapshot } from './file-catalog-store.js';
export { DocumentDecoder, decode, detectFormat } from './document-decoder.js';
export type { DecodeOptions } from './document-decoder.js';
export { DocumentExporter, parseExportFormat, serialize } from './document-exporter.js';
export type { DocumentExporterOptions, ExportFormat } from './document-exporter.js';
export { loadDocument } from './document-source.js';
export type { LoadedDocument } from './document-source.js';
export { importPaths } from './operation-importer.js';
export { project, resolveType } from './relational-projector.js';
export { extractAll, referencedNames } from './schema-extractor.js';
export { synthesize } from './name-synthesizer.js';
export { fromStorageString, toStorageString } from './json-value.js';
export type { JsonValue } from './json-value.js';
export { mapBounded } from './fan-out.js';
export { loadConfig } from './config.js';
export type { CatalogConfig } from './config.js';
export { MetricsCollector } from './metrics.js';
export { ConsoleLogger, JsonLogger, LogLevel } from './logger.js';
export type { Logger } from './logger.js';
export {
  CatalogError,
  ConfigurationError,
  DecodeError,
  NotFoundError,
  SourceError,
  ValidationError,
} from './errors.js';
export type * from './types/catalog.js';
export type * from './types/openapi.js';
