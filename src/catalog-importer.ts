/**
 * Catalog import pipeline
 *
 * decode -> service -> component schemas -> operations. All writes for one
 * document go through `store.transaction`, so a failure part way leaves the
 * catalog as it was. Malformed items do not fail the import; they come back
 * as warnings and are counted in `stats.skippedItems`.
 */

import type { CatalogStore } from './catalog-store.js';
import { decode, type DecodeOptions } from './document-decoder.js';
import { getErrorDetails, toError } from './errors.js';
import { ConsoleLogger, type Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { importPaths, type OperationImportContext } from './operation-importer.js';
import { project } from './relational-projector.js';
import { danglingReferences, extractAll } from './schema-extractor.js';
import {
  emptyImportStats,
  type EnvironmentType,
  type ImportResult,
  type NewService,
  type Service,
  type ServiceEnvironment,
} from './types/catalog.js';
import type { SchemaDocument, ServerNode } from './types/openapi.js';

export interface CatalogImporterOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
}

const ENVIRONMENT_PATTERNS: Array<[EnvironmentType, RegExp]> = [
  ['preprod', /pre-?prod|pre-production/i],
  ['stage', /stag(e|ing)/i],
  ['prod', /prod(uction)?/i],
];

/**
 * Classify a server by the words in its description and URL
 */
export function detectEnvironmentType(server: ServerNode): EnvironmentType {
  const text = `${server.description ?? ''} ${server.url}`;
  for (const [type, pattern] of ENVIRONMENT_PATTERNS) {
    if (pattern.test(text)) return type;
  }
  return 'development';
}

export function toEnvironment(server: ServerNode): ServiceEnvironment {
  // relative server URLs ("/v1") have no host
  const host = URL.canParse(server.url) ? new URL(server.url).host : '';

  return {
    type: detectEnvironmentType(server),
    host: host || 'unknown',
    baseURL: server.url,
    description: server.description,
  };
}

export function serviceFromDocument(document: SchemaDocument): NewService {
  return {
    name: document.info.title,
    version: document.info.version,
    description: document.info.description,
    owner: document.info.contact?.name,
    contactEmail: document.info.contact?.email,
    environments: document.servers.map(toEnvironment),
  };
}

export class CatalogImporter {
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(
    private store: CatalogStore,
    options: CatalogImporterOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics;
  }

  /**
   * Decode raw JSON/YAML and import it
   */
  async importDocument(input: string | Uint8Array, options: DecodeOptions = {}): Promise<ImportResult> {
    const started = performance.now();
    try {
      const document = decode(input, options);
      const result = await this.store.transaction(store => this.run(document, store));

      this.metrics?.recordImport('success', (performance.now() - started) / 1000);
      this.metrics?.recordImportResult(result.stats, result.warnings);
      this.logger.info('Import finished', {
        service: result.service.name,
        ...result.stats,
      });
      return result;
    } catch (error) {
      this.metrics?.recordImport('error', (performance.now() - started) / 1000);
      this.logger.error('Import failed', toError(error), getErrorDetails(error));
      throw error;
    }
  }

  private async run(document: SchemaDocument, store: CatalogStore): Promise<ImportResult> {
    const context: OperationImportContext = {
      stats: emptyImportStats(),
      warnings: [],
      logger: this.logger,
    };

    for (const diagnostic of document.diagnostics) {
      context.warnings.push({ kind: 'decode', pointer: diagnostic.pointer, message: diagnostic.message });
      context.stats.skippedItems++;
      this.logger.warn(diagnostic.message, { kind: 'decode', pointer: diagnostic.pointer });
    }

    const service = await this.upsertService(document, store);
    await this.importSchemas(document, store, service, context);
    const calls = await importPaths(document, store, service, context);

    return { service, calls, stats: context.stats, warnings: context.warnings };
  }

  private async upsertService(document: SchemaDocument, store: CatalogStore): Promise<Service> {
    const input = serviceFromDocument(document);
    const existing = await store.findServiceByName(input.name);

    if (existing) {
      this.logger.debug('Updating existing service', { service: input.name, id: existing.id });
      return store.updateService(existing.id, input);
    }
    return store.createService(input);
  }

  private async importSchemas(
    document: SchemaDocument,
    store: CatalogStore,
    service: Service,
    context: OperationImportContext
  ): Promise<void> {
    const schemas = document.components.schemas;

    for (const { from, target } of danglingReferences(schemas)) {
      this.logger.debug('Schema references an unknown component', { schema: from, target });
    }

    for (const extracted of extractAll(schemas)) {
      const projection = project(extracted.name, extracted.schema, { schemas });

      const existing = await store.findSchemaByName(service.id, extracted.name);
      let schemaId: string;
      if (existing) {
        await store.updateSchema(existing.id, projection.schema);
        await store.deleteAttributes(existing.id);
        schemaId = existing.id;
      } else {
        schemaId = (await store.createSchema(service.id, projection.schema)).id;
      }
      context.stats.importedSchemas++;

      for (const attribute of projection.attributes) {
        await store.createAttribute(schemaId, attribute);
        context.stats.importedAttributes++;
      }
    }
  }
}
