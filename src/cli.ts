/**
 * Command definitions for `api-catalog`
 *
 * import <source>     decode a document and merge it into the catalog file
 * export <service>    write a service back out as OpenAPI
 * services            list catalog services
 */

import fs from 'fs/promises';
import { Command, Option } from 'commander';
import { CatalogImporter } from './catalog-importer.js';
import type { CatalogConfig } from './config.js';
import { DocumentExporter, EXPORT_FORMATS, parseExportFormat } from './document-exporter.js';
import { loadDocument } from './document-source.js';
import { NotFoundError } from './errors.js';
import { FileCatalogStore } from './file-catalog-store.js';
import { createLogger, type Logger } from './logger.js';
import { MetricsCollector } from './metrics.js';

export interface CliOutput {
  write(text: string): void;
}

interface ImportOptions {
  format?: string;
}

interface ExportOptions {
  format: string;
  out?: string;
}

type GlobalOptions = {
  metricsOut?: string;
};

export interface ProgramContext {
  config: CatalogConfig;
  logger?: Logger;
  output?: CliOutput;
}

export function createProgram(context: ProgramContext): Command {
  const { config } = context;
  const logger = context.logger ?? createLogger(config.logFormat, config.logLevel);
  const output: CliOutput = context.output ?? { write: text => process.stdout.write(text) };
  const metrics = new MetricsCollector({ enabled: config.metricsEnabled });

  const program = new Command();

  program
    .name('api-catalog')
    .description('Import and export OpenAPI documents to and from the API catalog')
    .version('0.1.0')
    .option('--metrics-out <file>', 'Write Prometheus metrics to this file after the command (needs METRICS_ENABLED)')
    .exitOverride();

  program.hook('postAction', async () => {
    const { metricsOut } = program.opts<GlobalOptions>();
    if (metricsOut) {
      await fs.writeFile(metricsOut, await metrics.getMetrics(), 'utf-8');
    }
  });

  program
    .command('import')
    .description('Import an OpenAPI document from a file path or URL')
    .argument('<source>', 'File path, file:// URL or http(s):// URL')
    .addOption(new Option('-f, --format <format>', 'Document format (detected when omitted)').choices(EXPORT_FORMATS))
    .action(async (source: string, opts: ImportOptions) => {
      const document = await loadDocument(source, { timeoutMs: config.sourceTimeoutMs });
      const store = await FileCatalogStore.open(config.catalogPath);
      const importer = new CatalogImporter(store, { logger, metrics });

      const result = await importer.importDocument(document.bytes, {
        format: opts.format !== undefined ? parseExportFormat(opts.format) : undefined,
        filename: document.filename,
      });
      await store.save();

      output.write(`${JSON.stringify({
        service: result.service.name,
        version: result.service.version,
        stats: result.stats,
      }, null, 2)}\n`);
    });

  program
    .command('export')
    .description('Export a catalog service as an OpenAPI document')
    .argument('<service>', 'Service name')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(EXPORT_FORMATS).default('json'))
    .option('-o, --out <file>', 'Write to a file instead of stdout')
    .action(async (serviceName: string, opts: ExportOptions) => {
      const store = await FileCatalogStore.open(config.catalogPath);
      const service = await store.findServiceByName(serviceName);
      if (!service) {
        throw new NotFoundError('Service', serviceName);
      }

      const exporter = new DocumentExporter(store, {
        concurrency: config.exportConcurrency,
        logger,
        metrics,
      });
      const bytes = await exporter.exportService(service.id, parseExportFormat(opts.format));

      if (opts.out) {
        await fs.writeFile(opts.out, bytes);
        logger.info('Document written', { file: opts.out, bytes: bytes.byteLength });
      } else {
        output.write(new TextDecoder().decode(bytes));
      }
    });

  program
    .command('services')
    .description('List catalog services')
    .action(async () => {
      const store = await FileCatalogStore.open(config.catalogPath);
      for (const service of await store.listServices()) {
        const calls = await store.listAPICalls(service.id);
        output.write(`${service.name}\t${service.version}\t${calls.length} calls\n`);
      }
    });

  return program;
}
