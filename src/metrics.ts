/**
 * Prometheus Metrics Collector
 *
 * Tracks:
 * - Imports (outcome, duration)
 * - Imported and skipped items by kind
 * - Exports (format, outcome)
 */

import { Registry, Counter, Histogram } from 'prom-client';
import type { ImportStats, SkippedItemWarning } from './types/catalog.js';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
}

export type OperationStatus = 'success' | 'error';

/**
 * ImportStats counters reported as imported_items_total{kind}
 */
const IMPORTED_ITEM_KINDS = {
  endpoint: 'importedEndpoints',
  parameter: 'importedParameters',
  response: 'importedResponses',
  schema: 'importedSchemas',
  attribute: 'importedAttributes',
  link: 'linkedSchemas',
} as const satisfies Record<string, keyof ImportStats>;

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  private importsTotal: Counter;
  private importDuration: Histogram;
  private importedItemsTotal: Counter;
  private skippedItemsTotal: Counter;
  private exportsTotal: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || 'apicatalog_';

    this.importsTotal = new Counter({
      name: `${prefix}imports_total`,
      help: 'Total number of document imports',
      labelNames: ['status'],
      registers: [this.registry],
    });

    this.importDuration = new Histogram({
      name: `${prefix}import_duration_seconds`,
      help: 'Document import duration in seconds',
      labelNames: ['status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers: [this.registry],
    });

    this.importedItemsTotal = new Counter({
      name: `${prefix}imported_items_total`,
      help: 'Total number of catalog rows written by imports',
      labelNames: ['kind'],
      registers: [this.registry],
    });

    this.skippedItemsTotal = new Counter({
      name: `${prefix}skipped_items_total`,
      help: 'Total number of document items skipped by imports',
      labelNames: ['kind'],
      registers: [this.registry],
    });

    this.exportsTotal = new Counter({
      name: `${prefix}exports_total`,
      help: 'Total number of document exports',
      labelNames: ['format', 'status'],
      registers: [this.registry],
    });
  }

  /**
   * Record a finished import
   */
  recordImport(status: OperationStatus, durationSeconds: number): void {
    if (!this.enabled) return;

    this.importsTotal.inc({ status });
    this.importDuration.observe({ status }, durationSeconds);
  }

  /**
   * Record the rows and warnings of a successful import
   */
  recordImportResult(stats: ImportStats, warnings: SkippedItemWarning[]): void {
    if (!this.enabled) return;

    for (const [kind, field] of Object.entries(IMPORTED_ITEM_KINDS)) {
      const count = stats[field];
      if (count > 0) this.importedItemsTotal.inc({ kind }, count);
    }
    for (const warning of warnings) {
      this.skippedItemsTotal.inc({ kind: warning.kind });
    }
  }

  /**
   * Record a finished export
   */
  recordExport(format: string, status: OperationStatus): void {
    if (!this.enabled) return;
    this.exportsTotal.inc({ format, status });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }
}
