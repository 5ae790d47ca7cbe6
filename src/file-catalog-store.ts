/**
 * Catalog store persisted as a JSON snapshot file
 *
 * The whole catalog is loaded into an InMemoryCatalogStore on open and
 * written back by `save()`. A missing file opens as an empty catalog.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { HTTP_METHODS, PARAMETER_LOCATIONS } from './constants.js';
import { InMemoryCatalogStore, emptySnapshot, type CatalogSnapshot, type InMemoryCatalogStoreOptions } from './catalog-store.js';
import { SourceError, ValidationError, toError } from './errors.js';

const environmentSchema = z.object({
  type: z.enum(['development', 'stage', 'preprod', 'prod']),
  host: z.string(),
  baseURL: z.string(),
  description: z.string().optional(),
});

const serviceSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
  owner: z.string().optional(),
  contactEmail: z.string().optional(),
  environments: z.array(environmentSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const schemaRowSchema = z.object({
  id: z.string(),
  serviceId: z.string(),
  name: z.string(),
  schemaType: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  isReference: z.boolean(),
  referencedModelName: z.string().optional(),
  isRoot: z.boolean(),
  isEnum: z.boolean().optional(),
});

const attributeSchema = z.object({
  id: z.string(),
  schemaId: z.string(),
  position: z.number().int(),
  name: z.string(),
  type: z.string(),
  ofType: z.string().optional(),
  required: z.boolean(),
  nullable: z.boolean(),
  description: z.string().optional(),
  defaultValue: z.string().optional(),
  syntheticDefault: z.boolean().optional(),
  format: z.string().optional(),
  enumValues: z.array(z.string()).optional(),
});

const callSchema = z.object({
  id: z.string(),
  serviceId: z.string(),
  path: z.string(),
  method: z.enum(HTTP_METHODS),
  operationId: z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()),
});

const parameterSchema = z.object({
  id: z.string(),
  callId: z.string(),
  name: z.string(),
  location: z.enum(PARAMETER_LOCATIONS),
  type: z.string(),
  ofType: z.string().optional(),
  format: z.string().optional(),
  enumValues: z.array(z.string()).optional(),
  required: z.boolean(),
  description: z.string().optional(),
  example: z.string().optional(),
});

const responseSchema = z.object({
  id: z.string(),
  callId: z.string(),
  statusCode: z.string(),
  description: z.string().optional(),
  contentType: z.string(),
});

const linkKindSchema = z.literal('Items').nullable();

const snapshotSchema = z.object({
  version: z.literal(1),
  services: z.array(serviceSchema),
  schemas: z.array(schemaRowSchema),
  attributes: z.array(attributeSchema),
  calls: z.array(callSchema),
  parameters: z.array(parameterSchema),
  responses: z.array(responseSchema),
  callLinks: z.array(z.object({ schemaId: z.string(), callId: z.string(), kind: linkKindSchema })),
  responseLinks: z.array(z.object({ schemaId: z.string(), responseId: z.string(), kind: linkKindSchema })),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validate a parsed snapshot
 */
export function parseSnapshot(raw: unknown): CatalogSnapshot {
  const result = snapshotSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new ValidationError(
      `Invalid catalog snapshot: ${first ? `${first.path}: ${first.message}` : 'unknown problem'}`,
      { issues }
    );
  }
  return result.data;
}

export class FileCatalogStore extends InMemoryCatalogStore {
  private constructor(
    readonly filePath: string,
    snapshot: CatalogSnapshot,
    options: InMemoryCatalogStoreOptions
  ) {
    super(snapshot, options);
  }

  static async open(filePath: string, options: InMemoryCatalogStoreOptions = {}): Promise<FileCatalogStore> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return new FileCatalogStore(filePath, emptySnapshot(), options);
      }
      throw new SourceError(`Cannot read catalog: ${toError(error).message}`, filePath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`Catalog file is not valid JSON: ${toError(error).message}`, { filePath });
    }

    return new FileCatalogStore(filePath, parseSnapshot(raw), options);
  }

  /**
   * Write the current catalog; the file is replaced in one rename
   */
  async save(): Promise<void> {
    const directory = path.dirname(this.filePath);
    const temporary = path.join(directory, `.${path.basename(this.filePath)}.${process.pid}.tmp`);

    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(temporary, `${JSON.stringify(this.toSnapshot(), null, 2)}\n`, 'utf-8');
    await fs.rename(temporary, this.filePath);
  }
}
