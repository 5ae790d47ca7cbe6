/**
 * Persistence collaborator
 *
 * The interchange core only talks to this interface. `InMemoryCatalogStore`
 * is the in-process implementation used by the command line tool (through
 * FileCatalogStore) and by the tests.
 */

import { randomUUID } from 'node:crypto';
import { NotFoundError } from './errors.js';
import type { HttpMethod } from './constants.js';
import type {
  CallSchemaLink,
  CatalogAPICall,
  CatalogAPIResponse,
  CatalogAttribute,
  CatalogParameter,
  CatalogSchema,
  NewCatalogAPICall,
  NewCatalogAPIResponse,
  NewCatalogAttribute,
  NewCatalogParameter,
  NewCatalogSchema,
  NewService,
  ResponseSchemaLink,
  SchemaLink,
  SchemaLinkKind,
  Service,
} from './types/catalog.js';

export interface CatalogStore {
  findServiceByName(name: string): Promise<Service | undefined>;
  getService(id: string): Promise<Service>;
  createService(input: NewService): Promise<Service>;
  updateService(id: string, changes: Partial<NewService>): Promise<Service>;
  listServices(): Promise<Service[]>;

  findSchemaByName(serviceId: string, name: string): Promise<CatalogSchema | undefined>;
  getSchema(id: string): Promise<CatalogSchema>;
  createSchema(serviceId: string, input: NewCatalogSchema): Promise<CatalogSchema>;
  updateSchema(id: string, changes: Partial<NewCatalogSchema>): Promise<CatalogSchema>;
  listSchemas(serviceId: string): Promise<CatalogSchema[]>;
  createAttribute(schemaId: string, input: NewCatalogAttribute): Promise<CatalogAttribute>;
  deleteAttributes(schemaId: string): Promise<void>;
  listAttributes(schemaId: string): Promise<CatalogAttribute[]>;

  createAPICall(serviceId: string, input: NewCatalogAPICall): Promise<CatalogAPICall>;
  findAPICall(serviceId: string, path: string, method: HttpMethod): Promise<CatalogAPICall | undefined>;
  deleteAPICall(id: string): Promise<void>;
  listAPICalls(serviceId: string): Promise<CatalogAPICall[]>;
  createParameter(callId: string, input: NewCatalogParameter): Promise<CatalogParameter>;
  listParameters(callId: string): Promise<CatalogParameter[]>;
  createResponse(callId: string, input: NewCatalogAPIResponse): Promise<CatalogAPIResponse>;
  listResponses(callId: string): Promise<CatalogAPIResponse[]>;

  /** Idempotent: an existing link between the same rows is kept as is */
  attachSchemaToCall(schemaId: string, callId: string, kind: SchemaLinkKind): Promise<boolean>;
  /** Idempotent: an existing link between the same rows is kept as is */
  attachSchemaToResponse(schemaId: string, responseId: string, kind: SchemaLinkKind): Promise<boolean>;
  getCallSchemaLink(callId: string): Promise<SchemaLink | undefined>;
  getResponseSchemaLink(responseId: string): Promise<SchemaLink | undefined>;

  /**
   * Run `work` as one unit; a failure leaves the store as it was
   */
  transaction<T>(work: (store: CatalogStore) => Promise<T>): Promise<T>;
}

export interface CatalogSnapshot {
  version: 1;
  services: Service[];
  schemas: CatalogSchema[];
  attributes: CatalogAttribute[];
  calls: CatalogAPICall[];
  parameters: CatalogParameter[];
  responses: CatalogAPIResponse[];
  callLinks: CallSchemaLink[];
  responseLinks: ResponseSchemaLink[];
}

export interface InMemoryCatalogStoreOptions {
  generateId?: () => string;
  now?: () => Date;
}

export function emptySnapshot(): CatalogSnapshot {
  return {
    version: 1,
    services: [],
    schemas: [],
    attributes: [],
    calls: [],
    parameters: [],
    responses: [],
    callLinks: [],
    responseLinks: [],
  };
}

/** Rows leave the store as copies so callers cannot change keys in place */
function copy<T>(row: T): T {
  return structuredClone(row);
}

export class InMemoryCatalogStore implements CatalogStore {
  private data: CatalogSnapshot;
  private generateId: () => string;
  private now: () => Date;

  constructor(snapshot: CatalogSnapshot = emptySnapshot(), options: InMemoryCatalogStoreOptions = {}) {
    this.data = structuredClone(snapshot);
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  toSnapshot(): CatalogSnapshot {
    return structuredClone(this.data);
  }

  async findServiceByName(name: string): Promise<Service | undefined> {
    const service = this.data.services.find(candidate => candidate.name === name);
    return service ? copy(service) : undefined;
  }

  async getService(id: string): Promise<Service> {
    return copy(this.requireService(id));
  }

  async createService(input: NewService): Promise<Service> {
    const timestamp = this.now().toISOString();
    const service: Service = { ...input, id: this.generateId(), createdAt: timestamp, updatedAt: timestamp };
    this.data.services.push(copy(service));
    return service;
  }

  async updateService(id: string, changes: Partial<NewService>): Promise<Service> {
    const service = this.requireService(id);
    Object.assign(service, copy(changes), { updatedAt: this.now().toISOString() });
    return copy(service);
  }

  async listServices(): Promise<Service[]> {
    return this.data.services.map(copy);
  }

  async findSchemaByName(serviceId: string, name: string): Promise<CatalogSchema | undefined> {
    const schema = this.data.schemas.find(candidate => candidate.serviceId === serviceId && candidate.name === name);
    return schema ? copy(schema) : undefined;
  }

  async getSchema(id: string): Promise<CatalogSchema> {
    return copy(this.requireSchema(id));
  }

  async createSchema(serviceId: string, input: NewCatalogSchema): Promise<CatalogSchema> {
    this.requireService(serviceId);
    const schema: CatalogSchema = { ...copy(input), id: this.generateId(), serviceId };
    this.data.schemas.push(copy(schema));
    return schema;
  }

  async updateSchema(id: string, changes: Partial<NewCatalogSchema>): Promise<CatalogSchema> {
    const schema = this.requireSchema(id);
    Object.assign(schema, copy(changes));
    return copy(schema);
  }

  async listSchemas(serviceId: string): Promise<CatalogSchema[]> {
    return this.data.schemas.filter(schema => schema.serviceId === serviceId).map(copy);
  }

  async createAttribute(schemaId: string, input: NewCatalogAttribute): Promise<CatalogAttribute> {
    this.requireSchema(schemaId);
    const position = this.data.attributes.filter(attribute => attribute.schemaId === schemaId).length;
    const attribute: CatalogAttribute = { ...copy(input), id: this.generateId(), schemaId, position };
    this.data.attributes.push(copy(attribute));
    return attribute;
  }

  async deleteAttributes(schemaId: string): Promise<void> {
    this.data.attributes = this.data.attributes.filter(attribute => attribute.schemaId !== schemaId);
  }

  async listAttributes(schemaId: string): Promise<CatalogAttribute[]> {
    return this.data.attributes
      .filter(attribute => attribute.schemaId === schemaId)
      .sort((a, b) => a.position - b.position)
      .map(copy);
  }

  async createAPICall(serviceId: string, input: NewCatalogAPICall): Promise<CatalogAPICall> {
    this.requireService(serviceId);
    const call: CatalogAPICall = { ...copy(input), id: this.generateId(), serviceId };
    this.data.calls.push(copy(call));
    return call;
  }

  async findAPICall(serviceId: string, path: string, method: HttpMethod): Promise<CatalogAPICall | undefined> {
    const call = this.data.calls.find(candidate =>
      candidate.serviceId === serviceId && candidate.path === path && candidate.method === method
    );
    return call ? copy(call) : undefined;
  }

  async deleteAPICall(id: string): Promise<void> {
    const responseIds = new Set(
      this.data.responses.filter(response => response.callId === id).map(response => response.id)
    );

    this.data.calls = this.data.calls.filter(call => call.id !== id);
    this.data.parameters = this.data.parameters.filter(parameter => parameter.callId !== id);
    this.data.responses = this.data.responses.filter(response => response.callId !== id);
    this.data.callLinks = this.data.callLinks.filter(link => link.callId !== id);
    this.data.responseLinks = this.data.responseLinks.filter(link => !responseIds.has(link.responseId));
  }

  async listAPICalls(serviceId: string): Promise<CatalogAPICall[]> {
    return this.data.calls.filter(call => call.serviceId === serviceId).map(copy);
  }

  async createParameter(callId: string, input: NewCatalogParameter): Promise<CatalogParameter> {
    this.requireCall(callId);
    const parameter: CatalogParameter = { ...copy(input), id: this.generateId(), callId };
    this.data.parameters.push(copy(parameter));
    return parameter;
  }

  async listParameters(callId: string): Promise<CatalogParameter[]> {
    return this.data.parameters.filter(parameter => parameter.callId === callId).map(copy);
  }

  async createResponse(callId: string, input: NewCatalogAPIResponse): Promise<CatalogAPIResponse> {
    this.requireCall(callId);
    const response: CatalogAPIResponse = { ...copy(input), id: this.generateId(), callId };
    this.data.responses.push(copy(response));
    return response;
  }

  async listResponses(callId: string): Promise<CatalogAPIResponse[]> {
    return this.data.responses.filter(response => response.callId === callId).map(copy);
  }

  async attachSchemaToCall(schemaId: string, callId: string, kind: SchemaLinkKind): Promise<boolean> {
    this.requireSchema(schemaId);
    this.requireCall(callId);
    if (this.data.callLinks.some(link => link.schemaId === schemaId && link.callId === callId)) {
      return false;
    }
    this.data.callLinks.push({ schemaId, callId, kind });
    return true;
  }

  async attachSchemaToResponse(schemaId: string, responseId: string, kind: SchemaLinkKind): Promise<boolean> {
    this.requireSchema(schemaId);
    if (!this.data.responses.some(response => response.id === responseId)) {
      throw new NotFoundError('Response', responseId);
    }
    if (this.data.responseLinks.some(link => link.schemaId === schemaId && link.responseId === responseId)) {
      return false;
    }
    this.data.responseLinks.push({ schemaId, responseId, kind });
    return true;
  }

  async getCallSchemaLink(callId: string): Promise<SchemaLink | undefined> {
    const link = this.data.callLinks.find(candidate => candidate.callId === callId);
    return link ? { schemaId: link.schemaId, kind: link.kind } : undefined;
  }

  async getResponseSchemaLink(responseId: string): Promise<SchemaLink | undefined> {
    const link = this.data.responseLinks.find(candidate => candidate.responseId === responseId);
    return link ? { schemaId: link.schemaId, kind: link.kind } : undefined;
  }

  async transaction<T>(work: (store: CatalogStore) => Promise<T>): Promise<T> {
    const before = structuredClone(this.data);
    try {
      return await work(this);
    } catch (error) {
      this.data = before;
      throw error;
    }
  }

  private requireService(id: string): Service {
    const service = this.data.services.find(candidate => candidate.id === id);
    if (!service) throw new NotFoundError('Service', id);
    return service;
  }

  private requireSchema(id: string): CatalogSchema {
    const schema = this.data.schemas.find(candidate => candidate.id === id);
    if (!schema) throw new NotFoundError('Schema', id);
    return schema;
  }

  private requireCall(callId: string): CatalogAPICall {
    const call = this.data.calls.find(candidate => candidate.id === callId);
    if (!call) throw new NotFoundError('API call', callId);
    return call;
  }
}
