/**
 * Tests for the JSON snapshot file store
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { emptySnapshot } from './catalog-store.js';
import { SourceError, ValidationError } from './errors.js';
import { FileCatalogStore, parseSnapshot } from './file-catalog-store.js';

describe('parseSnapshot', () => {
  it('should accept an empty snapshot', () => {
    expect(parseSnapshot(emptySnapshot())).toEqual(emptySnapshot());
  });

  it('should name the first invalid field', () => {
    expect(() => parseSnapshot({ ...emptySnapshot(), services: 'none' })).toThrow(/^Invalid catalog snapshot: services: /);
    expect(() => parseSnapshot({ ...emptySnapshot(), version: 2 })).toThrow(ValidationError);
  });

  it('should reject unknown link kinds', () => {
    const snapshot = {
      ...emptySnapshot(),
      callLinks: [{ schemaId: 's', callId: 'c', kind: 'Map' }],
    };

    expect(() => parseSnapshot(snapshot)).toThrow(/^Invalid catalog snapshot: callLinks\.0\.kind: /);
  });
});

describe('FileCatalogStore', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'api-catalog-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should open a missing file as an empty catalog', async () => {
    const store = await FileCatalogStore.open(path.join(directory, 'catalog.json'));

    expect(store.toSnapshot()).toEqual(emptySnapshot());
    expect(await store.listServices()).toEqual([]);
  });

  it('should write the catalog and read it back', async () => {
    const filePath = path.join(directory, 'nested', 'catalog.json');
    const store = await FileCatalogStore.open(filePath);
    const service = await store.createService({ name: 'Users', version: '1', environments: [] });
    const call = await store.createAPICall(service.id, { path: '/users', method: 'get', tags: ['users'] });
    await store.createResponse(call.id, { statusCode: '200', contentType: 'application/json' });
    await store.save();

    const reopened = await FileCatalogStore.open(filePath);

    expect(reopened.toSnapshot()).toEqual(store.toSnapshot());
    expect(await fs.readdir(path.dirname(filePath))).toEqual(['catalog.json']);
  });

  it('should end the file with a newline', async () => {
    const filePath = path.join(directory, 'catalog.json');
    const store = await FileCatalogStore.open(filePath);
    await store.save();

    const content = await fs.readFile(filePath, 'utf-8');

    expect(content.endsWith('}\n')).toBe(true);
    expect(JSON.parse(content)).toEqual(emptySnapshot());
  });

  it('should reject a file that is not JSON', async () => {
    const filePath = path.join(directory, 'catalog.json');
    await fs.writeFile(filePath, 'not json', 'utf-8');

    await expect(FileCatalogStore.open(filePath)).rejects.toThrow(/^Catalog file is not valid JSON: /);
  });

  it('should reject a JSON file with the wrong shape', async () => {
    const filePath = path.join(directory, 'catalog.json');
    await fs.writeFile(filePath, JSON.stringify({ version: 1 }), 'utf-8');

    await expect(FileCatalogStore.open(filePath)).rejects.toThrow(ValidationError);
  });

  it('should report read failures other than a missing file', async () => {
    await expect(FileCatalogStore.open(directory)).rejects.toThrow(SourceError);
    await expect(FileCatalogStore.open(directory)).rejects.toThrow(/^Cannot read catalog: /);
  });
});
