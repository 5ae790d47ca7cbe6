/**
 * Tests for loading documents from files and URLs
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { loadDocument } from './document-source.js';
import { SourceError, ValidationError } from './errors.js';
import { usersDocumentJson, usersDocumentYaml } from './testing/fixtures.js';
import { DOCS_BASE_URL, resetMockServer, startMockServer, stopMockServer } from './testing/mock-docs-server.js';

const decoder = new TextDecoder();

describe('loadDocument', () => {
  describe('files', () => {
    let directory: string;
    let filePath: string;

    beforeAll(async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'api-catalog-source-'));
      filePath = path.join(directory, 'users.yaml');
      await fs.writeFile(filePath, usersDocumentYaml, 'utf-8');
    });

    afterAll(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('should read a plain path', async () => {
      const document = await loadDocument(filePath);

      expect(decoder.decode(document.bytes)).toBe(usersDocumentYaml);
      expect(document.filename).toBe(filePath);
      expect(document.contentType).toBeUndefined();
    });

    it('should read a file URL', async () => {
      const document = await loadDocument(pathToFileURL(filePath).href);

      expect(decoder.decode(document.bytes)).toBe(usersDocumentYaml);
      expect(document.filename).toBe(filePath);
    });

    it('should wrap read failures', async () => {
      const missing = path.join(directory, 'missing.json');

      await expect(loadDocument(missing)).rejects.toThrow(SourceError);
      await expect(loadDocument(missing)).rejects.toThrow(/^Cannot read document: ENOENT/);
    });
  });

  describe('URLs', () => {
    beforeAll(() => startMockServer());
    afterEach(() => resetMockServer());
    afterAll(() => stopMockServer());

    it('should fetch a document with its content type', async () => {
      const document = await loadDocument(`${DOCS_BASE_URL}/users.json`);

      expect(decoder.decode(document.bytes)).toBe(usersDocumentJson);
      expect(document.filename).toBe('/users.json');
      expect(document.contentType).toBe('application/json');
    });

    it('should keep the URL path as the format hint', async () => {
      const document = await loadDocument(`${DOCS_BASE_URL}/users.yaml?download=1`);

      expect(document.filename).toBe('/users.yaml');
    });

    it('should report HTTP errors with the status code', async () => {
      const failure = loadDocument(`${DOCS_BASE_URL}/missing.json`);

      await expect(failure).rejects.toThrow(new SourceError('Cannot fetch document: HTTP 404', ''));
      await expect(failure).rejects.toMatchObject({
        details: { source: `${DOCS_BASE_URL}/missing.json`, statusCode: 404 },
      });
    });

    it('should report network failures', async () => {
      await expect(loadDocument(`${DOCS_BASE_URL}/broken.json`)).rejects.toThrow(/^Cannot fetch document: /);
    });

    it('should give up after the timeout', async () => {
      await expect(loadDocument(`${DOCS_BASE_URL}/slow.json`, { timeoutMs: 20 }))
        .rejects.toThrow(SourceError);
    });
  });

  it('should reject other URL schemes', async () => {
    await expect(loadDocument('ftp://docs.example.test/users.json'))
      .rejects.toThrow(new ValidationError('Unsupported document source scheme "ftp:"'));
  });
});
