/**
 * Raw document loading
 *
 * Accepts a file path, a file:// URL or an http(s):// URL and returns the
 * document bytes with the name used for format detection.
 */

import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { SourceError, ValidationError, toError } from './errors.js';

export interface LoadedDocument {
  bytes: Uint8Array;
  /** Path or URL pathname, for extension-based format detection */
  filename: string;
  contentType?: string;
}

export interface DocumentSourceOptions {
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

function parseUrl(source: string): URL | undefined {
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(source) || !URL.canParse(source)) return undefined;
  return new URL(source);
}

export async function loadDocument(source: string, options: DocumentSourceOptions = {}): Promise<LoadedDocument> {
  const url = parseUrl(source);

  if (!url) {
    return readFile(source, source);
  }

  switch (url.protocol) {
    case 'file:':
      return readFile(fileURLToPath(url), source);
    case 'http:':
    case 'https:':
      return fetchDocument(url, source, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    default:
      throw new ValidationError(`Unsupported document source scheme "${url.protocol}"`, { source });
  }
}

async function readFile(filePath: string, source: string): Promise<LoadedDocument> {
  try {
    const bytes = await fs.readFile(filePath);
    return { bytes: new Uint8Array(bytes), filename: filePath };
  } catch (error) {
    throw new SourceError(`Cannot read document: ${toError(error).message}`, source);
  }
}

async function fetchDocument(url: URL, source: string, timeoutMs: number): Promise<LoadedDocument> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json, application/yaml, text/yaml, */*' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const cause = toError(error);
    const message = cause.name === 'TimeoutError'
      ? `Timed out after ${timeoutMs}ms`
      : cause.message;
    throw new SourceError(`Cannot fetch document: ${message}`, source);
  }

  if (!response.ok) {
    throw new SourceError(`Cannot fetch document: HTTP ${response.status}`, source, response.status);
  }

  const bytes = new Uint8Array(await response.arrayBuffer());
  return {
    bytes,
    filename: url.pathname,
    contentType: response.headers.get('content-type') ?? undefined,
  };
}
