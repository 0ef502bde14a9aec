/**
 * API specification loader (file or URL, JSON or YAML)
 */

import fs from 'node:fs';
import path from 'node:path';
import * as YAML from 'yaml';
import { specDocumentSchema, type SpecDocument } from './schema.js';

export const SPEC_FILE_NAMES = [
  'openapi.json',
  'openapi.yaml',
  'openapi.yml',
  'swagger.json',
  'swagger.yaml',
  'swagger.yml',
] as const;

type SpecFormat = 'json' | 'yaml' | 'unknown';

export function isRemoteSource(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://');
}

function detectFormat(source: string): SpecFormat {
  const pathname = isRemoteSource(source) ? new URL(source).pathname : source;
  const extension = path.extname(pathname).toLowerCase();

  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  return 'unknown';
}

async function readSource(source: string): Promise<string> {
  if (isRemoteSource(source)) {
    let response: Response;
    try {
      response = await fetch(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to fetch API specification from ${source}: ${reason}`);
    }
    if (!response.ok) {
      throw new Error(`Failed to fetch API specification from ${source}: HTTP ${response.status}`);
    }
    return response.text();
  }

  const absolutePath = path.resolve(source);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`API specification not found: ${absolutePath}`);
  }
  return fs.promises.readFile(absolutePath, 'utf-8');
}

function parseContent(content: string, format: SpecFormat, source: string): unknown {
  try {
    switch (format) {
      case 'json':
        return JSON.parse(content);
      case 'yaml':
        return YAML.parse(content);
      case 'unknown':
        try {
          return JSON.parse(content);
        } catch {
          // not JSON; try YAML
          return YAML.parse(content);
        }
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse API specification ${source}: ${reason}`);
  }
}

/**
 * Parse and validate specification text. `source` only feeds format
 * detection and error messages.
 */
export function parseSpecDocument(content: string, source: string): SpecDocument {
  const raw = parseContent(content, detectFormat(source), source);
  const result = specDocumentSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map(e => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid API specification ${source}:\n${errors}`);
  }

  return result.data;
}

export async function loadSpecDocument(source: string): Promise<SpecDocument> {
  const content = await readSource(source);
  return parseSpecDocument(content, source);
}

/**
 * Look for a conventionally named specification file in `startDir` and each
 * of its parents. Returns the first hit, or null.
 */
export function findSpecFile(startDir: string): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    for (const name of SPEC_FILE_NAMES) {
      const candidate = path.join(currentDir, name);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) return null;
    currentDir = parentDir;
  }
}
