/**
 * Endpoint extraction from a specification's path table
 */

import { HTTP_METHODS, type Endpoint, type HttpMethod } from '../types/index.js';

const METHOD_LOOKUP: ReadonlyMap<string, HttpMethod> = new Map(
  HTTP_METHODS.map(method => [method.toLowerCase(), method])
);

/**
 * Parse a method token case-insensitively. Returns null for anything that
 * is not one of the eight HTTP methods a path item can declare.
 */
export function parseHttpMethod(token: string): HttpMethod | null {
  return METHOD_LOOKUP.get(token.toLowerCase()) ?? null;
}

export function createEndpoint(path: string, method: HttpMethod): Endpoint {
  return Object.freeze({ path, method });
}

/** Stable identity used for Map/Set membership */
export function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.method} ${endpoint.path}`;
}

/** "METHOD path", the form the pattern filter is matched against */
export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.method} ${endpoint.path}`;
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Orders by path, then by method token, both by code unit */
export function compareEndpoints(a: Endpoint, b: Endpoint): number {
  return compareOrdinal(a.path, b.path) || compareOrdinal(a.method, b.method);
}

export type PathTable = Record<string, unknown>;

/**
 * Extract the endpoints declared in a path table.
 *
 * Path items that are not objects are skipped, and so are keys inside a path
 * item that are not HTTP methods (`parameters`, `summary`, `$ref`, ...).
 * Method keys differing only in case collapse to one endpoint.
 */
export function extractEndpoints(paths: PathTable): Endpoint[] {
  const endpoints = new Map<string, Endpoint>();

  for (const [path, pathItem] of Object.entries(paths)) {
    if (!isPlainObject(pathItem)) continue;

    for (const token of Object.keys(pathItem)) {
      const method = parseHttpMethod(token);
      if (!method) continue;

      const endpoint = createEndpoint(path, method);
      const key = endpointKey(endpoint);
      if (!endpoints.has(key)) {
        endpoints.set(key, endpoint);
      }
    }
  }

  return Array.from(endpoints.values());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
