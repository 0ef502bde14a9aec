/**
 * Pattern compiler - turns endpoints into the regexes the scanner runs
 *
 * Source code spells the same request in several ways, so every endpoint
 * gets a family of patterns (idiom variants). The family over-matches on
 * purpose: a missed call site would report a live endpoint as removable.
 */

import type { Endpoint } from '../types/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { formatEndpoint } from '../openapi/endpoints.js';

/**
 * - `prefixed-literal`: the declared path preceded by a base path, call closed right after the string
 * - `template`: `{param}` placeholders accept concrete values, call closed right after the string
 * - `loose`: the declared path verbatim, further call arguments allowed
 */
export type IdiomVariant = 'prefixed-literal' | 'template' | 'loose';

export type MethodCase = 'upper' | 'lower';

export interface PatternEntry {
  endpoint: Endpoint;
  variant: IdiomVariant;
  methodCase: MethodCase;
  regex: RegExp;
}

export interface PatternTable {
  entries: PatternEntry[];
  /** Endpoints whose family failed to compile, with the reason */
  skipped: Array<{ endpoint: Endpoint; error: string }>;
}

export interface PatternCompilerOptions {
  /** Fragment substituted for each `{param}` placeholder. Default: one or more non-slash characters */
  paramPattern?: string;
  logger?: Logger;
}

export const DEFAULT_PARAM_PATTERN = '[^/]+';

const QUOTE = '[\'"`]';
const NOT_QUOTE = '[^\'"`]';
const OPEN_CALL = '\\s*\\(\\s*';
const CLOSE_CALL = '\\s*\\)';
const PLACEHOLDER = /\{[^{}/]+\}/g;

/** Fixed order keeps match counts reproducible when variants overlap */
const FAMILY: ReadonlyArray<{ variant: IdiomVariant; methodCase: MethodCase }> = [
  { variant: 'prefixed-literal', methodCase: 'upper' },
  { variant: 'template', methodCase: 'upper' },
  { variant: 'prefixed-literal', methodCase: 'lower' },
  { variant: 'template', methodCase: 'lower' },
  { variant: 'loose', methodCase: 'lower' },
  { variant: 'loose', methodCase: 'upper' },
];

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex source for a templated path: literal text escaped, each `{param}`
 * replaced by `paramPattern`. A path without placeholders comes back escaped.
 */
export function pathToPattern(path: string, paramPattern: string = DEFAULT_PARAM_PATTERN): string {
  return path.split(PLACEHOLDER).map(escapeRegExp).join(paramPattern);
}

export function buildPatternSource(
  endpoint: Endpoint,
  variant: IdiomVariant,
  methodCase: MethodCase,
  paramPattern: string = DEFAULT_PARAM_PATTERN
): string {
  const method = escapeRegExp(methodCase === 'upper' ? endpoint.method : endpoint.method.toLowerCase());
  const literal = escapeRegExp(endpoint.path);

  switch (variant) {
    case 'prefixed-literal':
      return `${method}${OPEN_CALL}${QUOTE}(/${NOT_QUOTE}*${literal})${QUOTE}${CLOSE_CALL}`;
    case 'template':
      return `${method}${OPEN_CALL}${QUOTE}(${pathToPattern(endpoint.path, paramPattern)})${QUOTE}${CLOSE_CALL}`;
    case 'loose':
      return `${method}${OPEN_CALL}${QUOTE}(${literal})${QUOTE}`;
  }
}

/**
 * Compile the whole family for one endpoint. Throws if any member is not a
 * valid regex; the caller decides what to do with the endpoint.
 */
export function compileEndpointPatterns(
  endpoint: Endpoint,
  paramPattern: string = DEFAULT_PARAM_PATTERN
): PatternEntry[] {
  return FAMILY.map(({ variant, methodCase }) => ({
    endpoint,
    variant,
    methodCase,
    regex: new RegExp(buildPatternSource(endpoint, variant, methodCase, paramPattern), 'g'),
  }));
}

/**
 * Build the flat pattern table. An endpoint whose patterns fail to compile is
 * left out and reported in `skipped`; the rest of the table is unaffected.
 */
export function compilePatternTable(
  endpoints: readonly Endpoint[],
  options: PatternCompilerOptions = {}
): PatternTable {
  const paramPattern = options.paramPattern ?? DEFAULT_PARAM_PATTERN;
  const logger = options.logger ?? silentLogger;
  const entries: PatternEntry[] = [];
  const skipped: PatternTable['skipped'] = [];

  for (const endpoint of endpoints) {
    try {
      entries.push(...compileEndpointPatterns(endpoint, paramPattern));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      skipped.push({ endpoint, error: message });
      logger.warn(`Skipping ${formatEndpoint(endpoint)}: could not compile match patterns (${message})`);
    }
  }

  logger.debug(`Compiled ${entries.length} patterns for ${endpoints.length - skipped.length} endpoints`);

  return { entries, skipped };
}
