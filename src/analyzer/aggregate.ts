/**
 * Aggregation of per-file records into per-endpoint results
 */

import type { AggregatedResult, Endpoint, FileUsageRecord } from '../types/index.js';
import { compareEndpoints, endpointKey, formatEndpoint } from '../openapi/endpoints.js';

export interface ResultFilter {
  unusedOnly?: boolean;
  /** Matched against "METHOD path" */
  pattern?: RegExp;
}

/**
 * Compile a user-supplied filter expression. An invalid expression is a
 * configuration error for the whole run.
 */
export function compileFilterPattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid filter pattern "${source}": ${reason}`);
  }
}

/**
 * One result per endpoint, in endpoint order, including endpoints nothing
 * referenced. Only union and sum are used, so record order does not matter.
 */
export function aggregateUsage(
  endpoints: readonly Endpoint[],
  records: Iterable<FileUsageRecord>
): AggregatedResult[] {
  const usage = new Map<string, { files: Set<string>; matchCount: number }>();
  for (const endpoint of endpoints) {
    usage.set(endpointKey(endpoint), { files: new Set(), matchCount: 0 });
  }

  for (const record of records) {
    for (const { endpoint, count } of record.matches) {
      const entry = usage.get(endpointKey(endpoint));
      if (!entry || count <= 0) continue;
      entry.files.add(record.file);
      entry.matchCount += count;
    }
  }

  return endpoints.map((endpoint): AggregatedResult => {
    const entry = usage.get(endpointKey(endpoint));
    const files = entry ? Array.from(entry.files).sort() : [];
    return {
      endpoint,
      status: files.length > 0 ? 'used' : 'unused',
      usageCount: files.length,
      matchCount: entry?.matchCount ?? 0,
      files,
    };
  });
}

export function filterResults(results: readonly AggregatedResult[], filter: ResultFilter): AggregatedResult[] {
  const { unusedOnly = false, pattern } = filter;
  return results.filter(result => {
    if (unusedOnly && result.status !== 'unused') return false;
    if (pattern && !pattern.test(formatEndpoint(result.endpoint))) return false;
    return true;
  });
}

export function sortResults(results: readonly AggregatedResult[]): AggregatedResult[] {
  return [...results].sort((a, b) => compareEndpoints(a.endpoint, b.endpoint));
}
