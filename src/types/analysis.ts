/**
 * Analysis result types shared by the analyzer and the report formatters
 */

import type { Endpoint } from './endpoint.js';

export type EndpointStatus = 'used' | 'unused';

/** Matches found in one file, one entry per endpoint with a non-zero count */
export interface FileUsageRecord {
  file: string;
  /** False when the file could not be read or decoded; matches is then empty */
  readable: boolean;
  matches: Array<{ endpoint: Endpoint; count: number }>;
}

export interface AggregatedResult {
  endpoint: Endpoint;
  status: EndpointStatus;
  /** Number of distinct files referencing the endpoint */
  usageCount: number;
  /** Raw match total across all files and idiom variants */
  matchCount: number;
  /** Referencing files, sorted ascending */
  files: string[];
}

export interface AnalysisSummary {
  results: AggregatedResult[];
  totalFilesScanned: number;
  unreadableFiles: number;
  /** Endpoints left out of the pattern table because their patterns failed to compile */
  skippedEndpoints: Endpoint[];
  durationMs: number;
}
