import type { AnalysisSummary } from '../types/index.js';
import type { ReportContext } from './types.js';

export interface JsonReport {
  report: {
    generated: string;
    api_spec: string;
    search_dir: string;
    files_scanned: number;
    unreadable_files: number;
    scan_time_ms: number;
  };
  endpoints: Array<{
    endpoint: string;
    method: string;
    status: string;
    usage_count: number;
    files: string[];
  }>;
}

export function buildJsonReport(summary: AnalysisSummary, context: ReportContext): JsonReport {
  return {
    report: {
      generated: context.generatedAt.toISOString(),
      api_spec: context.specSource,
      search_dir: context.directory,
      files_scanned: summary.totalFilesScanned,
      unreadable_files: summary.unreadableFiles,
      scan_time_ms: summary.durationMs,
    },
    endpoints: summary.results.map(result => ({
      endpoint: result.endpoint.path,
      method: result.endpoint.method,
      status: result.status,
      usage_count: result.usageCount,
      files: result.files,
    })),
  };
}

export function formatJson(summary: AnalysisSummary, context: ReportContext): string {
  return JSON.stringify(buildJsonReport(summary, context), null, 2);
}
