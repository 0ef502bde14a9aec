import type { AnalysisSummary } from '../types/index.js';

function quote(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

export function formatCsv(summary: AnalysisSummary): string {
  const lines = ['Endpoint,Method,Status,Usage Count,Files'];

  for (const result of summary.results) {
    lines.push([
      quote(result.endpoint.path),
      quote(result.endpoint.method),
      quote(result.status.toUpperCase()),
      quote(result.usageCount),
      quote(result.files.join(';')),
    ].join(','));
  }

  return lines.join('\n');
}
