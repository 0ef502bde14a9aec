import type { AnalysisSummary } from '../types/index.js';
import type { ReportContext } from './types.js';
import { formatFileList, statusLabel } from './shared.js';

function cell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

export function formatMarkdown(summary: AnalysisSummary, context: ReportContext): string {
  const lines = [
    '| Endpoint | Method | Status | Count | Files |',
    '|----------|--------|--------|-------|-------|',
  ];

  for (const result of summary.results) {
    const cells = [
      cell(result.endpoint.path),
      result.endpoint.method,
      statusLabel(result.status),
      String(result.usageCount),
      cell(formatFileList(result, context.truncate)),
    ];
    lines.push(`| ${cells.join(' | ')} |`);
  }

  return lines.join('\n');
}
