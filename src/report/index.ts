/**
 * Report formatters. Pure functions from an analysis summary to text.
 */

import type { AnalysisSummary } from '../types/index.js';
import type { OutputFormat } from '../config/schema.js';
import type { ReportContext } from './types.js';
import { formatTable } from './table.js';
import { formatCsv } from './csv.js';
import { formatJson } from './json.js';
import { formatMarkdown } from './markdown.js';

export function formatReport(summary: AnalysisSummary, format: OutputFormat, context: ReportContext): string {
  switch (format) {
    case 'table':
      return formatTable(summary, context);
    case 'csv':
      return formatCsv(summary);
    case 'json':
      return formatJson(summary, context);
    case 'markdown':
      return formatMarkdown(summary, context);
  }
}

export { formatTable, formatCsv, formatJson, formatMarkdown };
export { buildJsonReport, type JsonReport } from './json.js';
export { formatFileList, statusLabel, formatTimestamp, TRUNCATE_THRESHOLD } from './shared.js';
export type { ReportContext } from './types.js';
