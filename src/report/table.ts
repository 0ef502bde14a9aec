/**
 * Human-readable table report
 */

import type { AnalysisSummary } from '../types/index.js';
import { paint } from '../logger.js';
import type { ReportContext } from './types.js';
import { formatFileList, formatTimestamp, statusLabel } from './shared.js';

const RULE = '='.repeat(80);

function headerLines(summary: AnalysisSummary, context: ReportContext): string[] {
  const lines = [
    RULE,
    paint('API Endpoint Usage Report', 'bold', context.colors),
    `Generated on ${formatTimestamp(context.generatedAt)}`,
    `API Spec: ${context.specSource}`,
    `Search Dir: ${context.directory}`,
  ];

  if (context.exclude.length > 0) {
    lines.push(`Excluding: ${context.exclude.join(', ')}`);
  }
  lines.push(context.truncate ? 'Mode: Truncated file lists' : 'Mode: Full file lists (use --truncate to limit)');
  if (context.unusedOnly) {
    lines.push('Filter: Unused endpoints only');
  }

  const unreadable = summary.unreadableFiles > 0 ? ` (${summary.unreadableFiles} unreadable)` : '';
  lines.push(`Files scanned: ${summary.totalFilesScanned}${unreadable} in ${summary.durationMs}ms`);
  lines.push(RULE);

  return lines;
}

function tableLines(summary: AnalysisSummary, context: ReportContext): string[] {
  const widths = {
    endpoint: Math.max('Endpoint'.length, ...summary.results.map(r => r.endpoint.path.length)),
    method: Math.max('Method'.length, ...summary.results.map(r => r.endpoint.method.length)),
    status: Math.max('Status'.length, ...summary.results.map(r => statusLabel(r.status).length)),
    count: Math.max('Count'.length, ...summary.results.map(r => String(r.usageCount).length)),
  };

  const lines = [
    [
      'Endpoint'.padEnd(widths.endpoint),
      'Method'.padEnd(widths.method),
      'Status'.padEnd(widths.status),
      'Count'.padStart(widths.count),
      'Files',
    ].join(' '),
    '-'.repeat(widths.endpoint + widths.method + widths.status + widths.count + 'Files'.length + 4),
  ];

  for (const result of summary.results) {
    const status = statusLabel(result.status).padEnd(widths.status);
    lines.push([
      result.endpoint.path.padEnd(widths.endpoint),
      result.endpoint.method.padEnd(widths.method),
      paint(status, result.status === 'used' ? 'green' : 'red', context.colors),
      String(result.usageCount).padStart(widths.count),
      formatFileList(result, context.truncate),
    ].join(' '));
  }

  return lines;
}

function summaryLines(summary: AnalysisSummary, context: ReportContext): string[] {
  const total = summary.results.length;
  const used = summary.results.filter(r => r.status === 'used').length;
  const fileReferences = summary.results.reduce((sum, r) => sum + r.usageCount, 0);

  const lines = [
    'Summary:',
    `  Total endpoints: ${total}`,
    `  Used: ${used}`,
    `  Unused: ${total - used}`,
  ];
  if (total > 0) {
    lines.push(`  Coverage: ${((used / total) * 100).toFixed(1)}%`);
  }
  lines.push(`  Total file references: ${fileReferences}`);

  if (summary.skippedEndpoints.length > 0) {
    lines.push(`  Not checked (pattern errors): ${summary.skippedEndpoints.length}`);
  }

  lines.push('', 'Detailed File References (endpoints with 2+ files):');
  const multiUsage = summary.results.filter(r => r.usageCount >= 2);
  if (multiUsage.length === 0) {
    lines.push(context.unusedOnly
      ? '  No unused endpoints have multiple file references.'
      : '  No endpoints with 2 or more file references found.');
  }
  for (const result of multiUsage) {
    lines.push(`  ${result.endpoint.method} ${result.endpoint.path}: ${result.usageCount} files`);
    for (const file of result.files) {
      lines.push(`    - ${file}`);
    }
  }

  return lines;
}

export function formatTable(summary: AnalysisSummary, context: ReportContext): string {
  return [
    ...headerLines(summary, context),
    '',
    ...tableLines(summary, context),
    '',
    ...summaryLines(summary, context),
  ].join('\n');
}
