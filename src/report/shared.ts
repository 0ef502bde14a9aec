import path from 'node:path';
import type { AggregatedResult, EndpointStatus } from '../types/index.js';

export const TRUNCATE_THRESHOLD = 3;

export function statusLabel(status: EndpointStatus): string {
  return status === 'used' ? '✓ USED' : '✗ UNUSED';
}

/**
 * File column text: base names, '-' when empty, a count when truncating
 * long lists.
 */
export function formatFileList(result: AggregatedResult, truncate: boolean): string {
  if (result.files.length === 0) return '-';
  if (truncate && result.files.length > TRUNCATE_THRESHOLD) {
    return `${result.files.length} files (truncated)`;
  }
  return result.files.map(file => path.posix.basename(file)).join(', ');
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}
