import { describe, it, expect } from 'vitest';
import { formatFileList, formatTimestamp, statusLabel } from '../../../src/report/shared.js';
import { createEndpoint } from '../../../src/openapi/endpoints.js';
import type { AggregatedResult } from '../../../src/types/index.js';

function resultWithFiles(files: string[]): AggregatedResult {
  return {
    endpoint: createEndpoint('/a', 'GET'),
    status: files.length > 0 ? 'used' : 'unused',
    usageCount: files.length,
    matchCount: files.length,
    files,
  };
}

describe('Report helpers', () => {
  describe('formatFileList', () => {
    it('should show a dash when nothing references the endpoint', () => {
      expect(formatFileList(resultWithFiles([]), false)).toBe('-');
    });

    it('should list base names', () => {
      expect(formatFileList(resultWithFiles(['src/a.ts', 'lib/deep/b.py']), false)).toBe('a.ts, b.py');
    });

    it('should collapse lists longer than three when truncating', () => {
      const files = ['a.ts', 'b.ts', 'c.ts', 'd.ts'];

      expect(formatFileList(resultWithFiles(files), true)).toBe('4 files (truncated)');
      expect(formatFileList(resultWithFiles(files), false)).toBe('a.ts, b.ts, c.ts, d.ts');
      expect(formatFileList(resultWithFiles(files.slice(0, 3)), true)).toBe('a.ts, b.ts, c.ts');
    });
  });

  describe('statusLabel', () => {
    it('should label both statuses', () => {
      expect(statusLabel('used')).toBe('✓ USED');
      expect(statusLabel('unused')).toBe('✗ UNUSED');
    });
  });

  describe('formatTimestamp', () => {
    it('should print UTC time to the second', () => {
      expect(formatTimestamp(new Date('2024-12-31T23:59:58.999Z'))).toBe('2024-12-31 23:59:58 UTC');
    });
  });
});
