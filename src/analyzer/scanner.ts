/**
 * Concurrent content scanner
 *
 * Each file is read and matched on its own; the pattern table is shared
 * read-only and every task returns its own record, so no state is shared
 * between concurrent scans. Merging happens afterwards in the aggregator.
 */

import fs from 'node:fs';
import path from 'node:path';
import pLimit from 'p-limit';
import type { Endpoint, FileUsageRecord } from '../types/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { endpointKey, formatEndpoint } from '../openapi/endpoints.js';
import type { PatternEntry } from './patterns.js';

export interface ScannerOptions {
  /** Maximum files read at once. Default: 32 */
  concurrency?: number;
  /** Files larger than this many bytes are skipped. 0 = unlimited */
  maxFileSize?: number;
  logger?: Logger;
}

export const DEFAULT_CONCURRENCY = 32;

/**
 * Count the non-overlapping matches of every pattern in `content`, summed
 * per endpoint. Overlapping idiom variants are counted independently.
 */
export function matchContent(
  content: string,
  patterns: readonly PatternEntry[]
): Array<{ endpoint: Endpoint; count: number }> {
  const counts = new Map<string, { endpoint: Endpoint; count: number }>();

  for (const { endpoint, regex } of patterns) {
    const count = content.match(regex)?.length ?? 0;
    if (count === 0) continue;

    const key = endpointKey(endpoint);
    const existing = counts.get(key);
    if (existing) {
      existing.count += count;
    } else {
      counts.set(key, { endpoint, count });
    }
  }

  return Array.from(counts.values());
}

export class ContentScanner {
  private readonly patterns: readonly PatternEntry[];
  private readonly concurrency: number;
  private readonly maxFileSize: number;
  private readonly logger: Logger;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(patterns: readonly PatternEntry[], options: ScannerOptions = {}) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    this.patterns = patterns;
    this.concurrency = concurrency;
    this.maxFileSize = options.maxFileSize ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Read a file as strict UTF-8. Returns null for anything that cannot be
   * scanned: read errors, binary content, files over the size limit.
   */
  private async readText(absolutePath: string, displayPath: string): Promise<string | null> {
    try {
      if (this.maxFileSize > 0) {
        const stats = await fs.promises.stat(absolutePath);
        if (stats.size > this.maxFileSize) {
          this.logger.debug(`Skipping ${displayPath}: ${stats.size} bytes exceeds the ${this.maxFileSize} byte limit`);
          return null;
        }
      }

      const buffer = await fs.promises.readFile(absolutePath);
      return this.decoder.decode(buffer);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Skipping ${displayPath}: ${reason}`);
      return null;
    }
  }

  /**
   * Scan one file. `file` is resolved against `rootDir` and kept as given in
   * the record.
   */
  async scanFile(rootDir: string, file: string): Promise<FileUsageRecord> {
    const content = await this.readText(path.resolve(rootDir, file), file);
    if (content === null) {
      return { file, readable: false, matches: [] };
    }

    const matches = matchContent(content, this.patterns);
    for (const { endpoint, count } of matches) {
      this.logger.debug(`${count} match${count === 1 ? '' : 'es'} for ${formatEndpoint(endpoint)} in ${file}`);
    }

    return { file, readable: true, matches };
  }

  /**
   * Scan every file with at most `concurrency` reads in flight. Records come
   * back in input order, though nothing downstream relies on it.
   */
  async scanFiles(rootDir: string, files: readonly string[]): Promise<FileUsageRecord[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(files.map(file => limit(() => this.scanFile(rootDir, file))));
  }
}
