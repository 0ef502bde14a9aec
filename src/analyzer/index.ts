/**
 * Endpoint usage analysis orchestration
 */

import fs from 'node:fs';
import path from 'node:path';
import type { AnalysisSummary, Endpoint } from '../types/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { endpointKey } from '../openapi/endpoints.js';
import { compilePatternTable, type PatternTable } from './patterns.js';
import { discoverFiles } from './discovery.js';
import { ContentScanner } from './scanner.js';
import { aggregateUsage, compileFilterPattern, filterResults, sortResults } from './aggregate.js';

export interface AnalyzerOptions {
  /** Gitignore-style exclusion patterns rooted at the scanned directory */
  exclude?: string[];
  extensions?: readonly string[];
  respectGitignore?: boolean;
  concurrency?: number;
  maxFileSize?: number;
  paramPattern?: string;
  unusedOnly?: boolean;
  /** Regular expression matched against "METHOD path" */
  pattern?: string;
  logger?: Logger;
}

export class EndpointAnalyzer {
  private readonly endpoints: Endpoint[];
  private readonly options: AnalyzerOptions;
  private readonly logger: Logger;
  private patternTable: PatternTable | null = null;

  constructor(endpoints: readonly Endpoint[], options: AnalyzerOptions = {}) {
    const unique = new Map<string, Endpoint>();
    for (const endpoint of endpoints) {
      if (!unique.has(endpointKey(endpoint))) {
        unique.set(endpointKey(endpoint), endpoint);
      }
    }

    this.endpoints = Array.from(unique.values());
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  getEndpoints(): readonly Endpoint[] {
    return this.endpoints;
  }

  /**
   * The compiled pattern table, built on first use and read-only afterwards
   */
  getPatternTable(): PatternTable {
    if (!this.patternTable) {
      this.patternTable = compilePatternTable(this.endpoints, {
        paramPattern: this.options.paramPattern,
        logger: this.logger,
      });
    }
    return this.patternTable;
  }

  private async assertReadableDirectory(rootDir: string): Promise<void> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(rootDir);
    } catch {
      throw new Error(`Directory not found: ${rootDir}`);
    }
    if (!stats.isDirectory()) {
      throw new Error(`Not a directory: ${rootDir}`);
    }
    try {
      await fs.promises.access(rootDir, fs.constants.R_OK);
    } catch {
      throw new Error(`Directory is not readable: ${rootDir}`);
    }
  }

  /**
   * Discover, scan and aggregate. Configuration problems (bad filter, bad
   * root) reject before any file is read; per-file problems never do.
   */
  async analyzeDirectory(directory: string): Promise<AnalysisSummary> {
    const startTime = Date.now();
    const rootDir = path.resolve(directory);

    const filter = this.options.pattern !== undefined
      ? compileFilterPattern(this.options.pattern)
      : undefined;
    await this.assertReadableDirectory(rootDir);

    const table = this.getPatternTable();
    const scanner = new ContentScanner(table.entries, {
      concurrency: this.options.concurrency,
      maxFileSize: this.options.maxFileSize,
      logger: this.logger,
    });

    const files = await discoverFiles(rootDir, {
      exclude: this.options.exclude,
      extensions: this.options.extensions,
      respectGitignore: this.options.respectGitignore,
      logger: this.logger,
    });

    const records = await scanner.scanFiles(rootDir, files);
    const unreadableFiles = records.filter(record => !record.readable).length;

    const aggregated = aggregateUsage(this.endpoints, records);
    const results = sortResults(filterResults(aggregated, {
      unusedOnly: this.options.unusedOnly,
      pattern: filter,
    }));

    const durationMs = Date.now() - startTime;
    this.logger.debug(
      `Scanned ${files.length} files (${unreadableFiles} unreadable) for ${this.endpoints.length} endpoints in ${durationMs}ms`
    );

    return {
      results,
      totalFilesScanned: files.length,
      unreadableFiles,
      skippedEndpoints: table.skipped.map(entry => entry.endpoint),
      durationMs,
    };
  }
}

export {
  compilePatternTable,
  compileEndpointPatterns,
  buildPatternSource,
  pathToPattern,
  escapeRegExp,
  DEFAULT_PARAM_PATTERN,
  type IdiomVariant,
  type MethodCase,
  type PatternEntry,
  type PatternTable,
  type PatternCompilerOptions,
} from './patterns.js';
export { discoverFiles, isCandidateFile, getDefaultExtensions, type DiscoveryOptions } from './discovery.js';
export { toIgnoreGlobs, parseIgnoreFile, loadGitignoreGlobs } from './ignore-rules.js';
export { ContentScanner, matchContent, DEFAULT_CONCURRENCY, type ScannerOptions } from './scanner.js';
export { aggregateUsage, filterResults, sortResults, compileFilterPattern, type ResultFilter } from './aggregate.js';
