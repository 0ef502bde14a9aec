/**
 * check command - Report which specification endpoints the codebase uses
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import path from 'node:path';
import type { AnalysisSummary } from '../../types/index.js';
import { EndpointAnalyzer } from '../../analyzer/index.js';
import { loadConfig, loadConfigOrDefault } from '../../config/loader.js';
import type { Config, OutputFormat } from '../../config/schema.js';
import { extractEndpoints, findSpecFile, isRemoteSource, loadSpecDocument } from '../../openapi/index.js';
import { formatReport } from '../../report/index.js';
import { createLogger, type Logger, type LogLevel } from '../../logger.js';

export interface CheckCommandOptions {
  spec?: string;
  dir?: string;
  format?: OutputFormat;
  pattern?: string;
  unusedOnly?: boolean;
  exclude?: string[];
  config?: string;
  concurrency?: number;
  truncate?: boolean;
  colors: boolean;
  verbose?: boolean;
  quiet?: boolean;
  failOnUnused?: boolean;
}

export interface CheckSettings {
  specSource: string;
  directory: string;
  /** User exclusions, shown in the report */
  exclude: string[];
  /** User exclusions plus the API specification file when it sits inside the directory */
  scanExclude: string[];
  format: OutputFormat;
  pattern?: string;
  unusedOnly: boolean;
  truncate: boolean;
  colors: boolean;
  concurrency: number;
  maxFileSize: number;
  extensions?: string[];
  respectGitignore: boolean;
  paramPattern: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function logLevelFor(options: CheckCommandOptions): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  return 'info';
}

/**
 * Exclusion that keeps a local spec file out of its own scan, or null when
 * the specification is remote or outside `directory`.
 */
export function specFileExclusion(specSource: string, directory: string): string | null {
  if (isRemoteSource(specSource)) return null;

  const relative = path.relative(path.resolve(directory), path.resolve(specSource));
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return null;

  return `/${relative.split(path.sep).join('/')}`;
}

/**
 * Merge CLI options over config values. Throws when no specification can be
 * located.
 */
export function resolveCheckSettings(options: CheckCommandOptions, config: Config, cwd: string): CheckSettings {
  const specSource = options.spec ?? config.spec ?? findSpecFile(cwd);
  if (!specSource) {
    throw new Error('No API specification given (--spec) and none found in the current or parent directories');
  }

  const directory = options.dir ?? config.directory;
  const exclude = options.exclude ?? config.exclude;
  const specExclusion = specFileExclusion(specSource, directory);

  return {
    specSource,
    directory,
    exclude,
    scanExclude: specExclusion ? [...exclude, specExclusion] : exclude,
    format: options.format ?? config.format,
    pattern: options.pattern ?? config.pattern,
    unusedOnly: options.unusedOnly ?? config.unusedOnly,
    truncate: options.truncate ?? config.truncate,
    colors: options.colors && config.colors && !process.env['NO_COLOR'],
    concurrency: options.concurrency ?? config.concurrency,
    maxFileSize: config.maxFileSize,
    extensions: config.extensions,
    respectGitignore: config.respectGitignore,
    paramPattern: config.paramPattern,
  };
}

export async function runCheck(settings: CheckSettings, logger: Logger): Promise<AnalysisSummary> {
  const document = await loadSpecDocument(settings.specSource);
  const endpoints = extractEndpoints(document.paths);

  if (endpoints.length === 0) {
    logger.warn(`No endpoints declared in ${settings.specSource}`);
  }
  logger.info(`Checking ${endpoints.length} endpoints from ${settings.specSource} in ${path.resolve(settings.directory)}`);

  const analyzer = new EndpointAnalyzer(endpoints, {
    exclude: settings.scanExclude,
    extensions: settings.extensions,
    respectGitignore: settings.respectGitignore,
    concurrency: settings.concurrency,
    maxFileSize: settings.maxFileSize,
    paramPattern: settings.paramPattern,
    unusedOnly: settings.unusedOnly,
    pattern: settings.pattern,
    logger,
  });

  return analyzer.analyzeDirectory(settings.directory);
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check which API specification endpoints are referenced in a codebase')
    .option('-s, --spec <source>', 'Path or URL of the OpenAPI/Swagger specification (JSON or YAML)')
    .option('-d, --dir <directory>', 'Directory to search for endpoint usage')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['table', 'csv', 'json', 'markdown']))
    .option('-p, --pattern <regex>', 'Only report endpoints whose "METHOD path" matches this regex')
    .option('--unused-only', 'Only report unused endpoints')
    .option('--no-unused-only', 'Report every endpoint, overriding unusedOnly from the config')
    .option('-e, --exclude <patterns...>', 'Gitignore-style patterns to exclude from the search')
    .option('-c, --config <path>', 'Path to config file')
    .option('--concurrency <number>', 'Maximum number of files read at once', parsePositiveInt)
    .option('--truncate', 'Collapse file lists longer than three entries')
    .option('--no-truncate', 'Show full file lists, overriding truncate from the config')
    .option('--no-colors', 'Disable colored output')
    .option('-v, --verbose', 'Show per-file match details', false)
    .option('-q, --quiet', 'Only print errors besides the report', false)
    .option('--fail-on-unused', 'Exit with status 2 when any unused endpoint is reported', false)
    .action(async (options: CheckCommandOptions) => {
      let unusedReported = false;
      try {
        const config = options.config
          ? await loadConfig(options.config)
          : await loadConfigOrDefault(options.dir ?? process.cwd());

        const settings = resolveCheckSettings(options, config, process.cwd());
        const logger = createLogger({ level: logLevelFor(options), colors: settings.colors });

        const summary = await runCheck(settings, logger);

        console.log(formatReport(summary, settings.format, {
          specSource: settings.specSource,
          directory: settings.directory,
          exclude: settings.exclude,
          unusedOnly: settings.unusedOnly,
          truncate: settings.truncate,
          colors: settings.colors,
          generatedAt: new Date(),
        }));

        unusedReported = summary.results.some(result => result.status === 'unused');
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }

      if (options.failOnUnused && unusedReported) {
        process.exit(2);
      }
    });
}

export const checkCommand = createCheckCommand();
