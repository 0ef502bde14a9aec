/**
 * init command - Write a starter configuration file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES, getDefaultConfig } from '../../config/loader.js';
import { findSpecFile, isRemoteSource } from '../../openapi/loader.js';
import { colors } from '../../logger.js';

interface InitOptions {
  spec?: string;
  force?: boolean;
}

function logSuccess(message: string): void {
  console.log(`${colors.green}✓${colors.reset} ${message}`);
}

function logWarning(message: string): void {
  console.log(`${colors.yellow}⚠${colors.reset} ${message}`);
}

function logInfo(message: string): void {
  console.log(`${colors.blue}ℹ${colors.reset} ${message}`);
}

/**
 * Config file contents for `projectPath`. The specification is stored relative to the
 * project so the file can be committed.
 */
export function buildStarterConfig(projectPath: string, specSource: string | null): Record<string, unknown> {
  const defaults = getDefaultConfig();
  const spec = specSource && !isRemoteSource(specSource)
    ? path.relative(projectPath, path.resolve(projectPath, specSource)).split(path.sep).join('/')
    : specSource;

  return {
    ...(spec ? { spec } : {}),
    directory: defaults.directory,
    exclude: defaults.exclude,
    respectGitignore: defaults.respectGitignore,
    concurrency: defaults.concurrency,
    format: defaults.format,
  };
}

/**
 * Write the starter config. Returns false when a config file already exists
 * and `force` is not set.
 */
export async function writeStarterConfig(projectPath: string, options: InitOptions): Promise<boolean> {
  const configPath = path.join(projectPath, CONFIG_FILE_NAMES[0]);

  if (fs.existsSync(configPath) && !options.force) {
    logWarning(`${CONFIG_FILE_NAMES[0]} already exists (use --force to overwrite)`);
    return false;
  }

  const specSource = options.spec ?? findSpecFile(projectPath);
  if (!specSource) {
    logInfo('No API specification found; add "spec" to the config or pass --spec when checking');
  }

  const config = buildStarterConfig(projectPath, specSource);
  await fs.promises.writeFile(configPath, JSON.stringify(config, null, 2) + '\n');
  logSuccess(`Created ${CONFIG_FILE_NAMES[0]}`);
  return true;
}

export const initCommand = new Command('init')
  .description('Create an endpoint-usage.config.json in the current directory')
  .option('-s, --spec <source>', 'Path or URL of the API specification to record')
  .option('--force', 'Overwrite an existing config file')
  .action(async (options: InitOptions) => {
    try {
      await writeStarterConfig(process.cwd(), options);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
