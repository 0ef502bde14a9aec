/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, type Config } from './schema.js';
import { isRemoteSource } from '../openapi/loader.js';

export const CONFIG_FILE_NAMES = [
  'endpoint-usage.config.json',
  '.endpointusagerc.json',
  '.endpointusagerc',
] as const;

export const PACKAGE_JSON_KEY = 'endpointUsage';

/**
 * Local paths in a config file are relative to the directory holding it, so
 * the file means the same thing from any working directory.
 */
function resolveConfigPaths(config: Config, baseDir: string): Config {
  const resolved: Config = { ...config, directory: path.resolve(baseDir, config.directory) };
  if (config.spec !== undefined && !isRemoteSource(config.spec)) {
    resolved.spec = path.resolve(baseDir, config.spec);
  }
  return resolved;
}

function parseConfig(rawConfig: unknown, source: string, baseDir: string): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration in ${source}:\n${errors}`);
  }

  return resolveConfigPaths(result.data, baseDir);
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  return parseConfig(rawConfig, absolutePath, path.dirname(absolutePath));
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

async function readPackageConfig(packagePath: string): Promise<unknown> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // A broken package.json is not ours to report
    return undefined;
  }
  if (typeof packageContent !== 'object' || packageContent === null) {
    return undefined;
  }
  return Object.entries(packageContent).find(([key]) => key === PACKAGE_JSON_KEY)?.[1];
}

/**
 * Walk from `startDir` up to the filesystem root and load the first config
 * found: a dedicated config file, or an `endpointUsage` key in package.json.
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);

  while (true) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = await readPackageConfig(packagePath);
      if (packageConfig !== undefined) {
        return parseConfig(packageConfig, `${packagePath} (${PACKAGE_JSON_KEY})`, currentDir);
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) return null;
    currentDir = parentDir;
  }
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

export { configSchema, type Config } from './schema.js';
