/**
 * File discovery - lists the candidate source files under a root directory
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import fg from 'fast-glob';
import { silentLogger, type Logger } from '../logger.js';
import { loadGitignoreGlobs, toIgnoreGlobs } from './ignore-rules.js';

export interface DiscoveryOptions {
  /** Gitignore-style patterns rooted at the scan root */
  exclude?: string[];
  /** Allowed extensions without the leading dot. Default: data/source-extensions.json */
  extensions?: readonly string[];
  respectGitignore?: boolean;
  logger?: Logger;
}

const ALWAYS_IGNORED = ['**/.git/**'];

let defaultExtensions: readonly string[] | null = null;

/**
 * The built-in extension allow-list. Lives beside the package as JSON, two
 * levels above this module in both src/ and dist/.
 */
export function getDefaultExtensions(): readonly string[] {
  if (!defaultExtensions) {
    const dataPath = fileURLToPath(new URL('../../data/source-extensions.json', import.meta.url));
    const parsed: unknown = JSON.parse(fs.readFileSync(dataPath, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === 'string')) {
      throw new Error(`Malformed extension list: ${dataPath}`);
    }
    defaultExtensions = Object.freeze(parsed);
  }
  return defaultExtensions;
}

/**
 * A file qualifies when its extension is allowed, or when its name has no
 * dot at all (extensionless scripts). Dotfiles such as `.env` have neither.
 */
export function isCandidateFile(filePath: string, extensions: ReadonlySet<string>): boolean {
  const name = path.posix.basename(filePath);
  const extension = path.posix.extname(name);

  if (extension) {
    return extensions.has(extension.slice(1));
  }
  return !name.includes('.');
}

/**
 * Directories the walk found but cannot list. fast-glob skips their contents
 * silently under `suppressErrors`, so each one is reported here.
 */
async function reportUnreadableDirectories(
  rootDir: string,
  directories: readonly string[],
  logger: Logger
): Promise<void> {
  await Promise.all(directories.map(async directory => {
    try {
      await fs.promises.access(path.join(rootDir, directory), fs.constants.R_OK | fs.constants.X_OK);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Cannot read directory ${directory}: ${reason} (its contents are skipped)`);
    }
  }));
}

/**
 * List candidate files under `rootDir`, relative to it with POSIX separators.
 * Hidden files are included. Symbolic links are not followed, so every file
 * is listed once under its own path. Directories the walk cannot read are
 * reported as warnings and the rest of the tree is still listed.
 */
export async function discoverFiles(rootDir: string, options: DiscoveryOptions = {}): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const extensions = new Set(options.extensions ?? getDefaultExtensions());

  const ignore = [...ALWAYS_IGNORED];
  if (options.respectGitignore ?? true) {
    ignore.push(...await loadGitignoreGlobs(rootDir, logger));
  }
  for (const pattern of options.exclude ?? []) {
    ignore.push(...toIgnoreGlobs(pattern));
  }

  const entries = await fg('**/*', {
    cwd: rootDir,
    ignore,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    objectMode: true,
  });

  const directories = entries.filter(entry => entry.dirent.isDirectory()).map(entry => entry.path);
  await reportUnreadableDirectories(rootDir, directories, logger);

  const files = entries
    .filter(entry => entry.dirent.isFile() && isCandidateFile(entry.path, extensions))
    .map(entry => entry.path)
    .sort();
  logger.debug(`Discovered ${files.length} candidate files (${entries.length} entries walked) under ${rootDir}`);

  return files;
}
