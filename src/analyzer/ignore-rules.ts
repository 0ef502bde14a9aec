/**
 * Gitignore-style rules translated into fast-glob ignore patterns
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { silentLogger, type Logger } from '../logger.js';

/**
 * Translate one gitignore line into fast-glob ignore globs scoped to
 * `baseDir` (a root-relative POSIX directory, '' for the root).
 *
 * Negated rules (`!pattern`) have no fast-glob equivalent and yield nothing.
 */
export function toIgnoreGlobs(line: string, baseDir: string = ''): string[] {
  let pattern = line.trim();
  if (!pattern || pattern.startsWith('#') || pattern.startsWith('!')) {
    return [];
  }
  if (pattern.startsWith('\\')) {
    pattern = pattern.slice(1);
  }

  const directoryOnly = pattern.endsWith('/');
  pattern = pattern.replace(/\/+$/, '');

  // A slash anywhere but the end anchors the rule to its own directory
  const anchored = pattern.includes('/');
  pattern = pattern.replace(/^\/+/, '');
  if (!pattern) return [];

  const prefix = baseDir ? `${baseDir}/` : '';
  const body = anchored ? `${prefix}${pattern}` : `${prefix}**/${pattern}`;

  return directoryOnly ? [`${body}/**`] : [body, `${body}/**`];
}

export function parseIgnoreFile(content: string, baseDir: string = ''): string[] {
  return content.split(/\r?\n/).flatMap(line => toIgnoreGlobs(line, baseDir));
}

async function readIgnoreFile(
  rootDir: string,
  relativeFile: string,
  baseDir: string,
  logger: Logger
): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(path.join(rootDir, relativeFile), 'utf-8');
    return parseIgnoreFile(content, baseDir);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not read ${relativeFile}: ${reason} (its rules are not applied)`);
    return [];
  }
}

/**
 * Collect ignore globs from every `.gitignore` under `rootDir` and from
 * `.git/info/exclude`. An ignore file that cannot be read is reported and
 * contributes no rules.
 */
export async function loadGitignoreGlobs(rootDir: string, logger: Logger = silentLogger): Promise<string[]> {
  const ignoreFiles = await fg('**/.gitignore', {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ['**/node_modules/**', '**/.git/**'],
  });

  const globs: string[] = [];

  for (const relativeFile of ignoreFiles.sort()) {
    const baseDir = path.posix.dirname(relativeFile);
    globs.push(...await readIgnoreFile(rootDir, relativeFile, baseDir === '.' ? '' : baseDir, logger));
  }

  const excludeFile = path.posix.join('.git', 'info', 'exclude');
  if (fs.existsSync(path.join(rootDir, excludeFile))) {
    globs.push(...await readIgnoreFile(rootDir, excludeFile, '', logger));
  }

  return globs;
}
