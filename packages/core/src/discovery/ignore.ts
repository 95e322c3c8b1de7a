/**
 * Ignore rules for file discovery: plain file and directory names plus
 * patterns read from a .gitignore-style file, matched with minimatch.
 *
 * All paths handed to IgnoreFilter are relative to the root being walked
 * and use forward slashes.
 */

import * as fs from 'node:fs';
import { minimatch } from 'minimatch';
import { IOError, describeError } from '../errors.js';

export interface IgnorePattern {
  glob: string;
  /** `!pattern` re-includes what an earlier pattern excluded. */
  negated: boolean;
  /** `pattern/` only matches directories. */
  directoryOnly: boolean;
  /** Leading or inner `/`: matched against the whole relative path, not just the name. */
  anchored: boolean;
}

export interface IgnoreOptions {
  ignoredFiles?: readonly string[];
  ignoredDirectories?: readonly string[];
  patterns?: readonly IgnorePattern[];
}

export const DEFAULT_IGNORED_DIRECTORIES: readonly string[] = [
  'venv',
  '.venv',
  'test',
  'tests',
  '__pycache__',
  '.git',
];

export const DEFAULT_IGNORE_FILE = '.gitignore';

/**
 * Parse .gitignore-style content. Blank lines and `#` comments are skipped;
 * `\#` and `\!` escape a leading character.
 */
export function parseIgnorePatterns(content: string): IgnorePattern[] {
  const patterns: IgnorePattern[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.replace(/(?<!\\)\s+$/, '');
    if (!line || line.startsWith('#')) continue;

    let negated = false;
    if (line.startsWith('!')) {
      negated = true;
      line = line.slice(1);
    } else if (line.startsWith('\\#') || line.startsWith('\\!')) {
      line = line.slice(1);
    }

    const directoryOnly = line.endsWith('/');
    if (directoryOnly) line = line.slice(0, -1);

    const anchored = line.includes('/');
    if (line.startsWith('/')) line = line.slice(1);
    if (!line) continue;

    patterns.push({ glob: line, negated, directoryOnly, anchored });
  }

  return patterns;
}

/**
 * Read and parse an ignore file.
 *
 * @throws IOError when the file cannot be read
 */
export function loadIgnoreFile(filePath: string): IgnorePattern[] {
  try {
    return parseIgnorePatterns(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new IOError(`Cannot read ignore file ${filePath}: ${describeError(error)}`, filePath, error);
  }
}

export class IgnoreFilter {
  private readonly files: ReadonlySet<string>;
  private readonly directories: ReadonlySet<string>;
  private readonly patterns: readonly IgnorePattern[];

  constructor(options: IgnoreOptions = {}) {
    this.files = new Set(options.ignoredFiles ?? []);
    this.directories = new Set(options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES);
    this.patterns = options.patterns ?? [];
  }

  ignoresDirectory(relativePath: string): boolean {
    if (this.directories.has(baseName(relativePath))) return true;
    return this.matchPatterns(relativePath, true);
  }

  ignoresFile(relativePath: string): boolean {
    if (this.files.has(baseName(relativePath))) return true;
    return this.matchPatterns(relativePath, false);
  }

  /** Last matching pattern decides, as in git. */
  private matchPatterns(relativePath: string, isDirectory: boolean): boolean {
    let ignored = false;
    for (const pattern of this.patterns) {
      if (pattern.directoryOnly && !isDirectory) continue;
      const subject = pattern.anchored ? relativePath : baseName(relativePath);
      if (minimatch(subject, pattern.glob, { dot: true })) {
        ignored = !pattern.negated;
      }
    }
    return ignored;
  }
}

function baseName(relativePath: string): string {
  const index = relativePath.lastIndexOf('/');
  return index < 0 ? relativePath : relativePath.slice(index + 1);
}
