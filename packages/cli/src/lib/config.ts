/**
 * Project configuration: sigdoc.config.json, validated with zod and
 * merged with command-line flags.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_IGNORED_DIRECTORIES, describeError } from '@sigdoc/core';
import { exitCommandError } from './command-runtime.js';

export const CONFIG_FILE_NAME = 'sigdoc.config.json';

const nameList = z.array(z.string().min(1));

export const SigdocConfigSchema = z
  .object({
    verbose: z.boolean(),
    ignoredFunctionNames: nameList,
    ignoredFiles: nameList,
    ignoredDirectories: nameList,
    ignoreFile: z.string().min(1),
  })
  .partial()
  .strict();

export type SigdocConfig = z.infer<typeof SigdocConfigSchema>;

/** Flags of `sigdoc check` that overlap with the config file. */
export interface ConfigFlags {
  verbose?: boolean;
  names?: string[];
  files?: string[];
  ignoreDirs?: string[];
  ignoreFile?: string;
}

export interface ResolvedSettings {
  verbose: boolean;
  ignoredFunctionNames: string[];
  ignoredFiles: string[];
  ignoredDirectories: string[];
  /** Absolute path of an explicit ignore file, if one was configured. */
  ignoreFile?: string;
}

interface LoadConfigOptions {
  /** Explicit --config path; a missing file is then an error. */
  configPath?: string;
  json?: boolean;
  color?: boolean;
}

/**
 * Load the config from `configPath`, or from sigdoc.config.json in `cwd`
 * when present. Returns an empty config when there is none.
 */
export function loadConfig(cwd: string, options: LoadConfigOptions = {}): SigdocConfig {
  const configFile = options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.join(cwd, CONFIG_FILE_NAME);

  if (!fs.existsSync(configFile)) {
    if (options.configPath) {
      return exitCommandError({
        json: options.json,
        color: options.color,
        message: `Config file not found: ${options.configPath}`,
        exitCode: 2,
      });
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch (err) {
    return exitCommandError({
      json: options.json,
      color: options.color,
      message: `Cannot read config ${configFile}: ${describeError(err)}`,
      exitCode: 2,
    });
  }

  const parsed = SigdocConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return exitCommandError({
      json: options.json,
      color: options.color,
      message: `Invalid config ${configFile}: ${key}: ${issue.message}`,
      exitCode: 2,
    });
  }
  return parsed.data;
}

/**
 * Merge flags over the config file. Lists concatenate (without repeats),
 * booleans and the ignore file from flags win.
 */
export function resolveSettings(cwd: string, config: SigdocConfig, flags: ConfigFlags): ResolvedSettings {
  const ignoreFile = flags.ignoreFile ?? config.ignoreFile;
  const settings: ResolvedSettings = {
    verbose: flags.verbose ?? config.verbose ?? false,
    ignoredFunctionNames: unique(config.ignoredFunctionNames, flags.names),
    ignoredFiles: unique(config.ignoredFiles, flags.files),
    ignoredDirectories: unique(DEFAULT_IGNORED_DIRECTORIES, config.ignoredDirectories, flags.ignoreDirs),
  };
  if (ignoreFile !== undefined) settings.ignoreFile = path.resolve(cwd, ignoreFile);
  return settings;
}

function unique(...lists: Array<readonly string[] | undefined>): string[] {
  const seen = new Set<string>();
  for (const list of lists) {
    for (const name of list ?? []) seen.add(name);
  }
  return [...seen];
}
