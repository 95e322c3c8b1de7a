/**
 * File discovery — finds the Python files under a root.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { IOError, describeError } from '../errors.js';
import type { IgnoreFilter } from './ignore.js';

export const PYTHON_EXTENSION = '.py';

/**
 * Python files under `root` in a stable (name-sorted, depth-first) order.
 * A file root yields itself when it is a .py file the filter keeps.
 * Directories that cannot be read are reported through `onError` and
 * skipped.
 *
 * @throws IOError when `root` itself does not exist
 */
export function discoverPythonFiles(
  root: string,
  filter: IgnoreFilter,
  onError: (error: IOError) => void = () => {},
): string[] {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch (error) {
    throw new IOError(`Invalid path: ${root}`, root, error);
  }

  if (stat.isFile()) {
    const keep = root.endsWith(PYTHON_EXTENSION) && !filter.ignoresFile(path.basename(root));
    return keep ? [root] : [];
  }

  const files: string[] = [];
  walkDir(root, '', filter, files, onError);
  return files;
}

function walkDir(
  dir: string,
  relativeDir: string,
  filter: IgnoreFilter,
  files: string[],
  onError: (error: IOError) => void,
): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    onError(new IOError(`Cannot read directory ${dir}: ${describeError(error)}`, dir, error));
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!filter.ignoresDirectory(relativePath)) {
        walkDir(fullPath, relativePath, filter, files, onError);
      }
    } else if (entry.isFile() && entry.name.endsWith(PYTHON_EXTENSION)) {
      if (!filter.ignoresFile(relativePath)) files.push(fullPath);
    }
  }
}
