import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';

export const DEFAULT_IGNORED_DIRS = ['.git', '.hg', '.svn', 'node_modules', 'dist', 'build', 'out', '.next', '.cache', 'coverage'];

export type WalkOptions = {
  ignoreDirNames?: string[];
  includeHidden?: boolean;
  /** Stop once this many files were found; `truncated` is set in the result. */
  maxFiles?: number;
};

export type WalkResult = {
  /** Paths relative to the walked directory, `/`-separated, sorted. */
  files: string[];
  truncated: boolean;
};

export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

export async function walkFiles(rootDir: string, options: WalkOptions = {}): Promise<WalkResult> {
  const ignoreDirNames = new Set(options.ignoreDirNames ?? DEFAULT_IGNORED_DIRS);
  const maxFiles = options.maxFiles ?? Number.POSITIVE_INFINITY;

  const results: string[] = [];
  const stack: string[] = [rootDir];
  let truncated = false;

  while (stack.length > 0 && !truncated) {
    const current = stack.pop();
    if (!current) continue;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      console.warn(`[local] skip ${current}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    for (const entry of entries) {
      if (!options.includeHidden && entry.name.startsWith('.')) continue;
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (ignoreDirNames.has(entry.name)) continue;
        stack.push(fullPath);
        continue;
      }

      if (!entry.isFile()) continue;
      if (results.length >= maxFiles) {
        truncated = true;
        break;
      }
      results.push(toPosixPath(path.relative(rootDir, fullPath)));
    }
  }

  results.sort((a, b) => a.localeCompare(b));
  return { files: results, truncated };
}
