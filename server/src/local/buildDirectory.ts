import fs from 'node:fs/promises';
import path from 'node:path';

import { buildLocal, type InfographicDocument, type LocalFile } from '../infographic/index.js';
import { outlineFile } from './functionOutline.js';
import { walkFiles } from './walk.js';

export type DirectoryBuildOptions = {
  name?: string;
  outline?: boolean;
  maxFiles?: number;
  maxFileBytes?: number;
  now?: () => Date;
};

export type DirectoryBuildResult = {
  document: InfographicDocument;
  fileCount: number;
  skipped: string[];
  truncated: boolean;
};

export const DEFAULT_MAX_FILES = 500;
export const DEFAULT_MAX_FILE_BYTES = 512 * 1024;

/**
 * Resolves `rawRel` under `rootDir`. Throws for `..` segments, NUL bytes or
 * anything that ends up outside the root.
 */
export function resolveUnderRoot(rootDir: string, rawRel: string): string {
  if (rawRel.includes('\0')) throw new Error('invalid path');

  const relNormalized = rawRel.replace(/\\/gu, '/').replace(/^\/+/u, '').replace(/\/+$/u, '');
  if (relNormalized.split('/').some((p) => p === '..')) throw new Error('path must not contain ..');

  const rootAbs = path.resolve(rootDir);
  const targetAbs = path.resolve(rootAbs, relNormalized);
  const relCheck = path.relative(rootAbs, targetAbs);
  if (relCheck.startsWith('..') || path.isAbsolute(relCheck)) throw new Error('path escapes the local root');
  return targetAbs;
}

async function readTextFile(filePath: string, maxBytes: number): Promise<string | null> {
  const stat = await fs.stat(filePath);
  if (stat.size > maxBytes) return null;
  const content = await fs.readFile(filePath, 'utf8');
  // NUL bytes mean binary content.
  if (content.includes('\0')) return null;
  return content;
}

export async function buildFromDirectory(dirAbs: string, options: DirectoryBuildOptions = {}): Promise<DirectoryBuildResult> {
  const stat = await fs.stat(dirAbs);
  if (!stat.isDirectory()) throw new Error(`not a directory: ${path.basename(dirAbs)}`);

  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const walked = await walkFiles(dirAbs, { maxFiles: options.maxFiles ?? DEFAULT_MAX_FILES });

  const files: LocalFile[] = [];
  const skipped: string[] = [];
  for (const rel of walked.files) {
    let content: string | null;
    try {
      content = await readTextFile(path.join(dirAbs, rel), maxFileBytes);
    } catch (error) {
      console.warn(`[local] cannot read ${rel}: ${error instanceof Error ? error.message : String(error)}`);
      content = null;
    }
    if (content === null) {
      skipped.push(rel);
      continue;
    }
    files.push({ path: rel, content });
  }

  const name = options.name?.trim() || path.basename(dirAbs);
  const document = buildLocal(name, files, {
    now: options.now,
    outline: options.outline ? (file, fileNodeId) => outlineFile(file, fileNodeId) : undefined,
  });

  return { document, fileCount: files.length, skipped, truncated: walked.truncated };
}
