import fs from 'node:fs/promises';
import path from 'node:path';

import { decodeInfographic, type InfographicDocument } from './infographic/index.js';

export type NamedResourceEntry = {
  name: string;
  displayName: string;
  sourceLocator: string;
};

export type ResourceOptions = {
  samplesDir: string;
};

const RESOURCE_EXT = '.json';

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/** Plain file stems only: no separators, no dot-segments. */
export function isSafeResourceName(name: string): boolean {
  if (!name || name.includes('\0')) return false;
  if (name.includes('/') || name.includes('\\')) return false;
  return name !== '.' && name !== '..' && !name.startsWith('.');
}

async function readResource(filePath: string): Promise<InfographicDocument | null> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      console.warn(`[samples] cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return null;
  }

  const result = decodeInfographic(data);
  if (!result.ok) {
    console.warn(`[samples] ${path.basename(filePath)} is not a valid infographic: ${result.error.message}`);
    return null;
  }
  for (const issue of result.issues) {
    console.warn(`[samples] ${path.basename(filePath)} ${issue.path}: ${issue.message}`);
  }
  return result.document;
}

/** null for a missing, unreadable or undecodable resource, or an unsafe name. */
export async function loadFromNamedResource(
  name: string,
  options: ResourceOptions,
): Promise<InfographicDocument | null> {
  if (!isSafeResourceName(name)) return null;
  return readResource(path.join(options.samplesDir, `${name}${RESOURCE_EXT}`));
}

/** Decodable resources sorted by name; broken files are skipped. */
export async function listNamedResources(options: ResourceOptions): Promise<NamedResourceEntry[]> {
  let names: string[] = [];
  try {
    names = await fs.readdir(options.samplesDir);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return [];
    throw error;
  }

  const entries: NamedResourceEntry[] = [];
  for (const fileName of names.sort((a, b) => a.localeCompare(b))) {
    if (!fileName.endsWith(RESOURCE_EXT)) continue;
    const name = fileName.slice(0, -RESOURCE_EXT.length);
    if (!isSafeResourceName(name)) continue;
    const document = await readResource(path.join(options.samplesDir, fileName));
    if (!document) continue;
    entries.push({ name, displayName: document.displayName, sourceLocator: document.sourceLocator });
  }
  return entries;
}
