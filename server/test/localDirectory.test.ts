import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildFromDirectory, resolveUnderRoot } from '../src/local/buildDirectory.js';
import { walkFiles } from '../src/local/walk.js';

async function writeFile(root: string, rel: string, content: string | Buffer): Promise<void> {
  const abs = path.join(root, rel);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, content);
}

describe('local directory builds', () => {
  let tmpDir = '';

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'infographic-local-'));
    await writeFile(tmpDir, 'src/main.ts', 'export function main(): void {\n  run();\n}\n');
    await writeFile(tmpDir, 'readme.md', '# demo\n');
    await writeFile(tmpDir, 'big.txt', 'x'.repeat(200));
    await writeFile(tmpDir, 'bin.dat', Buffer.from([0x50, 0x00, 0x51]));
    await writeFile(tmpDir, 'node_modules/dep/index.js', 'module.exports = 1;\n');
    await writeFile(tmpDir, '.env', 'TOKEN=test-secret\n');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('walks files, skipping hidden and ignored entries', async () => {
    const walked = await walkFiles(tmpDir);
    expect(walked).toEqual({ files: ['big.txt', 'bin.dat', 'readme.md', 'src/main.ts'], truncated: false });
  });

  it('includes hidden files on request', async () => {
    const walked = await walkFiles(tmpDir, { includeHidden: true });
    expect(walked.files).toContain('.env');
  });

  it('stops at the file limit', async () => {
    const walked = await walkFiles(tmpDir, { maxFiles: 2 });
    expect(walked.truncated).toBe(true);
    expect(walked.files).toHaveLength(2);
  });

  it('builds a document from the readable text files', async () => {
    const result = await buildFromDirectory(tmpDir, {
      name: 'demo',
      maxFileBytes: 100,
      now: () => new Date('2026-05-06T07:08:09.000Z'),
    });

    expect(result.fileCount).toBe(2);
    expect(result.skipped).toEqual(['big.txt', 'bin.dat']);
    expect(result.truncated).toBe(false);
    expect(result.document.displayName).toBe('demo');
    expect(result.document.sourceLocator).toBe('local://demo');
    expect(result.document.generatedAt).toBe('2026-05-06T07:08:09.000Z');

    const files = result.document.root.children[0]?.children ?? [];
    expect(files.map((f) => [f.id, f.label, f.children.length])).toEqual([
      ['file-0', 'readme.md', 0],
      ['file-1', 'src/main.ts', 0],
    ]);
  });

  it('outlines functions when asked', async () => {
    const result = await buildFromDirectory(tmpDir, { outline: true, maxFileBytes: 100 });
    const files = result.document.root.children[0]?.children ?? [];
    const mainFile = files.find((f) => f.label === 'src/main.ts');
    expect(mainFile?.children.map((c) => [c.id, c.label])).toEqual([['file-1-fn-0', 'main']]);
    expect(result.document.displayName).toBe(path.basename(tmpDir));
  });

  it('rejects a file path', async () => {
    await expect(buildFromDirectory(path.join(tmpDir, 'readme.md'))).rejects.toThrow('not a directory: readme.md');
  });
});

describe('resolveUnderRoot', () => {
  const root = path.resolve(os.tmpdir(), 'infographic-root');

  it('resolves relative and slash-prefixed paths inside the root', () => {
    expect(resolveUnderRoot(root, 'a/b')).toBe(path.join(root, 'a', 'b'));
    expect(resolveUnderRoot(root, '/a/')).toBe(path.join(root, 'a'));
    expect(resolveUnderRoot(root, '')).toBe(root);
  });

  it('refuses to leave the root', () => {
    expect(() => resolveUnderRoot(root, '../etc')).toThrow('path must not contain ..');
    expect(() => resolveUnderRoot(root, 'a\\..\\..\\b')).toThrow('path must not contain ..');
    expect(() => resolveUnderRoot(root, 'a\0b')).toThrow('invalid path');
  });
});
