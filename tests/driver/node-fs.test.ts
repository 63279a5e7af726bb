/**
 * Driver Tests: disk-backed ScriptFileSystem
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createNodeFileSystem, parsePath } from '../../src/index.js';

describe('createNodeFileSystem', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'gdparse-fs-'));
    await fs.mkdir(path.join(root, 'sub'));
    await fs.writeFile(path.join(root, 'b.gd'), 'pass\n');
    await fs.writeFile(path.join(root, 'a.gd'), 'var a = 1\n');
    await fs.writeFile(path.join(root, 'notes.txt'), 'notes\n');
    await fs.writeFile(path.join(root, 'sub', 'c.gd'), 'if a:\npass\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists matching files by name, depth first', async () => {
    expect(await createNodeFileSystem().findFilesInDir(root, '.gd')).toEqual([
      path.join(root, 'a.gd'),
      path.join(root, 'b.gd'),
      path.join(root, 'sub', 'c.gd'),
    ]);
  });

  it('classifies paths', async () => {
    const disk = createNodeFileSystem();
    expect(await disk.pathKind(root)).toBe('directory');
    expect(await disk.pathKind(path.join(root, 'a.gd'))).toBe('file');
    expect(await disk.pathKind(path.join(root, 'missing.gd'))).toBe('missing');
    expect(await disk.pathKind(path.join(root, 'a.gd', 'inner'))).toBe('missing');
  });

  it('reads file contents', async () => {
    expect(await createNodeFileSystem().readFile(path.join(root, 'a.gd'))).toBe(
      'var a = 1\n'
    );
  });

  it('drives a directory run from disk', async () => {
    const lines: string[] = [];
    const result = await parsePath(createNodeFileSystem(), root, {
      output: (text) => lines.push(text),
    });

    expect(result.kind).toBe('directory');
    expect(lines.map((line) => line.slice(root.length + 1))).toEqual([
      'a.gd:OK',
      'b.gd:OK',
      expect.stringMatching(/^sub.c\.gd:ERROR: .*found 0 at 2:1$/),
    ]);
  });
});
