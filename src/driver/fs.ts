/**
 * Script File System
 * The collaborator the driver uses to classify paths, enumerate scripts and
 * read them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export type PathKind = 'file' | 'directory' | 'missing';

export interface ScriptFileSystem {
  /** Every file under `root` whose name ends with `extension`, in a stable order */
  findFilesInDir(root: string, extension: string): Promise<string[]>;
  pathKind(target: string): Promise<PathKind>;
  readFile(target: string): Promise<string>;
}

/**
 * Collaborator backed by the local disk.
 *
 * Directory entries are visited in name order, depth first, so repeated runs
 * over the same tree report files in the same order.
 */
export function createNodeFileSystem(): ScriptFileSystem {
  async function walk(
    dir: string,
    extension: string,
    found: string[]
  ): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full, extension, found);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        found.push(full);
      }
    }
  }

  return {
    async findFilesInDir(root, extension) {
      const found: string[] = [];
      await walk(root, extension, found);
      return found;
    },

    async pathKind(target) {
      try {
        const stats = await fs.stat(target);
        if (stats.isDirectory()) return 'directory';
        if (stats.isFile()) return 'file';
        return 'missing';
      } catch (err) {
        if (
          err instanceof Error &&
          'code' in err &&
          (err.code === 'ENOENT' || err.code === 'ENOTDIR')
        ) {
          return 'missing';
        }
        throw err;
      }
    },

    async readFile(target) {
      return fs.readFile(target, 'utf-8');
    },
  };
}
