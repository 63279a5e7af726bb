/**
 * In-memory ScriptFileSystem for driver tests
 */

import type { PathKind, ScriptFileSystem } from '../../src/index.js';

export class MemoryFileSystem implements ScriptFileSystem {
  readonly reads: string[] = [];

  constructor(
    private readonly files: Readonly<Record<string, string>>,
    private readonly unreadable: ReadonlySet<string> = new Set(),
    private readonly unlistable: ReadonlySet<string> = new Set()
  ) {}

  async findFilesInDir(root: string, extension: string): Promise<string[]> {
    if (this.unlistable.has(root)) {
      throw new Error(`EACCES: permission denied, scandir '${root}'`);
    }
    return Object.keys(this.files)
      .filter((file) => file.startsWith(`${root}/`) && file.endsWith(extension))
      .sort();
  }

  async pathKind(target: string): Promise<PathKind> {
    if (target in this.files) return 'file';
    if (Object.keys(this.files).some((file) => file.startsWith(`${target}/`))) {
      return 'directory';
    }
    return 'missing';
  }

  async readFile(target: string): Promise<string> {
    this.reads.push(target);
    const content = this.files[target];
    if (content === undefined || this.unreadable.has(target)) {
      throw new Error('permission denied');
    }
    return content;
  }
}
