/**
 * Path Driver
 * Entry points that parse a single script or every script under a directory
 */

import type { BlockNode } from '../ast-nodes.js';
import {
  FileParseError,
  InternalError,
  MissingPathError,
  ParseError,
} from '../error-classes.js';
import { formatReport, formatTree } from '../cli-shared.js';
import { parse } from '../parser/index.js';
import type { OutputFormat } from './config.js';
import type { ScriptFileSystem } from './fs.js';

export interface DriverOptions {
  /** File name suffix collected in directory mode (default `.gd`) */
  readonly extension?: string;
  readonly maxDepth?: number;
  /** Rendering written in single-file mode (default `debug`) */
  readonly format?: OutputFormat;
  /** Receives each output line or rendered tree (default `console.log`) */
  readonly output?: (text: string) => void;
}

export type FileReport =
  | { readonly path: string; readonly status: 'OK'; readonly block: BlockNode }
  | {
      readonly path: string;
      readonly status: 'ERROR';
      readonly detail: string;
      readonly error: FileParseError | InternalError;
    };

export type PathResult =
  | { readonly kind: 'file'; readonly block: BlockNode }
  | { readonly kind: 'directory'; readonly reports: FileReport[] };

const DEFAULT_EXTENSION = '.gd';

function emit(options: DriverOptions, text: string): void {
  (options.output ?? console.log)(text);
}

async function readScript(fs: ScriptFileSystem, path: string): Promise<string> {
  try {
    return await fs.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InternalError(`Cannot read ${path}: ${reason}`);
  }
}

/** Parse the text of one file, wrapping grammar failures with the path */
function parseScript(
  path: string,
  source: string,
  options: DriverOptions
): BlockNode {
  try {
    return parse(source, { maxDepth: options.maxDepth });
  } catch (err) {
    if (err instanceof ParseError) {
      throw new FileParseError(path, err.trace(), err);
    }
    // Call stack exhausted before the depth limit was reached
    if (err instanceof RangeError) {
      throw new FileParseError(path, `Nesting too deep to parse: ${err.message}`);
    }
    throw err;
  }
}

// ============================================================
// ENTRY POINTS
// ============================================================

/**
 * Parse a directory of scripts or a single script, depending on what
 * `path` names.
 *
 * @throws MissingPathError when `path` is neither a file nor a directory,
 * or its directory cannot be listed
 * @throws FileParseError when a single file fails to parse
 */
export async function parsePath(
  fs: ScriptFileSystem,
  path: string,
  options: DriverOptions = {}
): Promise<PathResult> {
  const kind = await fs.pathKind(path);
  switch (kind) {
    case 'directory':
      return { kind, reports: await parseDir(fs, path, options) };
    case 'file':
      return { kind, block: await parseFileAtPath(fs, path, options) };
    case 'missing':
      throw new MissingPathError(path);
  }
}

/**
 * Parse every script under `path`. A failing file is reported as `ERROR`
 * and does not stop the run. One `path:STATUS` line is written per file,
 * in the order the collaborator lists them.
 */
export async function parseDir(
  fs: ScriptFileSystem,
  path: string,
  options: DriverOptions = {}
): Promise<FileReport[]> {
  let files: string[];
  try {
    files = await fs.findFilesInDir(path, options.extension ?? DEFAULT_EXTENSION);
  } catch {
    throw new MissingPathError(path);
  }
  const reports: FileReport[] = [];

  for (const file of files) {
    let report: FileReport;
    try {
      const source = await readScript(fs, file);
      report = {
        path: file,
        status: 'OK',
        block: parseScript(file, source, options),
      };
    } catch (err) {
      if (err instanceof FileParseError) {
        report = { path: file, status: 'ERROR', detail: err.detail, error: err };
      } else if (err instanceof InternalError) {
        report = {
          path: file,
          status: 'ERROR',
          detail: err.toData().message,
          error: err,
        };
      } else {
        throw err;
      }
    }

    reports.push(report);
    emit(options, formatReport(report));
  }

  return reports;
}

/**
 * Parse one script and write its rendered tree.
 *
 * @throws FileParseError when the script fails to parse
 */
export async function parseFileAtPath(
  fs: ScriptFileSystem,
  path: string,
  options: DriverOptions = {}
): Promise<BlockNode> {
  const source = await readScript(fs, path);
  const block = parseScript(path, source, options);
  emit(options, formatTree(block, options.format ?? 'debug'));
  return block;
}

export { createNodeFileSystem, type PathKind, type ScriptFileSystem } from './fs.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  type GdparseConfig,
  loadConfig,
  type OutputFormat,
  validateConfig,
} from './config.js';
