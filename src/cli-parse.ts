#!/usr/bin/env node
/**
 * CLI Parse Entry Point
 *
 * Parses a GDScript file and prints its tree, or every script under a
 * directory and prints one status line per file.
 */

import {
  createDefaultConfig,
  createNodeFileSystem,
  loadConfig,
  type OutputFormat,
  parsePath,
} from './driver/index.js';
import { explainError, formatError, VERSION } from './cli-shared.js';

/**
 * Parsed command-line arguments for gdparse
 */
export type ParsedParseArgs =
  | { mode: 'parse'; path: string; format: OutputFormat | undefined }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' }
  | { mode: 'version' };

const USAGE = `gdparse - Parse GDScript files

Usage: gdparse [options] <path>

  <path> may be a .gd file, whose tree is printed, or a directory, whose
  scripts are each reported as OK or ERROR.

Options:
  --format <fmt>   Tree output: debug (default) or json
  --explain <id>   Show documentation for an error ID (e.g. GDS-P002)
  -h, --help       Show this help message
  -v, --version    Show version number`;

/**
 * Parse command-line arguments for gdparse
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseParseArgs(argv: string[]): ParsedParseArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const errorId = argv[explainIndex + 1];
    if (!errorId || errorId.startsWith('-')) {
      throw new Error('--explain requires an error ID');
    }
    return { mode: 'explain', errorId };
  }

  let format: OutputFormat | undefined;
  let path: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      const value = argv[i + 1];
      if (value === 'debug' || value === 'json') {
        format = value;
      } else if (!value || value.startsWith('-')) {
        throw new Error('--format requires argument: debug or json');
      } else {
        throw new Error(`Invalid format: ${value}. Expected debug or json`);
      }
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    if (path !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    path = arg;
  }

  if (path === undefined) {
    throw new Error('Missing path argument');
  }

  return { mode: 'parse', path, format };
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Main entry point for the gdparse CLI.
 * Results go to stdout, failures to stderr with exit code 1.
 */
async function main(): Promise<void> {
  try {
    const args = parseParseArgs(process.argv.slice(2));

    if (args.mode === 'help') {
      console.log(USAGE);
      return;
    }

    if (args.mode === 'version') {
      console.log(VERSION);
      return;
    }

    if (args.mode === 'explain') {
      const documentation = explainError(args.errorId);
      if (documentation === null) {
        console.error(`Unknown error ID: ${args.errorId}`);
        process.exitCode = 1;
        return;
      }
      console.log(documentation);
      return;
    }

    // Load configuration from cwd (null if not present)
    const config = loadConfig(process.cwd()) ?? createDefaultConfig();

    const result = await parsePath(createNodeFileSystem(), args.path, {
      extension: config.extension,
      maxDepth: config.maxDepth,
      format: args.format ?? config.format,
    });

    if (
      result.kind === 'directory' &&
      result.reports.some((report) => report.status === 'ERROR')
    ) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
