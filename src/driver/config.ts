/**
 * Configuration Loader for gdparse
 * Loads and validates .gdparse.yaml configuration files.
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from '../parser/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.gdparse.yaml';

export type OutputFormat = 'debug' | 'json';

export interface GdparseConfig {
  /** File name suffix collected in directory mode */
  readonly extension: string;
  /** Maximum number of simultaneously active grammar rules */
  readonly maxDepth: number;
  /** Rendering of the tree in single-file mode */
  readonly format: OutputFormat;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): GdparseConfig {
  return { extension: '.gd', maxDepth: DEFAULT_MAX_DEPTH, format: 'debug' };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'debug' || value === 'json';
}

const KNOWN_KEYS = new Set(['extension', 'maxDepth', 'format']);

/**
 * Validate configuration structure and values, merging them over the
 * defaults. Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): GdparseConfig {
  // An empty file parses to null
  if (data === null || data === undefined) return createDefaultConfig();

  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const defaults = createDefaultConfig();
  let { extension, maxDepth, format } = defaults;

  if ('extension' in data) {
    const value = data['extension'];
    if (typeof value !== 'string' || value === '') {
      throw new Error(
        'Invalid configuration: extension must be a non-empty string'
      );
    }
    extension = value.startsWith('.') ? value : `.${value}`;
  }

  if ('maxDepth' in data) {
    const value = data['maxDepth'];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new Error(
        'Invalid configuration: maxDepth must be a positive integer'
      );
    }
    if (value > MAX_DEPTH_LIMIT) {
      throw new Error(
        `Invalid configuration: maxDepth must not exceed ${MAX_DEPTH_LIMIT}`
      );
    }
    maxDepth = value;
  }

  if ('format' in data) {
    const value = data['format'];
    if (!isOutputFormat(value)) {
      throw new Error(
        `Invalid configuration: format has invalid value "${String(value)}" (must be 'debug' or 'json')`
      );
    }
    format = value;
  }

  return { extension, maxDepth, format };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .gdparse.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over the defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is malformed
 */
export function loadConfig(cwd: string): GdparseConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
