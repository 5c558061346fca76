/**
 * Configuration Loader for intcalc
 * Loads and validates .intcalc.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './cli-error-formatter.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.intcalc.yaml';

const KNOWN_KEYS = ['format', 'verbose'];

export interface CliConfig {
  readonly format?: OutputFormat | undefined;
  readonly verbose?: boolean | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): CliConfig {
  // An empty file parses to null
  if (data === null || data === undefined) {
    return {};
  }

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const entries = Object.entries(data);
  for (const [key] of entries) {
    if (!KNOWN_KEYS.includes(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const values = new Map<string, unknown>(entries);

  let format: OutputFormat | undefined;
  const rawFormat = values.get('format');
  if (rawFormat !== undefined) {
    if (!isOutputFormat(rawFormat)) {
      throw new Error(
        `Invalid configuration: format "${String(rawFormat)}" must be one of: ${OUTPUT_FORMATS.join(', ')}`
      );
    }
    format = rawFormat;
  }

  let verbose: boolean | undefined;
  const rawVerbose = values.get('verbose');
  if (rawVerbose !== undefined) {
    if (typeof rawVerbose !== 'boolean') {
      throw new Error('Invalid configuration: verbose must be true or false');
    }
    verbose = rawVerbose;
  }

  return { format, verbose };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .intcalc.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CliConfig object, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): CliConfig | null {
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
