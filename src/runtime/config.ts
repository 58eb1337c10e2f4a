/**
 * Configuration loader for sprig.
 *
 * Loads sprig.config.json from the working directory or a specified path.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface SprigConfig {
  /** Log each pipeline stage to the console. */
  trace?: boolean;
  /** Prompt shown by the interactive loop. */
  prompt?: string;
  /** Source name used in diagnostics for `-c` input. */
  sourceName?: string;
}

const CONFIG_FILENAMES = ['sprig.config.json', '.sprigrc.json'];

/**
 * Load sprig configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. sprig.config.json in cwd
 * 3. .sprigrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): SprigConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return {};
}

/**
 * Load config relative to a script file's directory, falling back to cwd.
 */
export function loadConfigForScript(scriptPath: string): SprigConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(scriptDir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return loadConfig();
}

/**
 * Whether tracing is on, from config and the SPRIG_TRACE variable.
 */
export function traceEnabled(config: SprigConfig, env: NodeJS.ProcessEnv = process.env): boolean {
  return config.trace === true || env.SPRIG_TRACE === '1';
}

function readConfigFile(filePath: string): SprigConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(parsed, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
function validateConfig(raw: unknown, filePath: string): SprigConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const entries: [string, unknown][] = Object.entries(raw);
  const config: SprigConfig = {};
  for (const [key, value] of entries) {
    switch (key) {
      case 'trace':
        if (typeof value !== 'boolean') {
          throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
        }
        config.trace = value;
        break;
      case 'prompt':
      case 'sourceName':
        if (typeof value !== 'string') {
          throw new Error(`Invalid "${key}" in ${filePath}: must be a string`);
        }
        config[key] = value;
        break;
      default:
        throw new Error(`Unknown key "${key}" in ${filePath}`);
    }
  }
  return config;
}
