/**
 * Configuration
 *
 * Optional `astweave.config.json` in the scanned root, merged over defaults.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_MAX_FILE_SIZE } from './parser/index.js';
import { fileExists } from './utils/files.js';

export const CONFIG_FILENAME = 'astweave.config.json';

export interface AstWeaveConfig {
  /** minimatch globs, relative to the root */
  exclude: string[];
  /** Files above this many bytes are not parsed */
  maxFileSize: number;
  /** Emit variable nodes and `uses` edges in the graph */
  includeVariables: boolean;
  verbose: boolean;
}

export const DEFAULT_CONFIG: AstWeaveConfig = {
  exclude: ['node_modules', 'dist', 'build', '__pycache__'],
  maxFileSize: DEFAULT_MAX_FILE_SIZE,
  includeVariables: false,
  verbose: false,
};

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILENAME);
}

/**
 * Accepts a partial configuration: every field present must have the
 * right type.
 */
export function validateConfig(config: unknown): config is Partial<AstWeaveConfig> {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    return false;
  }

  const c: Record<string, unknown> = { ...config };

  if (c.exclude !== undefined) {
    if (!Array.isArray(c.exclude)) return false;
    if (!c.exclude.every((p) => typeof p === 'string')) return false;
  }
  if (c.maxFileSize !== undefined) {
    if (typeof c.maxFileSize !== 'number' || !Number.isFinite(c.maxFileSize) || c.maxFileSize < 0) return false;
  }
  if (c.includeVariables !== undefined && typeof c.includeVariables !== 'boolean') return false;
  if (c.verbose !== undefined && typeof c.verbose !== 'boolean') return false;

  return true;
}

export function mergeConfig(defaults: AstWeaveConfig, overrides: Partial<AstWeaveConfig>): AstWeaveConfig {
  return {
    exclude: overrides.exclude ?? defaults.exclude,
    maxFileSize: overrides.maxFileSize ?? defaults.maxFileSize,
    includeVariables: overrides.includeVariables ?? defaults.includeVariables,
    verbose: overrides.verbose ?? defaults.verbose,
  };
}

export function loadConfig(projectRoot: string): AstWeaveConfig {
  const configPath = getConfigPath(projectRoot);

  if (!fileExists(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);

    if (!validateConfig(parsed)) {
      console.error(`[Config] Invalid configuration in ${configPath}, using defaults`);
      return { ...DEFAULT_CONFIG };
    }

    return mergeConfig(DEFAULT_CONFIG, parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Config] Failed to load ${configPath}: ${message}`);
    return { ...DEFAULT_CONFIG };
  }
}
