/**
 * Shared CLI option handling
 */

import { loadConfig, loadConfigOrDefault } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { LENGTH_PREFERENCES, PARAPHRASE_STYLES } from '../paraphrase/types.js';
import type { LengthPreference, ParaphraseStyle } from '../paraphrase/types.js';

/**
 * Explicit config file, else the nearest one above the working directory
 */
export async function resolveConfig(configPath?: string): Promise<Config> {
  return configPath ? loadConfig(configPath) : loadConfigOrDefault(process.cwd());
}

export function parseStyle(value: string | undefined): ParaphraseStyle | undefined {
  if (value === undefined) return undefined;
  const style = PARAPHRASE_STYLES.find(s => s === value.toLowerCase());
  if (!style) {
    throw new Error(`Invalid style "${value}" (expected one of: ${PARAPHRASE_STYLES.join(', ')})`);
  }
  return style;
}

export function parseLengthPreference(value: string | undefined): LengthPreference | undefined {
  if (value === undefined) return undefined;
  const preference = LENGTH_PREFERENCES.find(p => p === value.toLowerCase());
  if (!preference) {
    throw new Error(`Invalid length preference "${value}" (expected one of: ${LENGTH_PREFERENCES.join(', ')})`);
  }
  return preference;
}

export function parseCount(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseSeed(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Seed must be an integer, got "${value}"`);
  }
  return parsed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
