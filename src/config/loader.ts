/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ZodError } from 'zod';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'lexiphrase.config.json',
  '.lexiphraserc.json',
  '.lexiphraserc',
];

function formatIssues(error: ZodError): string {
  return error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * The `lexiphrase` key of a package.json, when present
 */
async function readPackageConfig(packagePath: string): Promise<Config | null> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch (error) {
    console.error(`Skipping unreadable ${packagePath}:`, error instanceof Error ? error.message : String(error));
    return null;
  }

  if (typeof packageContent !== 'object' || packageContent === null || !('lexiphrase' in packageContent)) {
    return null;
  }

  const result = configSchema.safeParse(packageContent.lexiphrase);
  if (!result.success) {
    throw new Error(`Invalid configuration in ${packagePath}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const config = await readPackageConfig(packagePath);
      if (config) {
        return config;
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

export { configSchema, type Config } from './schema.js';
