/**
 * reposeed config parser
 * Finds, reads and validates the config file
 */

import { existsSync, readFileSync } from 'fs';
import * as fs from 'fs/promises';
import { dirname, join, resolve } from 'path';
import {
  ConfigError,
  configSchema,
  type ReposeedConfig,
  type ValidationError,
  type ValidationResult,
} from './schema';

export const CONFIG_DIR = '.reposeed';
export const CONFIG_FILENAME = 'reposeed.config.json';

const CONFIG_FILENAMES = [join(CONFIG_DIR, CONFIG_FILENAME), CONFIG_FILENAME, '.reposeed.json'];

/**
 * Find the config file in the given directory
 */
export function findConfigFile(dir: string): string | null {
  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(dir, filename);
    if (existsSync(filepath)) {
      return filepath;
    }
  }
  return null;
}

/**
 * Directory that relative paths in a config file are resolved against
 */
export function configBaseDir(configPath: string): string {
  const dir = dirname(configPath);
  return dir.endsWith(CONFIG_DIR) ? dirname(dir) : dir;
}

export function validateConfig(value: unknown): ValidationResult {
  const result = configSchema.safeParse(value);
  if (result.success) {
    return { valid: true, errors: [], config: result.data };
  }

  const errors: ValidationError[] = result.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
  return { valid: false, errors };
}

/**
 * Parse and validate the config file at a path
 */
export function parseConfig(configPath: string): ReposeedConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in config file: ${reason}`);
  }

  const validation = validateConfig(parsed);
  if (!validation.config) {
    const problems = validation.errors.map((e) => `${e.path}: ${e.message}`);
    throw new ConfigError(`Invalid config file ${configPath}`, problems);
  }
  return validation.config;
}

/**
 * Write a config file into <dir>/.reposeed/, returning its path
 */
export async function writeConfig(dir: string, config: ReposeedConfig): Promise<string> {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError(
      'Refusing to write an invalid config',
      validation.errors.map((e) => `${e.path}: ${e.message}`)
    );
  }

  const configDir = join(dir, CONFIG_DIR);
  await fs.mkdir(configDir, { recursive: true });
  const configPath = join(configDir, CONFIG_FILENAME);
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n');
  return configPath;
}
