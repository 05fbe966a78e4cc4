import { homedir } from 'os';
import chalk from 'chalk';
import {
  ConfigError,
  configBaseDir,
  findConfigFile,
  parseConfig,
  resolveSettings,
  resolveTarget,
  type ProvisionSettings,
  type ReposeedConfig,
  type ResolveContext,
  type SettingsOverrides,
  type TargetSettings,
} from '@reposeed/config';

export interface LoadedConfig {
  config: ReposeedConfig;
  configPath: string | null;
  context: ResolveContext;
}

/**
 * Read the config file for `cwd`, if there is one. An absent file is an empty config.
 */
export function loadConfig(cwd: string, homeDir: string = homedir()): LoadedConfig {
  const configPath = findConfigFile(cwd);
  const config = configPath ? parseConfig(configPath) : {};
  const baseDir = configPath ? configBaseDir(configPath) : cwd;
  return { config, configPath, context: { baseDir, cwd, homeDir } };
}

export type LoadedSettings = ProvisionSettings & { configPath: string | null };

export function loadSettings(
  cwd: string,
  overrides: SettingsOverrides,
  homeDir: string = homedir()
): LoadedSettings {
  const { config, configPath, context } = loadConfig(cwd, homeDir);
  return { ...resolveSettings(config, overrides, context), configPath };
}

export type LoadedTarget = TargetSettings & { configPath: string | null };

export function loadTarget(
  cwd: string,
  overrides: SettingsOverrides,
  homeDir: string = homedir()
): LoadedTarget {
  const { config, configPath, context } = loadConfig(cwd, homeDir);
  return { ...resolveTarget(config, overrides, context), configPath };
}

/**
 * Print a settings/config failure with its individual problems
 */
export function printConfigError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.log(chalk.red(`  Error: ${message}`));
  if (error instanceof ConfigError) {
    for (const problem of error.problems) {
      console.log(chalk.gray(`    - ${problem}`));
    }
  }
  console.log(chalk.gray(`\n  Run 'reposeed init' to create a config, or pass the values as options.\n`));
}
