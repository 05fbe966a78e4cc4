import * as fs from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import type { CommitAuthor, HostTarget } from '@reposeed/shared';
import {
  ConfigError,
  REPOSITORY_NAME_RULE,
  isValidBranchName,
  isValidRepositoryName,
  type ReposeedConfig,
} from './schema';

export const DEFAULT_SETTINGS = {
  host: 'azure-devops',
  sourceDir: '.',
  tokenFile: '~/.token',
  branch: 'master',
  remote: 'origin',
  commitMessage: 'first commit of all files',
} as const;

/**
 * Values given on the command line; they win over the config file
 */
export interface SettingsOverrides {
  host?: string;
  organization?: string;
  project?: string;
  repository?: string;
  sourceDir?: string;
  tokenFile?: string;
  branch?: string;
  remote?: string;
  commitMessage?: string;
}

export interface ResolveContext {
  /** Base for relative paths from the config file */
  baseDir: string;
  /** Base for relative paths given as overrides */
  cwd: string;
  homeDir: string;
}

export interface ProvisionSettings {
  host: string;
  target: HostTarget;
  repository: string;
  sourceDir: string;
  tokenFile: string;
  branch: string;
  remote: string;
  commitMessage: string;
  author?: CommitAuthor;
}

export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === '~') return homeDir;
  if (filePath.startsWith('~/')) return join(homeDir, filePath.slice(2));
  return filePath;
}

function resolvePath(filePath: string, base: string, homeDir: string): string {
  const expanded = expandHome(filePath, homeDir);
  return isAbsolute(expanded) ? expanded : resolve(base, expanded);
}

function pickPath(
  override: string | undefined,
  fromConfig: string | undefined,
  fallback: string,
  context: ResolveContext
): string {
  if (override) return resolvePath(override, context.cwd, context.homeDir);
  return resolvePath(fromConfig ?? fallback, context.baseDir, context.homeDir);
}

export interface TargetSettings {
  host: string;
  target: HostTarget;
  tokenFile: string;
}

/**
 * Host, scope and credential location only; enough for listing and deleting
 */
export function resolveTarget(
  config: ReposeedConfig,
  overrides: SettingsOverrides,
  context: ResolveContext
): TargetSettings {
  const organization = overrides.organization ?? config.organization;
  const project = overrides.project ?? config.project;

  const missing: string[] = [];
  if (!organization) missing.push('organization');
  if (!project) missing.push('project');
  if (!organization || !project) {
    throw new ConfigError(`Missing required settings: ${missing.join(', ')}`, missing);
  }

  return {
    host: overrides.host ?? config.host ?? DEFAULT_SETTINGS.host,
    target: { organization, project },
    tokenFile: pickPath(overrides.tokenFile, config.tokenFile, DEFAULT_SETTINGS.tokenFile, context),
  };
}

/**
 * Merge overrides over the config file and apply defaults
 */
export function resolveSettings(
  config: ReposeedConfig,
  overrides: SettingsOverrides,
  context: ResolveContext
): ProvisionSettings {
  const organization = overrides.organization ?? config.organization;
  const project = overrides.project ?? config.project;
  const repository = overrides.repository ?? config.repository;
  const branch = overrides.branch ?? config.branch ?? DEFAULT_SETTINGS.branch;

  const missing: string[] = [];
  if (!organization) missing.push('organization');
  if (!project) missing.push('project');
  if (!repository) missing.push('repository');
  if (!organization || !project || !repository) {
    throw new ConfigError(`Missing required settings: ${missing.join(', ')}`, missing);
  }

  if (!isValidRepositoryName(repository)) {
    throw new ConfigError(`Invalid repository name "${repository}"`, [REPOSITORY_NAME_RULE]);
  }
  if (!isValidBranchName(branch)) {
    throw new ConfigError(`Invalid branch name "${branch}"`);
  }

  return {
    host: overrides.host ?? config.host ?? DEFAULT_SETTINGS.host,
    target: { organization, project },
    repository,
    sourceDir: pickPath(overrides.sourceDir, config.sourceDir, DEFAULT_SETTINGS.sourceDir, context),
    tokenFile: pickPath(overrides.tokenFile, config.tokenFile, DEFAULT_SETTINGS.tokenFile, context),
    branch,
    remote: overrides.remote ?? config.remote ?? DEFAULT_SETTINGS.remote,
    commitMessage: overrides.commitMessage ?? config.commitMessage ?? DEFAULT_SETTINGS.commitMessage,
    author: config.author,
  };
}

/**
 * Read the access token from its file
 */
export async function readCredential(tokenFile: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(tokenFile, 'utf-8');
  } catch {
    throw new ConfigError(`Credential file not found or unreadable: ${tokenFile}`);
  }

  const token = content.trim();
  if (!token) {
    throw new ConfigError(`Credential file is empty: ${tokenFile}`);
  }
  return token;
}
