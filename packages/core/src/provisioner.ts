/**
 * Repository provisioner
 *
 * Ensures a named remote repository exists, then publishes a local directory
 * to it as a brand-new single-commit history:
 * 1. Verify the source directory
 * 2. Look the repository up by name; create it only when absent
 * 3. Discard local .git metadata and re-initialise
 * 4. Add the remote, stage everything, commit, force-push with upstream
 *
 * Every step is fatal. Nothing is retried or rolled back.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import type {
  CommitAuthor,
  ProvisionResult,
  ProvisionStep,
  RemoteRepository,
} from '@reposeed/shared';
import { ProvisionError, errorMessage, redactSecrets } from './errors';
import { runCommand, type CommandRunner } from './exec';
import { GitWorkspace } from './git';
import type { RepositoryHostClient } from './types';

export interface ProvisionRequest {
  repository: string;
  sourceDir: string;
  branch: string;
  remote: string;
  commitMessage: string;
  author?: CommitAuthor;
}

export interface ProvisionDependencies {
  host: RepositoryHostClient;
  run?: CommandRunner;
  /** Masked in the returned remote URL and in git errors */
  secrets?: string[];
  onProgress?: (step: ProvisionStep, message: string) => void;
}

const STEP_LABELS: Record<ProvisionStep, string> = {
  verify: 'Source directory check',
  lookup: 'Repository lookup',
  create: 'Repository creation',
  reset: 'Local history reset',
  init: 'git init',
  remote: 'git remote add',
  stage: 'git add',
  commit: 'git commit',
  push: 'git push',
};

async function runStep<T>(step: ProvisionStep, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof ProvisionError) {
      throw error;
    }
    throw new ProvisionError(step, `${STEP_LABELS[step]} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

async function verifySourceDir(dir: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(dir);
  } catch {
    throw new ProvisionError('verify', `Source directory not found: ${dir}`);
  }
  if (!stats.isDirectory()) {
    throw new ProvisionError('verify', `Source path is not a directory: ${dir}`);
  }
}

export async function provisionRepository(
  request: ProvisionRequest,
  deps: ProvisionDependencies
): Promise<ProvisionResult> {
  const { host } = deps;
  const secrets = deps.secrets ?? [];
  const report = deps.onProgress ?? (() => {});
  const name = request.repository;

  report('verify', `Checking source directory ${request.sourceDir}`);
  await verifySourceDir(request.sourceDir);

  report('lookup', `Looking up repository ${name}`);
  const existing = await runStep('lookup', () => host.findRepository(name));

  let repository: RemoteRepository;
  let created = false;

  if (existing) {
    report('create', `Repository [${name}] already exists.`);
    repository = existing;
  } else {
    report('create', `Creating repository ${name}`);
    const outcome = await runStep('create', () => host.createRepository(name));
    if (!outcome.created) {
      // Taken between lookup and create; publish to the one that won
      report('create', `Repository [${name}] already exists.`);
    }
    repository = outcome.repository;
    created = outcome.created;
  }

  const git = new GitWorkspace(request.sourceDir, deps.run ?? runCommand, secrets);
  const remoteUrl = host.remoteUrl(repository.name);

  report('reset', 'Discarding local git history');
  await runStep('reset', () => git.resetHistory());

  report('init', `Initialising repository on branch ${request.branch}`);
  await runStep('init', () => git.init(request.branch));

  report('remote', `Adding remote ${request.remote}`);
  await runStep('remote', () => git.addRemote(request.remote, remoteUrl));

  report('stage', 'Staging all files');
  await runStep('stage', () => git.stageAll());

  report('commit', 'Committing');
  await runStep('commit', () => git.commit(request.commitMessage, request.author));

  report('push', `Pushing ${request.branch} to ${request.remote}`);
  await runStep('push', () => git.push(request.remote, request.branch));

  return {
    repository,
    created,
    branch: request.branch,
    remoteUrl: redactSecrets(remoteUrl, secrets),
  };
}
