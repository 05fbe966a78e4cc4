/**
 * Azure Repos client, driving `az repos`
 */

import type { CreateRepositoryOutcome, RemoteRepository } from '@reposeed/shared';
import { CommandError, type HostContext, type RepositoryHostClient } from '@reposeed/core';
import { AZURE_DEVOPS_DOMAIN, parseOutput, runAz } from './az';
import { azRepositoryListSchema, azRepositorySchema, type AzRepository } from './schema';

function toRemoteRepository(repo: AzRepository): RemoteRepository {
  return {
    id: repo.id,
    name: repo.name,
    remoteUrl: repo.remoteUrl ?? undefined,
    webUrl: repo.webUrl ?? undefined,
    defaultBranch: repo.defaultBranch ?? undefined,
  };
}

// TF400948: "A Git repository with the name X already exists."
export function isAlreadyExistsError(error: unknown): boolean {
  return error instanceof CommandError && /TF400948|already exists/i.test(error.stderr);
}

export class AzureReposClient implements RepositoryHostClient {
  constructor(private readonly context: HostContext) {}

  private az(args: string[]): Promise<string> {
    return runAz(this.context, args);
  }

  async listRepositories(): Promise<RemoteRepository[]> {
    const stdout = await this.az(['repos', 'list']);
    return parseOutput(azRepositoryListSchema, stdout, 'az repos list').map(toRemoteRepository);
  }

  async findRepository(name: string): Promise<RemoteRepository | null> {
    const wanted = name.toLowerCase();
    const repositories = await this.listRepositories();
    return repositories.find((repo) => repo.name.toLowerCase() === wanted) ?? null;
  }

  async createRepository(name: string): Promise<CreateRepositoryOutcome> {
    try {
      const stdout = await this.az(['repos', 'create', '--name', name]);
      const repository = toRemoteRepository(parseOutput(azRepositorySchema, stdout, 'az repos create'));
      return { repository, created: true };
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        const existing = await this.findRepository(name);
        if (existing) {
          return { repository: existing, created: false };
        }
      }
      throw error;
    }
  }

  async deleteRepository(repository: RemoteRepository): Promise<void> {
    await this.az(['repos', 'delete', '--id', repository.id, '--yes']);
  }

  remoteUrl(name: string): string {
    const { target, credential } = this.context;
    return [
      `https://${encodeURIComponent(credential)}@${AZURE_DEVOPS_DOMAIN}`,
      encodeURIComponent(target.organization),
      encodeURIComponent(target.project),
      '_git',
      encodeURIComponent(name),
    ].join('/');
  }
}
