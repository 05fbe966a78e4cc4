import { describe, it, expect } from 'vitest';
import { CommandError, type CommandOptions, type CommandRunner } from '@reposeed/core';
import { AzureReposClient, isAlreadyExistsError } from '../client';
import { organizationUrl } from '../az';

interface Call {
  command: string;
  args: string[];
  options: CommandOptions;
}

/**
 * Runner answering `az repos <sub>` calls from a table of handlers
 */
function fakeAz(handlers: Record<string, (args: string[]) => string>): { run: CommandRunner; calls: Call[] } {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args, options = {}) => {
    calls.push({ command, args, options });
    const handler = handlers[args[1]];
    if (!handler) {
      throw new Error(`unexpected call: ${args.join(' ')}`);
    }
    return { stdout: handler(args), stderr: '' };
  };
  return { run, calls };
}

const target = { organization: 'acme', project: 'training' };

const listing = JSON.stringify([
  {
    id: '1f0c',
    name: 'Site',
    remoteUrl: 'https://acme@dev.azure.com/acme/training/_git/Site',
    webUrl: 'https://dev.azure.com/acme/training/_git/Site',
    defaultBranch: 'refs/heads/master',
    size: 1024,
  },
  { id: '2a9d', name: 'empty', defaultBranch: null },
]);

describe('AzureReposClient', () => {
  it('should pass organization, project and credential on every call', async () => {
    const { run, calls } = fakeAz({ list: () => '[]' });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    await client.listRepositories();

    expect(calls).toEqual([
      {
        command: 'az',
        args: [
          'repos',
          'list',
          '--organization',
          'https://dev.azure.com/acme',
          '--project',
          'training',
          '--output',
          'json',
        ],
        options: { env: { AZURE_DEVOPS_EXT_PAT: 'test-secret' }, redact: ['test-secret'] },
      },
    ]);
  });

  it('should map listed repositories', async () => {
    const { run } = fakeAz({ list: () => listing });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    expect(await client.listRepositories()).toEqual([
      {
        id: '1f0c',
        name: 'Site',
        remoteUrl: 'https://acme@dev.azure.com/acme/training/_git/Site',
        webUrl: 'https://dev.azure.com/acme/training/_git/Site',
        defaultBranch: 'refs/heads/master',
      },
      { id: '2a9d', name: 'empty', remoteUrl: undefined, webUrl: undefined, defaultBranch: undefined },
    ]);
  });

  it('should find repositories by case-insensitive name', async () => {
    const { run } = fakeAz({ list: () => listing });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    expect((await client.findRepository('site'))?.id).toBe('1f0c');
    expect(await client.findRepository('missing')).toBeNull();
  });

  it('should reject output that is not a repository list', async () => {
    const { run } = fakeAz({ list: () => '{"value": []}' });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    await expect(client.listRepositories()).rejects.toThrow(/^Unexpected az repos list output:/);
  });

  it('should create a repository', async () => {
    const { run, calls } = fakeAz({ create: () => JSON.stringify({ id: '3b7e', name: 'new_repo10' }) });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    const outcome = await client.createRepository('new_repo10');

    expect(outcome.created).toBe(true);
    expect(outcome.repository.id).toBe('3b7e');
    expect(calls[0].args.slice(0, 4)).toEqual(['repos', 'create', '--name', 'new_repo10']);
  });

  it('should fall back to the existing repository when the name is taken', async () => {
    const { run, calls } = fakeAz({
      create: () => {
        throw new CommandError({
          commandLine: 'az repos create',
          exitCode: 1,
          stderr: 'ERROR: TF400948: A Git repository with the name Site already exists.',
        });
      },
      list: () => listing,
    });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    const outcome = await client.createRepository('Site');

    expect(outcome).toEqual({
      created: false,
      repository: {
        id: '1f0c',
        name: 'Site',
        remoteUrl: 'https://acme@dev.azure.com/acme/training/_git/Site',
        webUrl: 'https://dev.azure.com/acme/training/_git/Site',
        defaultBranch: 'refs/heads/master',
      },
    });
    expect(calls.map((c) => c.args[1])).toEqual(['create', 'list']);
  });

  it('should propagate other create failures', async () => {
    const failure = new CommandError({
      commandLine: 'az repos create',
      exitCode: 1,
      stderr: 'ERROR: TF400813: The user is not authorized to access this resource.',
    });
    const { run } = fakeAz({
      create: () => {
        throw failure;
      },
    });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    await expect(client.createRepository('site')).rejects.toBe(failure);
  });

  it('should delete by id without prompting', async () => {
    const { run, calls } = fakeAz({ delete: () => '' });
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    await client.deleteRepository({ id: '2a9d', name: 'empty' });

    expect(calls[0].args.slice(0, 5)).toEqual(['repos', 'delete', '--id', '2a9d', '--yes']);
  });

  it('should build the push URL with the credential embedded', () => {
    const { run } = fakeAz({});
    const client = new AzureReposClient({ target, credential: 'test-secret', run });

    expect(client.remoteUrl('new_repo10')).toBe('https://test-secret@dev.azure.com/acme/training/_git/new_repo10');
  });

  it('should encode URL segments', () => {
    const { run } = fakeAz({});
    const client = new AzureReposClient({
      target: { organization: 'acme', project: 'Team Site' },
      credential: 'test-secret',
      run,
    });

    expect(client.remoteUrl('web app')).toBe('https://test-secret@dev.azure.com/acme/Team%20Site/_git/web%20app');
  });
});

describe('helpers', () => {
  it('should build the organization URL', () => {
    expect(organizationUrl('acme')).toBe('https://dev.azure.com/acme');
  });

  it('should only treat name conflicts as already-exists', () => {
    const conflict = new CommandError({ commandLine: 'az', exitCode: 1, stderr: 'TF400948: already exists' });
    const other = new CommandError({ commandLine: 'az', exitCode: 1, stderr: 'TF401019: denied' });

    expect(isAlreadyExistsError(conflict)).toBe(true);
    expect(isAlreadyExistsError(other)).toBe(false);
    expect(isAlreadyExistsError(new Error('already exists'))).toBe(false);
  });
});
