import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runCommand } from '../exec';
import { provisionRepository, type ProvisionRequest } from '../provisioner';
import { InMemoryHost } from './fakes';

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `reposeed-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

/**
 * Host whose repositories all live in one local bare repository
 */
class BareRepositoryHost extends InMemoryHost {
  constructor(private readonly bareDir: string) {
    super();
  }

  remoteUrl(): string {
    return this.bareDir;
  }
}

async function bareGit(bareDir: string, args: string[]): Promise<string> {
  const { stdout } = await runCommand('git', args, { cwd: bareDir });
  return stdout.trim();
}

describe('provisionRepository with git', () => {
  let tempDir: string;
  let sourceDir: string;
  let bareDir: string;
  let request: ProvisionRequest;

  beforeEach(async () => {
    tempDir = await createTempDir();
    sourceDir = path.join(tempDir, 'site');
    bareDir = path.join(tempDir, 'remote.git');
    await fs.mkdir(sourceDir);
    await fs.mkdir(bareDir);

    // Keep the machine's git config (signing, hooks, identity) out of the run
    const globalConfig = path.join(tempDir, 'gitconfig');
    await fs.writeFile(globalConfig, '');
    vi.stubEnv('GIT_CONFIG_GLOBAL', globalConfig);
    vi.stubEnv('GIT_CONFIG_NOSYSTEM', '1');

    await runCommand('git', ['init', '--bare'], { cwd: bareDir });

    request = {
      repository: 'site',
      sourceDir,
      branch: 'master',
      remote: 'origin',
      commitMessage: 'first commit of all files',
      author: { name: 'Test User', email: 'test@example.com' },
    };
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should push every file as a single commit', async () => {
    await fs.writeFile(path.join(sourceDir, 'a.txt'), 'a\n');
    await fs.mkdir(path.join(sourceDir, 'sub'));
    await fs.writeFile(path.join(sourceDir, 'sub', 'b.txt'), 'b\n');
    const host = new BareRepositoryHost(bareDir);

    const result = await provisionRepository(request, { host, run: runCommand });

    expect(result.created).toBe(true);
    expect(await bareGit(bareDir, ['rev-list', '--count', 'master'])).toBe('1');
    expect(await bareGit(bareDir, ['ls-tree', '-r', '--name-only', 'master'])).toBe('a.txt\nsub/b.txt');
    expect(await bareGit(bareDir, ['log', '-1', '--format=%an <%ae> %s', 'master'])).toBe(
      'Test User <test@example.com> first commit of all files'
    );
  });

  it('should replace the remote history on a second run', async () => {
    await fs.writeFile(path.join(sourceDir, 'a.txt'), 'a\n');
    const host = new BareRepositoryHost(bareDir);

    await provisionRepository(request, { host, run: runCommand });
    const firstCommit = await bareGit(bareDir, ['rev-parse', 'master']);

    await fs.writeFile(path.join(sourceDir, 'c.txt'), 'c\n');
    const second = await provisionRepository(request, { host, run: runCommand });

    expect(second.created).toBe(false);
    expect(host.createCalls).toBe(1);
    expect(host.repositories).toHaveLength(1);
    expect(await bareGit(bareDir, ['rev-list', '--count', 'master'])).toBe('1');
    expect(await bareGit(bareDir, ['ls-tree', '-r', '--name-only', 'master'])).toBe('a.txt\nc.txt');
    expect(await bareGit(bareDir, ['rev-parse', 'master'])).not.toBe(firstCommit);

    const { stdout } = await runCommand('git', ['rev-parse', '--abbrev-ref', 'master@{upstream}'], {
      cwd: sourceDir,
    });
    expect(stdout.trim()).toBe('origin/master');
  });

  it('should commit and push an empty directory', async () => {
    const host = new BareRepositoryHost(bareDir);

    await provisionRepository(request, { host, run: runCommand });

    expect(await bareGit(bareDir, ['rev-list', '--count', 'master'])).toBe('1');
    expect(await bareGit(bareDir, ['ls-tree', '-r', '--name-only', 'master'])).toBe('');
  });
});
