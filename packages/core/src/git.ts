import * as fs from 'fs/promises';
import * as path from 'path';
import type { CommitAuthor } from '@reposeed/shared';
import { runCommand, type CommandOutput, type CommandRunner } from './exec';

/**
 * Local git operations on the source tree being published
 */
export class GitWorkspace {
  constructor(
    readonly dir: string,
    private readonly run: CommandRunner = runCommand,
    private readonly redact: string[] = []
  ) {}

  private git(args: string[]): Promise<CommandOutput> {
    return this.run('git', args, { cwd: this.dir, redact: this.redact });
  }

  /**
   * Remove any existing .git metadata. Returns whether there was one.
   */
  async resetHistory(): Promise<boolean> {
    const gitDir = path.join(this.dir, '.git');
    const existed = await fs.lstat(gitDir).then(
      () => true,
      () => false
    );
    await fs.rm(gitDir, { recursive: true, force: true });
    return existed;
  }

  async init(branch: string): Promise<void> {
    await this.git(['init', `--initial-branch=${branch}`]);
  }

  async addRemote(name: string, url: string): Promise<void> {
    await this.git(['remote', 'add', name, url]);
  }

  async stageAll(): Promise<void> {
    await this.git(['add', '.']);
  }

  // --allow-empty: an empty tree still gets its initial commit
  async commit(message: string, author?: CommitAuthor): Promise<void> {
    const identity = author
      ? ['-c', `user.name=${author.name}`, '-c', `user.email=${author.email}`]
      : [];
    await this.git([...identity, 'commit', '--allow-empty', '-m', message]);
  }

  // Forced: the new single commit replaces whatever history the remote branch had
  async push(remote: string, branch: string): Promise<void> {
    await this.git(['push', '--force', '--set-upstream', remote, branch]);
  }
}
