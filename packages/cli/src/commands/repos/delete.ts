/**
 * reposeed repos delete
 *
 * Delete every repository in the target project except the excluded names.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, exitCodeOf } from '@reposeed/core';
import { createCommandLogger, logFullError } from '../../logger';
import { runCleanup } from '../../services/cleanup.service';
import { openTargetSession, type TargetOptions } from '../../services/target.service';

interface DeleteOptions extends TargetOptions {
  exclude?: string[];
  yes?: boolean;
}

export const deleteReposCommand = new Command('delete')
  .description('Delete all repositories in the target project (except excluded ones)')
  .option('--org <organization>', 'Hosting organization')
  .option('--project <project>', 'Hosting project')
  .option('--token-file <path>', 'File holding the access token (default ~/.token)')
  .option('--host <id>', 'Hosting provider (default azure-devops)')
  .option('-e, --exclude <names...>', 'Repository names to keep')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: DeleteOptions) => {
    process.exitCode = await runDelete(options);
  });

async function runDelete(options: DeleteOptions): Promise<number> {
  const log = createCommandLogger('repos-delete');
  console.log(chalk.bold('\n  reposeed repos delete\n'));

  try {
    const session = await openTargetSession(options);
    if (!session) {
      return 1;
    }

    console.log(chalk.gray(`  Fetching repositories from project '${session.settings.target.project}'...`));
    const repositories = await session.client.listRepositories();

    return await runCleanup({
      noun: 'repositories',
      items: repositories,
      exclude: options.exclude,
      yes: options.yes,
      remove: (repo) => session.client.deleteRepository(repo),
      log,
    });
  } catch (error) {
    logFullError('repos-delete', error, { options });
    console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
    return exitCodeOf(error);
  }
}
