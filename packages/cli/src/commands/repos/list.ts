/**
 * reposeed repos list
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, exitCodeOf } from '@reposeed/core';
import { logFullError } from '../../logger';
import { openTargetSession, type TargetOptions } from '../../services/target.service';

interface ListOptions extends TargetOptions {
  json?: boolean;
}

export const listReposCommand = new Command('list')
  .description('List repositories in the target project')
  .option('--org <organization>', 'Hosting organization')
  .option('--project <project>', 'Hosting project')
  .option('--token-file <path>', 'File holding the access token (default ~/.token)')
  .option('--host <id>', 'Hosting provider (default azure-devops)')
  .option('--json', 'Print the repositories as JSON')
  .action(async (options: ListOptions) => {
    process.exitCode = await runList(options);
  });

async function runList(options: ListOptions): Promise<number> {
  const spinner = options.json ? null : ora();

  try {
    const session = await openTargetSession(options);
    if (!session) {
      return 1;
    }
    const { target } = session.settings;

    spinner?.start(`Fetching repositories from project '${target.project}'...`);
    const repositories = await session.client.listRepositories();
    spinner?.stop();

    if (options.json) {
      console.log(JSON.stringify(repositories, null, 2));
      return 0;
    }

    if (repositories.length === 0) {
      console.log(chalk.gray('\n  No repositories found in the project.\n'));
      return 0;
    }

    console.log(chalk.bold(`\n  ${repositories.length} repositories in ${target.organization}/${target.project}\n`));
    for (const repo of repositories) {
      const branch = repo.defaultBranch ? chalk.gray(` (${repo.defaultBranch.replace('refs/heads/', '')})`) : '';
      console.log(`  ${chalk.cyan(repo.name)}${branch}`);
      console.log(chalk.gray(`    ${repo.id}`));
    }
    console.log('');
    return 0;
  } catch (error) {
    if (spinner?.isSpinning) {
      spinner.fail('Could not list repositories');
    }
    logFullError('repos-list', error, { options });
    console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
    return exitCodeOf(error);
  }
}
