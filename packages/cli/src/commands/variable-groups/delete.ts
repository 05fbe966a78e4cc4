/**
 * reposeed variable-groups delete
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, exitCodeOf } from '@reposeed/core';
import { createCommandLogger, logFullError } from '../../logger';
import { openPipelineClient } from '../../services/host.service';
import { runCleanup } from '../../services/cleanup.service';
import { openTargetSession, type TargetOptions } from '../../services/target.service';

interface DeleteOptions extends TargetOptions {
  exclude?: string[];
  yes?: boolean;
}

export const deleteVariableGroupsCommand = new Command('delete')
  .description('Delete all library variable groups in the target project (except excluded ones)')
  .option('--org <organization>', 'Hosting organization')
  .option('--project <project>', 'Hosting project')
  .option('--token-file <path>', 'File holding the access token (default ~/.token)')
  .option('--host <id>', 'Hosting provider (default azure-devops)')
  .option('-e, --exclude <names...>', 'Variable group names to keep')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: DeleteOptions) => {
    process.exitCode = await runDelete(options);
  });

async function runDelete(options: DeleteOptions): Promise<number> {
  const log = createCommandLogger('variable-groups-delete');
  console.log(chalk.bold('\n  reposeed variable-groups delete\n'));

  try {
    const session = await openTargetSession(options);
    if (!session) {
      return 1;
    }
    const pipelines = openPipelineClient(session);

    console.log(chalk.gray(`  Fetching variable groups from project '${session.settings.target.project}'...`));
    const groups = await pipelines.listVariableGroups();

    return await runCleanup({
      noun: 'variable groups',
      items: groups,
      exclude: options.exclude,
      yes: options.yes,
      remove: (group) => pipelines.deleteVariableGroup(group),
      log,
    });
  } catch (error) {
    logFullError('variable-groups-delete', error, { options });
    console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
    return exitCodeOf(error);
  }
}
