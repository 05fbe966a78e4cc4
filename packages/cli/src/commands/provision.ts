/**
 * reposeed provision
 *
 * Make sure the named repository exists on the host, then publish a local
 * directory to it as a brand-new single-commit history. Any failing step stops
 * the run; the process exits with the failed sub-command's code.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readCredential, type SettingsOverrides } from '@reposeed/config';
import { errorMessage, exitCodeOf, provisionRepository } from '@reposeed/core';
import { createCommandLogger, getLogPath, logFullError, registerSecret } from '../logger';
import { createLoggedRunner, openHostSession } from '../services/host.service';
import { loadSettings, printConfigError, type LoadedSettings } from '../services/settings.service';

interface ProvisionOptions {
  name?: string;
  org?: string;
  project?: string;
  tokenFile?: string;
  branch?: string;
  remote?: string;
  message?: string;
  host?: string;
}

export function toOverrides(dir: string | undefined, options: ProvisionOptions): SettingsOverrides {
  return {
    host: options.host,
    organization: options.org,
    project: options.project,
    repository: options.name,
    sourceDir: dir,
    tokenFile: options.tokenFile,
    branch: options.branch,
    remote: options.remote,
    commitMessage: options.message,
  };
}

export const provisionCommand = new Command('provision')
  .description('Create the repository if needed and push a directory as its fresh history')
  .argument('[dir]', 'Directory to publish (default: sourceDir from config, else .)')
  .option('-n, --name <name>', 'Repository name')
  .option('--org <organization>', 'Hosting organization')
  .option('--project <project>', 'Hosting project')
  .option('--token-file <path>', 'File holding the access token (default ~/.token)')
  .option('-b, --branch <branch>', 'Branch to create and push (default master)')
  .option('--remote <name>', 'Remote name (default origin)')
  .option('-m, --message <message>', 'Commit message')
  .option('--host <id>', 'Hosting provider (default azure-devops)')
  .action(async (dir: string | undefined, options: ProvisionOptions) => {
    process.exitCode = await runProvision(dir, options);
  });

async function runProvision(dir: string | undefined, options: ProvisionOptions): Promise<number> {
  const log = createCommandLogger('provision');
  console.log(chalk.bold('\n  reposeed provision\n'));

  let settings: LoadedSettings;
  let credential: string;
  try {
    settings = loadSettings(process.cwd(), toOverrides(dir, options));
    credential = await readCredential(settings.tokenFile);
  } catch (error) {
    logFullError('settings', error, { dir, options });
    printConfigError(error);
    return 1;
  }
  registerSecret(credential);
  log.info('Settings resolved', { ...settings });

  console.log(chalk.cyan('  Repository:'), settings.repository);
  console.log(chalk.cyan('  Organization:'), settings.target.organization);
  console.log(chalk.cyan('  Project:'), settings.target.project);
  console.log(chalk.cyan('  Source:'), settings.sourceDir);
  console.log(chalk.cyan('  Branch:'), settings.branch);
  console.log('');

  const run = createLoggedRunner();
  const spinner = ora();

  try {
    const { client } = openHostSession(settings.host, settings.target, credential, run);

    const result = await provisionRepository(
      {
        repository: settings.repository,
        sourceDir: settings.sourceDir,
        branch: settings.branch,
        remote: settings.remote,
        commitMessage: settings.commitMessage,
        author: settings.author,
      },
      {
        host: client,
        run,
        secrets: [credential],
        onProgress: (step, message) => {
          log.info(message, { step });
          if (spinner.isSpinning) {
            spinner.succeed();
          }
          spinner.start(message);
        },
      }
    );
    spinner.succeed();

    log.info('Provision complete', { ...result });
    console.log(chalk.green(`\n  Pushed ${result.branch} to ${result.repository.name}`));
    console.log(chalk.gray(`  Remote: ${result.remoteUrl}`));
    if (result.repository.webUrl) {
      console.log(chalk.gray(`  Web: ${result.repository.webUrl}`));
    }
    console.log('');
    return 0;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail();
    }
    logFullError('provision', error, {
      repository: settings.repository,
      target: settings.target,
      sourceDir: settings.sourceDir,
    });
    console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
    console.log(chalk.gray(`  Full debug log available at: ${getLogPath()}\n`));
    return exitCodeOf(error);
  }
}
