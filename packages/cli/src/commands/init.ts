/**
 * reposeed init
 *
 * Create .reposeed/reposeed.config.json in the current directory.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import {
  CONFIG_DIR,
  CONFIG_FILENAME,
  DEFAULT_SETTINGS,
  REPOSITORY_NAME_RULE,
  findConfigFile,
  isValidBranchName,
  isValidRepositoryName,
  writeConfig,
  type ReposeedConfig,
} from '@reposeed/config';
import { createCommandLogger, logFullError } from '../logger';
import { printConfigError } from '../services/settings.service';

interface InitOptions {
  org?: string;
  project?: string;
  name?: string;
  yes?: boolean;
}

interface InitAnswers {
  organization: string;
  project: string;
  repository: string;
  sourceDir: string;
  tokenFile: string;
  branch: string;
}

const required = (label: string) => (input: string) => input.trim().length > 0 || `${label} is required`;

export const initCommand = new Command('init')
  .description('Create a reposeed config in the current directory')
  .option('--org <organization>', 'Hosting organization')
  .option('--project <project>', 'Hosting project')
  .option('-n, --name <name>', 'Repository name')
  .option('-y, --yes', 'Overwrite an existing config without asking')
  .action(async (options: InitOptions) => {
    process.exitCode = await runInit(options);
  });

async function runInit(options: InitOptions): Promise<number> {
  const log = createCommandLogger('init');
  const cwd = process.cwd();
  console.log(chalk.bold('\n  reposeed init\n'));

  const existing = findConfigFile(cwd);
  if (existing && !options.yes) {
    console.log(chalk.yellow(`  ${existing} already exists.\n`));
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
      {
        type: 'confirm',
        name: 'overwrite',
        message: 'Overwrite it?',
        default: false,
      },
    ]);
    if (!overwrite) {
      console.log(chalk.gray('  Cancelled.\n'));
      return 0;
    }
  }

  const answers = await inquirer.prompt<InitAnswers>([
    {
      type: 'input',
      name: 'organization',
      message: 'Organization:',
      default: options.org,
      validate: required('Organization'),
    },
    {
      type: 'input',
      name: 'project',
      message: 'Project:',
      default: options.project,
      validate: required('Project'),
    },
    {
      type: 'input',
      name: 'repository',
      message: 'Repository name:',
      default: options.name,
      validate: (input: string) => isValidRepositoryName(input) || REPOSITORY_NAME_RULE,
    },
    {
      type: 'input',
      name: 'sourceDir',
      message: 'Directory to publish:',
      default: DEFAULT_SETTINGS.sourceDir,
    },
    {
      type: 'input',
      name: 'tokenFile',
      message: 'Credential file:',
      default: DEFAULT_SETTINGS.tokenFile,
    },
    {
      type: 'input',
      name: 'branch',
      message: 'Branch:',
      default: DEFAULT_SETTINGS.branch,
      validate: (input: string) => isValidBranchName(input) || 'Not a valid git branch name',
    },
  ]);

  const config: ReposeedConfig = {
    organization: answers.organization.trim(),
    project: answers.project.trim(),
    repository: answers.repository,
    sourceDir: answers.sourceDir,
    tokenFile: answers.tokenFile,
    branch: answers.branch,
  };

  try {
    const configPath = await writeConfig(cwd, config);
    log.info('Config written', { configPath });
    console.log(chalk.green(`\n  Created ${CONFIG_DIR}/${CONFIG_FILENAME}\n`));
    console.log(chalk.gray('  Next steps:'));
    console.log(chalk.gray('    reposeed doctor      Check git and the host CLI'));
    console.log(chalk.gray('    reposeed provision   Create the repository and push\n'));
    return 0;
  } catch (error) {
    logFullError('init', error, { config });
    printConfigError(error);
    return 1;
  }
}
