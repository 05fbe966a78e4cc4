/**
 * reposeed doctor
 *
 * Check the tools and settings a provision run depends on: git, the host's
 * CLI (and its extensions), the config file and the credential file.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { homedir } from 'os';
import type { CheckResult } from '@reposeed/shared';
import {
  DEFAULT_SETTINGS,
  expandHome,
  findConfigFile,
  parseConfig,
  readCredential,
} from '@reposeed/config';
import { errorMessage, registry, type CommandRunner, type HostProvider } from '@reposeed/core';
import { createLoggedRunner, ensureHostsRegistered } from '../services/host.service';
import { logFullError } from '../logger';

interface DoctorOptions {
  fix?: boolean;
  host?: string;
  tokenFile?: string;
  verbose?: boolean;
}

export const doctorCommand = new Command('doctor')
  .description('Check git, the host CLI and local settings')
  .option('--fix', 'Attempt to fix issues automatically')
  .option('--host <id>', 'Hosting provider (default from config, else azure-devops)')
  .option('--token-file <path>', 'File holding the access token')
  .option('--verbose', 'Show detailed output for each check')
  .action(async (options: DoctorOptions) => {
    process.exitCode = await runDoctor(options);
  });

export async function checkGit(run: CommandRunner): Promise<CheckResult> {
  try {
    const { stdout } = await run('git', ['--version']);
    return { name: 'git', status: 'ok', message: stdout.trim() };
  } catch {
    return {
      name: 'git',
      status: 'fail',
      message: 'Not installed',
      fix: 'Install git from https://git-scm.com/downloads',
    };
  }
}

export function checkConfig(cwd: string): CheckResult {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return {
      name: 'Config file',
      status: 'warn',
      message: 'No config file found; every setting must be given as an option',
      fix: 'reposeed init',
    };
  }
  try {
    parseConfig(configPath);
    return { name: 'Config file', status: 'ok', message: configPath };
  } catch (error) {
    return {
      name: 'Config file',
      status: 'fail',
      message: errorMessage(error),
      fix: `Fix or recreate ${configPath} (reposeed init)`,
    };
  }
}

export async function checkCredential(tokenFile: string): Promise<CheckResult> {
  try {
    await readCredential(tokenFile);
    return { name: 'Credential file', status: 'ok', message: `${tokenFile} is readable` };
  } catch (error) {
    return {
      name: 'Credential file',
      status: 'fail',
      message: errorMessage(error),
      fix: `Save an access token to ${tokenFile}`,
    };
  }
}

async function checkHost(provider: HostProvider, run: CommandRunner, fix: boolean): Promise<CheckResult[]> {
  if (provider.diagnose) {
    return provider.diagnose({ run, fix });
  }
  const ok = await provider.auth.validate(run);
  return [
    ok
      ? { name: provider.name, status: 'ok', message: `${provider.auth.command ?? provider.id} is available` }
      : { name: provider.name, status: 'fail', message: 'Not available', fix: provider.auth.instructions },
  ];
}

function displayResult(result: CheckResult, verbose?: boolean): void {
  const icon =
    result.status === 'ok' ? chalk.green('✓') :
    result.status === 'warn' ? chalk.yellow('⚠') :
    chalk.red('✗');

  const color =
    result.status === 'ok' ? chalk.white :
    result.status === 'warn' ? chalk.yellow :
    chalk.red;

  console.log(`  ${icon} ${color(result.name)}`);

  if (verbose || result.status !== 'ok') {
    console.log(chalk.gray(`    ${result.message}`));
  }
}

/**
 * Settings the checks need, read leniently: a broken config is reported by its own check
 */
function doctorSettings(cwd: string, options: DoctorOptions): { host: string; tokenFile: string } {
  let host: string = DEFAULT_SETTINGS.host;
  let tokenFile: string = DEFAULT_SETTINGS.tokenFile;
  const configPath = findConfigFile(cwd);
  if (configPath) {
    try {
      const config = parseConfig(configPath);
      host = config.host ?? host;
      tokenFile = config.tokenFile ?? tokenFile;
    } catch (error) {
      logFullError('doctor-config', error, { configPath });
    }
  }
  return {
    host: options.host ?? host,
    tokenFile: expandHome(options.tokenFile ?? tokenFile, homedir()),
  };
}

async function runDoctor(options: DoctorOptions): Promise<number> {
  console.log(chalk.bold('\n  reposeed doctor\n'));
  console.log(chalk.gray('  Checking your environment...\n'));

  const cwd = process.cwd();
  const run = createLoggedRunner();
  const settings = doctorSettings(cwd, options);
  const results: CheckResult[] = [];

  const record = (result: CheckResult): void => {
    results.push(result);
    displayResult(result, options.verbose);
  };

  record(await checkGit(run));

  const provider = ensureHostsRegistered(registry).getHost(settings.host);
  if (provider) {
    for (const result of await checkHost(provider, run, options.fix ?? false)) {
      record(result);
    }
  } else {
    record({
      name: 'Host',
      status: 'fail',
      message: `Unknown host "${settings.host}"`,
      fix: `Use one of: ${registry.getAllHosts().map((h) => h.id).join(', ')}`,
    });
  }

  record(checkConfig(cwd));
  record(await checkCredential(settings.tokenFile));

  console.log(chalk.bold('\n  Summary\n'));

  const passed = results.filter((r) => r.status === 'ok').length;
  const warnings = results.filter((r) => r.status === 'warn').length;
  const failed = results.filter((r) => r.status === 'fail').length;

  console.log(chalk.green(`  ✓ ${passed} checks passed`));
  if (warnings > 0) {
    console.log(chalk.yellow(`  ⚠ ${warnings} warnings`));
  }
  if (failed > 0) {
    console.log(chalk.red(`  ✗ ${failed} checks failed`));
  }

  if (failed > 0 || warnings > 0) {
    console.log(chalk.bold('\n  Recommended Actions\n'));
    for (const result of results) {
      if (result.status !== 'ok' && result.fix) {
        console.log(chalk.gray(`  ${result.name}:`));
        console.log(chalk.cyan(`    ${result.fix}\n`));
      }
    }
  }

  if (failed === 0) {
    console.log(chalk.green('\n  Ready to provision.\n'));
    return 0;
  }
  console.log(chalk.yellow('\n  Please fix the issues above before provisioning.\n'));
  return 1;
}
