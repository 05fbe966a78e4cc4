import type { CheckResult } from '@reposeed/shared';
import { errorMessage, type CommandRunner, type DiagnoseOptions } from '@reposeed/core';
import { azVersionSchema } from './schema';

export const DEVOPS_EXTENSION = 'azure-devops';

async function readAzVersion(run: CommandRunner): Promise<{ cli: string; extensions: Record<string, string> } | null> {
  try {
    const { stdout } = await run('az', ['version', '--output', 'json']);
    const parsed = azVersionSchema.safeParse(JSON.parse(stdout));
    if (!parsed.success) {
      return null;
    }
    return { cli: parsed.data['azure-cli'], extensions: parsed.data.extensions };
  } catch {
    return null;
  }
}

/**
 * Check the Azure CLI and its azure-devops extension; with `fix`, install the extension
 */
export async function diagnoseAzureCli({ run, fix }: DiagnoseOptions): Promise<CheckResult[]> {
  const version = await readAzVersion(run);
  if (!version) {
    return [
      {
        name: 'Azure CLI',
        status: 'fail',
        message: 'Not installed or not working',
        fix: 'Install the Azure CLI: https://learn.microsoft.com/cli/azure/install-azure-cli',
      },
    ];
  }

  const results: CheckResult[] = [
    { name: 'Azure CLI', status: 'ok', message: `Version ${version.cli} installed` },
  ];

  const extensionVersion = version.extensions[DEVOPS_EXTENSION];
  if (extensionVersion) {
    results.push({
      name: 'Azure DevOps extension',
      status: 'ok',
      message: `Version ${extensionVersion} installed`,
    });
    return results;
  }

  if (!fix) {
    results.push({
      name: 'Azure DevOps extension',
      status: 'fail',
      message: 'Not installed',
      fix: `az extension add --name ${DEVOPS_EXTENSION}`,
    });
    return results;
  }

  try {
    await run('az', ['extension', 'add', '--name', DEVOPS_EXTENSION]);
    results.push({ name: 'Azure DevOps extension', status: 'ok', message: 'Installed' });
  } catch (error) {
    results.push({
      name: 'Azure DevOps extension',
      status: 'fail',
      message: `Install failed: ${errorMessage(error)}`,
      fix: `az extension add --name ${DEVOPS_EXTENSION}`,
    });
  }
  return results;
}
