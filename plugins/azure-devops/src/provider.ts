import { defineHost } from '@reposeed/core';
import { AzureReposClient } from './client';
import { diagnoseAzureCli } from './diagnose';
import { AzurePipelinesClient } from './pipelines';

/**
 * Azure DevOps host
 *
 * Repository, pipeline and variable group management goes through the Azure
 * CLI with the azure-devops extension; pushes use a personal access token
 * embedded in the remote URL.
 */
export const azureDevOpsHost = defineHost({
  id: 'azure-devops',
  name: 'Azure DevOps',

  auth: {
    type: 'api_key',
    command: 'az',
    instructions: `
To publish to Azure DevOps:

1. Install the Azure CLI and run: az extension add --name azure-devops
2. Create a personal access token with Code (Read, write & manage) scope,
   plus Build and Variable Groups (Read & manage) for the cleanup commands:
   https://dev.azure.com/<organization>/_usersSettings/tokens
3. Save the token to the credential file (default ~/.token)
    `.trim(),

    validate: async (run): Promise<boolean> => {
      try {
        await run('az', ['--version']);
        return true;
      } catch {
        return false;
      }
    },
  },

  diagnose: diagnoseAzureCli,

  createClient: (context) => new AzureReposClient(context),

  createPipelineClient: (context) => new AzurePipelinesClient(context),
});
