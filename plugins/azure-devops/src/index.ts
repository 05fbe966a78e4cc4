import type { Plugin } from '@reposeed/core';
import { azureDevOpsHost } from './provider';

export { azureDevOpsHost } from './provider';
export { AzureReposClient, isAlreadyExistsError } from './client';
export { AzurePipelinesClient, ACTIVE_RUN_STATUSES } from './pipelines';
export { organizationUrl, AZURE_DEVOPS_DOMAIN } from './az';
export { diagnoseAzureCli, DEVOPS_EXTENSION } from './diagnose';

// Export as plugin for registration
const plugin: Plugin = {
  hosts: [azureDevOpsHost],
};

export default plugin;
