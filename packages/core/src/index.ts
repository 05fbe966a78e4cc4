// Types
export type {
  RepositoryHostClient,
  PipelineHostClient,
  HostContext,
  HostProvider,
  AuthMethod,
  DiagnoseOptions,
  DefineHostInput,
  Plugin,
} from './types';

// Define helpers
export { defineHost } from './define';

// Registry
export { HostRegistry, registry } from './registry';

// Process execution
export {
  createCommandRunner,
  formatCommandLine,
  runCommand,
  type CommandHooks,
  type CommandOptions,
  type CommandOutput,
  type CommandRunner,
} from './exec';

// Errors
export {
  CommandError,
  ProvisionError,
  REDACTED,
  errorMessage,
  exitCodeOf,
  redactSecrets,
  type CommandErrorDetails,
} from './errors';

// Git and provisioning
export { GitWorkspace } from './git';
export {
  provisionRepository,
  type ProvisionDependencies,
  type ProvisionRequest,
} from './provisioner';
