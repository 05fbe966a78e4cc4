import type {
  CheckResult,
  CreateRepositoryOutcome,
  HostTarget,
  PipelineRun,
  ProjectItem,
  RemoteRepository,
} from '@reposeed/shared';
import type { CommandRunner } from './exec';

// Host client types
export interface RepositoryHostClient {
  listRepositories(): Promise<RemoteRepository[]>;
  findRepository(name: string): Promise<RemoteRepository | null>;
  createRepository(name: string): Promise<CreateRepositoryOutcome>;
  deleteRepository(repository: RemoteRepository): Promise<void>;
  /** Push URL for a repository, with the credential embedded */
  remoteUrl(name: string): string;
}

/**
 * Build pipelines and pipeline libraries of a project, for hosts that have them
 */
export interface PipelineHostClient {
  listPipelines(): Promise<ProjectItem[]>;
  /** Runs that are queued or still running */
  listActiveRuns(pipeline: ProjectItem): Promise<PipelineRun[]>;
  cancelRun(run: PipelineRun): Promise<void>;
  deletePipeline(pipeline: ProjectItem): Promise<void>;
  listVariableGroups(): Promise<ProjectItem[]>;
  deleteVariableGroup(group: ProjectItem): Promise<void>;
}

export interface HostContext {
  target: HostTarget;
  credential: string;
  run: CommandRunner;
}

// Provider types
export interface AuthMethod {
  type: 'cli' | 'api_key';
  command?: string;
  instructions: string;
  validate: (run: CommandRunner) => Promise<boolean>;
}

export interface DiagnoseOptions {
  run: CommandRunner;
  fix: boolean;
}

export interface HostProvider {
  id: string;
  name: string;
  auth: AuthMethod;
  diagnose?: (options: DiagnoseOptions) => Promise<CheckResult[]>;
  createClient: (context: HostContext) => RepositoryHostClient;
  createPipelineClient?: (context: HostContext) => PipelineHostClient;
}

export type DefineHostInput = HostProvider;

// Plugin export shape
export interface Plugin {
  hosts: HostProvider[];
}
