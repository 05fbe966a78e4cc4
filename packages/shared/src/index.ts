// Hosting scope
export interface HostTarget {
  organization: string;
  project: string;
}

// A repository as reported by the hosting service
export interface RemoteRepository {
  id: string;
  name: string;
  remoteUrl?: string;
  webUrl?: string;
  defaultBranch?: string;
}

// Pipeline or variable group in a hosting project
export interface ProjectItem {
  id: string;
  name: string;
}

export interface PipelineRun {
  id: string;
  status: string;
}

export interface CreateRepositoryOutcome {
  repository: RemoteRepository;
  created: boolean; // false when the name was taken by the time create ran
}

export interface CommitAuthor {
  name: string;
  email: string;
}

export type ProvisionStep =
  | 'verify'
  | 'lookup'
  | 'create'
  | 'reset'
  | 'init'
  | 'remote'
  | 'stage'
  | 'commit'
  | 'push';

export interface ProvisionResult {
  repository: RemoteRepository;
  created: boolean;
  branch: string;
  remoteUrl: string; // credential masked
}

// Environment health checks (doctor)
export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}
