/**
 * reposeed config schema
 * Shape of .reposeed/reposeed.config.json
 */

import { z } from 'zod';

const FORBIDDEN_NAME_CHARS = /[\\/:*?"<>|;#${},+=[\]]/;
const MAX_NAME_LENGTH = 64;

/**
 * Repository names as the hosting service accepts them
 */
export function isValidRepositoryName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= MAX_NAME_LENGTH &&
    !FORBIDDEN_NAME_CHARS.test(name) &&
    !name.startsWith('_') &&
    !name.startsWith('.') &&
    name.trim() === name
  );
}

export const REPOSITORY_NAME_RULE =
  'repository name must be 1-64 chars, not start with "_" or ".", and not contain \\ / : * ? " < > | ; # $ { } , + = [ ]';

export function isValidBranchName(branch: string): boolean {
  return /^[^\s~^:?*[\\]+$/.test(branch) && !branch.startsWith('-') && !branch.endsWith('/');
}

const nonEmpty = (field: string) => z.string().min(1, `${field} must not be empty`);

export const authorSchema = z
  .object({
    name: nonEmpty('author.name'),
    email: z.string().email('author.email must be an email address'),
  })
  .strict();

export const configSchema = z
  .object({
    host: nonEmpty('host').optional(),
    organization: nonEmpty('organization').optional(),
    project: nonEmpty('project').optional(),
    repository: z.string().refine(isValidRepositoryName, REPOSITORY_NAME_RULE).optional(),
    sourceDir: nonEmpty('sourceDir').optional(),
    tokenFile: nonEmpty('tokenFile').optional(),
    branch: z.string().refine(isValidBranchName, 'branch is not a valid git branch name').optional(),
    remote: nonEmpty('remote').optional(),
    commitMessage: nonEmpty('commitMessage').optional(),
    author: authorSchema.optional(),
  })
  .strict();

export type ReposeedConfig = z.infer<typeof configSchema>;

// =============================================================================
// Validation Types
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  config?: ReposeedConfig;
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
