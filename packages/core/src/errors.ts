import type { ProvisionStep } from '@reposeed/shared';

export const REDACTED = '***';

/**
 * Mask every occurrence of the given secrets, raw or URI-encoded
 */
export function redactSecrets(text: string, secrets: readonly string[] = []): string {
  let result = text;
  for (const secret of secrets) {
    if (!secret) continue;
    result = result.split(secret).join(REDACTED);
    const encoded = encodeURIComponent(secret);
    if (encoded !== secret) {
      result = result.split(encoded).join(REDACTED);
    }
  }
  return result;
}

export interface CommandErrorDetails {
  commandLine: string;
  exitCode: number | null;
  stderr: string;
  reason?: string;
}

/**
 * A sub-command exited non-zero or could not be started
 */
export class CommandError extends Error {
  readonly commandLine: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(details: CommandErrorDetails) {
    const detail = details.stderr.trim();
    const message = details.reason
      ? `${details.commandLine} could not be started: ${details.reason}`
      : `${details.commandLine} failed with exit code ${details.exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`;
    super(message);
    this.name = 'CommandError';
    this.commandLine = details.commandLine;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/**
 * A provisioning step failed; the run stops here
 */
export class ProvisionError extends Error {
  readonly step: ProvisionStep;
  readonly exitCode: number;

  constructor(step: ProvisionStep, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ProvisionError';
    this.step = step;
    this.exitCode = exitCodeOf(options.cause);
  }
}

/**
 * Process exit code to report for an error: the failed sub-command's own code when there is one
 */
export function exitCodeOf(error: unknown): number {
  if (error instanceof ProvisionError) {
    return error.exitCode;
  }
  if (error instanceof CommandError && error.exitCode !== null && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
