/**
 * Process runner used for every vendor CLI call (git, az)
 *
 * Commands are spawned without a shell. Output is buffered and returned once the
 * process exits; a non-zero exit rejects with CommandError.
 */

import { spawn } from 'child_process';
import { CommandError, redactSecrets } from './errors';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Values masked in logs, errors and returned output */
  redact?: string[];
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandOutput>;

export interface CommandHooks {
  onCommand?: (commandLine: string, cwd: string | undefined) => void;
  onOutput?: (stream: 'stdout' | 'stderr', output: string) => void;
}

/**
 * Render a command line for logs and error messages
 */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (part === '' || /[\s"'$`\\]/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

export function createCommandRunner(hooks: CommandHooks = {}): CommandRunner {
  return (command, args, options = {}) =>
    new Promise((resolve, reject) => {
      const redact = options.redact ?? [];
      const commandLine = redactSecrets(formatCommandLine(command, args), redact);
      hooks.onCommand?.(commandLine, options.cwd);

      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      // 'close' can follow 'error' when the binary never started
      let settled = false;
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (error) => {
        if (settled) return;
        settled = true;
        reject(
          new CommandError({
            commandLine,
            exitCode: null,
            stderr: '',
            reason: redactSecrets(error.message, redact),
          })
        );
      });

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        const output = {
          stdout: redactSecrets(stdout, redact),
          stderr: redactSecrets(stderr, redact),
        };
        hooks.onOutput?.('stdout', output.stdout);
        hooks.onOutput?.('stderr', output.stderr);

        if (code === 0) {
          resolve(output);
        } else {
          reject(new CommandError({ commandLine, exitCode: code, stderr: output.stderr }));
        }
      });
    });
}

export const runCommand: CommandRunner = createCommandRunner();
