import { describe, it, expect } from 'vitest';
import { CommandError, ProvisionError } from '@reposeed/core';
import { describeError, formatEntry, registerSecret } from '../logger';

const timestamp = new Date('2026-01-02T03:04:05.000Z');

describe('logger', () => {
  it('should format a plain entry', () => {
    expect(formatEntry('INFO', 'Provision complete', undefined, timestamp)).toBe(
      '[2026-01-02T03:04:05.000Z] [INFO] Provision complete\n'
    );
  });

  it('should indent structured data', () => {
    expect(formatEntry('DEBUG', 'Settings', { branch: 'master' }, timestamp)).toBe(
      '[2026-01-02T03:04:05.000Z] [DEBUG] Settings\n  Data: {\n    "branch": "master"\n  }\n'
    );
  });

  it('should mask registered secrets', () => {
    registerSecret('test-secret');

    expect(
      formatEntry('CMD', 'Executing: git remote add origin https://test-secret@git.example.test/site', undefined, timestamp)
    ).toBe('[2026-01-02T03:04:05.000Z] [CMD] Executing: git remote add origin https://***@git.example.test/site\n');
  });

  it('should describe a failed step with its sub-command', () => {
    const cause = new CommandError({ commandLine: 'git push', exitCode: 128, stderr: 'fatal: denied' });
    const error = new ProvisionError('push', 'git push failed: denied', { cause });

    const fields = describeError(error);

    expect(fields).toMatchObject({
      errorName: 'ProvisionError',
      errorMessage: 'git push failed: denied',
      step: 'push',
      exitCode: 128,
      commandLine: 'git push',
      commandExitCode: 128,
      stderr: 'fatal: denied',
    });
  });

  it('should describe a non-error value', () => {
    expect(describeError('boom')).toEqual({ rawError: 'boom' });
  });
});
