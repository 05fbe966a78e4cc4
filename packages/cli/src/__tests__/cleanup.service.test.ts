import { describe, it, expect } from 'vitest';
import type { ProjectItem } from '@reposeed/shared';
import { CommandError } from '@reposeed/core';
import { deleteSequentially, planDeletion } from '../services/cleanup.service';

const repos: ProjectItem[] = [
  { id: '1', name: 'site' },
  { id: '2', name: 'Docs' },
  { id: '3', name: 'scratch' },
];

describe('planDeletion', () => {
  it('should keep excluded items regardless of case', () => {
    const plan = planDeletion(repos, ['docs', 'missing']);

    expect(plan.toDelete.map((r) => r.name)).toEqual(['site', 'scratch']);
    expect(plan.excluded.map((r) => r.name)).toEqual(['Docs']);
  });

  it('should delete everything without exclusions', () => {
    const plan = planDeletion(repos);

    expect(plan.toDelete).toHaveLength(3);
    expect(plan.excluded).toEqual([]);
  });
});

describe('deleteSequentially', () => {
  it('should delete in order and report each result', async () => {
    const deleted: string[] = [];
    const reported: Array<[string, boolean]> = [];

    const summary = await deleteSequentially(
      repos,
      async (repo) => {
        deleted.push(repo.name);
      },
      {
        delayMs: 0,
        onResult: (repo, error) => reported.push([repo.name, error === null]),
      }
    );

    expect(deleted).toEqual(['site', 'Docs', 'scratch']);
    expect(summary.deleted).toHaveLength(3);
    expect(summary.failed).toEqual([]);
    expect(reported).toEqual([
      ['site', true],
      ['Docs', true],
      ['scratch', true],
    ]);
  });

  it('should continue after a failed deletion', async () => {
    const deleted: string[] = [];

    const summary = await deleteSequentially(
      repos,
      async (repo) => {
        if (repo.name === 'Docs') {
          throw new CommandError({ commandLine: 'az repos delete', exitCode: 1, stderr: 'ERROR: not allowed' });
        }
        deleted.push(repo.name);
      },
      { delayMs: 0 }
    );

    expect(deleted).toEqual(['site', 'scratch']);
    expect(summary.failed.map((f) => f.item.name)).toEqual(['Docs']);
    expect(summary.failed[0].error).toBeInstanceOf(CommandError);
  });

  it('should pause between deletions but not after the last', async () => {
    const started: number[] = [];

    await deleteSequentially(
      repos.slice(0, 2),
      async () => {
        started.push(Date.now());
      },
      { delayMs: 40 }
    );

    expect(started[1] - started[0]).toBeGreaterThanOrEqual(35);
  });
});
