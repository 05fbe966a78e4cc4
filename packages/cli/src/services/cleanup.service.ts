/**
 * Bulk deletion of project items (repositories, pipelines, variable groups)
 *
 * Items are listed, filtered by an exclusion list, confirmed, then deleted one
 * at a time with a short pause between them. A failed deletion is reported
 * and the rest continue.
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import type { ProjectItem } from '@reposeed/shared';
import { errorMessage } from '@reposeed/core';
import { logFullError, type CommandLogger } from '../logger';

export const DELETE_DELAY_MS = 500;

export interface DeletionPlan<T extends ProjectItem> {
  toDelete: T[];
  excluded: T[];
}

export function planDeletion<T extends ProjectItem>(items: T[], exclude: string[] = []): DeletionPlan<T> {
  const keep = new Set(exclude.map((name) => name.toLowerCase()));
  return {
    toDelete: items.filter((item) => !keep.has(item.name.toLowerCase())),
    excluded: items.filter((item) => keep.has(item.name.toLowerCase())),
  };
}

export interface DeletionFailure<T extends ProjectItem> {
  item: T;
  error: unknown;
}

export interface DeletionSummary<T extends ProjectItem> {
  deleted: T[];
  failed: DeletionFailure<T>[];
}

export async function deleteSequentially<T extends ProjectItem>(
  items: T[],
  remove: (item: T) => Promise<void>,
  options: {
    delayMs?: number;
    onResult?: (item: T, error: unknown | null) => void;
  } = {}
): Promise<DeletionSummary<T>> {
  const { delayMs = DELETE_DELAY_MS, onResult } = options;
  const summary: DeletionSummary<T> = { deleted: [], failed: [] };

  for (const [index, item] of items.entries()) {
    try {
      await remove(item);
      summary.deleted.push(item);
      onResult?.(item, null);
    } catch (error) {
      summary.failed.push({ item, error });
      onResult?.(item, error);
    }
    if (delayMs > 0 && index < items.length - 1) {
      await sleep(delayMs);
    }
  }
  return summary;
}

export interface CleanupRequest<T extends ProjectItem> {
  /** Plural noun for messages, e.g. "repositories" */
  noun: string;
  items: T[];
  exclude?: string[];
  yes?: boolean;
  /** Past tense for the summary line; "Deleted" unless the items are only processed */
  verb?: string;
  /** What confirmation asks the user to agree to */
  action?: string;
  remove: (item: T) => Promise<void>;
  log: CommandLogger;
}

/**
 * Print the plan, confirm, delete. Returns the process exit code.
 */
export async function runCleanup<T extends ProjectItem>(request: CleanupRequest<T>): Promise<number> {
  const { noun, items, log } = request;
  const verb = request.verb ?? 'Deleted';

  if (items.length === 0) {
    console.log(chalk.gray(`\n  No ${noun} found in the project.\n`));
    return 0;
  }

  const plan = planDeletion(items, request.exclude);
  console.log(`  Found ${items.length} ${noun} in the project.`);
  console.log(`  ${plan.toDelete.length} will be processed.`);

  if (plan.excluded.length > 0) {
    console.log(chalk.cyan(`\n  Excluded ${noun}:`));
    for (const item of plan.excluded) {
      console.log(chalk.gray(`  - ${item.name}`));
    }
  }

  if (plan.toDelete.length === 0) {
    console.log(chalk.gray(`\n  No ${noun} to process after applying exclusions.\n`));
    return 0;
  }

  console.log(chalk.yellow(`\n  ${noun[0].toUpperCase()}${noun.slice(1)} to process:`));
  for (const item of plan.toDelete) {
    console.log(`  - ${item.name} ${chalk.gray(`(ID: ${item.id})`)}`);
  }

  if (!request.yes) {
    console.log(chalk.yellow('\n  This action cannot be undone.\n'));
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: `Are you sure you want to ${request.action ?? `delete these ${noun}`}?`,
        default: false,
      },
    ]);

    if (!confirm) {
      console.log(chalk.gray('\n  Cancelled.\n'));
      return 0;
    }
  }

  console.log(chalk.bold(`\n  Processing ${noun}...\n`));
  const summary = await deleteSequentially(plan.toDelete, request.remove, {
    onResult: (item, error) => {
      if (error === null) {
        log.info(`${verb} ${item.name}`, { id: item.id });
        console.log(`  ${chalk.green('✓')} ${item.name}`);
      } else {
        logFullError(`delete ${noun}`, error, { name: item.name, id: item.id });
        console.log(`  ${chalk.red('✗')} ${item.name}: ${chalk.gray(errorMessage(error))}`);
      }
    },
  });

  console.log(`\n  ${verb} ${summary.deleted.length} out of ${plan.toDelete.length} ${noun}.\n`);
  return summary.failed.length > 0 ? 1 : 0;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
