/**
 * reposeed pipelines delete
 *
 * Cancel the queued and running runs of every pipeline in the target project,
 * then delete the pipelines (unless --runs-only).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ProjectItem } from '@reposeed/shared';
import { errorMessage, exitCodeOf, type PipelineHostClient } from '@reposeed/core';
import { createCommandLogger, logFullError, type CommandLogger } from '../../logger';
import { openPipelineClient } from '../../services/host.service';
import { DELETE_DELAY_MS, deleteSequentially, runCleanup } from '../../services/cleanup.service';
import { openTargetSession, type TargetOptions } from '../../services/target.service';

interface DeleteOptions extends TargetOptions {
  exclude?: string[];
  yes?: boolean;
  runsOnly?: boolean;
}

export interface PipelineCleanupCounts {
  runsCancelled: number;
  runsFailed: number;
}

/**
 * Cancel a pipeline's active runs, then delete it unless `runsOnly`.
 * A run that cannot be cancelled is counted; it does not stop the pipeline's deletion.
 */
export async function cleanUpPipeline(
  client: PipelineHostClient,
  pipeline: ProjectItem,
  options: { runsOnly?: boolean; delayMs?: number; log?: CommandLogger } = {}
): Promise<PipelineCleanupCounts> {
  const runs = await client.listActiveRuns(pipeline);
  const summary = await deleteSequentially(
    runs.map((run) => ({ ...run, name: `${pipeline.name} run ${run.id}` })),
    (run) => client.cancelRun(run),
    {
      delayMs: options.delayMs ?? DELETE_DELAY_MS,
      onResult: (run, error) => {
        if (error !== null) {
          logFullError('pipeline-run-cancel', error, { pipeline: pipeline.name, run: run.id });
        } else {
          options.log?.info(`Cancelled ${run.name}`);
        }
      },
    }
  );

  if (!options.runsOnly) {
    await client.deletePipeline(pipeline);
  }
  return { runsCancelled: summary.deleted.length, runsFailed: summary.failed.length };
}

export const deletePipelinesCommand = new Command('delete')
  .description('Cancel active runs and delete all pipelines in the target project (except excluded ones)')
  .option('--org <organization>', 'Hosting organization')
  .option('--project <project>', 'Hosting project')
  .option('--token-file <path>', 'File holding the access token (default ~/.token)')
  .option('--host <id>', 'Hosting provider (default azure-devops)')
  .option('-e, --exclude <names...>', 'Pipeline names to keep')
  .option('--runs-only', 'Only cancel active runs; keep the pipelines')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: DeleteOptions) => {
    process.exitCode = await runDelete(options);
  });

async function runDelete(options: DeleteOptions): Promise<number> {
  const log = createCommandLogger('pipelines-delete');
  console.log(chalk.bold('\n  reposeed pipelines delete\n'));

  try {
    const session = await openTargetSession(options);
    if (!session) {
      return 1;
    }
    const pipelines = openPipelineClient(session);

    console.log(chalk.gray(`  Fetching pipelines from project '${session.settings.target.project}'...`));
    const items = await pipelines.listPipelines();

    const totals: PipelineCleanupCounts = { runsCancelled: 0, runsFailed: 0 };
    const code = await runCleanup({
      noun: 'pipelines',
      items,
      exclude: options.exclude,
      yes: options.yes,
      verb: options.runsOnly ? 'Processed' : 'Deleted',
      action: options.runsOnly
        ? 'cancel the active runs of these pipelines'
        : 'cancel any active runs and delete these pipelines',
      remove: async (pipeline) => {
        const counts = await cleanUpPipeline(pipelines, pipeline, { runsOnly: options.runsOnly, log });
        totals.runsCancelled += counts.runsCancelled;
        totals.runsFailed += counts.runsFailed;
      },
      log,
    });

    const attempted = totals.runsCancelled + totals.runsFailed;
    if (attempted > 0) {
      console.log(`  Cancelled ${totals.runsCancelled} out of ${attempted} active runs.\n`);
    }
    return totals.runsFailed > 0 ? 1 : code;
  } catch (error) {
    logFullError('pipelines-delete', error, { options });
    console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
    return exitCodeOf(error);
  }
}
