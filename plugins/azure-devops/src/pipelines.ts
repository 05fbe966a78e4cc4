/**
 * Azure Pipelines client, driving `az pipelines`
 */

import type { PipelineRun, ProjectItem } from '@reposeed/shared';
import type { HostContext, PipelineHostClient } from '@reposeed/core';
import { parseOutput, runAz } from './az';
import { azPipelineRunListSchema, azProjectItemListSchema } from './schema';

export const ACTIVE_RUN_STATUSES = ['inProgress', 'notStarted', 'queued'];

export class AzurePipelinesClient implements PipelineHostClient {
  constructor(private readonly context: HostContext) {}

  async listPipelines(): Promise<ProjectItem[]> {
    const stdout = await runAz(this.context, ['pipelines', 'list']);
    return parseOutput(azProjectItemListSchema, stdout, 'az pipelines list');
  }

  async listActiveRuns(pipeline: ProjectItem): Promise<PipelineRun[]> {
    const stdout = await runAz(this.context, ['pipelines', 'runs', 'list', '--pipeline-ids', pipeline.id]);
    return parseOutput(azPipelineRunListSchema, stdout, 'az pipelines runs list')
      .filter((run) => ACTIVE_RUN_STATUSES.includes(run.status ?? ''))
      .map((run) => ({ id: run.id, status: run.status ?? '' }));
  }

  async cancelRun(run: PipelineRun): Promise<void> {
    await runAz(this.context, ['pipelines', 'build', 'cancel', '--build-id', run.id]);
  }

  async deletePipeline(pipeline: ProjectItem): Promise<void> {
    await runAz(this.context, ['pipelines', 'delete', '--id', pipeline.id, '--yes']);
  }

  async listVariableGroups(): Promise<ProjectItem[]> {
    const stdout = await runAz(this.context, ['pipelines', 'variable-group', 'list']);
    return parseOutput(azProjectItemListSchema, stdout, 'az pipelines variable-group list');
  }

  async deleteVariableGroup(group: ProjectItem): Promise<void> {
    await runAz(this.context, ['pipelines', 'variable-group', 'delete', '--group-id', group.id, '--yes']);
  }
}
