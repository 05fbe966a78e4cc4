/**
 * Pipeline cleanup commands
 */

import { Command } from 'commander';
import { deletePipelinesCommand } from './delete';

export const pipelinesCommand = new Command('pipelines')
  .description('Clean up build pipelines in the target project')
  .addCommand(deletePipelinesCommand);
