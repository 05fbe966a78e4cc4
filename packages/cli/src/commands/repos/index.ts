/**
 * Repository management commands
 */

import { Command } from 'commander';
import { listReposCommand } from './list';
import { deleteReposCommand } from './delete';

export const reposCommand = new Command('repos')
  .description('List or delete repositories in the target project')
  .addCommand(listReposCommand)
  .addCommand(deleteReposCommand);
