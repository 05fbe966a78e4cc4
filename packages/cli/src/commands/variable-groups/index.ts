/**
 * Pipeline library cleanup commands
 */

import { Command } from 'commander';
import { deleteVariableGroupsCommand } from './delete';

export const variableGroupsCommand = new Command('variable-groups')
  .description('Clean up library variable groups in the target project')
  .addCommand(deleteVariableGroupsCommand);
