/**
 * reposeed CLI entry point
 */

import { Command } from 'commander';
import {
  doctorCommand,
  initCommand,
  pipelinesCommand,
  provisionCommand,
  reposCommand,
  variableGroupsCommand,
} from './commands';

const program = new Command();

program
  .name('reposeed')
  .description('Create a hosted git repository and seed it with a local directory')
  .version('0.1.0');

program.addCommand(provisionCommand, { isDefault: true });
program.addCommand(reposCommand);
program.addCommand(pipelinesCommand);
program.addCommand(variableGroupsCommand);
program.addCommand(initCommand);
program.addCommand(doctorCommand);

await program.parseAsync();
