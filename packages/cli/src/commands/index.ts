/**
 * reposeed CLI commands
 */

export { provisionCommand } from './provision';
export { reposCommand } from './repos';
export { doctorCommand } from './doctor';
export { initCommand } from './init';
export { pipelinesCommand } from './pipelines';
export { variableGroupsCommand } from './variable-groups';
