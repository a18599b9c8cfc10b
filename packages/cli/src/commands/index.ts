export { registerAttemptsCommand } from './attempts';
export { registerListTasksCommand } from './list-tasks';
export { registerRunAgentCommand } from './run-agent';
export { registerValidateSuiteCommand } from './validate-suite';
export { registerValidateTaskCommand } from './validate-task';
