import type { Command } from 'commander';
import { loadSuite } from '@benchkit/eval';
import { logger } from '@benchkit/shared';
import { createContext, resolveFrom, type CliDeps } from '../context';
import { OutputRenderer } from '../output/renderer';

export function registerListTasksCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('list-tasks')
    .argument('<suite>', 'Suite name')
    .option('-t, --tasks <dir>', 'Root directory containing task suites')
    .description('List the valid tasks of a suite')
    .action(async (suite: string, options: { tasks?: string }) => {
      const ctx = createContext(program, deps, { tasksRoot: options.tasks });
      const tasks = await loadSuite(resolveFrom(ctx, ctx.config.tasksRoot), suite, logger);
      new OutputRenderer(!!ctx.options.json).taskList(suite, tasks);
    });
}
