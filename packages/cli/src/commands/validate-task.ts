import type { Command } from 'commander';
import { runTask } from '@benchkit/eval';
import { logger } from '@benchkit/shared';
import { createContext, resolveFrom, type CliDeps, type RunStatus } from '../context';
import { OutputRenderer } from '../output/renderer';

interface ValidateTaskOptions {
  out?: string;
}

export function registerValidateTaskCommand(program: Command, deps: CliDeps, status: RunStatus) {
  program
    .command('validate-task')
    .argument('<task>', 'Path to the task YAML file')
    .option('-o, --out <dir>', 'Output directory for run artifacts')
    .description('Check that a task fails on its pinned commit before any fix')
    .action(async (taskPath: string, options: ValidateTaskOptions) => {
      const ctx = createContext(program, deps, { outDir: options.out });
      const renderer = new OutputRenderer(!!ctx.options.json);

      const run = await runTask(resolveFrom(ctx, taskPath), {
        outDir: resolveFrom(ctx, ctx.config.outDir),
        git: ctx.git,
        sandboxFactory: ctx.sandboxFactory,
        gitTimeoutSec: ctx.config.git.timeoutSec,
        logger,
        signal: ctx.signal,
      });

      renderer.taskRun(run);
      if (!run.result.valid) status.exitCode = 1;
    });
}
