import type { Command } from 'commander';
import { SuiteRenderer, runSuite } from '@benchkit/eval';
import { logger } from '@benchkit/shared';
import { createContext, resolveFrom, type CliDeps } from '../context';
import { OutputRenderer } from '../output/renderer';

interface ValidateSuiteOptions {
  tasks?: string;
  out?: string;
}

export function registerValidateSuiteCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('validate-suite')
    .argument('<suite>', 'Suite name (a directory under the tasks root)')
    .option('-t, --tasks <dir>', 'Root directory containing task suites')
    .option('-o, --out <dir>', 'Output directory for run artifacts')
    .description('Validate the baseline of every task in a suite')
    .action(async (suite: string, options: ValidateSuiteOptions) => {
      const ctx = createContext(program, deps, { tasksRoot: options.tasks, outDir: options.out });
      const json = !!ctx.options.json;

      const run = await runSuite(suite, {
        tasksRoot: resolveFrom(ctx, ctx.config.tasksRoot),
        outDir: resolveFrom(ctx, ctx.config.outDir),
        git: ctx.git,
        sandboxFactory: ctx.sandboxFactory,
        gitTimeoutSec: ctx.config.git.timeoutSec,
        renderer: json ? undefined : new SuiteRenderer(),
        logger,
        signal: ctx.signal,
      });

      new OutputRenderer(json).suiteRun(run, suite);
    });
}
