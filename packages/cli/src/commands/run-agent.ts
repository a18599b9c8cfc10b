import type { Command } from 'commander';
import { ScriptedAgent, loadAgentScript } from '@benchkit/core';
import { runAgentTask } from '@benchkit/eval';
import { UsageError, logger } from '@benchkit/shared';
import { createContext, resolveFrom, type CliDeps, type RunStatus } from '../context';
import { OutputRenderer } from '../output/renderer';

interface RunAgentOptions {
  script: string;
  variant: string;
  out?: string;
}

const AGENTS = ['scripted'];

export function registerRunAgentCommand(program: Command, deps: CliDeps, status: RunStatus) {
  program
    .command('run-agent')
    .argument('<task>', 'Path to the task YAML file')
    .requiredOption('--script <file>', 'YAML file listing the tool calls the agent makes')
    .option('--variant <name>', 'Agent variant to run', 'scripted')
    .option('-o, --out <dir>', 'Output directory for run artifacts')
    .description('Run an agent on one task and record the attempt')
    .action(async (taskPath: string, options: RunAgentOptions) => {
      if (!AGENTS.includes(options.variant)) {
        throw new UsageError(`Unknown agent variant '${options.variant}'`, { details: { available: AGENTS } });
      }
      const ctx = createContext(program, deps, { outDir: options.out });
      const renderer = new OutputRenderer(!!ctx.options.json);

      const steps = await loadAgentScript(resolveFrom(ctx, options.script));
      const run = await runAgentTask(resolveFrom(ctx, taskPath), {
        outDir: resolveFrom(ctx, ctx.config.outDir),
        agent: new ScriptedAgent(steps, { logger }),
        variant: options.variant,
        tools: ctx.config.tools,
        git: ctx.git,
        sandboxFactory: ctx.sandboxFactory,
        gitTimeoutSec: ctx.config.git.timeoutSec,
        logger,
        signal: ctx.signal,
      });

      renderer.agentRun(run);
      if (!run.record.result.passed) status.exitCode = 1;
    });
}
