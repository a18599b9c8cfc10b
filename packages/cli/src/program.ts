import { Command, CommanderError } from 'commander';
import { AppError, ConfigError, UsageError } from '@benchkit/shared';
import { version } from '../package.json';
import {
  registerAttemptsCommand,
  registerListTasksCommand,
  registerRunAgentCommand,
  registerValidateSuiteCommand,
  registerValidateTaskCommand,
} from './commands';
import { globalOptions, type CliDeps, type RunStatus } from './context';
import { OutputRenderer } from './output/renderer';

export function createProgram(deps: CliDeps = {}, status: RunStatus = { exitCode: 0 }): Command {
  const program = new Command();

  program
    .name('benchkit')
    .description('Run coding-agent benchmark tasks in isolated sandboxes')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerValidateTaskCommand(program, deps, status);
  registerValidateSuiteCommand(program, deps);
  registerListTasksCommand(program, deps);
  registerAttemptsCommand(program, deps);
  registerRunAgentCommand(program, deps, status);

  return program;
}

/** User-correctable errors exit with 2, everything else with 1. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError || err instanceof UsageError) return 2;
  if (err instanceof AppError && err.code === 'TaskError') return 2;
  return 1;
}

/**
 * Parses `argv` and runs the selected command.
 * @returns the process exit code
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const status: RunStatus = { exitCode: 0 };
  const program = createProgram(deps, status);
  try {
    await program.parseAsync(argv);
    return status.exitCode;
  } catch (err) {
    // Commander has already printed its own message (or the help text).
    if (err instanceof CommanderError) return err.exitCode;
    const opts = globalOptions(program);
    new OutputRenderer(!!opts.json).error(err, !!opts.verbose);
    return exitCodeFor(err);
  }
}
