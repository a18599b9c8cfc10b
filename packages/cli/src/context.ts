import path from 'node:path';
import type { Command } from 'commander';
import { ConfigLoader } from '@benchkit/core';
import { createSandboxFactory, type SandboxFactory } from '@benchkit/exec';
import { GitCli, type GitClient } from '@benchkit/repo';
import { logger, type Config, type ConfigInput } from '@benchkit/shared';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

/**
 * Collaborators the commands run against. Everything is optional; the
 * defaults talk to the real git and container CLIs.
 */
export interface CliDeps {
  git?: GitClient;
  sandboxFactory?: SandboxFactory;
  /** Directory holding `.benchkit.yaml`; relative paths resolve against it */
  cwd?: string;
  homeDir?: string;
  /** Aborted on SIGINT */
  signal?: AbortSignal;
}

/** Exit status a command reports without throwing. */
export interface RunStatus {
  exitCode: number;
}

export interface CommandContext {
  options: GlobalOptions;
  config: Config;
  cwd: string;
  git: GitClient;
  sandboxFactory: SandboxFactory;
  signal?: AbortSignal;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/**
 * Loads configuration for a command and sets the log level from it.
 * JSON output keeps stdout for the result, so only warnings are logged.
 */
export function createContext(program: Command, deps: CliDeps, flags: ConfigInput = {}): CommandContext {
  const options = globalOptions(program);
  const cwd = deps.cwd ?? process.cwd();
  const config = ConfigLoader.load({ configPath: options.config, flags, cwd, homeDir: deps.homeDir });

  logger.setLevel(options.verbose ? 'debug' : options.json ? 'warn' : config.logging.level);

  return {
    options,
    config,
    cwd,
    git: deps.git ?? new GitCli(),
    sandboxFactory: deps.sandboxFactory ?? createSandboxFactory(config.sandbox.binary),
    signal: deps.signal,
  };
}

export function resolveFrom(ctx: Pick<CommandContext, 'cwd'>, target: string): string {
  return path.resolve(ctx.cwd, target);
}
