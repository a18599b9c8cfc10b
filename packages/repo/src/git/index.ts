import { runCommand, type CommandResult } from '@benchkit/exec';

export const DEFAULT_GIT_TIMEOUT_SEC = 120;

export interface GitStepOptions {
  timeoutSec?: number;
  signal?: AbortSignal;
}

/**
 * The two git stages a task goes through before setup.
 * Results carry exit codes; only a failure to start git throws.
 */
export interface GitClient {
  cloneRepo(url: string, dest: string, logsDir: string, options?: GitStepOptions): Promise<CommandResult>;
  checkoutCommit(repoDir: string, commit: string, logsDir: string, options?: GitStepOptions): Promise<CommandResult>;
}

export interface GitCliOptions {
  /** Path to the git binary. Default: "git" */
  binary?: string;
}

export class GitCli implements GitClient {
  private readonly binary: string;

  constructor(options: GitCliOptions = {}) {
    this.binary = options.binary ?? 'git';
  }

  private env(): NodeJS.ProcessEnv {
    // Never block on a credential prompt.
    return { ...process.env, GIT_TERMINAL_PROMPT: '0' };
  }

  async cloneRepo(url: string, dest: string, logsDir: string, options: GitStepOptions = {}): Promise<CommandResult> {
    return runCommand('clone', this.binary, ['clone', url, dest], {
      logsDir,
      timeoutSec: options.timeoutSec ?? DEFAULT_GIT_TIMEOUT_SEC,
      env: this.env(),
      signal: options.signal,
    });
  }

  async checkoutCommit(
    repoDir: string,
    commit: string,
    logsDir: string,
    options: GitStepOptions = {},
  ): Promise<CommandResult> {
    return runCommand('checkout', this.binary, ['checkout', commit], {
      cwd: repoDir,
      logsDir,
      timeoutSec: options.timeoutSec ?? DEFAULT_GIT_TIMEOUT_SEC,
      env: this.env(),
      signal: options.signal,
    });
  }
}

const defaultClient = new GitCli();

export function cloneRepo(url: string, dest: string, logsDir: string, timeoutSec = DEFAULT_GIT_TIMEOUT_SEC) {
  return defaultClient.cloneRepo(url, dest, logsDir, { timeoutSec });
}

export function checkoutCommit(repoDir: string, commit: string, logsDir: string, timeoutSec = DEFAULT_GIT_TIMEOUT_SEC) {
  return defaultClient.checkoutCommit(repoDir, commit, logsDir, { timeoutSec });
}
