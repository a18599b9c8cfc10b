import path from 'node:path';
import fs from 'fs-extra';
import {
  classifyFailure,
  createSandboxFactory,
  toValidationErrorReason,
  type SandboxFactory,
  type SandboxRunResult,
  type SandboxRunner,
} from '@benchkit/exec';
import { DEFAULT_GIT_TIMEOUT_SEC, GitCli, type GitClient } from '@benchkit/repo';
import type { EventLogger } from '@benchkit/core';
import {
  SandboxError,
  isInterrupt,
  logger as defaultLogger,
  type AttemptRecord,
  type FailureReason,
  type Logger,
  type Stage,
  type TaskSpec,
  type ValidationResult,
} from '@benchkit/shared';
import { NO_EXIT_CODE, withAttempt, type AttemptLedger } from './ledger/attempt';

/** Directory under the workspace the task repository is cloned into. */
export const REPO_DIR = 'repo';

export interface ValidateOptions {
  /** Host directory mounted into the sandbox; the repo is cloned beneath it */
  workspaceDir: string;
  logsDir: string;
  attemptsPath: string;
  git?: GitClient;
  sandboxFactory?: SandboxFactory;
  gitTimeoutSec?: number;
  /** The task file is copied here as the first step of the attempt */
  taskCopyDir?: string;
  events?: EventLogger;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Checks that a task's tests fail on its pinned commit before any fix.
 *
 * Stages run in order (clone, checkout, setup, baseline run) and the first
 * one that fails decides the result. Exactly one attempt record is
 * appended to `attemptsPath`. Faults other than a failing stage are
 * recorded and then rethrown.
 */
export async function validateBaseline(task: TaskSpec, options: ValidateOptions): Promise<ValidationResult> {
  const log = (options.logger ?? defaultLogger).child({ task: task.id });

  const { record } = await withAttempt(
    {
      attemptsPath: options.attemptsPath,
      taskId: task.id,
      suite: task.suite,
      timeoutSec: task.environment.timeout_sec,
      logger: options.logger,
    },
    async (ledger) => {
      try {
        const baseline = await runBaselineStages(task, ledger, options, log);
        if (!baseline) return;
        ledger.setExitCode(baseline.run.exitCode);
        ledger.setOutcome(true);
      } catch (err) {
        if (err instanceof SandboxError) ledger.setFailureReason('SANDBOX_ERROR');
        throw err;
      }
    },
  );

  const result = toValidationResult(record);
  if (result.valid) {
    log.info(`Baseline failed as expected (exit ${result.exitCode})`);
  } else {
    log.warn(`Baseline invalid: ${result.errorReason ?? 'unknown'}`);
  }
  return result;
}

export interface BaselineStages {
  /** Checkout of the task repository, below the workspace */
  repoDir: string;
  sandbox: SandboxRunner;
  /** The failing baseline run */
  run: SandboxRunResult;
}

/**
 * Runs clone, checkout, setup and the baseline test inside an open attempt,
 * attaching each stage's output to the ledger.
 *
 * @returns null once a stage has failed; its reason is on the ledger
 */
export async function runBaselineStages(
  task: TaskSpec,
  ledger: AttemptLedger,
  options: ValidateOptions,
  log: Logger,
): Promise<BaselineStages | null> {
  const git = options.git ?? new GitCli();
  const sandboxFactory = options.sandboxFactory ?? createSandboxFactory();
  const gitTimeoutSec = options.gitTimeoutSec ?? DEFAULT_GIT_TIMEOUT_SEC;
  const { workspaceDir, logsDir, signal } = options;

  if (options.taskCopyDir && task.source_path) {
    await fs.copy(task.source_path, path.join(options.taskCopyDir, path.basename(task.source_path)));
  }
  await fs.ensureDir(workspaceDir);
  await fs.ensureDir(logsDir);
  const repoDir = path.join(workspaceDir, REPO_DIR);

  ledger.markStage('git_clone');
  log.info(`Cloning ${task.repo.url}`);
  const clone = await git.cloneRepo(task.repo.url, repoDir, logsDir, { timeoutSec: gitTimeoutSec, signal });
  attachOutput(ledger, 'clone', clone);
  if (stageFailed(ledger, 'git_clone', clone.exitCode)) return null;

  ledger.markStage('git_checkout');
  log.info(`Checking out ${task.repo.commit}`);
  const checkout = await git.checkoutCommit(repoDir, task.repo.commit, logsDir, {
    timeoutSec: gitTimeoutSec,
    signal,
  });
  attachOutput(ledger, 'checkout', checkout);
  if (stageFailed(ledger, 'git_checkout', checkout.exitCode)) return null;

  const sandbox = sandboxFactory(task.environment.docker_image, task.environment.workdir);

  if (task.setup.commands.length > 0) {
    ledger.markStage('setup');
    log.info(`Running ${task.setup.commands.length} setup command(s)`);
    const setup = await sandbox.run({
      workspaceHostPath: workspaceDir,
      command: inRepo(task.setup.commands.join(' && ')),
      network: 'bridge',
      timeoutSec: task.environment.timeout_sec,
      stdoutPath: path.join(logsDir, 'setup_stdout.txt'),
      stderrPath: path.join(logsDir, 'setup_stderr.txt'),
      signal,
    });
    attachOutput(ledger, 'setup', setup);
    if (stageFailed(ledger, 'setup', setup.exitCode)) return null;
  }

  ledger.markStage('baseline_run');
  log.info(`Running baseline: ${task.run.command}`);
  const run = await runTests(task, sandbox, options, 'run');
  attachOutput(ledger, 'run', run);
  ledger.recordBaseline(run.exitCode, classifyFailure('baseline_run', run.exitCode) === null);
  if (stageFailed(ledger, 'baseline_run', run.exitCode)) return null;

  return { repoDir, sandbox, run };
}

/**
 * Runs the task's test command in the repository with networking off and
 * reports it as a pair of test events. Output goes to `<name>_stdout.txt`.
 */
export async function runTests(
  task: TaskSpec,
  sandbox: SandboxRunner,
  options: Pick<ValidateOptions, 'workspaceDir' | 'logsDir' | 'events' | 'signal'>,
  name: string,
): Promise<SandboxRunResult> {
  await options.events?.testsStarted(task.run.command);
  const run = await sandbox.run({
    workspaceHostPath: options.workspaceDir,
    command: inRepo(task.run.command),
    network: 'none',
    timeoutSec: task.environment.timeout_sec,
    stdoutPath: path.join(options.logsDir, `${name}_stdout.txt`),
    stderrPath: path.join(options.logsDir, `${name}_stderr.txt`),
    signal: options.signal,
  });
  await options.events?.testsFinished({
    exit_code: run.exitCode,
    passed: run.exitCode === 0,
    stdout_path: run.stdoutPath,
    stderr_path: run.stderrPath,
  });
  return run;
}

/**
 * The failure reason a fault escaping validation is recorded with.
 */
export function faultReason(fault: unknown): FailureReason {
  if (isInterrupt(fault)) return 'INTERRUPTED';
  if (fault instanceof SandboxError) return 'SANDBOX_ERROR';
  return 'UNKNOWN';
}

/**
 * The result reported for a task whose validation ended in a fault.
 */
export function faultResult(taskId: string, fault: unknown, durationSec: number): ValidationResult {
  const reason = faultReason(fault);
  return Object.freeze({
    taskId,
    valid: false,
    exitCode: NO_EXIT_CODE,
    stdoutPath: null,
    stderrPath: null,
    errorReason: toValidationErrorReason(reason),
    failureReason: reason,
    durationSec,
  });
}

export function toValidationResult(record: AttemptRecord): ValidationResult {
  const reason = record.result.failure_reason;
  return Object.freeze({
    taskId: record.task_id,
    valid: record.result.passed,
    exitCode: record.result.exit_code,
    stdoutPath: record.artifact_paths['run_stdout'] ?? null,
    stderrPath: record.artifact_paths['run_stderr'] ?? null,
    errorReason: reason ? toValidationErrorReason(reason) : null,
    failureReason: reason,
    durationSec: record.duration_sec,
  });
}

function inRepo(command: string): string {
  return `cd ${REPO_DIR} && ${command}`;
}

export function attachOutput(
  ledger: AttemptLedger,
  prefix: string,
  result: Pick<SandboxRunResult, 'stdoutPath' | 'stderrPath'>,
): void {
  ledger.addArtifact(`${prefix}_stdout`, result.stdoutPath);
  ledger.addArtifact(`${prefix}_stderr`, result.stderrPath);
}

export function stageFailed(ledger: AttemptLedger, stage: Stage, exitCode: number): boolean {
  const reason = classifyFailure(stage, exitCode);
  if (reason === null) return false;
  ledger.setExitCode(exitCode);
  ledger.setFailureReason(reason);
  return true;
}
