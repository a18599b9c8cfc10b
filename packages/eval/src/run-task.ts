import path from 'node:path';
import { EventLogger } from '@benchkit/core';
import type { SandboxFactory } from '@benchkit/exec';
import type { GitClient } from '@benchkit/repo';
import {
  SandboxError,
  StageFailedError,
  isInterrupt,
  logger as defaultLogger,
  type FailureReason,
  type Logger,
  type RunMetadata,
  type ValidationResult,
} from '@benchkit/shared';
import { loadTask } from './loader';
import { EVENTS_FILE, buildRunMetadata, createRunDir, writeRunMetadata, type RunDir } from './runs';
import { faultResult, validateBaseline } from './validator';

/** Reasons that abort a single-task run instead of being reported as a result. */
const STAGE_FAILURES: readonly FailureReason[] = [
  'GIT_CLONE_FAILED',
  'GIT_CHECKOUT_FAILED',
  'SETUP_TIMEOUT',
  'SETUP_FAILED',
];

export interface RunTaskOptions {
  outDir: string;
  git?: GitClient;
  sandboxFactory?: SandboxFactory;
  gitTimeoutSec?: number;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface TaskRun {
  runDir: RunDir;
  result: ValidationResult;
  metadata: RunMetadata;
}

/**
 * Validates one task in a run directory of its own.
 *
 * A baseline that passes or times out is a result. A task whose repository,
 * checkout or setup fails, or whose sandbox breaks, throws StageFailedError
 * after `run.json` has been written. An interrupt is rethrown once `run.json`
 * records it.
 */
export async function runTask(taskPath: string, options: RunTaskOptions): Promise<TaskRun> {
  const log = options.logger ?? defaultLogger;
  const task = await loadTask(taskPath);
  const startedAt = new Date();
  const runDir = await createRunDir(options.outDir, task.id, startedAt);
  log.info(`Starting run ${runDir.runId} for task ${task.id}`);

  let result: ValidationResult;
  try {
    result = await validateBaseline(task, {
      workspaceDir: runDir.workspaceDir,
      logsDir: runDir.logsDir,
      attemptsPath: runDir.attemptsPath,
      taskCopyDir: runDir.taskDir,
      git: options.git,
      sandboxFactory: options.sandboxFactory,
      gitTimeoutSec: options.gitTimeoutSec,
      events: new EventLogger(path.join(runDir.root, EVENTS_FILE), runDir.runId, { logger: log }),
      logger: log,
      signal: options.signal,
    });
  } catch (err) {
    const interrupted = isInterrupt(err);
    if (interrupted || err instanceof SandboxError) {
      await writeRunMetadata(
        runDir,
        buildRunMetadata({
          runId: runDir.runId,
          suite: task.suite,
          startedAt,
          endedAt: new Date(),
          results: [faultResult(task.id, err, secondsSince(startedAt))],
          interrupted,
        }),
      );
    }
    if (err instanceof SandboxError) {
      throw new StageFailedError('SANDBOX_ERROR', `Sandbox failed for task ${task.id}: ${err.message}`, {
        cause: err,
        details: { runDir: runDir.root },
      });
    }
    throw err;
  }

  const metadata = buildRunMetadata({
    runId: runDir.runId,
    suite: task.suite,
    startedAt,
    endedAt: new Date(),
    results: [result],
  });
  await writeRunMetadata(runDir, metadata);

  const reason = result.failureReason;
  if (reason !== null && STAGE_FAILURES.includes(reason)) {
    throw new StageFailedError(reason, `Task ${task.id} failed: ${reason}`, {
      details: { runDir: runDir.root, logsDir: runDir.logsDir },
    });
  }

  log.info(`Run ${runDir.runId} finished: ${result.valid ? 'valid' : `invalid (${result.errorReason})`}`);
  return { runDir, result, metadata };
}

export function secondsSince(start: Date): number {
  return (Date.now() - start.getTime()) / 1000;
}
