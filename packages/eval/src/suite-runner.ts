import path from 'node:path';
import { EventLogger } from '@benchkit/core';
import type { SandboxFactory } from '@benchkit/exec';
import type { GitClient } from '@benchkit/repo';
import {
  SuiteInterruptedError,
  isInterrupt,
  logger as defaultLogger,
  toError,
  type Logger,
  type RunMetadata,
  type ValidationResult,
} from '@benchkit/shared';
import { loadSuite } from './loader';
import type { SuiteRenderer } from './renderer';
import { secondsSince } from './run-task';
import { EVENTS_FILE, buildRunMetadata, createRunDir, writeRunMetadata, type RunDir } from './runs';
import { faultResult, validateBaseline } from './validator';

export interface SuiteRunOptions {
  tasksRoot: string;
  outDir: string;
  git?: GitClient;
  sandboxFactory?: SandboxFactory;
  gitTimeoutSec?: number;
  renderer?: SuiteRenderer;
  logger?: Logger;
  /** Aborting stops the suite once the in-flight attempt is recorded */
  signal?: AbortSignal;
}

export interface SuiteRun {
  runDir: RunDir;
  results: ValidationResult[];
  metadata: RunMetadata;
}

/**
 * Validates the baseline of every task in a suite, one after another, in a
 * single run directory. A task that faults is reported as invalid and the
 * suite moves on; an interrupt ends the loop, writes `run.json` and throws
 * SuiteInterruptedError.
 *
 * @returns null when the suite has no loadable tasks
 */
export async function runSuite(suite: string, options: SuiteRunOptions): Promise<SuiteRun | null> {
  const log = (options.logger ?? defaultLogger).child({ suite });
  const tasks = await loadSuite(options.tasksRoot, suite, log);
  if (tasks.length === 0) {
    log.warn(`No valid tasks found in suite ${suite}`);
    return null;
  }

  const startedAt = new Date();
  const runDir = await createRunDir(options.outDir, `${suite}__baseline`, startedAt);
  const events = new EventLogger(path.join(runDir.root, EVENTS_FILE), runDir.runId, { logger: log });
  const { renderer, signal } = options;
  renderer?.suiteStarted(suite, tasks.length, runDir.root);
  log.info(`Run ${runDir.runId}: ${tasks.length} task(s)`);

  const results: ValidationResult[] = [];
  let interrupted = false;

  for (const [index, task] of tasks.entries()) {
    if (signal?.aborted) {
      interrupted = true;
      break;
    }
    renderer?.taskStarted(task, index, tasks.length);

    const taskStartedAt = new Date();
    let result: ValidationResult;
    try {
      result = await validateBaseline(task, {
        workspaceDir: path.join(runDir.workspaceDir, task.id),
        logsDir: path.join(runDir.logsDir, task.id),
        attemptsPath: runDir.attemptsPath,
        taskCopyDir: path.join(runDir.taskDir, task.id),
        git: options.git,
        sandboxFactory: options.sandboxFactory,
        gitTimeoutSec: options.gitTimeoutSec,
        events,
        logger: log,
        signal,
      });
    } catch (err) {
      result = faultResult(task.id, err, secondsSince(taskStartedAt));
      if (isInterrupt(err)) {
        interrupted = true;
      } else {
        log.error(toError(err), `Task ${task.id} faulted; continuing with the next task`);
      }
    }

    results.push(result);
    renderer?.taskFinished(result);
    if (interrupted) break;
  }

  const notAttempted = tasks.length - results.length;
  const metadata = buildRunMetadata({
    runId: runDir.runId,
    suite,
    startedAt,
    endedAt: new Date(),
    results,
    interrupted,
    notAttempted,
  });
  await writeRunMetadata(runDir, metadata);
  renderer?.suiteFinished(metadata, runDir.root);

  if (interrupted) {
    throw new SuiteInterruptedError(runDir.root, notAttempted);
  }
  return { runDir, results, metadata };
}
