import pc from 'picocolors';
import type { AgentTaskRun, AttemptSummary, SuiteRun, TaskRun } from '@benchkit/eval';
import { AppError, type AttemptRecord, type TaskSpec } from '@benchkit/shared';
import { formatTable } from './table';

export interface ErrorOutput {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown> | string;
  };
}

export function toErrorOutput(err: unknown): ErrorOutput {
  if (err instanceof AppError) {
    return { error: { code: err.code, message: err.message, details: err.details } };
  }
  return { error: { code: 'UnknownError', message: err instanceof Error ? err.message : String(err) } };
}

/**
 * Prints command results either as JSON on stdout or as human-readable text.
 */
export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  private json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  taskRun(run: TaskRun): void {
    const { result } = run;
    if (this.isJson) {
      this.json({
        run_id: run.runDir.runId,
        run_dir: run.runDir.root,
        task_id: result.taskId,
        valid: result.valid,
        exit_code: result.exitCode,
        error_reason: result.errorReason,
        stdout_path: result.stdoutPath,
        stderr_path: result.stderrPath,
        duration_sec: result.durationSec,
      });
      return;
    }

    const status = result.valid ? pc.green('✔ Baseline fails as expected') : pc.red('✖ Baseline is not valid');
    console.log(`\n${status}`);
    console.log(`  Task:      ${pc.bold(result.taskId)}`);
    console.log(`  Exit code: ${result.exitCode}`);
    if (result.errorReason) console.log(`  Reason:    ${pc.yellow(result.errorReason)}`);
    console.log(`  Duration:  ${result.durationSec.toFixed(1)}s`);
    console.log(pc.gray(`\nArtifacts saved to: ${run.runDir.root}`));
  }

  agentRun(run: AgentTaskRun): void {
    const { record, agent } = run;
    if (this.isJson) {
      this.json({
        run_id: run.runDir.runId,
        run_dir: run.runDir.root,
        task_id: record.task_id,
        variant: record.variant,
        passed: record.result.passed,
        exit_code: record.result.exit_code,
        failure_reason: record.result.failure_reason,
        stopped_reason: agent?.stoppedReason ?? null,
        steps_taken: agent?.stepsTaken ?? 0,
        patch_files: agent?.patchFiles ?? [],
        duration_sec: record.duration_sec,
      });
      return;
    }

    const status = record.result.passed ? pc.green('✔ Task fixed') : pc.red('✖ Task not fixed');
    console.log(`\n${status}`);
    console.log(`  Task:      ${pc.bold(record.task_id)}`);
    console.log(`  Variant:   ${record.variant}`);
    if (agent) console.log(`  Agent:     ${agent.stoppedReason} after ${agent.stepsTaken} step(s)`);
    console.log(`  Exit code: ${record.result.exit_code}`);
    if (record.result.failure_reason) console.log(`  Reason:    ${pc.yellow(record.result.failure_reason)}`);
    console.log(`  Duration:  ${record.duration_sec.toFixed(1)}s`);
    console.log(pc.gray(`\nArtifacts saved to: ${run.runDir.root}`));
  }

  /** The human form of a suite run is printed while it runs. */
  suiteRun(run: SuiteRun | null, suite: string): void {
    if (!this.isJson) {
      if (!run) console.log(pc.yellow(`No tasks found in suite '${suite}'`));
      return;
    }
    this.json({
      run_dir: run?.runDir.root ?? null,
      metadata: run?.metadata ?? null,
      results: (run?.results ?? []).map((r) => ({
        task_id: r.taskId,
        valid: r.valid,
        exit_code: r.exitCode,
        error_reason: r.errorReason,
      })),
    });
  }

  taskList(suite: string, tasks: readonly TaskSpec[]): void {
    if (this.isJson) {
      this.json({ suite, tasks: tasks.map((t) => ({ id: t.id, source_path: t.source_path ?? null })) });
      return;
    }
    if (tasks.length === 0) {
      console.log(pc.yellow(`No tasks found in suite '${suite}'`));
      return;
    }
    console.log(`${tasks.length} task(s) in ${pc.bold(suite)}`);
    tasks.forEach((task, i) => console.log(`  ${i + 1}. ${task.id}`));
  }

  attempts(summary: AttemptSummary, records: readonly AttemptRecord[]): void {
    if (this.isJson) {
      this.json({ summary, records });
      return;
    }
    if (records.length > 0) {
      console.log(
        formatTable(
          records.map((record) => ({
            Task: record.task_id,
            Passed: record.result.passed ? '✔' : '✖',
            'Exit code': record.result.exit_code,
            Duration: `${record.duration_sec.toFixed(1)}s`,
            Reason: record.result.failure_reason ?? '',
          })),
        ),
      );
    }
    console.log(pc.bold(`\n${summary.total} attempt(s): ${summary.passed} passed, ${summary.failed} failed`));
    for (const { reason, count } of summary.failures) {
      console.log(`  - ${reason}: ${count}`);
    }
    if (summary.primary) console.log(`  Primary failure: ${pc.yellow(summary.primary)}`);
  }

  error(err: unknown, verbose = false): void {
    if (this.isJson) {
      console.log(JSON.stringify(toErrorOutput(err)));
      return;
    }
    console.error(pc.red(`✖ Error: ${err instanceof Error ? err.message : String(err)}`));
    if (err instanceof AppError && err.details) {
      console.error(
        `  Details: ${typeof err.details === 'string' ? err.details : JSON.stringify(err.details, null, 2)}`,
      );
    }
    if (verbose && err instanceof Error && err.stack) {
      console.error(`\nStack Trace:\n${err.stack}`);
    } else {
      console.error(pc.gray('\nFor more details, run with the --verbose flag.'));
    }
  }
}
