import { ulid } from 'ulid';
import {
  ATTEMPT_SCHEMA_VERSION,
  appendJsonlRecord,
  isInterrupt,
  logger as defaultLogger,
  readJsonl,
  validateAttemptRecord,
  type AttemptRecord,
  type FailureReason,
  type Logger,
  type ModelConfig,
  type Stage,
} from '@benchkit/shared';

/** Exit code recorded when no process ever reported one. */
export const NO_EXIT_CODE = -1;

export interface AttemptOptions {
  /** The `attempts.jsonl` file the record is appended to */
  attemptsPath: string;
  taskId: string;
  suite: string;
  timeoutSec: number;
  toolTimeoutSec?: number | null;
  /** Default: "baseline" */
  variant?: string;
  model?: ModelConfig | null;
  logger?: Logger;
}

/**
 * Accumulates the state of one attempt and appends exactly one
 * AttemptRecord when it is closed, whatever happened in between.
 */
export class AttemptLedger {
  readonly runId = ulid();
  readonly startedAt = new Date();

  private stage: Stage | null = null;
  private exitCode: number | null = null;
  private failureReason: FailureReason | null = null;
  private passed = false;
  private baseline: { exitCode: number; failedAsExpected: boolean } | null = null;
  private readonly artifacts: Record<string, string> = {};
  private closed: AttemptRecord | null = null;
  private readonly log: Logger;

  constructor(private readonly options: AttemptOptions) {
    this.log = (options.logger ?? defaultLogger).child({ task: options.taskId });
  }

  get currentStage(): Stage | null {
    return this.stage;
  }

  get reason(): FailureReason | null {
    return this.failureReason;
  }

  get isClosed(): boolean {
    return this.closed !== null;
  }

  /** The record written on close, or null while the attempt is open. */
  get record(): AttemptRecord | null {
    return this.closed;
  }

  get artifactPaths(): Readonly<Record<string, string>> {
    return this.artifacts;
  }

  markStage(stage: Stage): void {
    this.stage = stage;
    this.log.debug(`Stage: ${stage}`);
  }

  setExitCode(code: number): void {
    this.exitCode = code;
  }

  /**
   * Records why the attempt failed. Only the first reason sticks.
   * @returns whether this call set the reason
   */
  setFailureReason(reason: FailureReason): boolean {
    if (this.failureReason !== null) return false;
    this.failureReason = reason;
    return true;
  }

  /**
   * Records the baseline run separately from the final result, for
   * attempts that go on past the baseline.
   */
  recordBaseline(exitCode: number, failedAsExpected: boolean): void {
    this.baseline = { exitCode, failedAsExpected };
  }

  addArtifact(name: string, path: string): void {
    this.artifacts[name] = path;
  }

  setOutcome(passed: boolean): void {
    this.passed = passed;
  }

  /**
   * Finalizes the attempt and appends its record. Later calls return the
   * first record without writing again. Never throws.
   *
   * @param fault - the error that ended the attempt, if any
   */
  async close(fault?: unknown): Promise<AttemptRecord> {
    if (this.closed) return this.closed;

    const endedAt = new Date();
    const abnormal = fault !== undefined && fault !== null;
    if (abnormal && this.failureReason === null) {
      this.failureReason = isInterrupt(fault) ? 'INTERRUPTED' : 'UNKNOWN';
    }
    const passed = abnormal ? false : this.passed;
    const exitCode = this.exitCode ?? NO_EXIT_CODE;

    const record: AttemptRecord = {
      run_id: this.runId,
      task_id: this.options.taskId,
      suite: this.options.suite,
      timestamps: {
        started_at: this.startedAt.toISOString(),
        ended_at: endedAt.toISOString(),
      },
      duration_sec: (endedAt.getTime() - this.startedAt.getTime()) / 1000,
      baseline_validation: {
        attempted: true,
        failed_as_expected: this.baseline?.failedAsExpected ?? passed,
        exit_code: this.baseline?.exitCode ?? exitCode,
      },
      result: {
        passed,
        exit_code: exitCode,
        failure_reason: this.failureReason,
      },
      artifact_paths: { ...this.artifacts },
      variant: this.options.variant ?? 'baseline',
      model: this.options.model ?? null,
      limits: {
        timeout_sec: this.options.timeoutSec,
        tool_timeout_sec: this.options.toolTimeoutSec ?? null,
      },
      schema_version: ATTEMPT_SCHEMA_VERSION,
    };
    this.closed = record;

    const written = await appendJsonlRecord(this.options.attemptsPath, record, { logger: this.log });
    if (written) {
      this.log.debug(
        `Recorded attempt ${this.runId}` +
          (record.result.failure_reason ? ` (${record.result.failure_reason})` : ''),
      );
    }
    return record;
  }
}

/**
 * Runs `body` with a fresh ledger and closes it exactly once, whether the
 * body returns or throws. The body's own error is rethrown as is.
 */
export async function withAttempt<T>(
  options: AttemptOptions,
  body: (ledger: AttemptLedger) => Promise<T>,
): Promise<{ value: T; record: AttemptRecord }> {
  const ledger = new AttemptLedger(options);
  let value: T;
  try {
    value = await body(ledger);
  } catch (err) {
    await ledger.close(err);
    throw err;
  }
  const record = await ledger.close();
  return { value, record };
}

/**
 * Reads the attempt records of a log, skipping lines that do not validate.
 */
export async function readAttempts(path: string, log: Logger = defaultLogger): Promise<AttemptRecord[]> {
  const records: AttemptRecord[] = [];
  let index = 0;
  for await (const value of readJsonl(path, { logger: log })) {
    index++;
    try {
      records.push(validateAttemptRecord(value));
    } catch {
      log.warn(`Skipping record ${index} in ${path}: not a valid attempt record`);
    }
  }
  return records;
}
