// packages/shared/src/eval/types.ts

import type { FailureReason } from '../types/failure';

export const ATTEMPT_SCHEMA_VERSION = '0.1.0';

/**
 * One benchmark task, as declared in `<tasks>/<suite>/<id>/task.yaml`.
 */
export interface TaskSpec {
  id: string;
  suite: string;
  repo: {
    url: string;
    /** Pinned commit the baseline is checked out at */
    commit: string;
  };
  environment: {
    docker_image: string;
    /** Mount point of the workspace inside the container */
    workdir: string;
    timeout_sec: number;
  };
  setup: {
    commands: string[];
  };
  run: {
    command: string;
  };
  /** File the task was loaded from */
  source_path?: string;
}

/**
 * Model settings captured with an attempt, if an agent ran.
 */
export interface ModelConfig {
  provider: string;
  name: string;
  temperature?: number;
  max_tokens?: number;
}

/**
 * A persisted line of `attempts.jsonl`.
 * Field names are the on-disk format.
 */
export interface AttemptRecord {
  run_id: string;
  task_id: string;
  suite: string;
  timestamps: {
    started_at: string;
    ended_at: string;
  };
  duration_sec: number;
  baseline_validation: {
    attempted: boolean;
    failed_as_expected: boolean;
    /** -1 when no exit code was observed */
    exit_code: number;
  };
  result: {
    passed: boolean;
    exit_code: number;
    failure_reason: FailureReason | null;
  };
  artifact_paths: Record<string, string>;
  variant: string;
  model: ModelConfig | null;
  limits: {
    timeout_sec: number;
    tool_timeout_sec: number | null;
  };
  schema_version: string;
}

/**
 * The `error_reason` vocabulary of validation results.
 * Mirrors FailureReason in lower case, except that a baseline which
 * passes is reported as `baseline_passed`.
 */
export type ValidationErrorReason =
  | Lowercase<Exclude<FailureReason, 'BASELINE_NOT_FAILING'>>
  | 'baseline_passed';

export interface ValidationResult {
  taskId: string;
  /** True iff the baseline run failed as expected */
  valid: boolean;
  exitCode: number;
  stdoutPath: string | null;
  stderrPath: string | null;
  errorReason: ValidationErrorReason | null;
  failureReason: FailureReason | null;
  durationSec: number;
}

/**
 * Contents of `run.json` for a suite or single-task run.
 */
export interface RunMetadata {
  run_id: string;
  suite: string;
  started_at: string;
  ended_at: string;
  task_count: number;
  valid_count: number;
  invalid_count: number;
  interrupted: boolean;
  /** Tasks never started because the run was interrupted */
  not_attempted: number;
  failure_counts: Partial<Record<FailureReason, number>>;
  harness_version: string;
}
