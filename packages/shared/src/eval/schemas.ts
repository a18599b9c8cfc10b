// packages/shared/src/eval/schemas.ts

import { z } from 'zod';
import { FAILURE_REASONS } from '../types/failure';
import type { AttemptRecord, RunMetadata, TaskSpec } from './types';

export const TaskSpecSchema = z.object({
  id: z.string().min(1),
  suite: z.string().min(1),
  repo: z.object({
    url: z.string().min(1),
    commit: z.string().min(1),
  }),
  environment: z.object({
    docker_image: z.string().min(1),
    workdir: z.string().default('/workspace'),
    timeout_sec: z.number().int().positive().default(600),
  }),
  setup: z
    .object({
      commands: z.array(z.string()).default([]),
    })
    .default({ commands: [] }),
  run: z.object({
    command: z.string().min(1),
  }),
});

const FailureReasonSchema = z.enum(FAILURE_REASONS);

// Unknown keys are stripped, so records written by newer versions still parse.
export const AttemptRecordSchema = z.object({
  run_id: z.string(),
  task_id: z.string(),
  suite: z.string(),
  timestamps: z.object({
    started_at: z.string(),
    ended_at: z.string(),
  }),
  duration_sec: z.number(),
  baseline_validation: z.object({
    attempted: z.boolean(),
    failed_as_expected: z.boolean(),
    exit_code: z.number().int(),
  }),
  result: z.object({
    passed: z.boolean(),
    exit_code: z.number().int(),
    failure_reason: FailureReasonSchema.nullable(),
  }),
  artifact_paths: z.record(z.string()),
  variant: z.string(),
  model: z
    .object({
      provider: z.string(),
      name: z.string(),
      temperature: z.number().optional(),
      max_tokens: z.number().int().optional(),
    })
    .nullable(),
  limits: z.object({
    timeout_sec: z.number(),
    tool_timeout_sec: z.number().nullable(),
  }),
  schema_version: z.string(),
});

export const RunMetadataSchema = z.object({
  run_id: z.string(),
  suite: z.string(),
  started_at: z.string(),
  ended_at: z.string(),
  task_count: z.number().int(),
  valid_count: z.number().int(),
  invalid_count: z.number().int(),
  interrupted: z.boolean(),
  not_attempted: z.number().int().default(0),
  failure_counts: z.record(FailureReasonSchema, z.number().int()).default({}),
  harness_version: z.string().default('unknown'),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}

export function validateTaskSpec(value: unknown): TaskSpec {
  return TaskSpecSchema.parse(value);
}

export function validateAttemptRecord(value: unknown): AttemptRecord {
  return AttemptRecordSchema.parse(value);
}

export function validateRunMetadata(value: unknown): RunMetadata {
  return RunMetadataSchema.parse(value);
}
