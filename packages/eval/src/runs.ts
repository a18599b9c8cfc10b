import path from 'node:path';
import fs from 'fs-extra';
import { ulid } from 'ulid';
import { writeJsonAtomic, type RunMetadata, type ValidationResult } from '@benchkit/shared';
import { version } from '../package.json';
import { countFailures } from './summary';

export const HARNESS_VERSION: string = version;

export const RUN_METADATA_FILE = 'run.json';
export const ATTEMPTS_FILE = 'attempts.jsonl';
export const EVENTS_FILE = 'events.jsonl';

/**
 * Layout of one run directory under `<out>/runs/`.
 */
export interface RunDir {
  runId: string;
  root: string;
  taskDir: string;
  logsDir: string;
  workspaceDir: string;
  diffsDir: string;
  attemptsPath: string;
  metadataPath: string;
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatRunTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Creates `<outDir>/runs/<timestamp>__<label>__<run id>` and its
 * `task/`, `logs/`, `workspace/` and `diffs/` subdirectories.
 */
export async function createRunDir(outDir: string, label: string, now: Date = new Date()): Promise<RunDir> {
  const runId = ulid();
  const root = path.resolve(outDir, 'runs', `${formatRunTimestamp(now)}__${label}__${runId}`);
  const dir: RunDir = {
    runId,
    root,
    taskDir: path.join(root, 'task'),
    logsDir: path.join(root, 'logs'),
    workspaceDir: path.join(root, 'workspace'),
    diffsDir: path.join(root, 'diffs'),
    attemptsPath: path.join(root, ATTEMPTS_FILE),
    metadataPath: path.join(root, RUN_METADATA_FILE),
  };
  for (const sub of [dir.taskDir, dir.logsDir, dir.workspaceDir, dir.diffsDir]) {
    await fs.ensureDir(sub);
  }
  return dir;
}

export async function writeRunMetadata(dir: RunDir, metadata: RunMetadata): Promise<void> {
  await writeJsonAtomic(dir.metadataPath, metadata);
}

export interface RunTally {
  runId: string;
  suite: string;
  startedAt: Date;
  endedAt: Date;
  results: readonly ValidationResult[];
  interrupted?: boolean;
  notAttempted?: number;
}

export function buildRunMetadata(tally: RunTally): RunMetadata {
  const valid = tally.results.filter((r) => r.valid).length;
  return {
    run_id: tally.runId,
    suite: tally.suite,
    started_at: tally.startedAt.toISOString(),
    ended_at: tally.endedAt.toISOString(),
    task_count: tally.results.length + (tally.notAttempted ?? 0),
    valid_count: valid,
    invalid_count: tally.results.length - valid,
    interrupted: tally.interrupted ?? false,
    not_attempted: tally.notAttempted ?? 0,
    failure_counts: countFailures(tally.results.map((r) => r.failureReason)),
    harness_version: HARNESS_VERSION,
  };
}
