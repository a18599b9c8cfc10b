import path from 'node:path';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import type { CommandResult, SandboxFactory, SandboxRunRequest, SandboxRunResult, SandboxRunner } from '@benchkit/exec';
import type { GitClient } from '@benchkit/repo';
import type { Logger, TaskSpec } from '@benchkit/shared';

export const quietLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => quietLogger,
};

export function makeTask(overrides: Partial<TaskSpec> = {}): TaskSpec {
  return {
    id: 'calc-001',
    suite: 'demo',
    repo: { url: 'https://example.com/calc.git', commit: 'abc123' },
    environment: { docker_image: 'python:3.11-slim', workdir: '/workspace', timeout_sec: 300 },
    setup: { commands: [] },
    run: { command: 'pytest -q' },
    ...overrides,
  };
}

/** Writes `<root>/<suite>/<id>/task.yaml` and returns its path. */
export async function writeTaskFile(root: string, task: TaskSpec | Record<string, unknown>, dir?: string): Promise<string> {
  const suite = typeof task.suite === 'string' ? task.suite : 'demo';
  const id = dir ?? (typeof task.id === 'string' ? task.id : 'task');
  const file = path.join(root, suite, id, 'task.yaml');
  await fs.outputFile(file, yaml.dump(task));
  return file;
}

async function writeOutput(logsDir: string, name: string, exitCode: number): Promise<CommandResult> {
  const stdoutPath = path.join(logsDir, `${name}_stdout.txt`);
  const stderrPath = path.join(logsDir, `${name}_stderr.txt`);
  await fs.outputFile(stdoutPath, '');
  await fs.outputFile(stderrPath, exitCode === 0 ? '' : `fatal: ${name} failed\n`);
  return { exitCode, stdoutPath, stderrPath, durationMs: 1, timedOut: false };
}

export class FakeGit implements GitClient {
  readonly calls: string[] = [];

  constructor(private readonly exitCodes: { clone?: number; checkout?: number } = {}) {}

  async cloneRepo(url: string, dest: string, logsDir: string): Promise<CommandResult> {
    this.calls.push(`clone ${url}`);
    await fs.ensureDir(dest);
    return writeOutput(logsDir, 'clone', this.exitCodes.clone ?? 0);
  }

  async checkoutCommit(_repoDir: string, commit: string, logsDir: string): Promise<CommandResult> {
    this.calls.push(`checkout ${commit}`);
    return writeOutput(logsDir, 'checkout', this.exitCodes.checkout ?? 0);
  }
}

export type SandboxStep = { exitCode: number; stdout?: string } | Error | (() => Error);

/**
 * Answers sandbox runs from a queue of outcomes, in call order.
 */
export class ScriptedSandbox implements SandboxRunner {
  readonly requests: SandboxRunRequest[] = [];

  constructor(private readonly steps: SandboxStep[]) {}

  async run(request: SandboxRunRequest): Promise<SandboxRunResult> {
    this.requests.push(request);
    const step = this.steps.shift();
    if (step === undefined) throw new Error(`Unexpected sandbox run: ${request.command}`);
    if (step instanceof Error) throw step;
    if (typeof step === 'function') throw step();

    await fs.outputFile(request.stdoutPath, step.stdout ?? '');
    await fs.outputFile(request.stderrPath, '');
    return {
      exitCode: step.exitCode,
      stdoutPath: request.stdoutPath,
      stderrPath: request.stderrPath,
      durationMs: 5,
      timedOut: step.exitCode === 124,
    };
  }

  factory(): SandboxFactory {
    return () => this;
  }
}
