import { spawn, spawnSync, type ChildProcess, type SpawnOptions } from 'child_process';
import fs from 'fs';
import { constants as osConstants } from 'os';
import { finished } from 'stream/promises';
import { ensureParentDir, InterruptedError, isWindows } from '@benchkit/shared';

/** Exit code reported for a process killed by its deadline. */
export const TIMEOUT_EXIT_CODE = 124;

/** Time between SIGTERM and SIGKILL when stopping a process group. */
const KILL_GRACE_MS = 2000;

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface SpawnToFilesOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutSec: number;
  stdoutPath: string;
  stderrPath: string;
  /** Aborting kills the process and rejects with InterruptedError */
  signal?: AbortSignal;
  /** Appended to the stderr file when the deadline kills the process */
  timeoutMarker?: string;
  spawnImpl?: SpawnFn;
}

export interface SpawnOutcome {
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
}

export function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
  if (isWindows()) {
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // The child is a group leader (detached), so -pid reaches its descendants too.
  try {
    process.kill(-pid, signal);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
  }
}

function exitCodeFromSignal(signal: NodeJS.Signals | null): number {
  if (!signal) return -1;
  const entry = Object.entries(osConstants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

/**
 * Runs a process with stdout and stderr streamed into files and a
 * wall-clock deadline enforced from this side.
 *
 * On timeout the process group is killed, the exit code is forced to 124
 * and `timeoutMarker` is appended to the stderr file. Spawn and stream
 * faults reject with the underlying error.
 */
export async function spawnToFiles(
  bin: string,
  args: readonly string[],
  options: SpawnToFilesOptions,
): Promise<SpawnOutcome> {
  await ensureParentDir(options.stdoutPath);
  await ensureParentDir(options.stderrPath);
  if (options.signal?.aborted) {
    throw new InterruptedError(`Interrupted before starting ${bin}`);
  }

  const spawnFn: SpawnFn = options.spawnImpl ?? spawn;
  const start = Date.now();

  return new Promise<SpawnOutcome>((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    let interrupted = false;
    let deadlineTimer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;
    let child: ChildProcess | undefined;

    const stdout = fs.createWriteStream(options.stdoutPath);
    const stderr = fs.createWriteStream(options.stderrPath);

    const onAbort = () => {
      interrupted = true;
      stop();
    };

    const cleanup = () => {
      clearTimeout(deadlineTimer);
      clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    const fail = (err: unknown) => {
      if (settled) return;
      settled = true;
      cleanup();
      if (child?.pid && child.exitCode === null) killProcessTree(child.pid, 'SIGKILL');
      stdout.destroy();
      stderr.destroy();
      reject(err);
    };

    const stop = () => {
      const pid = child?.pid;
      if (!pid) return;
      killProcessTree(pid, 'SIGTERM');
      killTimer = setTimeout(() => killProcessTree(pid, 'SIGKILL'), KILL_GRACE_MS);
    };

    stdout.on('error', fail);
    stderr.on('error', fail);

    try {
      child = spawnFn(bin, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });
    } catch (err) {
      fail(err);
      return;
    }

    deadlineTimer = setTimeout(() => {
      timedOut = true;
      stop();
    }, options.timeoutSec * 1000);
    if (options.signal?.aborted) onAbort();
    else options.signal?.addEventListener('abort', onAbort, { once: true });

    if (child.stdout) child.stdout.pipe(stdout);
    else stdout.end();
    if (child.stderr) child.stderr.pipe(stderr);
    else stderr.end();

    child.on('error', fail);
    child.on('close', (code, signal) => {
      if (settled) return;
      cleanup();

      void Promise.all([finished(stdout), finished(stderr)])
        .then(async () => {
          if (timedOut && options.timeoutMarker) {
            await fs.promises.appendFile(options.stderrPath, options.timeoutMarker);
          }
        })
        .then(() => {
          if (settled) return;
          settled = true;
          if (interrupted) {
            reject(new InterruptedError(`Interrupted while running ${bin}`));
            return;
          }
          resolve({
            exitCode: timedOut ? TIMEOUT_EXIT_CODE : (code ?? exitCodeFromSignal(signal)),
            timedOut,
            durationMs: Date.now() - start,
          });
        }, fail);
    });
  });
}
