import { join, ProcessError, toError, isInterrupt } from '@benchkit/shared';
import { spawnToFiles, type SpawnFn } from './spawn';

export interface CommandOptions {
  cwd?: string;
  /** Directory receiving `<name>_stdout.txt` and `<name>_stderr.txt` */
  logsDir: string;
  timeoutSec: number;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  spawnImpl?: SpawnFn;
}

export interface CommandResult {
  exitCode: number;
  stdoutPath: string;
  stderrPath: string;
  durationMs: number;
  timedOut: boolean;
}

/**
 * Runs a host command (no sandbox) with its output captured under `logsDir`.
 * A timeout yields exit code 124; failure to start the process throws ProcessError.
 */
export async function runCommand(
  name: string,
  bin: string,
  args: readonly string[],
  options: CommandOptions,
): Promise<CommandResult> {
  const stdoutPath = join(options.logsDir, `${name}_stdout.txt`);
  const stderrPath = join(options.logsDir, `${name}_stderr.txt`);

  try {
    const outcome = await spawnToFiles(bin, args, {
      cwd: options.cwd,
      env: options.env,
      timeoutSec: options.timeoutSec,
      stdoutPath,
      stderrPath,
      signal: options.signal,
      spawnImpl: options.spawnImpl,
      timeoutMarker: `\n[benchkit] ${name} timed out after ${options.timeoutSec}s and was terminated\n`,
    });
    return { ...outcome, stdoutPath, stderrPath };
  } catch (err) {
    if (isInterrupt(err)) throw err;
    throw new ProcessError(`Failed to run ${bin}: ${toError(err).message}`, {
      cause: err,
      details: { name, bin, args: [...args] },
    });
  }
}
