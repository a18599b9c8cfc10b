import fs from 'fs-extra';
import { ConfigError, SandboxError, isInterrupt, toError } from '@benchkit/shared';
import { spawnToFiles, type SpawnFn } from '../runner/spawn';

/**
 * Network modes a sandbox may use.
 *
 * - `none`: no external connectivity, used for test runs
 * - `bridge`: outbound access, used only for setup and dependency installs
 */
export type NetworkMode = 'none' | 'bridge';

export const NETWORK_MODES: readonly NetworkMode[] = ['none', 'bridge'];

export function parseNetworkMode(value: string): NetworkMode {
  const mode = NETWORK_MODES.find((m) => m === value);
  if (!mode) {
    throw new ConfigError(
      `Invalid sandbox network mode "${value}"; expected one of: ${NETWORK_MODES.join(', ')}`,
    );
  }
  return mode;
}

export interface SandboxRunRequest {
  /** Host directory bind-mounted at the sandbox workdir; must exist */
  workspaceHostPath: string;
  /** Run through a login shell inside the sandbox */
  command: string;
  network: NetworkMode;
  timeoutSec: number;
  stdoutPath: string;
  stderrPath: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface SandboxRunResult {
  exitCode: number;
  stdoutPath: string;
  stderrPath: string;
  durationMs: number;
  timedOut: boolean;
}

export interface SandboxRunner {
  run(request: SandboxRunRequest): Promise<SandboxRunResult>;
}

/**
 * Configuration for Docker sandbox
 */
export interface DockerSandboxConfig {
  image: string;
  /** Mount point of the workspace inside the container. Default: /workspace */
  workdir?: string;
  /** Container CLI. Default: docker */
  binary?: string;
  spawnImpl?: SpawnFn;
}

export function timeoutMarker(timeoutSec: number): string {
  return `\n[benchkit] Command timed out after ${timeoutSec}s and was terminated\n`;
}

/**
 * Runs commands in a throwaway container with the workspace bind-mounted.
 */
export class DockerSandbox implements SandboxRunner {
  readonly image: string;
  readonly workdir: string;
  private readonly binary: string;
  private readonly spawnImpl?: SpawnFn;

  constructor(config: DockerSandboxConfig) {
    this.image = config.image;
    this.workdir = config.workdir ?? '/workspace';
    this.binary = config.binary ?? 'docker';
    this.spawnImpl = config.spawnImpl;
  }

  buildArgs(request: Pick<SandboxRunRequest, 'workspaceHostPath' | 'command' | 'network' | 'env'>): string[] {
    const args: string[] = [
      'run',
      '--rm',
      '--network',
      request.network,
      '-v',
      `${request.workspaceHostPath}:${this.workdir}`,
      '-w',
      this.workdir,
    ];

    for (const [key, value] of Object.entries(request.env ?? {})) {
      args.push('-e', `${key}=${value}`);
    }

    args.push(this.image, 'bash', '-lc', request.command);
    return args;
  }

  async run(request: SandboxRunRequest): Promise<SandboxRunResult> {
    const network = parseNetworkMode(request.network);
    const stat = await fs.stat(request.workspaceHostPath).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new ConfigError(`Workspace directory does not exist: ${request.workspaceHostPath}`);
    }

    const args = this.buildArgs({ ...request, network });
    try {
      const outcome = await spawnToFiles(this.binary, args, {
        timeoutSec: request.timeoutSec,
        stdoutPath: request.stdoutPath,
        stderrPath: request.stderrPath,
        signal: request.signal,
        spawnImpl: this.spawnImpl,
        timeoutMarker: timeoutMarker(request.timeoutSec),
      });
      return {
        ...outcome,
        stdoutPath: request.stdoutPath,
        stderrPath: request.stderrPath,
      };
    } catch (err) {
      if (isInterrupt(err)) throw err;
      throw new SandboxError(`Sandbox failed to run command: ${toError(err).message}`, {
        cause: err,
        details: { image: this.image, network },
      });
    }
  }
}

/**
 * Creates the sandbox used for a task's image.
 */
export type SandboxFactory = (image: string, workdir: string) => SandboxRunner;

export function createSandboxFactory(binary = 'docker'): SandboxFactory {
  return (image, workdir) => new DockerSandbox({ image, workdir, binary });
}
