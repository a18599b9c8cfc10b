import path from 'node:path';
import fs from 'fs-extra';
import type { SandboxRunner } from '@benchkit/exec';
import {
  AppError,
  PathEscapeError,
  SandboxError,
  SymlinkError,
  TimeoutError,
  ToolError,
  isInterrupt,
  padStep,
  toError,
  toolFailure,
  toolSuccess,
  truncateOutput,
  type ListFilesParams,
  type ReadFileParams,
  type RunParams,
  type SearchParams,
  type ToolErrorInfo,
  type ToolName,
  type ToolResult,
} from '@benchkit/shared';
import { resolveSafePath, safeGlob, type SearchEngine } from '@benchkit/repo';

export const READ_FILE_MAX_LINES = 10_000;
export const READ_FILE_KEEP_LINES = 5_000;
export const DEFAULT_MAX_RESULTS = 50;

export interface BuiltinContext {
  workspaceRoot: string;
  signal?: AbortSignal;
}

export interface RunToolContext extends BuiltinContext {
  sandbox: SandboxRunner;
  /** Receives `tool_step_NNNN_stdout.txt` and `_stderr.txt` */
  logsDir: string;
  defaultTimeoutSec: number;
  maxOutputLines: number;
  maxOutputBytes: number;
}

function typedToolError(type: string, message: string, details?: Record<string, unknown>): ToolError {
  return new ToolError(message, { details: { ...details, type } });
}

/**
 * Maps a thrown fault to the structured error a ToolResult carries.
 * Interrupts are not tool faults and are rethrown.
 */
export function describeToolFault(err: unknown): ToolErrorInfo {
  if (isInterrupt(err)) throw err;
  if (err instanceof PathEscapeError) {
    return { type: 'path_escape', message: err.message, details: { path: err.path } };
  }
  if (err instanceof SymlinkError) {
    return { type: 'symlink_blocked', message: err.message, details: { path: err.path, component: err.component } };
  }
  if (err instanceof TimeoutError) {
    return { type: 'timeout', message: err.message, details: { timeout_sec: err.timeoutMs / 1000 } };
  }
  if (err instanceof SandboxError) {
    return { type: 'sandbox_error', message: err.message };
  }
  if (err instanceof AppError && typeof err.details === 'object') {
    const { type, ...details } = err.details;
    if (typeof type === 'string') return { type, message: err.message, details };
  }
  const error = toError(err);
  return { type: error.name, message: error.message };
}

async function guarded(
  tool: ToolName,
  requestId: string,
  fn: (startedAt: Date) => Promise<ToolResult>,
): Promise<ToolResult> {
  const startedAt = new Date();
  try {
    return await fn(startedAt);
  } catch (err) {
    return toolFailure(tool, requestId, startedAt, describeToolFault(err));
  }
}

/**
 * Lists files below `root` in sorted order, relative to `root`.
 */
export function listFiles(ctx: BuiltinContext, requestId: string, params: ListFilesParams): Promise<ToolResult> {
  return guarded('list_files', requestId, async (startedAt) => {
    const root = params.root ?? '.';
    const absRoot = await resolveSafePath(ctx.workspaceRoot, root);
    const stat = await fs.stat(absRoot).catch(() => null);
    if (!stat?.isDirectory()) {
      throw typedToolError('not_a_directory', `Not a directory: ${root}`, { path: root });
    }
    const files = await safeGlob(absRoot, params.glob ?? '**/*', { signal: ctx.signal });
    return toolSuccess('list_files', requestId, startedAt, { root, files });
  });
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function keepHeadAndTail(lines: string[]): { lines: string[]; truncated: boolean } {
  if (lines.length <= READ_FILE_MAX_LINES) return { lines, truncated: false };
  const dropped = lines.length - READ_FILE_KEEP_LINES * 2;
  return {
    lines: [
      ...lines.slice(0, READ_FILE_KEEP_LINES),
      '',
      `... [${dropped} lines truncated] ...`,
      '',
      ...lines.slice(lines.length - READ_FILE_KEEP_LINES),
    ],
    truncated: true,
  };
}

/**
 * Reads a UTF-8 text file, optionally restricted to a 1-based inclusive line range.
 */
export function readFile(ctx: BuiltinContext, requestId: string, params: ReadFileParams): Promise<ToolResult> {
  return guarded('read_file', requestId, async (startedAt) => {
    const absPath = await resolveSafePath(ctx.workspaceRoot, params.path);
    const stat = await fs.stat(absPath).catch(() => null);
    if (!stat?.isFile()) {
      throw typedToolError('file_not_found', `File does not exist: ${params.path}`, { path: params.path });
    }

    const bytes = await fs.readFile(absPath);
    let text: string | null = null;
    if (!bytes.includes(0)) {
      try {
        text = utf8.decode(bytes);
      } catch {
        text = null;
      }
    }
    if (text === null) {
      throw typedToolError('binary_file', `Cannot read binary file: ${params.path}`, { path: params.path });
    }

    const all = text.split(/\r?\n/);
    if (all[all.length - 1] === '') all.pop();
    const totalLines = all.length;

    const start = Math.max(1, params.start_line ?? 1);
    const end = Math.min(totalLines, params.end_line ?? totalLines);
    const selected = start <= end ? all.slice(start - 1, end) : [];
    const { lines, truncated } = keepHeadAndTail(selected);

    return toolSuccess('read_file', requestId, startedAt, {
      path: params.path,
      content: lines.join('\n'),
      total_lines: totalLines,
      start_line: start,
      end_line: end,
      truncated,
    });
  });
}

/**
 * Literal text search over the workspace with the given engine.
 */
export function search(
  ctx: BuiltinContext,
  requestId: string,
  params: SearchParams,
  engine: SearchEngine,
): Promise<ToolResult> {
  return guarded('search', requestId, async (startedAt) => {
    try {
      const result = await engine.search({
        query: params.query,
        cwd: ctx.workspaceRoot,
        glob: params.glob,
        maxResults: params.max_results ?? DEFAULT_MAX_RESULTS,
        signal: ctx.signal,
      });
      return toolSuccess('search', requestId, startedAt, {
        matches: result.matches,
        total_matches: result.totalMatches,
        truncated: result.truncated,
        engine: result.engine,
      });
    } catch (err) {
      if (err instanceof ToolError && engine.name === 'ripgrep') {
        throw typedToolError('ripgrep_error', err.message, typeof err.details === 'object' ? err.details : {});
      }
      throw err;
    }
  });
}

async function readTail(file: string, maxLines: number, maxBytes: number) {
  const content = (await fs.pathExists(file)) ? await fs.readFile(file, 'utf8') : '';
  return truncateOutput(content, { maxLines, maxBytes });
}

/**
 * Runs a shell command in the sandbox with networking disabled.
 */
export function runTool(ctx: RunToolContext, stepId: number, params: RunParams): Promise<ToolResult> {
  const requestId = `tool_step_${padStep(stepId)}`;
  return guarded('run', requestId, async (startedAt) => {
    const stdoutPath = path.join(ctx.logsDir, `tool_step_${padStep(stepId)}_stdout.txt`);
    const stderrPath = path.join(ctx.logsDir, `tool_step_${padStep(stepId)}_stderr.txt`);
    const timeoutSec = params.timeout_sec ?? ctx.defaultTimeoutSec;

    const outcome = await ctx.sandbox.run({
      workspaceHostPath: ctx.workspaceRoot,
      command: params.command,
      network: 'none',
      timeoutSec,
      stdoutPath,
      stderrPath,
      env: params.env,
      signal: ctx.signal,
    });

    const stdout = await readTail(outcome.stdoutPath, ctx.maxOutputLines, ctx.maxOutputBytes);
    const stderr = await readTail(outcome.stderrPath, ctx.maxOutputLines, ctx.maxOutputBytes);
    const data = {
      exit_code: outcome.exitCode,
      stdout: stdout.text,
      stderr: stderr.text,
      output_truncated: stdout.truncated || stderr.truncated,
    };
    const extras = { exit_code: outcome.exitCode, stdout_path: outcome.stdoutPath, stderr_path: outcome.stderrPath };

    if (outcome.timedOut) {
      return toolFailure(
        'run',
        requestId,
        startedAt,
        { type: 'timeout', message: `Command timed out after ${timeoutSec}s`, details: { timeout_sec: timeoutSec } },
        { ...extras, data },
      );
    }
    if (outcome.exitCode !== 0) {
      return toolFailure(
        'run',
        requestId,
        startedAt,
        {
          type: 'abnormal_exit',
          message: `Command exited with code ${outcome.exitCode}`,
          details: { exit_code: outcome.exitCode },
        },
        { ...extras, data },
      );
    }
    return toolSuccess('run', requestId, startedAt, data, extras);
  });
}
