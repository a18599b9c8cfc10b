/**
 * Names of the tools an agent may call.
 */
export const TOOL_NAMES = ['list_files', 'read_file', 'search', 'apply_patch', 'run'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ListFilesParams {
  /** Directory to list, relative to the workspace. Default: "." */
  root?: string;
  /** Glob matched against paths relative to `root`. Default: "**\/*" */
  glob?: string;
}

export interface ReadFileParams {
  path: string;
  /** 1-indexed, inclusive */
  start_line?: number;
  /** 1-indexed, inclusive */
  end_line?: number;
}

export interface SearchParams {
  query: string;
  glob?: string;
  /** Default: 50 */
  max_results?: number;
}

export interface ApplyPatchParams {
  unified_diff: string;
}

export interface RunParams {
  command: string;
  timeout_sec?: number;
  env?: Record<string, string>;
}

export interface ToolParamsMap {
  list_files: ListFilesParams;
  read_file: ReadFileParams;
  search: SearchParams;
  apply_patch: ApplyPatchParams;
  run: RunParams;
}

/**
 * A single tool call, as produced by an agent.
 */
export type ToolRequest = {
  [K in ToolName]: {
    request_id: string;
    tool: K;
    params: ToolParamsMap[K];
  };
}[ToolName];

/**
 * Structured error attached to a failed tool call.
 * `type` is a stable discriminator such as `path_escape` or `patch_hunk_fail`.
 */
export interface ToolErrorInfo {
  type: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Result of one tool invocation, in its serialized form.
 */
export interface ToolResult {
  request_id: string;
  tool: ToolName;
  status: 'success' | 'error';
  /** ISO 8601 */
  started_at: string;
  /** ISO 8601 */
  ended_at: string;
  duration_sec: number;
  data?: Record<string, unknown>;
  error?: ToolErrorInfo;
  exit_code?: number;
  stdout_path?: string;
  stderr_path?: string;
}

/**
 * A single search hit returned by the `search` tool.
 */
export interface SearchMatch {
  file: string;
  line_number: number;
  line: string;
}
