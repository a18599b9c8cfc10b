import type { ToolErrorInfo, ToolName, ToolResult } from '../types/tools';

export interface ToolResultExtras {
  exit_code?: number;
  stdout_path?: string;
  stderr_path?: string;
}

function timing(startedAt: Date, endedAt: Date) {
  return {
    started_at: startedAt.toISOString(),
    ended_at: endedAt.toISOString(),
    duration_sec: (endedAt.getTime() - startedAt.getTime()) / 1000,
  };
}

export function toolSuccess(
  tool: ToolName,
  requestId: string,
  startedAt: Date,
  data: Record<string, unknown>,
  extras: ToolResultExtras = {},
): ToolResult {
  return {
    request_id: requestId,
    tool,
    status: 'success',
    ...timing(startedAt, new Date()),
    data,
    ...extras,
  };
}

export function toolFailure(
  tool: ToolName,
  requestId: string,
  startedAt: Date,
  error: ToolErrorInfo,
  extras: ToolResultExtras & { data?: Record<string, unknown> } = {},
): ToolResult {
  return {
    request_id: requestId,
    tool,
    status: 'error',
    ...timing(startedAt, new Date()),
    error,
    ...extras,
  };
}
