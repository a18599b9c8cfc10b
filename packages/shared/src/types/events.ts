import type { ToolName, ToolResult } from './tools';

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Base interface for all harness events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schema_version: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  run_id: string;
  /** Monotonic per-run step counter */
  step_id: number;
  type: string;
}

export interface ToolCallStarted extends BaseEvent {
  type: 'tool_call_started';
  payload: {
    request_id: string;
    tool: ToolName;
    params: Record<string, unknown>;
  };
}

export interface ToolCallFinished extends BaseEvent {
  type: 'tool_call_finished';
  payload: {
    result: ToolResult;
  };
}

export interface PatchApplied extends BaseEvent {
  type: 'patch_applied';
  payload: {
    changed_files: string[];
    patch_size_bytes: number;
    artifact_path: string;
  };
}

export interface TestsStarted extends BaseEvent {
  type: 'tests_started';
  payload: {
    command: string;
  };
}

export interface TestsFinished extends BaseEvent {
  type: 'tests_finished';
  payload: {
    exit_code: number;
    passed: boolean;
    stdout_path?: string;
    stderr_path?: string;
  };
}

export interface AgentTurnStarted extends BaseEvent {
  type: 'agent_turn_started';
  payload: {
    /** 1-based */
    turn: number;
  };
}

export interface AgentTurnFinished extends BaseEvent {
  type: 'agent_turn_finished';
  payload: {
    turn: number;
    stopped_reason: string;
  };
}

export type HarnessEvent =
  | AgentTurnStarted
  | AgentTurnFinished
  | ToolCallStarted
  | ToolCallFinished
  | PatchApplied
  | TestsStarted
  | TestsFinished;

export type HarnessEventType = HarnessEvent['type'];
