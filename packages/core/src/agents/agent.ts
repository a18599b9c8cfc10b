import type { TaskSpec, ToolErrorInfo } from '@benchkit/shared';
import type { ToolDispatcher } from '../tools/dispatcher';
import type { EventLogger } from '../tools/events';

/**
 * Why an agent handed control back to the harness.
 */
export type AgentStopReason = 'completed' | 'tool_error' | 'gave_up';

export interface AgentContext {
  task: TaskSpec;
  /** The only way an agent touches the workspace */
  tools: ToolDispatcher;
  /** stdout and stderr of the failing baseline run */
  failingOutput: string;
  events?: EventLogger;
  signal?: AbortSignal;
}

export interface AgentResult {
  stoppedReason: AgentStopReason;
  stepsTaken: number;
  /** Artifacts of the patches the agent applied, in order */
  patchFiles: string[];
  /** The tool error that stopped the agent */
  error?: ToolErrorInfo;
}

/**
 * Something that tries to make a task's failing tests pass through the
 * tool contract. The harness runs the final test itself afterwards.
 */
export interface Agent {
  readonly name: string;
  run(context: AgentContext): Promise<AgentResult>;
}
