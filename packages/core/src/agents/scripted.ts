import { logger, type Logger, type ToolName, type ToolResult } from '@benchkit/shared';
import type { Agent, AgentContext, AgentResult } from './agent';

export interface ScriptedStep {
  tool: ToolName;
  params: Record<string, unknown>;
  /** Default: `scripted-<turn>` */
  request_id?: string;
}

export interface ScriptedAgentOptions {
  logger?: Logger;
}

/**
 * Replays a fixed list of tool requests, one per turn. Stops at the first
 * tool error; a `run` whose command exits nonzero is an answer, not an error.
 */
export class ScriptedAgent implements Agent {
  readonly name = 'scripted';
  private readonly log: Logger;

  constructor(
    private readonly steps: readonly ScriptedStep[],
    options: ScriptedAgentOptions = {},
  ) {
    this.log = (options.logger ?? logger).child({ agent: this.name });
  }

  async run({ tools, events, signal }: AgentContext): Promise<AgentResult> {
    const patchFiles: string[] = [];
    let turn = 0;

    for (const step of this.steps) {
      signal?.throwIfAborted();
      turn++;
      await events?.agentTurnStarted(turn);

      const result = await tools.dispatch({
        request_id: step.request_id ?? `scripted-${String(turn).padStart(3, '0')}`,
        tool: step.tool,
        params: step.params,
      });
      const artifact = result.data?.artifact_path;
      if (step.tool === 'apply_patch' && result.status === 'success' && typeof artifact === 'string') {
        patchFiles.push(artifact);
      }

      if (stopsScript(result)) {
        await events?.agentTurnFinished(turn, 'tool_error');
        this.log.warn(`Turn ${turn}: ${step.tool} failed with ${result.error?.type ?? 'an error'}; stopping`);
        return { stoppedReason: 'tool_error', stepsTaken: turn, patchFiles, error: result.error };
      }
      await events?.agentTurnFinished(turn, `${step.tool} ${result.status}`);
    }

    this.log.info(`Script finished after ${turn} turn(s)`);
    return { stoppedReason: 'completed', stepsTaken: turn, patchFiles };
  }
}

function stopsScript(result: ToolResult): boolean {
  return result.status === 'error' && result.error?.type !== 'abnormal_exit';
}
