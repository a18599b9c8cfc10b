import {
  appendJsonlRecord,
  EVENT_SCHEMA_VERSION,
  logger,
  type HarnessEvent,
  type HarnessEventType,
  type Logger,
  type TestsFinished,
  type ToolName,
  type ToolResult,
} from '@benchkit/shared';

/**
 * The type and payload of an event; the logger stamps the rest.
 */
export type EventInput = {
  [E in HarnessEvent as E['type']]: { type: E['type']; payload: E['payload'] };
}[HarnessEventType];

export interface EventLoggerOptions {
  logger?: Logger;
}

/**
 * Appends harness events to `events.jsonl`, one line per event, numbering
 * them with a per-run step counter.
 */
export class EventLogger {
  private step = 0;
  private readonly log: Logger;

  constructor(
    readonly path: string,
    readonly runId: string,
    options: EventLoggerOptions = {},
  ) {
    this.log = (options.logger ?? logger).child({ run: runId });
  }

  nextStepId(): number {
    this.step += 1;
    return this.step;
  }

  async emit(input: EventInput): Promise<HarnessEvent> {
    const event: HarnessEvent = {
      schema_version: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      run_id: this.runId,
      step_id: this.nextStepId(),
      ...input,
    };
    const written = await appendJsonlRecord(this.path, event, { logger: this.log });
    if (written) {
      this.log.debug(`Logged event ${event.type} (step ${event.step_id})`);
    }
    return event;
  }

  agentTurnStarted(turn: number): Promise<HarnessEvent> {
    return this.emit({ type: 'agent_turn_started', payload: { turn } });
  }

  agentTurnFinished(turn: number, stoppedReason: string): Promise<HarnessEvent> {
    return this.emit({ type: 'agent_turn_finished', payload: { turn, stopped_reason: stoppedReason } });
  }

  toolStarted(requestId: string, tool: ToolName, params: Record<string, unknown>): Promise<HarnessEvent> {
    return this.emit({ type: 'tool_call_started', payload: { request_id: requestId, tool, params } });
  }

  toolFinished(result: ToolResult): Promise<HarnessEvent> {
    return this.emit({ type: 'tool_call_finished', payload: { result } });
  }

  patchApplied(changedFiles: string[], patchSizeBytes: number, artifactPath: string): Promise<HarnessEvent> {
    return this.emit({
      type: 'patch_applied',
      payload: { changed_files: changedFiles, patch_size_bytes: patchSizeBytes, artifact_path: artifactPath },
    });
  }

  testsStarted(command: string): Promise<HarnessEvent> {
    return this.emit({ type: 'tests_started', payload: { command } });
  }

  testsFinished(payload: TestsFinished['payload']): Promise<HarnessEvent> {
    return this.emit({ type: 'tests_finished', payload });
  }
}
