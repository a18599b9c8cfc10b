import { z } from 'zod';
import { withDeadline, withSignalDeadline, type SandboxRunner } from '@benchkit/exec';
import {
  JsFallbackSearch,
  PatchApplier,
  RipgrepSearch,
  selectSearchEngine,
  type SearchEngine,
} from '@benchkit/repo';
import {
  ConfigSchema,
  TOOL_NAMES,
  UsageError,
  formatIssues,
  logger,
  toolFailure,
  type Config,
  type Logger,
  type ToolName,
  type ToolResult,
} from '@benchkit/shared';
import { describeToolFault, listFiles, readFile, runTool, search } from './builtins';
import type { EventLogger } from './events';

const EnvelopeSchema = z.object({
  request_id: z.string().min(1),
  tool: z.enum(TOOL_NAMES),
  params: z.record(z.unknown()).default({}),
});

const ParamSchemas = {
  list_files: z.object({ root: z.string().optional(), glob: z.string().min(1).optional() }),
  read_file: z.object({
    path: z.string().min(1),
    start_line: z.number().int().positive().optional(),
    end_line: z.number().int().positive().optional(),
  }),
  search: z.object({
    query: z.string().min(1),
    glob: z.string().min(1).optional(),
    max_results: z.number().int().positive().optional(),
  }),
  apply_patch: z.object({ unified_diff: z.string() }),
  run: z.object({
    command: z.string().min(1),
    timeout_sec: z.number().positive().optional(),
    env: z.record(z.string()).optional(),
  }),
} satisfies Record<ToolName, z.ZodTypeAny>;

export interface ToolDispatcherOptions {
  workspaceRoot: string;
  /** Run-tool output logs */
  logsDir: string;
  /** Patch artifacts (`step_NNNN.patch`) */
  diffsDir: string;
  sandbox: SandboxRunner;
  events?: EventLogger;
  tools?: Config['tools'];
  searchEngines?: { preferred: SearchEngine; fallback: SearchEngine };
  patchApplier?: PatchApplier;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Validates agent tool calls, runs them against one workspace and records
 * every call as a pair of events. Tool faults come back as error results;
 * only a malformed request envelope or an interrupt throws.
 */
export class ToolDispatcher {
  private step = 0;
  private engine: SearchEngine | null = null;
  private readonly tools: Config['tools'];
  private readonly applier: PatchApplier;
  private readonly log: Logger;

  constructor(private readonly options: ToolDispatcherOptions) {
    this.tools = options.tools ?? ConfigSchema.parse({}).tools;
    this.log = (options.logger ?? logger).child({ component: 'tools' });
    this.applier = options.patchApplier ?? new PatchApplier({ logger: this.log });
  }

  get stepCount(): number {
    return this.step;
  }

  async dispatch(request: unknown): Promise<ToolResult> {
    const envelope = EnvelopeSchema.safeParse(request);
    if (!envelope.success) {
      throw new UsageError(`Invalid tool request:\n${formatIssues(envelope.error)}`);
    }
    const { request_id: requestId, tool, params } = envelope.data;
    const stepId = ++this.step;

    await this.options.events?.toolStarted(requestId, tool, params);
    this.log.debug(`Step ${stepId}: ${tool} (${requestId})`);

    const result = { ...(await this.execute(tool, requestId, stepId, params)), request_id: requestId };

    await this.options.events?.toolFinished(result);
    if (result.status === 'error' && result.error) {
      this.log.debug(`Step ${stepId} failed: ${result.error.type}: ${result.error.message}`);
    }
    return result;
  }

  private async execute(
    tool: ToolName,
    requestId: string,
    stepId: number,
    raw: Record<string, unknown>,
  ): Promise<ToolResult> {
    const startedAt = new Date();
    const invalid = (error: z.ZodError) =>
      toolFailure(tool, requestId, startedAt, {
        type: 'invalid_params',
        message: `Invalid parameters for ${tool}:\n${formatIssues(error)}`,
      });
    const { workspaceRoot } = this.options;

    switch (tool) {
      case 'list_files': {
        const parsed = ParamSchemas.list_files.safeParse(raw);
        if (!parsed.success) return invalid(parsed.error);
        return this.withToolDeadline(tool, requestId, (signal) =>
          listFiles({ workspaceRoot, signal }, requestId, parsed.data),
        );
      }
      case 'read_file': {
        const parsed = ParamSchemas.read_file.safeParse(raw);
        if (!parsed.success) return invalid(parsed.error);
        return this.withToolDeadline(tool, requestId, (signal) =>
          readFile({ workspaceRoot, signal }, requestId, parsed.data),
        );
      }
      case 'search': {
        const parsed = ParamSchemas.search.safeParse(raw);
        if (!parsed.success) return invalid(parsed.error);
        const engine = await this.searchEngine();
        return this.withToolDeadline(tool, requestId, (signal) =>
          search({ workspaceRoot, signal }, requestId, parsed.data, engine),
        );
      }
      case 'apply_patch': {
        const parsed = ParamSchemas.apply_patch.safeParse(raw);
        if (!parsed.success) return invalid(parsed.error);
        // The applier stops at its deadline only before it writes, so the
        // result always matches the workspace.
        const result = await this.withToolDeadline(
          tool,
          requestId,
          (signal) => this.applier.apply(workspaceRoot, parsed.data.unified_diff, stepId, this.options.diffsDir, signal),
          withSignalDeadline,
        );
        const data = result.data;
        if (result.status === 'success' && data) {
          await this.options.events?.patchApplied(
            Array.isArray(data.changed_files) ? data.changed_files.map(String) : [],
            Number(data.patch_size_bytes),
            String(data.artifact_path),
          );
        }
        return result;
      }
      case 'run': {
        const parsed = ParamSchemas.run.safeParse(raw);
        if (!parsed.success) return invalid(parsed.error);
        // The sandbox enforces the command's own deadline.
        return runTool(
          {
            workspaceRoot,
            signal: this.options.signal,
            sandbox: this.options.sandbox,
            logsDir: this.options.logsDir,
            defaultTimeoutSec: this.tools.runTimeoutSec,
            maxOutputLines: this.tools.maxOutputLines,
            maxOutputBytes: this.tools.maxOutputBytes,
          },
          stepId,
          parsed.data,
        );
      }
    }
  }

  private async withToolDeadline(
    tool: Exclude<ToolName, 'run'>,
    requestId: string,
    fn: (signal: AbortSignal) => Promise<ToolResult>,
    deadline: typeof withDeadline = withDeadline,
  ): Promise<ToolResult> {
    const startedAt = new Date();
    const timeoutSec = this.tools.timeouts[tool];
    try {
      return await deadline(timeoutSec * 1000, tool, fn, this.options.signal);
    } catch (err) {
      return toolFailure(tool, requestId, startedAt, describeToolFault(err));
    }
  }

  private async searchEngine(): Promise<SearchEngine> {
    if (!this.engine) {
      const engines = this.options.searchEngines ?? {
        preferred: new RipgrepSearch(),
        fallback: new JsFallbackSearch(),
      };
      this.engine = await selectSearchEngine(engines.preferred, engines.fallback);
      this.log.debug(`Search engine: ${this.engine.name}`);
    }
    return this.engine;
  }
}
