import path from 'node:path';
import fs from 'fs-extra';
import { EventLogger, ToolDispatcher, type Agent, type AgentResult } from '@benchkit/core';
import {
  ConfigSchema,
  SandboxError,
  logger as defaultLogger,
  type AttemptRecord,
  type Config,
  type FailureReason,
  type ModelConfig,
  type TaskSpec,
} from '@benchkit/shared';
import { withAttempt } from './ledger/attempt';
import { loadTask } from './loader';
import { EVENTS_FILE, createRunDir, type RunDir } from './runs';
import { attachOutput, runBaselineStages, runTests, stageFailed, type ValidateOptions } from './validator';

export interface AgentAttemptOptions extends ValidateOptions {
  agent: Agent;
  /** Patch artifacts (`step_NNNN.patch`) */
  diffsDir: string;
  /** Default: the agent's name */
  variant?: string;
  model?: ModelConfig | null;
  tools?: Config['tools'];
}

export interface AgentAttempt {
  record: AttemptRecord;
  /** null when the agent never ran */
  agent: AgentResult | null;
}

const STOP_REASONS: Record<Exclude<AgentResult['stoppedReason'], 'completed'>, FailureReason> = {
  tool_error: 'TOOL_ERROR',
  gave_up: 'AGENT_GAVE_UP',
};

/**
 * One full agent attempt: the baseline stages, the agent working through
 * the tool contract, then the task's tests once more. Everything lands in
 * a single attempt record; the final test decides whether it passed.
 */
export async function runAgentAttempt(task: TaskSpec, options: AgentAttemptOptions): Promise<AgentAttempt> {
  const log = (options.logger ?? defaultLogger).child({ task: task.id });
  const tools = options.tools ?? ConfigSchema.parse({}).tools;
  const { agent, events, signal } = options;
  let agentResult: AgentResult | null = null;

  const { record } = await withAttempt(
    {
      attemptsPath: options.attemptsPath,
      taskId: task.id,
      suite: task.suite,
      timeoutSec: task.environment.timeout_sec,
      toolTimeoutSec: tools.runTimeoutSec,
      variant: options.variant ?? agent.name,
      model: options.model ?? null,
      logger: options.logger,
    },
    async (ledger) => {
      try {
        const baseline = await runBaselineStages(task, ledger, options, log);
        if (!baseline) return;
        if (events) ledger.addArtifact('events', events.path);

        ledger.markStage('agent_run');
        log.info(`Running agent ${agent.name}`);
        const dispatcher = new ToolDispatcher({
          workspaceRoot: baseline.repoDir,
          logsDir: options.logsDir,
          diffsDir: options.diffsDir,
          sandbox: baseline.sandbox,
          events,
          tools,
          logger: log,
          signal,
        });
        const outcome = await agent.run({
          task,
          tools: dispatcher,
          failingOutput: await readFailingOutput(baseline.run.stdoutPath, baseline.run.stderrPath),
          events,
          signal,
        });
        agentResult = outcome;
        for (const patchFile of outcome.patchFiles) {
          ledger.addArtifact(path.basename(patchFile, '.patch'), patchFile);
        }
        log.info(`Agent stopped after ${outcome.stepsTaken} step(s): ${outcome.stoppedReason}`);
        if (outcome.stoppedReason !== 'completed') {
          ledger.setFailureReason(STOP_REASONS[outcome.stoppedReason]);
          return;
        }

        ledger.markStage('final_test');
        log.info(`Running final test: ${task.run.command}`);
        const finalRun = await runTests(task, baseline.sandbox, options, 'final');
        attachOutput(ledger, 'final', finalRun);
        ledger.setExitCode(finalRun.exitCode);
        if (stageFailed(ledger, 'final_test', finalRun.exitCode)) return;
        ledger.setOutcome(true);
      } catch (err) {
        if (err instanceof SandboxError) ledger.setFailureReason('SANDBOX_ERROR');
        throw err;
      }
    },
  );

  if (record.result.passed) {
    log.info(`Agent attempt passed (exit ${record.result.exit_code})`);
  } else {
    log.warn(`Agent attempt failed: ${record.result.failure_reason ?? 'unknown'}`);
  }
  return { record, agent: agentResult };
}

async function readFailingOutput(stdoutPath: string, stderrPath: string): Promise<string> {
  const [stdout, stderr] = await Promise.all([fs.readFile(stdoutPath, 'utf8'), fs.readFile(stderrPath, 'utf8')]);
  return stderr === '' ? stdout : `${stdout}\n${stderr}`;
}

export interface RunAgentTaskOptions extends Pick<
  ValidateOptions,
  'git' | 'sandboxFactory' | 'gitTimeoutSec' | 'logger' | 'signal'
> {
  outDir: string;
  agent: Agent;
  variant?: string;
  model?: ModelConfig | null;
  tools?: Config['tools'];
}

export interface AgentTaskRun extends AgentAttempt {
  runDir: RunDir;
}

/**
 * Runs an agent on one task in a run directory of its own, labelled
 * `<task-id>__<variant>`.
 */
export async function runAgentTask(taskPath: string, options: RunAgentTaskOptions): Promise<AgentTaskRun> {
  const log = options.logger ?? defaultLogger;
  const task = await loadTask(taskPath);
  const variant = options.variant ?? options.agent.name;
  const runDir = await createRunDir(options.outDir, `${task.id}__${variant}`, new Date());
  log.info(`Starting agent run ${runDir.runId} for task ${task.id}`);

  const attempt = await runAgentAttempt(task, {
    ...options,
    variant,
    workspaceDir: runDir.workspaceDir,
    logsDir: runDir.logsDir,
    diffsDir: runDir.diffsDir,
    attemptsPath: runDir.attemptsPath,
    taskCopyDir: runDir.taskDir,
    events: new EventLogger(path.join(runDir.root, EVENTS_FILE), runDir.runId, { logger: log }),
  });
  return { runDir, ...attempt };
}
