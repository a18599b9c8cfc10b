import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { SandboxRunner } from '@benchkit/exec';
import { JsFallbackSearch, PatchApplier, type SearchEngine } from '@benchkit/repo';
import { ConfigSchema, ConsoleLogger, UsageError, readJsonl, type ToolRequest } from '@benchkit/shared';
import { ToolDispatcher } from './dispatcher';
import { EventLogger } from './events';

const unusedSandbox: SandboxRunner = {
  run: async () => {
    throw new Error('sandbox should not be used');
  },
};

describe('ToolDispatcher', () => {
  let tmpDir: string;
  let ws: string;
  let eventsFile: string;
  let dispatcher: ToolDispatcher;
  const quiet = new ConsoleLogger({ level: 'error' });

  const readEvents = async () => {
    const events: unknown[] = [];
    for await (const event of readJsonl(eventsFile)) events.push(event);
    return events;
  };

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'dispatcher-test-')));
    ws = path.join(tmpDir, 'workspace');
    eventsFile = path.join(tmpDir, 'events.jsonl');
    await fs.mkdir(ws);
    await fs.writeFile(path.join(ws, 'calc.py'), 'def add(a, b):\n    return a - b\n');
    dispatcher = new ToolDispatcher({
      workspaceRoot: ws,
      logsDir: path.join(tmpDir, 'logs'),
      diffsDir: path.join(tmpDir, 'diffs'),
      sandbox: unusedSandbox,
      events: new EventLogger(eventsFile, 'run-1', { logger: quiet }),
      searchEngines: { preferred: new JsFallbackSearch(), fallback: new JsFallbackSearch() },
      logger: quiet,
    });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('runs a tool and records started and finished events', async () => {
    const request: ToolRequest = { request_id: 'req-1', tool: 'read_file', params: { path: 'calc.py' } };

    const result = await dispatcher.dispatch(request);

    expect(result.status).toBe('success');
    expect(result.request_id).toBe('req-1');
    expect(dispatcher.stepCount).toBe(1);
    const events = await readEvents();
    expect(events).toMatchObject([
      { step_id: 1, type: 'tool_call_started', payload: { request_id: 'req-1', tool: 'read_file' } },
      { step_id: 2, type: 'tool_call_finished', payload: { result: { request_id: 'req-1', status: 'success' } } },
    ]);
  });

  it('returns invalid_params for bad parameters', async () => {
    const result = await dispatcher.dispatch({ request_id: 'req-2', tool: 'read_file', params: { path: 42 } });
    expect(result.status).toBe('error');
    expect(result.error?.type).toBe('invalid_params');
    expect(result.error?.message.split('\n')[0]).toBe('Invalid parameters for read_file:');
  });

  it('throws on a malformed request envelope', async () => {
    await expect(dispatcher.dispatch({ tool: 'teleport', params: {} })).rejects.toThrow(UsageError);
  });

  it('applies patches and records a patch_applied event', async () => {
    const diff = [
      '--- a/calc.py',
      '+++ b/calc.py',
      '@@ -1,2 +1,2 @@',
      ' def add(a, b):',
      '-    return a - b',
      '+    return a + b',
      '',
    ].join('\n');

    const result = await dispatcher.dispatch({ request_id: 'req-3', tool: 'apply_patch', params: { unified_diff: diff } });

    expect(result.status).toBe('success');
    expect(result.request_id).toBe('req-3');
    await expect(fs.readFile(path.join(tmpDir, 'diffs', 'step_0001.patch'), 'utf8')).resolves.toBe(diff);
    const events = await readEvents();
    expect(events[1]).toMatchObject({
      type: 'patch_applied',
      payload: {
        changed_files: ['calc.py'],
        patch_size_bytes: Buffer.byteLength(diff),
        artifact_path: path.join(tmpDir, 'diffs', 'step_0001.patch'),
      },
    });
  });

  it('turns a tool deadline into a timeout result', async () => {
    const stalled: SearchEngine = {
      name: 'js-fallback',
      isAvailable: async () => true,
      search: (options) =>
        new Promise((_, reject) => {
          const signal = options.signal;
          if (!signal) return;
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    };
    const slow = new ToolDispatcher({
      workspaceRoot: ws,
      logsDir: path.join(tmpDir, 'logs'),
      diffsDir: path.join(tmpDir, 'diffs'),
      sandbox: unusedSandbox,
      tools: ConfigSchema.parse({ tools: { timeouts: { search: 0.05 } } }).tools,
      searchEngines: { preferred: stalled, fallback: stalled },
      logger: quiet,
    });

    const result = await slow.dispatch({ request_id: 'req-4', tool: 'search', params: { query: 'add' } });

    expect(result.error?.type).toBe('timeout');
    expect(result.error?.details).toEqual({ timeout_sec: 0.05 });
  });

  describe('apply_patch deadline', () => {
    const fix = [
      '--- a/calc.py',
      '+++ b/calc.py',
      '@@ -1,2 +1,2 @@',
      ' def add(a, b):',
      '-    return a - b',
      '+    return a + b',
      '',
    ].join('\n');

    const withApplier = (applier: PatchApplier, timeoutSec: number) =>
      new ToolDispatcher({
        workspaceRoot: ws,
        logsDir: path.join(tmpDir, 'logs'),
        diffsDir: path.join(tmpDir, 'diffs'),
        sandbox: unusedSandbox,
        tools: ConfigSchema.parse({ tools: { timeouts: { apply_patch: timeoutSec } } }).tools,
        patchApplier: applier,
        logger: quiet,
      });

    it('reports a timeout only when nothing was written', async () => {
      class SlowDryRun extends PatchApplier {
        override async apply(root: string, diff: string, step: number, dir: string, signal?: AbortSignal) {
          await new Promise((resolve) => signal?.addEventListener('abort', resolve, { once: true }));
          return super.apply(root, diff, step, dir, signal);
        }
      }

      const result = await withApplier(new SlowDryRun({ logger: quiet }), 0.02).dispatch({
        request_id: 'req-5',
        tool: 'apply_patch',
        params: { unified_diff: fix },
      });

      expect(result.error).toMatchObject({ type: 'timeout', details: { timeout_sec: 0.02 } });
      await expect(fs.readFile(path.join(ws, 'calc.py'), 'utf8')).resolves.toBe('def add(a, b):\n    return a - b\n');
    });

    it('reports success when the writes finish after the deadline', async () => {
      class SlowCommit extends PatchApplier {
        override async apply(root: string, diff: string, step: number, dir: string) {
          await new Promise((resolve) => setTimeout(resolve, 60));
          return super.apply(root, diff, step, dir);
        }
      }

      const result = await withApplier(new SlowCommit({ logger: quiet }), 0.01).dispatch({
        request_id: 'req-6',
        tool: 'apply_patch',
        params: { unified_diff: fix },
      });

      expect(result.status).toBe('success');
      await expect(fs.readFile(path.join(ws, 'calc.py'), 'utf8')).resolves.toBe('def add(a, b):\n    return a + b\n');
    });

    it('keeps the result and the workspace in agreement on a large file', async () => {
      const body = Array.from({ length: 20_000 }, (_, i) => `line ${i + 1}`);
      await fs.writeFile(path.join(ws, 'big.txt'), body.join('\n') + '\n');
      const diff = ['--- a/big.txt', '+++ b/big.txt', '@@ -10000,1 +10000,1 @@', '-line 10000', '+LINE 10000', ''].join(
        '\n',
      );

      const result = await withApplier(new PatchApplier({ logger: quiet }), 0.001).dispatch({
        request_id: 'req-7',
        tool: 'apply_patch',
        params: { unified_diff: diff },
      });

      const onDisk = (await fs.readFile(path.join(ws, 'big.txt'), 'utf8')).split('\n')[9999];
      if (result.status === 'success') {
        expect(onDisk).toBe('LINE 10000');
      } else {
        expect(result.error?.type).toBe('timeout');
        expect(onDisk).toBe('line 10000');
      }
    });
  });
});
