import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { spawn } from 'child_process';
import { GitCli, checkoutCommit, cloneRepo } from './index';

const run = (cmd: string, args: string[], cwd: string) => {
  return new Promise<string>((resolve, reject) => {
    const p = spawn(cmd, args, { cwd, stdio: ['ignore', 'pipe', 'ignore'] });
    let out = '';
    p.stdout.on('data', (chunk: Buffer) => {
      out += chunk.toString();
    });
    p.on('close', (code) => {
      if (code === 0) resolve(out.trim());
      else reject(new Error(`Command ${cmd} ${args.join(' ')} failed with code ${code}`));
    });
    p.on('error', reject);
  });
};

describe('git stages', () => {
  let tmpDir: string;
  let origin: string;
  let logsDir: string;
  let firstCommit: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-stage-test-'));
    origin = path.join(tmpDir, 'origin');
    logsDir = path.join(tmpDir, 'logs');
    await fs.mkdir(origin);

    await run('git', ['init'], origin);
    await run('git', ['config', 'user.email', 'test@example.com'], origin);
    await run('git', ['config', 'user.name', 'Test User'], origin);
    await fs.writeFile(path.join(origin, 'calc.py'), 'v1\n');
    await run('git', ['add', '.'], origin);
    await run('git', ['commit', '-m', 'first'], origin);
    firstCommit = await run('git', ['rev-parse', 'HEAD'], origin);
    await fs.writeFile(path.join(origin, 'calc.py'), 'v2\n');
    await run('git', ['commit', '-am', 'second'], origin);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('clones a repository and checks out a pinned commit', async () => {
    const dest = path.join(tmpDir, 'workspace', 'repo');

    const clone = await cloneRepo(origin, dest, logsDir);
    expect(clone.exitCode).toBe(0);
    expect(clone.stdoutPath).toBe(path.join(logsDir, 'clone_stdout.txt'));
    await expect(fs.readFile(path.join(dest, 'calc.py'), 'utf8')).resolves.toBe('v2\n');

    const checkout = await checkoutCommit(dest, firstCommit, logsDir);
    expect(checkout.exitCode).toBe(0);
    expect(checkout.stderrPath).toBe(path.join(logsDir, 'checkout_stderr.txt'));
    await expect(fs.readFile(path.join(dest, 'calc.py'), 'utf8')).resolves.toBe('v1\n');
  });

  it('reports a failed clone through its exit code', async () => {
    const result = await new GitCli().cloneRepo(path.join(tmpDir, 'missing'), path.join(tmpDir, 'dest'), logsDir);
    expect(result.exitCode).not.toBe(0);
    expect(result.timedOut).toBe(false);
    const stderr = await fs.readFile(result.stderrPath, 'utf8');
    expect(stderr.length).toBeGreaterThan(0);
  });

  it('reports an unknown commit through its exit code', async () => {
    const dest = path.join(tmpDir, 'repo');
    await cloneRepo(origin, dest, logsDir);
    const result = await checkoutCommit(dest, 'deadbeefdeadbeefdeadbeefdeadbeefdeadbeef', logsDir);
    expect(result.exitCode).not.toBe(0);
  });
});
