import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  TaskLoadError,
  SuiteNotFoundError,
  PathEscapeError,
  SymlinkError,
  SandboxError,
  TimeoutError,
  ProcessError,
  InterruptedError,
  StageFailedError,
  SuiteInterruptedError,
  isInterrupt,
  toError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('SandboxError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });
});

describe('subclasses', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError'],
    [new UsageError('x'), 'UsageError'],
    [new SandboxError('x'), 'SandboxError'],
    [new ProcessError('x', { exitCode: 3 }), 'ProcessError'],
    [new InterruptedError(), 'InterruptedError'],
    [new TimeoutError('x', { timeoutMs: 10 }), 'TimeoutError'],
  ])('%s carries code %s', (error, code) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
  });

  it('names the offending task file', () => {
    const error = new TaskLoadError('tasks/demo/a/task.yaml', 'missing run');
    expect(error.message).toBe('Invalid task tasks/demo/a/task.yaml: missing run');
    expect(error.code).toBe('TaskError');
    expect(new SuiteNotFoundError('demo').message).toBe('Suite not found: demo');
  });

  it('records the path for escape and symlink errors', () => {
    const escape = new PathEscapeError('../etc/passwd', '/work');
    expect(escape.details).toEqual({ path: '../etc/passwd', root: '/work' });

    const symlink = new SymlinkError('link/file.txt', '/work/link');
    expect(symlink.component).toBe('/work/link');
    expect(symlink.message).toBe('Symlinks are not allowed: /work/link');
  });

  it('keeps the failure reason of a failed stage', () => {
    const error = new StageFailedError('SETUP_FAILED', 'setup exited 1');
    expect(error.reason).toBe('SETUP_FAILED');
  });

  it('reports how many tasks an interrupted suite skipped', () => {
    const error = new SuiteInterruptedError('/out/runs/r1', 3);
    expect(error).toBeInstanceOf(InterruptedError);
    expect(error.notAttempted).toBe(3);
    expect(error.message).toBe('Suite interrupted; 3 task(s) not attempted');
  });
});

describe('isInterrupt', () => {
  it('recognizes harness interrupts and abort errors', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(isInterrupt(new InterruptedError())).toBe(true);
    expect(isInterrupt(abort)).toBe(true);
    expect(isInterrupt(new Error('boom'))).toBe(false);
    expect(isInterrupt('string')).toBe(false);
  });
});

describe('toError', () => {
  it('wraps non-errors', () => {
    const err = new Error('e');
    expect(toError(err)).toBe(err);
    expect(toError(42).message).toBe('42');
  });
});
