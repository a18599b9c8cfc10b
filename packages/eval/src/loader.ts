import path from 'node:path';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import {
  SuiteNotFoundError,
  TaskLoadError,
  formatIssues,
  logger as defaultLogger,
  toError,
  validateTaskSpec,
  type Logger,
  type TaskSpec,
} from '@benchkit/shared';

export const TASK_FILE = 'task.yaml';

/**
 * Reads and validates one `task.yaml`. The returned spec is frozen and
 * remembers the file it came from.
 */
export async function loadTask(taskPath: string): Promise<TaskSpec> {
  const absPath = path.resolve(taskPath);

  let raw: string;
  try {
    raw = await fs.readFile(absPath, 'utf8');
  } catch (err) {
    throw new TaskLoadError(absPath, 'file could not be read', { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new TaskLoadError(absPath, `YAML syntax error: ${err.message}`, { cause: err });
    }
    throw err;
  }

  try {
    const spec = validateTaskSpec(parsed);
    return Object.freeze({ ...spec, source_path: absPath });
  } catch (err) {
    if (err instanceof ZodError) {
      throw new TaskLoadError(absPath, `schema validation failed\n${formatIssues(err)}`, {
        cause: err,
        details: { issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
      });
    }
    throw err;
  }
}

/**
 * Finds `<tasksRoot>/<suite>/<task>/task.yaml` files, sorted by path.
 */
export async function discoverTasks(tasksRoot: string, suite: string): Promise<string[]> {
  const suiteDir = path.resolve(tasksRoot, suite);
  const stat = await fs.stat(suiteDir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new SuiteNotFoundError(suite, { details: { tasksRoot, suiteDir } });
  }

  const entries = await fs.readdir(suiteDir, { withFileTypes: true });
  const found: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const candidate = path.join(suiteDir, entry.name, TASK_FILE);
    if (await fs.pathExists(candidate)) found.push(candidate);
  }
  return found.sort();
}

/**
 * Loads every task of a suite. Invalid tasks are logged and skipped.
 */
export async function loadSuite(
  tasksRoot: string,
  suite: string,
  log: Logger = defaultLogger,
): Promise<TaskSpec[]> {
  const tasks: TaskSpec[] = [];
  for (const taskPath of await discoverTasks(tasksRoot, suite)) {
    try {
      tasks.push(await loadTask(taskPath));
    } catch (err) {
      if (!(err instanceof TaskLoadError)) throw err;
      log.warn(`Skipping task: ${toError(err).message}`);
    }
  }
  return tasks;
}
