import fs from 'fs-extra';
import yaml from 'js-yaml';
import { z } from 'zod';
import { TOOL_NAMES, UsageError, formatIssues } from '@benchkit/shared';
import type { ScriptedStep } from './scripted';

const AgentScriptSchema = z.object({
  steps: z
    .array(
      z.object({
        tool: z.enum(TOOL_NAMES),
        params: z.record(z.unknown()).default({}),
        request_id: z.string().min(1).optional(),
      }),
    )
    .min(1),
});

/**
 * Reads the steps of a scripted agent from YAML (or JSON):
 *
 * ```yaml
 * steps:
 *   - tool: read_file
 *     params: { path: src/calc.py }
 * ```
 */
export async function loadAgentScript(scriptPath: string): Promise<ScriptedStep[]> {
  if (!(await fs.pathExists(scriptPath))) {
    throw new UsageError(`Agent script not found: ${scriptPath}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(await fs.readFile(scriptPath, 'utf8'));
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new UsageError(`Error parsing agent script: ${scriptPath}\n${err.message}`, { cause: err });
    }
    throw err;
  }

  const result = AgentScriptSchema.safeParse(parsed);
  if (!result.success) {
    throw new UsageError(`Invalid agent script: ${scriptPath}\n${formatIssues(result.error)}`);
  }
  return result.data.steps;
}
