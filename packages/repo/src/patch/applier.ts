import path from 'node:path';
import fs from 'fs-extra';
import {
  atomicWrite,
  logger,
  padStep,
  toolFailure,
  toError,
  toolSuccess,
  type Logger,
  type ToolResult,
} from '@benchkit/shared';
import { resolveSafePath } from '../fs/guard';
import { parseUnifiedDiff } from './parser';
import { checkPatches } from './validator';

export interface PatchApplierOptions {
  logger?: Logger;
}

export interface Snapshot {
  absPath: string;
  content: Buffer | null;
}

/**
 * Applies unified diffs to a workspace as a single transaction: a full dry
 * run in memory first, then the writes, rolled back if any of them fails.
 */
export class PatchApplier {
  private readonly log: Logger;

  constructor(options: PatchApplierOptions = {}) {
    this.log = (options.logger ?? logger).child({ component: 'patch' });
  }

  /**
   * `signal` is honoured up to the end of the dry run: an abort before then
   * rejects with the signal's reason and nothing is written. Once the first
   * write starts the patch is committed in full.
   */
  async apply(
    workspaceRoot: string,
    diffText: string,
    stepId: number,
    artifactsDir: string,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    const startedAt = new Date();
    const requestId = `patch_${stepId}`;
    const fail = (type: string, message: string, details?: Record<string, unknown>) =>
      toolFailure('apply_patch', requestId, startedAt, { type, message, details });

    const normalized = trimCompletelyEmptyOuterLines(diffText);
    const patches = parseUnifiedDiff(normalized);
    if (patches.length === 0) {
      return fail('invalid_patch', 'Diff contains no file patches');
    }

    const { plan, issues } = await checkPatches(workspaceRoot, patches);
    if (issues.length > 0) {
      const errors = issues.map((issue) => issue.message);
      this.log.debug(`Patch rejected at step ${stepId}: ${errors.length} problem(s)`);
      return fail('patch_hunk_fail', 'Patch does not apply cleanly', {
        errors,
        kinds: [...new Set(issues.map((issue) => issue.kind))],
      });
    }

    // Last point at which an abort leaves the workspace untouched.
    signal?.throwIfAborted();

    const touched = [...plan.writes.keys(), ...plan.deletes];
    const snapshots: Snapshot[] = [];
    for (const rel of touched) {
      const absPath = await resolveSafePath(workspaceRoot, rel);
      const content = (await fs.pathExists(absPath)) ? await fs.readFile(absPath) : null;
      snapshots.push({ absPath, content });
    }

    try {
      for (const [rel, content] of plan.writes) {
        await atomicWrite(await resolveSafePath(workspaceRoot, rel), content);
      }
      for (const rel of plan.deletes) {
        await fs.remove(await resolveSafePath(workspaceRoot, rel));
      }
    } catch (err) {
      this.log.error(toError(err), `Failed to apply patch at step ${stepId}; rolling back`);
      return this.failAndRollBack(snapshots, toError(err), fail);
    }

    const artifactPath = path.join(artifactsDir, `step_${padStep(stepId)}.patch`);
    try {
      await this.writeArtifact(artifactPath, diffText);
    } catch (err) {
      this.log.error(toError(err), `Failed to store patch artifact at step ${stepId}; rolling back`);
      return this.failAndRollBack(snapshots, toError(err), fail);
    }

    const changedFiles = [...new Set(touched)].sort();
    this.log.info(`Applied patch at step ${stepId} to ${changedFiles.length} file(s)`);
    return toolSuccess('apply_patch', requestId, startedAt, {
      changed_files: changedFiles,
      patch_size_bytes: Buffer.byteLength(diffText, 'utf8'),
      artifact_path: artifactPath,
    });
  }

  protected async writeArtifact(artifactPath: string, diffText: string): Promise<void> {
    await atomicWrite(artifactPath, diffText);
  }

  /** Puts every touched file back the way the snapshot found it. */
  protected async restore(snapshots: Snapshot[]): Promise<void> {
    for (const snap of snapshots) {
      if (snap.content === null) {
        await fs.remove(snap.absPath);
      } else {
        await atomicWrite(snap.absPath, snap.content);
      }
    }
  }

  private async failAndRollBack(snapshots: Snapshot[], cause: Error, fail: FailFn): Promise<ToolResult> {
    try {
      await this.restore(snapshots);
    } catch (err) {
      const rollbackError = toError(err);
      this.log.error(rollbackError, 'Rollback failed; workspace may be partially patched');
      return fail('patch_apply_failed', cause.message, { rollback_error: rollbackError.message });
    }
    return fail('patch_apply_failed', cause.message);
  }
}

type FailFn = (type: string, message: string, details?: Record<string, unknown>) => ToolResult;

/**
 * Drops completely empty leading and trailing lines and ends the text with
 * exactly one newline. Whitespace-only lines are kept: they can be context.
 */
export function trimCompletelyEmptyOuterLines(raw: string): string {
  const lines = raw.split('\n');
  const first = lines.findIndex((l) => l !== '' && l !== '\r');
  if (first === -1) return '';

  let last = lines.length - 1;
  while (last > first && (lines[last] === '' || lines[last] === '\r')) last--;

  return lines.slice(first, last + 1).join('\n') + '\n';
}
