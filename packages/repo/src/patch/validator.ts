import fs from 'fs-extra';
import {
  FUZZ_LIMIT,
  PathEscapeError,
  SymlinkError,
  type FilePatch,
  type PatchHunk,
  type PatchPlan,
} from '@benchkit/shared';
import { resolveSafePath } from '../fs/guard';
import { hunkDropsFinalNewline, hunkNewLines, hunkOldLines } from './parser';

export type PatchIssueKind = 'path_escape' | 'symlink_blocked' | 'missing_file' | 'encoding' | 'hunk';

export interface PatchIssue {
  kind: PatchIssueKind;
  file: string;
  message: string;
}

export interface PatchCheck {
  plan: PatchPlan;
  issues: PatchIssue[];
}

interface PlannedFile {
  rel: string;
  /** `null` once a section deletes the file */
  content: string | null;
}

interface TextFile {
  lines: string[];
  eol: string;
  finalNewline: boolean;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function splitText(content: string): TextFile {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  if (content === '') return { lines: [], eol, finalNewline: false };
  const lines = content.split(/\r?\n/);
  const finalNewline = lines[lines.length - 1] === '';
  if (finalNewline) lines.pop();
  return { lines, eol, finalNewline };
}

function joinText(file: TextFile): string {
  if (file.lines.length === 0) return '';
  return file.lines.join(file.eol) + (file.finalNewline ? file.eol : '');
}

function sliceEquals(lines: string[], at: number, expected: string[]): boolean {
  if (at + expected.length > lines.length) return false;
  return expected.every((line, i) => lines[at + i] === line);
}

/**
 * Index where a hunk's expected lines sit, trying every offset within the
 * fuzz window in ascending order. Positions before `floor` are taken by an
 * earlier hunk of the same file.
 */
export function locateHunk(lines: string[], hunk: PatchHunk, floor = 0): number | null {
  const declared = Math.max(0, hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1);
  const expected = hunkOldLines(hunk);
  for (let offset = -FUZZ_LIMIT; offset <= FUZZ_LIMIT; offset++) {
    const at = declared + offset;
    if (at < floor) continue;
    if (sliceEquals(lines, at, expected)) return at;
  }
  return null;
}

function declaredIndex(hunk: PatchHunk): number {
  return Math.max(0, hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1);
}

function applyHunks(file: TextFile, hunks: PatchHunk[], name: string, issues: PatchIssue[]): TextFile | null {
  const out: string[] = [];
  let cursor = 0;
  let finalNewline = file.finalNewline;
  const before = issues.length;

  for (const hunk of hunks) {
    if (declaredIndex(hunk) > file.lines.length + FUZZ_LIMIT) {
      issues.push({
        kind: 'hunk',
        file: name,
        message: `${name}: hunk at line ${hunk.oldStart} is outside file bounds (fuzz limit ${FUZZ_LIMIT})`,
      });
      continue;
    }
    const at = locateHunk(file.lines, hunk, cursor);
    if (at === null) {
      issues.push({
        kind: 'hunk',
        file: name,
        message: `${name}: context at line ${hunk.oldStart} does not match file content`,
      });
      continue;
    }
    out.push(...file.lines.slice(cursor, at), ...hunkNewLines(hunk));
    cursor = at + hunkOldLines(hunk).length;
    if (cursor >= file.lines.length) {
      finalNewline = !hunkDropsFinalNewline(hunk);
    }
  }

  if (issues.length > before) return null;
  out.push(...file.lines.slice(cursor));
  return { lines: out, eol: file.eol, finalNewline };
}

async function checkPath(root: string, relPath: string, issues: PatchIssue[]): Promise<string | null> {
  try {
    return await resolveSafePath(root, relPath);
  } catch (err) {
    if (err instanceof PathEscapeError) {
      issues.push({ kind: 'path_escape', file: relPath, message: `${relPath} escapes workspace root` });
      return null;
    }
    if (err instanceof SymlinkError) {
      issues.push({ kind: 'symlink_blocked', file: relPath, message: err.message });
      return null;
    }
    throw err;
  }
}

async function readText(absPath: string, name: string, issues: PatchIssue[]): Promise<TextFile | null> {
  if (!(await fs.pathExists(absPath))) {
    issues.push({ kind: 'missing_file', file: name, message: `${name} does not exist` });
    return null;
  }
  const bytes = await fs.readFile(absPath);
  try {
    return splitText(utf8.decode(bytes));
  } catch {
    issues.push({ kind: 'encoding', file: name, message: `${name} contains invalid UTF-8 encoding` });
    return null;
  }
}

/**
 * Dry run of a parsed diff against the workspace. Computes the full new
 * content of every touched file in memory and never writes.
 */
export async function checkPatches(workspaceRoot: string, patches: FilePatch[]): Promise<PatchCheck> {
  const issues: PatchIssue[] = [];
  // Planned state per absolute path; later sections for a path build on it.
  const planned = new Map<string, PlannedFile>();

  const exists = async (absPath: string) => {
    const entry = planned.get(absPath);
    return entry ? entry.content !== null : fs.pathExists(absPath);
  };

  const current = async (absPath: string, name: string): Promise<TextFile | null> => {
    const entry = planned.get(absPath);
    if (!entry) return readText(absPath, name, issues);
    if (entry.content === null) {
      issues.push({ kind: 'missing_file', file: name, message: `${name} was deleted by an earlier section of the diff` });
      return null;
    }
    return splitText(entry.content);
  };

  for (const patch of patches) {
    const { oldPath, newPath } = patch;
    const absOld = oldPath === null ? null : await checkPath(workspaceRoot, oldPath, issues);
    if (oldPath !== null && absOld === null) continue;
    const absNew = newPath === null ? null : await checkPath(workspaceRoot, newPath, issues);
    if (newPath !== null && absNew === null) continue;

    if (oldPath === null || absOld === null) {
      if (newPath === null || absNew === null) continue;
      if (await exists(absNew)) {
        issues.push({ kind: 'hunk', file: newPath, message: `${newPath} already exists` });
        continue;
      }
      const created = applyHunks({ lines: [], eol: '\n', finalNewline: false }, patch.hunks, newPath, issues);
      if (created) planned.set(absNew, { rel: newPath, content: joinText(created) });
      continue;
    }

    const before = await current(absOld, oldPath);
    if (!before) continue;
    const next = applyHunks(before, patch.hunks, oldPath, issues);
    if (!next) continue;

    if (newPath === null || absNew === null) {
      if (next.lines.length > 0) {
        issues.push({ kind: 'hunk', file: oldPath, message: `${oldPath}: deletion leaves ${next.lines.length} line(s) behind` });
        continue;
      }
      planned.set(absOld, { rel: oldPath, content: null });
      continue;
    }

    if (absNew !== absOld) {
      planned.set(absOld, { rel: oldPath, content: null });
      planned.delete(absNew);
    }
    planned.set(absNew, { rel: newPath, content: joinText(next) });
  }

  const plan: PatchPlan = { writes: new Map(), deletes: [] };
  for (const { rel, content } of planned.values()) {
    if (content === null) plan.deletes.push(rel);
    else plan.writes.set(rel, content);
  }
  return { plan, issues };
}

/**
 * Checks every patch against the workspace and returns one message per problem.
 * An empty list means the diff applies cleanly.
 */
export async function validatePatches(workspaceRoot: string, patches: FilePatch[]): Promise<string[]> {
  const { issues } = await checkPatches(workspaceRoot, patches);
  return issues.map((issue) => issue.message);
}
