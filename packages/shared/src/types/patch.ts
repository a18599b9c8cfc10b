/**
 * One `@@` section of a unified diff.
 */
export interface PatchHunk {
  /** Declared starting line in the old file (1-indexed, 0 for an empty file) */
  oldStart: number;
  oldCount: number;
  /** Declared starting line in the new file */
  newStart: number;
  newCount: number;
  /** Raw body lines, each prefixed with ' ', '+' or '-' */
  lines: string[];
}

/**
 * All hunks for one file in a unified diff.
 * A null path stands for `/dev/null`: a null `oldPath` creates the file,
 * a null `newPath` deletes it.
 */
export interface FilePatch {
  oldPath: string | null;
  newPath: string | null;
  hunks: PatchHunk[];
}

export const DEV_NULL = '/dev/null';

/**
 * Maximum number of lines a hunk may drift from its declared position
 * and still be matched against the file.
 */
export const FUZZ_LIMIT = 3;

/**
 * Outcome of planning a patch without touching the workspace.
 */
export interface PatchPlan {
  /** New content for each file to write, keyed by workspace-relative path */
  writes: Map<string, string>;
  /** Workspace-relative paths to delete */
  deletes: string[];
}
