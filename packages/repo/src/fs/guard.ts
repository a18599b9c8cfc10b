import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { isWithin, normalizePath, PathEscapeError, SymlinkError } from '@benchkit/shared';

const VCS_DIR = '.git';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * realpath() for paths whose tail may not exist yet (a file about to be created).
 */
async function canonicalize(p: string): Promise<string> {
  const missing: string[] = [];
  let current = p;
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (err) {
      if (!isMissing(err)) throw err;
      const parent = path.dirname(current);
      if (parent === current) return p;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Resolves `relativePath` inside `workspaceRoot`.
 *
 * A leading `/` is dropped, so every input is workspace-relative. Unless
 * `allowSymlinks` is set, each existing component below the root is checked
 * with lstat and the first symlink rejects the path; the final path alone is
 * not enough, since a symlinked directory can point anywhere.
 *
 * @returns the canonical absolute path
 * @throws PathEscapeError when the path leaves the workspace
 * @throws SymlinkError when a component is a symlink and symlinks are not allowed
 */
export async function resolveSafePath(
  workspaceRoot: string,
  relativePath: string,
  allowSymlinks = false,
): Promise<string> {
  const root = await fs.realpath(workspaceRoot);
  const stripped = relativePath.replace(/^[\\/]+/, '');
  const lexical = path.resolve(root, stripped);

  if (!isWithin(root, lexical)) {
    throw new PathEscapeError(relativePath, workspaceRoot);
  }

  if (!allowSymlinks) {
    let current = root;
    for (const part of path.relative(root, lexical).split(path.sep).filter(Boolean)) {
      current = path.join(current, part);
      let stat: Stats;
      try {
        stat = await fs.lstat(current);
      } catch (err) {
        if (isMissing(err)) break;
        throw err;
      }
      if (stat.isSymbolicLink()) {
        throw new SymlinkError(relativePath, current);
      }
    }
  }

  const canonical = await canonicalize(lexical);
  if (!isWithin(root, canonical)) {
    throw new PathEscapeError(relativePath, workspaceRoot);
  }
  return canonical;
}

export interface SafeGlobOptions {
  signal?: AbortSignal;
}

/**
 * Lists files under `root` whose relative path matches `pattern`.
 *
 * Symlinks are never followed or returned, `.git` is skipped, and the result
 * is sorted so repeated listings of the same tree are identical.
 *
 * @returns POSIX paths relative to `root`
 */
export async function safeGlob(
  root: string,
  pattern: string,
  options: SafeGlobOptions = {},
): Promise<string[]> {
  const matches: string[] = [];

  const walk = async (dir: string, relativeDir: string): Promise<void> => {
    options.signal?.throwIfAborted();
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name === VCS_DIR || entry.isSymbolicLink()) continue;
      const rel = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), rel);
      } else if (entry.isFile() && minimatch(rel, pattern, { dot: true })) {
        matches.push(normalizePath(rel));
      }
    }
  };

  await walk(root, '');
  return matches.sort();
}
