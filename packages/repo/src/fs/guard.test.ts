import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PathEscapeError, SymlinkError } from '@benchkit/shared';
import { resolveSafePath, safeGlob } from './guard';

describe('resolveSafePath', () => {
  let root: string;
  let outside: string;

  beforeEach(async () => {
    const base = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'guard-test-')));
    root = path.join(base, 'ws');
    outside = path.join(base, 'outside');
    await fs.mkdir(path.join(root, 'src', 'real'), { recursive: true });
    await fs.mkdir(outside);
    await fs.writeFile(path.join(root, 'src', 'real', 'file.txt'), 'x');
    await fs.symlink(path.join(root, 'src', 'real'), path.join(root, 'src', 'link'));
    await fs.symlink(outside, path.join(root, 'out-link'));
  });

  afterEach(async () => {
    await fs.rm(path.dirname(root), { recursive: true, force: true });
  });

  it('resolves paths inside the workspace', async () => {
    await expect(resolveSafePath(root, 'src/real/file.txt')).resolves.toBe(
      path.join(root, 'src', 'real', 'file.txt'),
    );
  });

  it('treats absolute-looking paths as workspace-relative', async () => {
    await expect(resolveSafePath(root, '/src/real/file.txt')).resolves.toBe(
      path.join(root, 'src', 'real', 'file.txt'),
    );
  });

  it('resolves paths that do not exist yet', async () => {
    await expect(resolveSafePath(root, 'src/new/module.py')).resolves.toBe(
      path.join(root, 'src', 'new', 'module.py'),
    );
  });

  it.each(['../outside', 'src/../../outside', './../outside/', 'src/./real/../../../x', '..'])(
    'rejects %s as an escape',
    async (p) => {
      await expect(resolveSafePath(root, p)).rejects.toBeInstanceOf(PathEscapeError);
    },
  );

  it.each(['src/link/file.txt', './src/link/./file.txt', 'src/link/', 'src/link'])(
    'rejects %s because of the symlinked component',
    async (p) => {
      const error = await resolveSafePath(root, p).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(SymlinkError);
      expect(error instanceof SymlinkError && error.component).toBe(path.join(root, 'src', 'link'));
    },
  );

  it('follows symlinks inside the workspace when allowed', async () => {
    await expect(resolveSafePath(root, 'src/link/file.txt', true)).resolves.toBe(
      path.join(root, 'src', 'real', 'file.txt'),
    );
  });

  it('still rejects a symlink that leads outside when symlinks are allowed', async () => {
    await expect(resolveSafePath(root, 'out-link/secret', true)).rejects.toBeInstanceOf(
      PathEscapeError,
    );
  });
});

describe('safeGlob', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'glob-test-')));
    await fs.mkdir(path.join(root, 'src', 'pkg'), { recursive: true });
    await fs.mkdir(path.join(root, '.git'));
    await fs.writeFile(path.join(root, 'b.py'), '');
    await fs.writeFile(path.join(root, 'a.py'), '');
    await fs.writeFile(path.join(root, '.hidden'), '');
    await fs.writeFile(path.join(root, 'src', 'pkg', 'mod.py'), '');
    await fs.writeFile(path.join(root, 'src', 'notes.txt'), '');
    await fs.writeFile(path.join(root, '.git', 'config.py'), '');
    await fs.symlink(path.join(root, 'src'), path.join(root, 'src-link'));
    await fs.symlink(path.join(root, 'a.py'), path.join(root, 'alias.py'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('matches recursively and sorts the result', async () => {
    await expect(safeGlob(root, '**/*.py')).resolves.toEqual(['a.py', 'b.py', 'src/pkg/mod.py']);
  });

  it('matches only the top level for a bare star', async () => {
    await expect(safeGlob(root, '*')).resolves.toEqual(['.hidden', 'a.py', 'b.py']);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('deadline'));
    await expect(safeGlob(root, '**/*', { signal: controller.signal })).rejects.toThrow('deadline');
  });
});
