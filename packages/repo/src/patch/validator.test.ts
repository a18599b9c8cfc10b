import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parseUnifiedDiff } from './parser';
import { checkPatches, validatePatches } from './validator';

const lines = (...body: string[]) => body.join('\n');

describe('validatePatches', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'patch-validate-')));
    await fs.writeFile(path.join(root, 'calc.py'), 'a\nb\nc\nd\ne\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('accepts a hunk at its declared position', async () => {
    const patches = parseUnifiedDiff(lines('--- a/calc.py', '+++ b/calc.py', '@@ -2,2 +2,2 @@', ' b', '-c', '+C'));
    await expect(validatePatches(root, patches)).resolves.toEqual([]);
  });

  it('accepts a hunk that drifted within the fuzz window', async () => {
    const patches = parseUnifiedDiff(lines('--- a/calc.py', '+++ b/calc.py', '@@ -4,2 +4,2 @@', ' b', '-c', '+C'));
    const { plan, issues } = await checkPatches(root, patches);
    expect(issues).toEqual([]);
    expect(plan.writes.get('calc.py')).toBe('a\nb\nC\nd\ne\n');
  });

  it('reports a context mismatch', async () => {
    const patches = parseUnifiedDiff(lines('--- a/calc.py', '+++ b/calc.py', '@@ -9,2 +9,2 @@', ' b', '-c', '+C'));
    await expect(validatePatches(root, patches)).resolves.toEqual([
      'calc.py: context at line 9 does not match file content',
    ]);
  });

  it('reports a hunk outside the file bounds', async () => {
    const patches = parseUnifiedDiff(lines('--- a/calc.py', '+++ b/calc.py', '@@ -10,1 +10,1 @@', '-j', '+J'));
    await expect(validatePatches(root, patches)).resolves.toEqual([
      'calc.py: hunk at line 10 is outside file bounds (fuzz limit 3)',
    ]);
  });

  it('reports a missing file', async () => {
    const patches = parseUnifiedDiff(lines('--- a/nope.py', '+++ b/nope.py', '@@ -1,1 +1,1 @@', '-a', '+b'));
    await expect(validatePatches(root, patches)).resolves.toEqual(['nope.py does not exist']);
  });

  it('reports files that are not valid UTF-8', async () => {
    await fs.writeFile(path.join(root, 'blob.dat'), Buffer.from([0xff, 0xfe, 0x00]));
    const patches = parseUnifiedDiff(lines('--- a/blob.dat', '+++ b/blob.dat', '@@ -1,1 +1,1 @@', '-a', '+b'));
    await expect(validatePatches(root, patches)).resolves.toEqual(['blob.dat contains invalid UTF-8 encoding']);
  });

  it('reports paths that escape the workspace', async () => {
    const patches = parseUnifiedDiff(lines('--- a/../outside.txt', '+++ b/../outside.txt', '@@ -1,1 +1,1 @@', '-a', '+b'));
    await expect(validatePatches(root, patches)).resolves.toEqual(['../outside.txt escapes workspace root']);
  });

  it('accepts context that drifted by up to three lines either way', async () => {
    const body = Array.from({ length: 20 }, (_, i) => `l${i + 1}`);
    await fs.writeFile(path.join(root, 'drift.txt'), body.join('\n') + '\n');
    const at = (line: number) =>
      parseUnifiedDiff(lines('--- a/drift.txt', '+++ b/drift.txt', `@@ -${line},1 +${line},1 @@`, '-l10', '+X'));

    await expect(validatePatches(root, at(13))).resolves.toEqual([]);
    await expect(validatePatches(root, at(7))).resolves.toEqual([]);
    await expect(validatePatches(root, at(14))).resolves.toEqual([
      'drift.txt: context at line 14 does not match file content',
    ]);
    await expect(validatePatches(root, at(6))).resolves.toEqual([
      'drift.txt: context at line 6 does not match file content',
    ]);
  });

  it('refuses to create a file that already exists', async () => {
    const patches = parseUnifiedDiff(lines('--- /dev/null', '+++ b/calc.py', '@@ -0,0 +1,1 @@', '+x'));
    await expect(validatePatches(root, patches)).resolves.toEqual(['calc.py already exists']);
  });
});

describe('checkPatches', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'patch-plan-')));
    await fs.writeFile(path.join(root, 'calc.py'), 'a\nb\nc\nd\ne\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('applies several hunks to one file in order', async () => {
    const patches = parseUnifiedDiff(
      lines('--- a/calc.py', '+++ b/calc.py', '@@ -1,1 +1,1 @@', '-a', '+A', '@@ -5,1 +5,1 @@', '-e', '+E'),
    );
    const { plan } = await checkPatches(root, patches);
    expect(plan.writes.get('calc.py')).toBe('A\nb\nc\nd\nE\n');
  });

  it('keeps CRLF line endings', async () => {
    await fs.writeFile(path.join(root, 'win.txt'), 'one\r\ntwo\r\n');
    const patches = parseUnifiedDiff(lines('--- a/win.txt', '+++ b/win.txt', '@@ -1,2 +1,2 @@', ' one', '-two', '+TWO'));
    const { plan } = await checkPatches(root, patches);
    expect(plan.writes.get('win.txt')).toBe('one\r\nTWO\r\n');
  });

  it('honours a missing final newline marker', async () => {
    const patches = parseUnifiedDiff(
      lines('--- a/calc.py', '+++ b/calc.py', '@@ -5,1 +5,1 @@', '-e', '+E', '\\ No newline at end of file'),
    );
    const { plan } = await checkPatches(root, patches);
    expect(plan.writes.get('calc.py')).toBe('a\nb\nc\nd\nE');
  });

  it('plans creations and deletions', async () => {
    const patches = parseUnifiedDiff(
      lines(
        '--- /dev/null',
        '+++ b/docs/new.txt',
        '@@ -0,0 +1,2 @@',
        '+line one',
        '+line two',
        '--- a/calc.py',
        '+++ /dev/null',
        '@@ -1,5 +0,0 @@',
        '-a',
        '-b',
        '-c',
        '-d',
        '-e',
      ),
    );
    const { plan, issues } = await checkPatches(root, patches);
    expect(issues).toEqual([]);
    expect(plan.writes.get('docs/new.txt')).toBe('line one\nline two\n');
    expect(plan.deletes).toEqual(['calc.py']);
  });

  it('plans a rename as a write plus a delete', async () => {
    const patches = parseUnifiedDiff(lines('--- a/calc.py', '+++ b/lib/calc.py', '@@ -1,1 +1,1 @@', '-a', '+A'));
    const { plan } = await checkPatches(root, patches);
    expect(plan.writes.get('lib/calc.py')).toBe('A\nb\nc\nd\ne\n');
    expect(plan.deletes).toEqual(['calc.py']);
  });

  it('applies later sections for the same file on top of earlier ones', async () => {
    await fs.writeFile(path.join(root, 'f.txt'), 'a\nb\nc\nd\ne\nf\ng\nh\n');
    const patches = parseUnifiedDiff(
      lines(
        '--- a/f.txt',
        '+++ b/f.txt',
        '@@ -1,1 +1,1 @@',
        '-a',
        '+A',
        '--- a/f.txt',
        '+++ b/f.txt',
        '@@ -8,1 +8,1 @@',
        '-h',
        '+H',
      ),
    );
    const { plan, issues } = await checkPatches(root, patches);
    expect(issues).toEqual([]);
    expect([...plan.writes.entries()]).toEqual([['f.txt', 'A\nb\nc\nd\ne\nf\ng\nH\n']]);
  });

  it('rejects a section that edits a file deleted earlier in the diff', async () => {
    const patches = parseUnifiedDiff(
      lines(
        '--- a/calc.py',
        '+++ /dev/null',
        '@@ -1,5 +0,0 @@',
        '-a',
        '-b',
        '-c',
        '-d',
        '-e',
        '--- a/calc.py',
        '+++ b/calc.py',
        '@@ -1,1 +1,1 @@',
        '-a',
        '+A',
      ),
    );
    const { issues } = await checkPatches(root, patches);
    expect(issues.map((issue) => issue.message)).toEqual(['calc.py was deleted by an earlier section of the diff']);
  });

  it('lets a section recreate a file deleted earlier in the diff', async () => {
    const patches = parseUnifiedDiff(
      lines(
        '--- a/calc.py',
        '+++ /dev/null',
        '@@ -1,5 +0,0 @@',
        '-a',
        '-b',
        '-c',
        '-d',
        '-e',
        '--- /dev/null',
        '+++ b/calc.py',
        '@@ -0,0 +1,1 @@',
        '+fresh',
      ),
    );
    const { plan, issues } = await checkPatches(root, patches);
    expect(issues).toEqual([]);
    expect(plan.writes.get('calc.py')).toBe('fresh\n');
    expect(plan.deletes).toEqual([]);
  });
});
