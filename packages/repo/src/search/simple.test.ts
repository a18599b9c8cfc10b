import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsFallbackSearch } from './simple';
import { RipgrepSearch } from './ripgrep';

describe('JsFallbackSearch', () => {
  let root: string;
  const engine = new JsFallbackSearch();

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'search-test-')));
    await fs.mkdir(path.join(root, 'src'));
    await fs.mkdir(path.join(root, '.git'));
    await fs.writeFile(path.join(root, 'src', 'calc.py'), 'def add(a, b):\n    return a - b\n\ndef sub(a, b):\n    return a - b\n');
    await fs.writeFile(path.join(root, 'README.md'), 'Use add() to add.\r\n');
    await fs.writeFile(path.join(root, '.git', 'config'), 'add = true\n');
    await fs.writeFile(path.join(root, 'blob.bin'), Buffer.from([0x61, 0x64, 0x64, 0x00]));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('finds literal matches in path order', async () => {
    const result = await engine.search({ query: 'add', cwd: root, maxResults: 50 });
    expect(result).toEqual({
      matches: [
        { file: 'README.md', line_number: 1, line: 'Use add() to add.' },
        { file: 'src/calc.py', line_number: 1, line: 'def add(a, b):' },
      ],
      totalMatches: 2,
      truncated: false,
      engine: 'js-fallback',
    });
  });

  it('treats the query as a literal string', async () => {
    const result = await engine.search({ query: 'add()', cwd: root, maxResults: 50 });
    expect(result.matches.map((m) => m.file)).toEqual(['README.md']);
  });

  it('truncates to maxResults but counts every match', async () => {
    const result = await engine.search({ query: 'return a - b', cwd: root, maxResults: 1 });
    expect(result.matches).toEqual([{ file: 'src/calc.py', line_number: 2, line: '    return a - b' }]);
    expect(result.totalMatches).toBe(2);
    expect(result.truncated).toBe(true);
  });

  it('restricts the scan with a glob', async () => {
    const result = await engine.search({ query: 'add', cwd: root, glob: '**/*.py', maxResults: 50 });
    expect(result.matches.map((m) => m.file)).toEqual(['src/calc.py']);
  });
});

describe('RipgrepSearch', () => {
  it('builds a fixed-string invocation scoped to the glob', () => {
    const args = new RipgrepSearch().buildArgs({ query: '-v', cwd: '/ws', glob: '*.py', maxResults: 10 });
    expect(args).toEqual([
      '--json',
      '--fixed-strings',
      '--hidden',
      '--no-ignore',
      '--sort',
      'path',
      '--glob',
      '!.git',
      '--glob',
      '*.py',
      '--',
      '-v',
      '.',
    ]);
  });

  it('reports itself unavailable when the binary is missing', async () => {
    await expect(new RipgrepSearch('benchkit-no-such-rg').isAvailable()).resolves.toBe(false);
  });
});
