import { spawn } from 'node:child_process';
import * as readline from 'node:readline';
import which from 'which';
import { z } from 'zod';
import { ToolError, type SearchMatch } from '@benchkit/shared';
import { collectResult, type SearchEngine, type SearchOptions, type SearchResult } from './types';

const RgText = z.object({ text: z.string() });

const RgMatchEvent = z.object({
  type: z.literal('match'),
  data: z.object({
    path: RgText,
    lines: RgText,
    line_number: z.number().int(),
  }),
});

function parseMatch(line: string): SearchMatch | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = RgMatchEvent.safeParse(raw);
  if (!parsed.success) return null;
  const { path, lines, line_number } = parsed.data.data;
  return {
    file: path.text.replace(/^\.\//, ''),
    line_number,
    line: lines.text.replace(/\r?\n$/, ''),
  };
}

export class RipgrepSearch implements SearchEngine {
  readonly name = 'ripgrep';
  private available: boolean | null = null;

  constructor(private readonly binary = 'rg') {}

  async isAvailable(): Promise<boolean> {
    if (this.available === null) {
      this.available = (await which(this.binary, { nothrow: true })) !== null;
    }
    return this.available;
  }

  buildArgs(options: SearchOptions): string[] {
    const args = ['--json', '--fixed-strings', '--hidden', '--no-ignore', '--sort', 'path', '--glob', '!.git'];
    if (options.glob) args.push('--glob', options.glob);
    args.push('--', options.query, '.');
    return args;
  }

  async search(options: SearchOptions): Promise<SearchResult> {
    const child = spawn(this.binary, this.buildArgs(options), {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    });

    const exited = new Promise<{ code: number } | { error: Error }>((resolve) => {
      child.once('error', (error) => resolve({ error }));
      child.once('close', (code) => resolve({ code: code ?? 2 }));
    });

    let stderr = '';
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const matches: SearchMatch[] = [];
    const rl = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    for await (const line of rl) {
      if (!line.trim()) continue;
      const match = parseMatch(line);
      if (match) matches.push(match);
    }

    // 1 means "no matches"; anything above is a real failure.
    const outcome = await exited;
    if ('error' in outcome) throw outcome.error;
    const { code } = outcome;
    if (code >= 2) {
      throw new ToolError(`ripgrep exited with code ${code}: ${stderr.trim()}`, {
        details: { exitCode: code, stderr },
      });
    }
    return collectResult(this.name, matches, options.maxResults);
  }
}

/**
 * Picks ripgrep when it is on PATH, otherwise the JS scan.
 */
export async function selectSearchEngine(
  preferred: SearchEngine,
  fallback: SearchEngine,
): Promise<SearchEngine> {
  return (await preferred.isAvailable()) ? preferred : fallback;
}
