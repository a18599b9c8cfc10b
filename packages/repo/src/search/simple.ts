import path from 'node:path';
import fs from 'fs-extra';
import isBinaryPath from 'is-binary-path';
import type { SearchMatch } from '@benchkit/shared';
import { safeGlob } from '../fs/guard';
import { collectResult, type SearchEngine, type SearchOptions, type SearchResult } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeText(bytes: Buffer): string | null {
  if (bytes.includes(0)) return null;
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Fixed-string scan over `safeGlob` results, used when ripgrep is not installed.
 * Binary files and files that are not valid UTF-8 are skipped.
 */
export class JsFallbackSearch implements SearchEngine {
  readonly name = 'js-fallback';

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async search(options: SearchOptions): Promise<SearchResult> {
    const matches: SearchMatch[] = [];
    if (options.query.length === 0) return collectResult(this.name, matches, options.maxResults);

    const files = await safeGlob(options.cwd, options.glob ?? '**/*', { signal: options.signal });

    for (const file of files) {
      options.signal?.throwIfAborted();
      if (isBinaryPath(file)) continue;

      const text = decodeText(await fs.readFile(path.join(options.cwd, file)));
      if (text === null) continue;

      const lines = text.split(/\r?\n/);
      for (let i = 0; i < lines.length; i++) {
        if (lines[i].includes(options.query)) {
          matches.push({ file, line_number: i + 1, line: lines[i] });
        }
      }
    }

    return collectResult(this.name, matches, options.maxResults);
  }
}
