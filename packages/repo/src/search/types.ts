import type { SearchMatch } from '@benchkit/shared';

export type SearchEngineName = 'ripgrep' | 'js-fallback';

export interface SearchOptions {
  /** Literal text to look for; never a regex */
  query: string;
  /** Root directory to search in */
  cwd: string;
  /** Glob over workspace-relative paths. Default: every file */
  glob?: string;
  /** Matches kept in the result; the total is still counted */
  maxResults: number;
  signal?: AbortSignal;
}

export interface SearchResult {
  /** Ordered by file path, then line number */
  matches: SearchMatch[];
  totalMatches: number;
  truncated: boolean;
  engine: SearchEngineName;
}

export interface SearchEngine {
  readonly name: SearchEngineName;
  search(options: SearchOptions): Promise<SearchResult>;
  isAvailable(): Promise<boolean>;
}

export function collectResult(engine: SearchEngineName, all: SearchMatch[], maxResults: number): SearchResult {
  return {
    matches: all.slice(0, maxResults),
    totalMatches: all.length,
    truncated: all.length > maxResults,
    engine,
  };
}
