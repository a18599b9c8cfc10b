import { DEV_NULL, type FilePatch, type PatchHunk } from '@benchkit/shared';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

interface OpenHunk {
  hunk: PatchHunk;
  oldRemaining: number;
  newRemaining: number;
}

function parseHeaderPath(raw: string): string | null {
  // Drop a trailing "\t<timestamp>" as written by diff(1).
  const value = raw.split('\t')[0].trim();
  if (value === DEV_NULL) return null;
  if (value.startsWith('a/') || value.startsWith('b/')) return value.slice(2);
  return value;
}

function isBodyLine(line: string): boolean {
  return line.startsWith(' ') || line.startsWith('+') || line.startsWith('-') || line.startsWith('\\');
}

/**
 * Parses a unified diff into per-file patches.
 *
 * A `---` header starts a new file, `+++` names its new path and each `@@`
 * header starts a hunk. Hunk bodies are read up to their declared line
 * counts; an empty line inside a hunk is taken as empty context. Lines
 * outside any hunk (`diff --git`, `index ...`) are ignored.
 */
export function parseUnifiedDiff(text: string): FilePatch[] {
  const patches: FilePatch[] = [];
  let current: FilePatch | null = null;
  let open: OpenHunk | null = null;

  const hunkIsOpen = () => open !== null && (open.oldRemaining > 0 || open.newRemaining > 0);

  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (!hunkIsOpen()) {
      if (line.startsWith('--- ')) {
        if (current) patches.push(current);
        current = { oldPath: parseHeaderPath(line.slice(4)), newPath: null, hunks: [] };
        open = null;
        continue;
      }
      if (line.startsWith('+++ ') && current && current.hunks.length === 0) {
        current.newPath = parseHeaderPath(line.slice(4));
        continue;
      }
    }

    const header = HUNK_HEADER.exec(line);
    if (header && current) {
      const hunk: PatchHunk = {
        oldStart: Number(header[1]),
        oldCount: header[2] === undefined ? 1 : Number(header[2]),
        newStart: Number(header[3]),
        newCount: header[4] === undefined ? 1 : Number(header[4]),
        lines: [],
      };
      current.hunks.push(hunk);
      open = { hunk, oldRemaining: hunk.oldCount, newRemaining: hunk.newCount };
      continue;
    }

    if (!open) continue;

    if (hunkIsOpen()) {
      const bodyLine = line === '' ? ' ' : line;
      if (!isBodyLine(bodyLine)) continue;
      open.hunk.lines.push(bodyLine);
      if (bodyLine.startsWith(' ')) {
        open.oldRemaining--;
        open.newRemaining--;
      } else if (bodyLine.startsWith('-')) {
        open.oldRemaining--;
      } else if (bodyLine.startsWith('+')) {
        open.newRemaining--;
      }
    } else if (line.startsWith('\\') || (isBodyLine(line) && !line.startsWith('--- ') && !line.startsWith('+++ '))) {
      // Miscounted hunks: keep body lines until the next header.
      open.hunk.lines.push(line);
    }
  }

  if (current) patches.push(current);
  return patches;
}

/**
 * Lines a hunk expects to find in the old file (context and deletions).
 */
export function hunkOldLines(hunk: PatchHunk): string[] {
  return hunk.lines.filter((l) => l.startsWith(' ') || l.startsWith('-')).map((l) => l.slice(1));
}

/**
 * Lines a hunk leaves in the new file (context and additions).
 */
export function hunkNewLines(hunk: PatchHunk): string[] {
  return hunk.lines.filter((l) => l.startsWith(' ') || l.startsWith('+')).map((l) => l.slice(1));
}

/**
 * True when the hunk ends with a "\ No newline at end of file" marker after an addition.
 */
export function hunkDropsFinalNewline(hunk: PatchHunk): boolean {
  const last = hunk.lines.length - 1;
  return last > 0 && hunk.lines[last].startsWith('\\') && !hunk.lines[last - 1].startsWith('-');
}
