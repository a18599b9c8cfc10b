export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

export const MAX_OUTPUT_LINES = 2000;
export const MAX_OUTPUT_BYTES = 100_000;

export interface TruncateOptions {
  maxLines?: number;
  maxBytes?: number;
}

export interface TruncatedText {
  text: string;
  truncated: boolean;
}

/**
 * Keeps the head and tail of a large output.
 * Lines are cut first; if the remaining text is still over `maxBytes`, the
 * middle bytes are cut as well.
 */
export function truncateOutput(content: string, options: TruncateOptions = {}): TruncatedText {
  const maxLines = options.maxLines ?? MAX_OUTPUT_LINES;
  const maxBytes = options.maxBytes ?? MAX_OUTPUT_BYTES;
  let text = content;
  let truncated = false;

  const lines = text.split(/(?<=\n)/);
  if (lines.length > maxLines) {
    const half = Math.floor(maxLines / 2);
    const dropped = lines.length - half * 2;
    text =
      lines.slice(0, half).join('') +
      `\n... [${dropped} lines truncated] ...\n\n` +
      lines.slice(lines.length - half).join('');
    truncated = true;
  }

  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length > maxBytes) {
    const half = Math.floor(maxBytes / 2);
    text =
      bytes.subarray(0, half).toString('utf8') +
      '\n... [content truncated] ...\n' +
      bytes.subarray(bytes.length - half).toString('utf8');
    truncated = true;
  }

  return { text, truncated };
}

/**
 * Formats a step number the way artifact file names use it: `0007`.
 */
export function padStep(step: number): string {
  return String(step).padStart(4, '0');
}
