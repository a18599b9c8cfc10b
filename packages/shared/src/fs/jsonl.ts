// packages/shared/src/fs/jsonl.ts
import { promises as fs, createReadStream } from 'fs';
import { basename, dirname } from 'path';
import * as readline from 'node:readline';
import lockfile from 'proper-lockfile';
import { tmpName } from 'tmp-promise';
import { ensureDir, pathExists } from 'fs-extra';
import { logger as defaultLogger, type Logger } from '../logger';
import { toError } from '../errors';

export interface JsonlOptions {
  logger?: Logger;
}

export interface AppendOptions extends JsonlOptions {
  /** How many times to retry acquiring the lock before giving up. Default: 100 */
  lockRetries?: number;
}

/**
 * Appends one JSON line to `path` so that readers never observe a partial record.
 *
 * Under an exclusive `<path>.lock`, the current content is copied into a temp
 * file in the same directory, the new line is appended, the temp file is
 * fsynced and then renamed over `path`.
 *
 * Never throws: IO faults are logged and reported as `false`.
 */
export async function appendJsonlRecord(
  path: string,
  record: unknown,
  options: AppendOptions = {},
): Promise<boolean> {
  const log = options.logger ?? defaultLogger;
  let release: (() => Promise<void>) | undefined;
  let tempPath: string | undefined;

  try {
    const line = JSON.stringify(record) + '\n';
    await ensureDir(dirname(path));
    release = await lockfile.lock(path, {
      realpath: false,
      retries: {
        retries: options.lockRetries ?? 100,
        factor: 1.2,
        minTimeout: 10,
        maxTimeout: 250,
      },
    });

    tempPath = await tmpName({ dir: dirname(path), prefix: `.${basename(path)}-` });
    const chunks: Buffer[] = [];
    if (await pathExists(path)) {
      const existing = await fs.readFile(path);
      chunks.push(existing);
      if (existing.length > 0 && existing[existing.length - 1] !== 0x0a) {
        chunks.push(Buffer.from('\n'));
      }
    }
    chunks.push(Buffer.from(line, 'utf8'));

    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(Buffer.concat(chunks));
      await handle.sync();
    } finally {
      await handle.close();
    }

    await fs.rename(tempPath, path);
    tempPath = undefined;
    return true;
  } catch (err) {
    log.error(toError(err), `Failed to append record to ${path}`);
    if (tempPath) {
      await fs.rm(tempPath, { force: true }).catch((rmErr: unknown) => {
        log.warn(`Could not remove temp file ${tempPath}: ${toError(rmErr).message}`);
      });
    }
    return false;
  } finally {
    if (release) {
      await release().catch((relErr: unknown) => {
        log.warn(`Could not release lock on ${path}: ${toError(relErr).message}`);
      });
    }
  }
}

/**
 * Lazily reads the JSON values of a JSONL file.
 *
 * Each iteration re-opens the file. Blank lines are skipped, malformed lines
 * are logged and skipped, and a missing file yields nothing.
 */
export function readJsonl(path: string, options: JsonlOptions = {}): AsyncIterable<unknown> {
  const log = options.logger ?? defaultLogger;
  return {
    [Symbol.asyncIterator]: () => iterateJsonl(path, log),
  };
}

async function* iterateJsonl(path: string, log: Logger): AsyncGenerator<unknown> {
  if (!(await pathExists(path))) return;

  const rl = readline.createInterface({
    input: createReadStream(path, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    if (!line.trim()) continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      log.warn(`Skipping malformed line ${lineNumber} in ${path}: ${toError(err).message}`);
      continue;
    }
    yield value;
  }
}
