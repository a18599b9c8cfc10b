import path from 'node:path';
import type { Command } from 'commander';
import fs from 'fs-extra';
import { ATTEMPTS_FILE, readAttempts, summarizeRecords } from '@benchkit/eval';
import { UsageError, logger } from '@benchkit/shared';
import { createContext, resolveFrom, type CliDeps } from '../context';
import { OutputRenderer } from '../output/renderer';

export function registerAttemptsCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('attempts')
    .argument('<run-dir>', 'Run directory containing attempts.jsonl')
    .description('Summarize the attempts recorded in a run')
    .action(async (runDir: string) => {
      const ctx = createContext(program, deps);
      const attemptsPath = path.join(resolveFrom(ctx, runDir), ATTEMPTS_FILE);
      if (!(await fs.pathExists(attemptsPath))) {
        throw new UsageError(`No ${ATTEMPTS_FILE} in ${runDir}`);
      }

      const records = await readAttempts(attemptsPath, logger);
      new OutputRenderer(!!ctx.options.json).attempts(summarizeRecords(records), records);
    });
}
