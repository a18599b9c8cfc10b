import chalk from 'chalk';
import type { RunMetadata, TaskSpec, ValidationResult } from '@benchkit/shared';

export type LineWriter = (line: string) => void;

/**
 * Console progress for a suite run: one line per task and a closing summary.
 */
export class SuiteRenderer {
  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  suiteStarted(suite: string, taskCount: number, runDir: string) {
    this.write(chalk.bold.cyan(`\nValidating suite "${suite}" (${taskCount} task(s))`));
    this.write(chalk.gray(`Run directory: ${runDir}`));
    this.write('='.repeat(80));
  }

  taskStarted(task: TaskSpec, index: number, total: number) {
    this.write(chalk.gray(`(${index + 1}/${total})`) + ` ${chalk.bold(task.id)} ${chalk.gray(task.repo.url)}`);
  }

  taskFinished(result: ValidationResult) {
    const badge = result.valid ? chalk.green.bold('VALID') : chalk.red.bold('INVALID');
    let line = `  ${badge} ${result.taskId} exit=${result.exitCode} in ${result.durationSec.toFixed(2)}s`;
    if (result.errorReason) line += ` ${chalk.yellow(result.errorReason)}`;
    this.write(line);
  }

  suiteFinished(metadata: RunMetadata, runDir: string) {
    this.write('='.repeat(80));
    this.write(chalk.bold.cyan('Summary'));
    this.write(`  Tasks:          ${metadata.task_count}`);
    this.write(`  Valid:          ${chalk.green(String(metadata.valid_count))}`);
    this.write(`  Invalid:        ${chalk.red(String(metadata.invalid_count))}`);
    if (metadata.interrupted) {
      this.write(chalk.yellow(`  Interrupted:    ${metadata.not_attempted} task(s) not attempted`));
    }
    for (const [reason, count] of Object.entries(metadata.failure_counts)) {
      this.write(`  - ${reason}: ${count}`);
    }
    this.write(chalk.cyan(`\nResults written to: ${runDir}`));
  }
}
