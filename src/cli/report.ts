import chalk from 'chalk';
import type { Outcome, RunStatus, RunSummary } from '../types.js';
import { pathDepth, relativePath } from '../utils/paths.js';

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

export function colorRunStatus(status: RunStatus | null): string {
  switch (status) {
    case 'all-succeeded':
      return chalk.green(status);
    case 'partial-failure':
      return chalk.yellow(status);
    case 'total-failure':
      return chalk.red(status);
    case null:
      return chalk.dim('unfinished');
  }
}

function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/** One progress line per outcome, indented by depth below `destination`. */
export function formatOutcome(outcome: Outcome, destination: string): string {
  const rel = relativePath(destination, outcome.subject.localPath);
  const indent = '  '.repeat(pathDepth(destination, outcome.subject.localPath));
  const name = lastSegment(rel);

  switch (outcome.status) {
    case 'succeeded':
      if (outcome.subject.kind === 'directory') {
        return `${indent}${chalk.green('mkdir')} ${rel}`;
      }
      return `${indent}${chalk.blue('downloading')} ${name} (${outcome.detail}, ${formatSize(outcome.bytes)})`;
    case 'skipped':
      return `${indent}${chalk.dim('skipping')} ${name} (${outcome.detail})`;
    case 'failed':
      return `${indent}${chalk.red('failed')} ${rel}: ${outcome.reason}`;
  }
}

export function formatSummary(summary: RunSummary): string[] {
  const lines: string[] = [];
  const counts =
    `${chalk.green(`${summary.succeeded} succeeded`)}  ` +
    `${chalk.dim(`${summary.skipped} skipped`)}  ` +
    `${summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : `${summary.failed} failed`}  ` +
    `(${formatSize(summary.bytes)} downloaded)`;
  lines.push(counts);

  if (summary.fatalError) {
    lines.push(chalk.red(`Error: ${summary.fatalError}`));
  }
  if (summary.failures.length > 0) {
    lines.push(chalk.red('Failures:'));
    for (const failure of summary.failures) {
      lines.push(`  - ${failure.subject.remotePath}: ${failure.reason}`);
    }
  }

  switch (summary.status) {
    case 'all-succeeded':
      lines.push(chalk.green('Sync complete.'));
      break;
    case 'partial-failure':
      lines.push(chalk.yellow('Sync finished with failures.'));
      break;
    case 'total-failure':
      lines.push(chalk.red('Sync failed.'));
      break;
  }
  return lines;
}
