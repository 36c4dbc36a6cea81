import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { HistoryDB, type OutcomeLogEntry, type RunRecord } from '../sync/history.js';
import type { OutcomeStatus } from '../types.js';
import { fileExists, getHistoryDbPath } from '../utils/paths.js';
import { colorRunStatus, formatSize } from './report.js';

export interface LogCommandOptions {
  all?: boolean;
  status?: string;
  path?: string;
  limit: string;
  json?: boolean;
  config?: string;
}

export interface LogCommandDeps {
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

const OUTCOME_STATUSES: readonly OutcomeStatus[] = ['succeeded', 'skipped', 'failed'];

function isOutcomeStatus(value: string): value is OutcomeStatus {
  return OUTCOME_STATUSES.some((status) => status === value);
}

export function shortRunId(id: string): string {
  return id.slice(0, 8);
}

function colorOutcomeStatus(status: OutcomeStatus): string {
  switch (status) {
    case 'succeeded':
      return chalk.green(status);
    case 'skipped':
      return chalk.dim(status);
    case 'failed':
      return chalk.red.bold(status);
  }
}

export function formatRunLine(run: RunRecord): string {
  const counts = `${run.succeeded} succeeded, ${run.skipped} skipped, ${run.failed} failed, ${formatSize(run.bytes)}`;
  return (
    `${chalk.yellow(shortRunId(run.id))}  ${new Date(run.startedAt).toISOString()}  ` +
    `${colorRunStatus(run.status)}  ${run.reference}  ${chalk.dim(`(${counts})`)}`
  );
}

export function formatLogEntry(entry: OutcomeLogEntry): string {
  const path = entry.kind === 'directory' ? `${entry.remotePath}/` : entry.remotePath;
  const details = entry.details ? `  ${chalk.dim(entry.details)}` : '';
  return `${colorOutcomeStatus(entry.status)}  ${path}${details}`;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid --limit value: "${value}"`);
  }
  return limit;
}

function showRun(db: HistoryDB, run: RunRecord, opts: LogCommandOptions, limit: number, print: (line: string) => void): void {
  let status: OutcomeStatus | undefined;
  if (!opts.all) {
    const wanted = opts.status ?? 'failed';
    if (!isOutcomeStatus(wanted)) {
      throw new Error(`Invalid --status value: "${wanted}". Use succeeded, skipped or failed.`);
    }
    status = wanted;
  }
  // stored newest first; shown in the order they were recorded
  const entries = db.getOutcomeLog({ runId: run.id, status, path: opts.path, limit }).reverse();

  if (opts.json) {
    print(JSON.stringify({ run, outcomes: entries }, null, 2));
    return;
  }

  print(formatRunLine(run));
  print(chalk.dim(`  to ${run.destination}`));
  if (run.fatalError) {
    print(chalk.red(`  Error: ${run.fatalError}`));
  }
  if (entries.length === 0) {
    print(chalk.dim(status ? `  No ${status} outcomes.` : '  No outcomes recorded.'));
    return;
  }
  for (const entry of entries) {
    print(`  ${formatLogEntry(entry)}`);
  }
}

/**
 * List recorded runs, or with a run id (any unique prefix) show that run's
 * outcomes: failures by default, everything with --all. Returns the exit code.
 */
export async function runLogCommand(
  runId: string | undefined,
  opts: LogCommandOptions,
  deps: LogCommandDeps = {},
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));

  try {
    const config = await loadConfig(opts.config);
    const limit = parseLimit(opts.limit);
    const dbPath = getHistoryDbPath(config);

    if (!(await fileExists(dbPath))) {
      print(chalk.dim('No sync history found. Run a sync first.'));
      return 0;
    }

    const db = new HistoryDB(dbPath);
    try {
      if (runId === undefined) {
        const runs = db.getRecentRuns(limit);
        if (opts.json) {
          print(JSON.stringify(runs, null, 2));
        } else if (runs.length === 0) {
          print(chalk.dim('No runs recorded.'));
        } else {
          for (const run of runs) {
            print(formatRunLine(run));
          }
        }
        return 0;
      }

      const [run, ...others] = db.findRuns(runId);
      if (!run) {
        throw new Error(`No run matches "${runId}"`);
      }
      if (others.length > 0) {
        throw new Error(`"${runId}" matches more than one run; give more of the id`);
      }
      showRun(db, run, opts, limit, print);
      return 0;
    } finally {
      db.close();
    }
  } catch (err) {
    printError(chalk.red(`Error: ${errorMessage(err)}`));
    return 1;
  }
}

export const logCommand = new Command('log')
  .description('List recorded runs, or show the outcomes of one run')
  .argument('[run-id]', 'run to show; any unique prefix of its id')
  .option('-a, --all', 'show every outcome of the run, not only failures')
  .option('-s, --status <status>', 'show outcomes with this status (succeeded, skipped, failed)')
  .option('-p, --path <prefix>', 'only outcomes under this remote path')
  .option('-n, --limit <n>', 'number of runs or outcomes to show', '20')
  .option('--json', 'output as JSON')
  .option('--config <path>', 'configuration file')
  .action(async (runId: string | undefined, opts: LogCommandOptions) => {
    process.exitCode = await runLogCommand(runId, opts);
  });
