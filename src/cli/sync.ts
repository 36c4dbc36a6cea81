import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig, loadCredentials, type FilesSyncConfig } from '../config.js';
import { InvalidReferenceError, errorMessage } from '../errors.js';
import { parseSource } from '../remote/reference.js';
import { HistoryDB, SyncRun, SyncSession, trackRun, EXIT_CODES } from '../sync/index.js';
import type { FetchLike } from '../remote/client.js';
import type { Credentials } from '../types.js';
import { getHistoryDbPath, getHistoryDir } from '../utils/paths.js';
import { formatOutcome, formatSummary } from './report.js';

export interface SyncCommandOptions {
  recursive?: boolean;
  destination: string;
  newName?: string;
  concurrency?: number;
  exclude: string[];
  force?: boolean;
  config?: string;
  history: boolean;
  quiet?: boolean;
}

export interface SyncCommandDeps {
  fetch?: FetchLike;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function openHistory(
  config: FilesSyncConfig,
  enabled: boolean,
  warn: (message: string) => void,
): Promise<HistoryDB | null> {
  if (!enabled || !config.history.enabled) return null;
  try {
    await mkdir(getHistoryDir(config), { recursive: true });
    return new HistoryDB(getHistoryDbPath(config));
  } catch (err) {
    warn(`history disabled for this run: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Run one sync and return the process exit code. Nothing is fetched when
 * the reference does not parse.
 */
export async function runSyncCommand(
  reference: string,
  opts: SyncCommandOptions,
  deps: SyncCommandDeps = {},
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const warn = (message: string): void => printError(chalk.yellow(`Warning: ${message}`));

  try {
    parseSource(reference);
  } catch (err) {
    if (err instanceof InvalidReferenceError) {
      printError(chalk.red(`Error: ${err.message}`));
      return EXIT_CODES['total-failure'];
    }
    throw err;
  }

  let config: FilesSyncConfig;
  let credentials: Credentials;
  try {
    config = await loadConfig(opts.config);
    credentials = await loadCredentials(config);
  } catch (err) {
    printError(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    return EXIT_CODES['total-failure'];
  }

  const destination = resolve(opts.destination);
  const history = await openHistory(config, opts.history, warn);
  const run = new SyncRun();
  const tracker = history
    ? trackRun(history, run, reference, destination, (err) => {
        warn(`history disabled for this run: ${errorMessage(err)}`);
      })
    : null;
  if (!opts.quiet) {
    run.on('outcome', (outcome) => {
      print(formatOutcome(outcome, destination));
    });
  }

  const controller = new AbortController();
  const onSignal = (): void => {
    printError(chalk.yellow('Cancelling: waiting for in-flight transfers...'));
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const session = new SyncSession({ config, credentials, fetch: deps.fetch });
    const summary = await session.run(
      {
        reference,
        destination,
        recursive: opts.recursive ?? false,
        newName: opts.newName,
        force: opts.force,
        exclude: opts.exclude,
        maxConcurrency: opts.concurrency,
      },
      run,
      controller.signal,
    );

    tracker?.finish(summary);
    for (const line of formatSummary(summary)) {
      print(line);
    }
    return summary.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    tracker?.stop();
    history?.close();
  }
}

export const syncCommand = new Command('sync')
  .description('Download a remote file, or mirror a remote directory with --recursive')
  .argument('<reference>', 'agave://<system>/<path>, or a files/v2 media or listings URL')
  .option('-r, --recursive', 'mirror a directory tree')
  .option('-d, --destination <dir>', 'local destination directory', '.')
  .option('-n, --new-name <name>', 'local name for the file or top directory')
  .option('-c, --concurrency <n>', 'max concurrent remote operations', parsePositiveInt)
  .option('-x, --exclude <glob>', 'skip entries matching this glob (repeatable)', collect, [])
  .option('-f, --force', 'download even when the local copy is up to date')
  .option('--config <path>', 'configuration file')
  .option('--no-history', 'do not record this run')
  .option('-q, --quiet', 'only print the summary')
  .action(async (reference: string, opts: SyncCommandOptions) => {
    try {
      process.exitCode = await runSyncCommand(reference, opts);
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = EXIT_CODES['total-failure'];
    }
  });
