import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, loadCredentials, getConfigPath } from '../config.js';
import { errorMessage } from '../errors.js';
import { HistoryDB } from '../sync/history.js';
import { fileExists, getHistoryDbPath } from '../utils/paths.js';
import { formatRunLine, shortRunId } from './log.js';

export const statusCommand = new Command('status')
  .description('Show configuration, credentials and the last run')
  .option('--config <path>', 'configuration file')
  .action(async (opts: { config?: string }) => {
    try {
      const config = await loadConfig(opts.config);
      const configPath = opts.config ?? getConfigPath();

      console.log('');
      console.log(chalk.bold('files-sync status'));
      console.log(chalk.dim('─'.repeat(40)));

      const configState = (await fileExists(configPath)) ? configPath : `${configPath} ${chalk.dim('(defaults)')}`;
      console.log(`  Config:      ${configState}`);
      console.log(`  Concurrency: ${config.sync.maxConcurrency}  Retries: ${config.sync.maxRetries}  Timeout: ${config.sync.requestTimeoutMs} ms`);

      try {
        const credentials = await loadCredentials(config);
        console.log(`  Server:      ${credentials.baseUrl}`);
        console.log(`  Credentials: ${chalk.green('found')}`);
      } catch (err) {
        console.log(`  Credentials: ${chalk.red(errorMessage(err))}`);
      }

      console.log('');
      console.log(chalk.bold('  Last run'));
      const dbPath = getHistoryDbPath(config);
      if (!config.history.enabled) {
        console.log(chalk.dim('    History is disabled'));
      } else if (await fileExists(dbPath)) {
        const db = new HistoryDB(dbPath);
        const [run] = db.getRecentRuns(1);
        db.close();

        if (run) {
          console.log(`    ${formatRunLine(run)}`);
          if (run.fatalError) {
            console.log(chalk.red(`    ${run.fatalError}`));
          }
          if (run.failed > 0) {
            console.log(chalk.dim(`    See the failures with: files-sync log ${shortRunId(run.id)}`));
          }
        } else {
          console.log(chalk.dim('    No runs recorded'));
        }
      } else {
        console.log(chalk.dim('    No history database found'));
      }
      console.log('');
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
