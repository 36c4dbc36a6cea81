import { Command } from 'commander';
import { syncCommand } from './sync.js';
import { logCommand } from './log.js';
import { statusCommand } from './status.js';

export const program = new Command()
  .name('files-sync')
  .description('Mirror files and directories from an Agave files service to the local filesystem')
  .version('0.1.0');

program.addCommand(syncCommand, { isDefault: true });
program.addCommand(logCommand);
program.addCommand(statusCommand);
