#!/usr/bin/env node
import 'dotenv/config';
import { Command, Option } from 'commander';
import { clearCommand } from './commands/clear.js';
import { historyCommand } from './commands/history.js';
import { markSeenCommand } from './commands/mark-seen.js';
import { sendCommand } from './commands/send.js';
import { watchCommand } from './commands/watch.js';
import { DEFAULT_RELAY_URL } from './settings.js';

const program = new Command();

program
  .name('notirelay')
  .description('Send, inspect and watch notifications on a relay')
  .version('0.1.0')
  .addOption(new Option('--url <url>', 'Relay base URL').env('RELAY_URL').default(DEFAULT_RELAY_URL))
  .addOption(new Option('--token <token>', 'Shared auth token').env('RELAY_TOKEN'));

program.addCommand(sendCommand);
program.addCommand(historyCommand);
program.addCommand(markSeenCommand);
program.addCommand(clearCommand);
program.addCommand(watchCommand);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
}
