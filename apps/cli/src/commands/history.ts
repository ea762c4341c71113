import { Command, Option } from 'commander';
import { formatNotification } from '../format.js';
import { clientFor, parseInteger } from '../settings.js';

export const historyCommand = new Command('history')
  .addOption(new Option('-l, --limit <n>', 'Page size').argParser(parseInteger))
  .addOption(new Option('-o, --offset <n>', 'Rows to skip').argParser(parseInteger))
  .description('List stored notifications, newest first')
  .action(async (options: { limit?: number; offset?: number }, command: Command) => {
    const rows = await clientFor(command).history(options);
    if (rows.length === 0) {
      console.log('No notifications.');
      return;
    }
    for (const row of rows) console.log(formatNotification(row));
  });
