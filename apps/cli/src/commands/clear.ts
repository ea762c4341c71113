import { Command } from 'commander';
import { clientFor } from '../settings.js';

export const clearCommand = new Command('clear')
  .description('Delete every stored notification (irreversible)')
  .action(async (_options: unknown, command: Command) => {
    await clientFor(command).clear();
    console.log('All notifications deleted.');
  });
