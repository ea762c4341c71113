import { Command } from 'commander';
import { clientFor } from '../settings.js';
import { watch } from '../watch.js';

export const watchCommand = new Command('watch')
  .description('Print the history snapshot, then live notifications until Ctrl-C')
  .action(async (_options: unknown, command: Command) => {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    await watch(clientFor(command).subscribeUrl(), (line) => console.log(line), controller.signal);
    console.log('Connection closed.');
  });
