import { Command } from 'commander';
import { clientFor } from '../settings.js';

export const sendCommand = new Command('send')
  .argument('<text>', 'Notification body')
  .option('-t, --title <title>', 'Notification title')
  .description('Store a notification and push it to every live subscriber')
  .action(async (text: string, options: { title?: string }, command: Command) => {
    const { id, sent_to } = await clientFor(command).send(text, options.title);
    console.log(`Sent notification #${id} to ${sent_to} subscriber(s).`);
  });
