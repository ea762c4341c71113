import { Command } from 'commander';
import { clientFor, parseInteger } from '../settings.js';

export const markSeenCommand = new Command('mark-seen')
  .argument('[ids...]', 'Notification ids; all unseen notifications when omitted')
  .description('Mark notifications as seen')
  .action(async (ids: string[], _options: unknown, command: Command) => {
    const marked = await clientFor(command).markSeen(ids.map(parseInteger));
    console.log(`Marked ${marked} notification(s) as seen.`);
  });
