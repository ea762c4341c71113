import type { Command } from 'commander';
import { z } from 'zod';
import { RelayClient } from './client.js';

export const DEFAULT_RELAY_URL = 'http://127.0.0.1:8086';

const globalOptions = z.object({
  url: z.string().url(),
  token: z
    .string({ required_error: 'a token is required (--token or RELAY_TOKEN)' })
    .min(1, 'a token is required (--token or RELAY_TOKEN)'),
});

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

/** Build a client from the program-level --url / --token options of a subcommand. */
export function clientFor(command: Command): RelayClient {
  const parsed = globalOptions.safeParse(command.optsWithGlobals());
  if (!parsed.success) {
    throw new CliError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return new RelayClient({ baseUrl: parsed.data.url, token: parsed.data.token });
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new CliError(`not an integer: ${value}`);
  }
  return parsed;
}
