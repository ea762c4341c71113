import { Command, Option } from 'commander';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface RelayConfig {
  port: number;
  host: string;
  dbPath: string;
  token: string;
}

export interface TokenSource {
  token?: string;
  tokenFile?: string;
}

export type ReadTextFile = (path: string) => Promise<string>;

// Empty values (an exported-but-blank env var, `--token ""`) count as not given.
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const optionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65_535),
  host: z.string().min(1),
  db: z.string().min(1),
  token: optionalString,
  tokenFile: optionalString,
});

/**
 * Command-line definition. Every flag can also come from the environment
 * (a .env file is loaded by the entry point before parsing).
 */
export function createProgram(): Command {
  return new Command()
    .name('notirelay-server')
    .description('Relay notifications from one trusted sender to live WebSocket subscribers')
    .version('0.1.0')
    .addOption(new Option('--port <port>', 'TCP port to listen on').env('RELAY_PORT').default('8086'))
    .addOption(
      new Option('--host <host>', 'address to bind; keep it local behind a reverse proxy')
        .env('RELAY_HOST')
        .default('127.0.0.1'),
    )
    .addOption(new Option('--db <path>', 'SQLite database file').env('RELAY_DB').default('notifications.db'))
    .addOption(new Option('--token <token>', 'shared auth token').env('RELAY_TOKEN'))
    .addOption(
      new Option('--token-file <path>', 'file holding the shared auth token').env('RELAY_TOKEN_FILE'),
    )
    .exitOverride();
}

/**
 * Resolve the shared token from exactly one source. File contents are trimmed.
 *
 * @throws ConfigError when neither or both sources are given, the file cannot be
 *   read, or the token comes out empty
 */
export async function resolveToken(
  source: TokenSource,
  read: ReadTextFile = (path) => readFile(path, 'utf8'),
): Promise<string> {
  const { token, tokenFile } = source;

  if (token !== undefined && tokenFile !== undefined) {
    throw new ConfigError('give exactly one of --token or --token-file, not both');
  }

  if (tokenFile !== undefined) {
    let raw: string;
    try {
      raw = await read(tokenFile);
    } catch (err) {
      throw new ConfigError(`read token file: ${err instanceof Error ? err.message : String(err)}`);
    }
    const fromFile = raw.trim();
    if (fromFile === '') {
      throw new ConfigError('token file is empty');
    }
    return fromFile;
  }

  if (token !== undefined) {
    if (token.trim() === '') {
      throw new ConfigError('token is empty');
    }
    return token;
  }

  throw new ConfigError('one of --token or --token-file is required');
}

/**
 * Parse flags (falling back to RELAY_* environment variables) into a validated config.
 *
 * @param argv process.argv, or bare user arguments when `from` is 'user'
 */
export async function loadConfig(
  argv: readonly string[],
  from: 'node' | 'user' = 'node',
  read?: ReadTextFile,
): Promise<RelayConfig> {
  const program = createProgram();
  program.parse([...argv], { from });

  const parsed = optionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`invalid options: ${details.join('; ')}`);
  }

  const { port, host, db, token, tokenFile } = parsed.data;
  return {
    port,
    host,
    dbPath: db,
    token: await resolveToken({ token, tokenFile }, read),
  };
}
