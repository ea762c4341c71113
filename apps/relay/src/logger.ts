/**
 * Tagged single-line logging to stderr, e.g. `[relay] send: id=3 sent_to=2`.
 * Components take a Logger instead of writing to stderr themselves so tests can
 * capture or silence them.
 */
export type Logger = (message: string) => void;

export function createLogger(
  tag: string,
  write: (line: string) => void = (line) => {
    process.stderr.write(line);
  },
): Logger {
  return (message) => write(`[${tag}] ${message}\n`);
}

export const silentLogger: Logger = () => {};
