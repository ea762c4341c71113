import { ServerMessage } from '@notirelay/protocol';
import WebSocket, { type RawData } from 'ws';
import { describeMessage } from './format.js';

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function parseFrame(data: RawData): ServerMessage | undefined {
  let json: unknown;
  try {
    json = JSON.parse(frameText(data));
  } catch {
    return undefined;
  }
  const parsed = ServerMessage.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Subscribe and print every frame until the relay closes the connection or
 * `signal` aborts. Pings are answered by ws itself.
 */
export function watch(url: string, print: (line: string) => void, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);

    ws.on('message', (data) => {
      const message = parseFrame(data);
      if (message === undefined) {
        print('(ignored malformed frame)');
        return;
      }
      for (const line of describeMessage(message)) print(line);
    });
    ws.on('error', reject);
    ws.on('close', () => resolve());

    signal?.addEventListener('abort', () => ws.close(), { once: true });
  });
}
