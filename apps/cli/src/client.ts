import {
  ErrorResponse,
  HistoryResponse,
  MarkSeenResponse,
  SendResponse,
  type MarkSeenRequest,
  type SendRequest,
} from '@notirelay/protocol';

export interface RelayClientOptions {
  /** Relay base URL; a path prefix (reverse proxy mount) is kept */
  baseUrl: string;
  token: string;
  fetch?: typeof fetch;
}

export interface HistoryPage {
  limit?: number;
  offset?: number;
}

/**
 * Non-2xx answer from the relay, or no answer at all (status 0).
 */
export class RelayRequestError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'RelayRequestError';
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Sender-side HTTP client for the relay. Every call carries the shared token as a
 * Bearer header and every response body is validated with the shared schemas.
 */
export class RelayClient {
  private readonly baseUrl: URL;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RelayClientOptions) {
    const base = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.baseUrl = new URL(base);
    this.token = options.token;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(text: string, title?: string): Promise<SendResponse> {
    const body: SendRequest = { title, text };
    return SendResponse.parse(await this.request('POST', 'send', body));
  }

  async history(page: HistoryPage = {}): Promise<HistoryResponse> {
    const params = new URLSearchParams();
    if (page.limit !== undefined) params.set('limit', String(page.limit));
    if (page.offset !== undefined) params.set('offset', String(page.offset));
    const query = params.toString();

    return HistoryResponse.parse(await this.request('GET', query === '' ? 'history' : `history?${query}`));
  }

  /** Without ids (or with an empty list) every unseen notification is marked. */
  async markSeen(ids?: number[]): Promise<number> {
    const body: MarkSeenRequest | undefined = ids !== undefined && ids.length > 0 ? { ids } : undefined;
    return MarkSeenResponse.parse(await this.request('POST', 'mark-seen', body)).marked;
  }

  async clear(): Promise<void> {
    await this.request('DELETE', 'notifications');
  }

  /** ws:// (or wss://) address of the subscription endpoint, token included. */
  subscribeUrl(): string {
    const url = new URL('ws', this.baseUrl);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    url.searchParams.set('token', this.token);
    return url.href;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const url = new URL(path, this.baseUrl).href;
    const headers: Record<string, string> = { Authorization: `Bearer ${this.token}` };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      throw new RelayRequestError(0, `${method} ${url}: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!res.ok) {
      const text = await res.text();
      const parsed = ErrorResponse.safeParse(parseJson(text));
      const reason = parsed.success ? parsed.data.error : text || res.statusText;
      throw new RelayRequestError(res.status, `${method} ${url}: ${res.status} ${reason}`);
    }

    if (res.status === 204) return undefined;
    const data: unknown = await res.json();
    return data;
  }
}
