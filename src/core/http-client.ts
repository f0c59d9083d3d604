export interface HttpRequestOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  /** Declared body length, when the server sent one */
  contentLength?: number;
  etag?: string;
  text(): Promise<string>;
  chunks(): AsyncIterable<Uint8Array>;
  /** Releases a body that will not be read */
  cancel(): Promise<void>;
}

/**
 * Minimal GET capability the engine cache needs from an HTTP stack.
 * Transport failures reject; HTTP error statuses resolve with their status.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export class FetchHttpClient implements HttpClient {
  private readonly fetchImpl: typeof fetch;

  constructor(fetchImpl?: typeof fetch) {
    const candidate = fetchImpl ?? globalThis.fetch;
    if (typeof candidate !== 'function') {
      throw new Error('FetchHttpClient requires a fetch implementation');
    }
    this.fetchImpl = fetchImpl ?? candidate.bind(globalThis);
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await this.fetchImpl(url, {
      headers: { 'User-Agent': 'engine-cache', ...options.headers },
      signal: options.signal
    });

    const rawLength = response.headers.get('content-length');
    const contentLength = rawLength && /^\d+$/.test(rawLength) ? Number.parseInt(rawLength, 10) : undefined;
    const body = response.body;

    return {
      status: response.status,
      contentLength,
      etag: response.headers.get('etag') ?? undefined,
      text: () => response.text(),
      cancel: async () => {
        if (body && !body.locked) {
          await body.cancel();
        }
      },
      chunks: async function* () {
        if (!body) {
          return;
        }
        const reader = body.getReader();
        try {
          while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            yield value;
          }
        } finally {
          reader.releaseLock();
        }
      }
    };
  }
}
