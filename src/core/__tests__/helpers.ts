import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createHash } from 'crypto';
import { HttpClient, HttpRequestOptions, HttpResponse } from '../http-client';

export interface FakeRoute {
  status?: number;
  body?: string | Uint8Array;
  etag?: string;
  chunkSize?: number;
  /** Every chunk after the first waits for this */
  gate?: Promise<void>;
  error?: Error;
}

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

type RouteHandler = FakeRoute | ((request: RecordedRequest) => FakeRoute);

function waitForGate(gate: Promise<void>, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('The operation was aborted'));
      return;
    }
    signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), { once: true });
    gate.then(resolve, reject);
  });
}

/**
 * In-process stand-in for the HTTP stack, serving canned responses per URL
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];

  /** URLs whose response body was released without being read */
  readonly cancelled: string[] = [];

  private readonly routes = new Map<string, RouteHandler>();

  route(url: string, handler: RouteHandler): this {
    this.routes.set(url, handler);
    return this;
  }

  count(url: string): number {
    return this.requests.filter((request) => request.url === url).length;
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const request: RecordedRequest = { url, headers: { ...options.headers } };
    this.requests.push(request);

    const handler = this.routes.get(url);
    const route: FakeRoute = handler === undefined ? { status: 404, body: 'not found' } : typeof handler === 'function' ? handler(request) : handler;
    if (route.error) {
      throw route.error;
    }

    const body = route.body ?? '';
    const bytes = typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;
    const chunkSize = route.chunkSize ?? 64 * 1024;
    const signal = options.signal;
    const cancelled = this.cancelled;

    return {
      status: route.status ?? 200,
      contentLength: bytes.byteLength,
      etag: route.etag,
      text: async () => Buffer.from(bytes).toString('utf-8'),
      cancel: async () => {
        cancelled.push(url);
      },
      chunks: async function* () {
        for (let offset = 0; offset < bytes.byteLength; offset += chunkSize) {
          if (offset > 0 && route.gate) {
            await waitForGate(route.gate, signal);
          }
          if (signal?.aborted) {
            throw new Error('The operation was aborted');
          }
          yield bytes.subarray(offset, offset + chunkSize);
        }
      }
    };
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function createDeferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = () => res();
  });
  return { promise, resolve };
}

export function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'engine-cache-test-'));
}

/**
 * Mutable clock for tests that need to control timestamps
 */
export class TestClock {
  constructor(public now: number = 1_000_000) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}
