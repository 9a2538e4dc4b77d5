/**
 * transport.ts — Raw HTTP exchange underneath the gateway.
 *
 * The default transport is got-scraping: its TLS Client Hello and generated
 * header set match a desktop Chrome, which the arena's edge expects to see
 * alongside the browser session's cookies.  The response body is handed back
 * as a chunk stream so chat replies can be parsed while they arrive.
 *
 * Tests swap in an in-process stub with the same signature.
 */

import { gotScraping } from 'got-scraping';
import { Logger } from '../core/logger';

const logger = new Logger('Transport');

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type HeaderMap = Record<string, string | string[] | undefined>;

export interface TransportResponse {
  statusCode: number;
  headers: HeaderMap;
  /** Body chunks in arrival order; may be iterated once. */
  body: AsyncIterable<Uint8Array | string>;
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

interface ResponseHead {
  statusCode?: number;
  headers: HeaderMap;
}

/**
 * got-scraping backed transport.  Resolves once the response head arrives;
 * connection-level failures before that point reject.
 */
export const gotTransport: Transport = async (request) => {
  logger.debug(`${request.method} ${request.url}`);

  const stream = gotScraping.stream(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body === undefined ? undefined : toBuffer(request.body),
    timeout: { request: request.timeoutMs },
    throwHttpErrors: false,
    followRedirect: true,
  });

  if (request.signal) {
    const signal = request.signal;
    const abort = () => stream.destroy(new Error('Request aborted by caller'));
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener('abort', abort, { once: true });
      stream.once('close', () => signal.removeEventListener('abort', abort));
    }
  }

  const head = await new Promise<ResponseHead>((resolve, reject) => {
    stream.once('response', (response: ResponseHead) => resolve(response));
    stream.once('error', (err: Error) => reject(err));
  });

  return {
    statusCode: head.statusCode ?? 0,
    headers: head.headers,
    body: readChunks(stream),
  };
};

async function* readChunks(stream: AsyncIterable<unknown>): AsyncGenerator<Uint8Array | string> {
  for await (const chunk of stream) {
    if (typeof chunk === 'string' || chunk instanceof Uint8Array) {
      yield chunk;
    }
  }
}

function toBuffer(body: string | Uint8Array): Buffer {
  return typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
}
