/**
 * httpGateway.ts — The single chokepoint for every outbound call.
 *
 * REQUEST SIDE
 * ────────────
 * Same-origin requests are decorated with the browser session's cookies and
 * browser-like headers (user agent, sec-ch-ua, origin/referer).  Requests to
 * third-party storage (`withSession: false`) go out bare.
 *
 * RESPONSE SIDE
 * ─────────────
 * Non-2xx answers are read in full and classified, in order:
 *
 *   1. block-page fragment, or a rejected challenge token on 403 → CloudflareError
 *   2. 401 / 403 while the auth cookie is missing                → AuthError
 *   3. 5xx, or no response at all                                → TransientError
 *   4. 429 / 402                                                 → RateLimitError
 *   5. anything else                                             → HttpError
 *
 * 2xx answers come back as a GatewayResponse whose body can be consumed
 * once, buffered (`text()` / `json()`) or line by line (`lines()`).
 */

import {
  AuthError,
  CloudflareError,
  HttpError,
  RateLimitError,
  TransientError,
  errorMessage,
} from '../core/errors';
import { Logger } from '../core/logger';
import type { ClientConfig, CookieJar } from '../core/types';
import { isAuthWallStatus, isBlockPage, isRateLimitStatus, looksLikeCaptchaFailure } from './blockPage';
import {
  gotTransport,
  type HeaderMap,
  type HttpMethod,
  type Transport,
  type TransportResponse,
} from './transport';

const logger = new Logger('HttpGateway');

/** Where session cookies and headers come from (the session driver). */
export interface CredentialSource {
  getCookies(): CookieJar;
  getRequestHeaders(): Record<string, string>;
}

export interface GatewayRequest {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
  /** Serialized as the body with a JSON content type unless one is given. */
  json?: unknown;
  /** Attach the session's cookies and browser headers (default true). */
  withSession?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Short label for logs ("chat stream", "generate-upload-url", …). */
  context?: string;
}

export interface GatewayOptions {
  config: Pick<ClientConfig, 'authCookieName' | 'blockPageSignatures' | 'chatTimeoutMs'>;
  credentials?: CredentialSource;
  transport?: Transport;
}

export class HttpGateway {
  private readonly config: GatewayOptions['config'];
  private readonly credentials?: CredentialSource;
  private readonly transport: Transport;

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.credentials = options.credentials;
    this.transport = options.transport ?? gotTransport;
  }

  /** Issue one request; resolves with the 2xx response or throws a classified error. */
  async request(req: GatewayRequest): Promise<GatewayResponse> {
    const method = req.method ?? 'GET';
    const context = req.context ?? `${method} ${req.url}`;
    const withSession = req.withSession ?? true;
    const cookies: CookieJar = withSession && this.credentials ? this.credentials.getCookies() : {};

    const headers: Record<string, string> = {
      ...(withSession && this.credentials ? this.credentials.getRequestHeaders() : {}),
      ...lowercaseKeys(req.headers ?? {}),
    };

    let body = req.body;
    if (req.json !== undefined) {
      body = JSON.stringify(req.json);
      if (!headers['content-type']) {
        headers['content-type'] = 'application/json';
      }
    }

    const cookieHeader = serializeCookies(cookies);
    if (cookieHeader) {
      headers['cookie'] = cookieHeader;
    }

    let response: TransportResponse;
    try {
      response = await this.transport({
        url: req.url,
        method,
        headers,
        body,
        timeoutMs: req.timeoutMs ?? this.config.chatTimeoutMs,
        signal: req.signal,
      });
    } catch (err) {
      logger.warn(`${context}: no response (${errorMessage(err)})`);
      throw new TransientError(`${context}: connection failed: ${errorMessage(err)}`, { cause: err });
    }

    const gatewayResponse = new GatewayResponse(response.statusCode, response.headers, response.body);
    if (response.statusCode >= 200 && response.statusCode < 300) {
      logger.debug(`${context}: HTTP ${response.statusCode}`);
      return gatewayResponse;
    }

    let text = '';
    try {
      text = await gatewayResponse.text();
    } catch (err) {
      logger.warn(`${context}: error body unreadable (${errorMessage(err)})`);
    }

    logger.warn(`${context}: HTTP ${response.statusCode} from ${req.url}`);
    throw this.classify(response.statusCode, text, cookies, context);
  }

  /** Map a non-2xx answer onto the error taxonomy. */
  classify(status: number, body: string, cookies: CookieJar, context: string): Error {
    if (isBlockPage(body, this.config.blockPageSignatures)) {
      return new CloudflareError(`${context}: HTTP ${status} block page`);
    }
    if (status === 403 && looksLikeCaptchaFailure(body)) {
      return new CloudflareError(`${context}: HTTP 403 challenge token rejected`);
    }
    if (isAuthWallStatus(status) && !hasAuthCookie(cookies, this.config.authCookieName)) {
      return new AuthError(`${context}: HTTP ${status} without an auth cookie`);
    }
    if (status >= 500) {
      return new TransientError(`${context}: HTTP ${status}`);
    }
    if (isRateLimitStatus(status)) {
      return new RateLimitError(status, body);
    }
    return new HttpError(status, body);
  }
}

// ─── Response ───────────────────────────────────────────────

export class GatewayResponse {
  private consumed = false;

  constructor(
    readonly status: number,
    readonly headers: HeaderMap,
    private readonly body: AsyncIterable<Uint8Array | string>,
  ) {}

  header(name: string): string | undefined {
    const value = this.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
  }

  async text(): Promise<string> {
    let out = '';
    for await (const piece of decode(this.take())) {
      out += piece;
    }
    return out;
  }

  /** Body split on \n (a trailing \r is dropped); the last line may lack a newline. */
  async *lines(): AsyncGenerator<string> {
    let buffer = '';
    for await (const piece of decode(this.take())) {
      buffer += piece;
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        yield stripCarriageReturn(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
      }
    }
    if (buffer.length > 0) {
      yield stripCarriageReturn(buffer);
    }
  }

  private take(): AsyncIterable<Uint8Array | string> {
    if (this.consumed) {
      throw new Error('Response body already consumed');
    }
    this.consumed = true;
    return this.body;
  }
}

// ─── Helpers ────────────────────────────────────────────────

async function* decode(chunks: AsyncIterable<Uint8Array | string>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  for await (const chunk of chunks) {
    yield typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
  }
  const tail = decoder.decode();
  if (tail) yield tail;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function hasAuthCookie(cookies: CookieJar, authCookieName: string): boolean {
  return Object.keys(cookies).some((name) => name.includes(authCookieName));
}

export function serializeCookies(cookies: CookieJar): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

function lowercaseKeys(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key.toLowerCase()] = value;
  }
  return out;
}
