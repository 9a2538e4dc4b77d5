/**
 * Shared test doubles: an in-process transport, a session driver that never
 * launches a browser, and builders for landing pages and bundles.
 */

import type { SessionDriver } from '../src/agents/sessionDriver';
import { setLogSink, type LogLevel, type LogSink } from '../src/core/logger';
import type { CaptchaToken, ClientConfig, CookieJar, SessionState } from '../src/core/types';
import { loadClientConfig } from '../src/core/types';
import type { HeaderMap, Transport, TransportRequest } from '../src/middleware/transport';

export const ORIGIN = 'https://arena.test';

export const UPLOAD_ACTION_ID = `7f${'a'.repeat(40)}`;
export const SIGN_ACTION_ID = `60${'b'.repeat(40)}`;

export function testConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return { ...loadClientConfig({ ARENA_ORIGIN: ORIGIN }), ...overrides };
}

// ── Logging ────────────────────────────────────────────────

export interface CapturedLog {
  level: LogLevel;
  line: string;
}

/** Route log output into an array until `restore()` is called. */
export function captureLogs(): { lines: CapturedLog[]; restore: () => void } {
  const lines: CapturedLog[] = [];
  const sink: LogSink = (level, line) => {
    lines.push({ level, line });
  };
  const previous = setLogSink(sink);
  return {
    lines,
    restore: () => {
      setLogSink(previous);
    },
  };
}

// ── Transport ──────────────────────────────────────────────

export interface StubReply {
  status?: number;
  headers?: HeaderMap;
  /** Body delivered as these chunks, in order. */
  chunks?: string[];
  /** Throw instead of answering (connection failure). */
  fail?: Error;
}

export type StubRoute = (request: TransportRequest) => StubReply;

export class StubTransport {
  readonly requests: TransportRequest[] = [];

  constructor(private readonly route: StubRoute) {}

  readonly transport: Transport = async (request) => {
    this.requests.push(request);
    const reply = this.route(request);
    if (reply.fail) {
      throw reply.fail;
    }
    return {
      statusCode: reply.status ?? 200,
      headers: reply.headers ?? {},
      body: chunked(reply.chunks ?? [], request.signal),
    };
  };

  /** Requests whose URL contains `fragment`. */
  to(fragment: string): TransportRequest[] {
    return this.requests.filter((r) => r.url.includes(fragment));
  }
}

async function* chunked(chunks: readonly string[], signal: AbortSignal | undefined): AsyncGenerator<string> {
  for (const chunk of chunks) {
    await Promise.resolve();
    if (signal?.aborted) {
      throw new Error('socket closed');
    }
    yield chunk;
  }
}

export function bodyText(request: TransportRequest): string {
  const body = request.body;
  if (body === undefined) return '';
  return typeof body === 'string' ? body : new TextDecoder().decode(body);
}

// ── Session ────────────────────────────────────────────────

export class FakeSession implements SessionDriver {
  state: SessionState = 'ready';
  ensureReadyCalls = 0;
  tokensIssued = 0;
  readonly degradedReasons: string[] = [];
  cookies: CookieJar = { 'arena-auth-prod': 'test-cookie' };

  async bootstrap(): Promise<void> {
    this.state = 'ready';
  }

  async ensureReady(): Promise<void> {
    this.ensureReadyCalls++;
    if (this.state !== 'ready') {
      this.state = 'ready';
    }
  }

  getCookies(): CookieJar {
    return this.cookies;
  }

  getRequestHeaders(): Record<string, string> {
    return { 'user-agent': 'test-agent', origin: ORIGIN };
  }

  async getCaptchaToken(purpose: string): Promise<CaptchaToken> {
    this.tokensIssued++;
    return { value: `test-token-${this.tokensIssued}`, purpose, issuedAt: 0 };
  }

  markDegraded(reason: string): void {
    this.degradedReasons.push(reason);
    this.state = 'degraded';
  }

  async shutdown(): Promise<void> {
    this.state = 'closed';
  }
}

// ── Fixtures ───────────────────────────────────────────────

export interface RawModelFixture {
  id: string;
  publicName: string;
  capabilities: {
    inputCapabilities: Record<string, boolean>;
    outputCapabilities: Record<string, boolean>;
  };
}

export function rawModel(
  id: string,
  publicName: string,
  options: { output?: 'text' | 'image'; vision?: boolean } = {},
): RawModelFixture {
  const inputCapabilities: Record<string, boolean> = { text: true };
  if (options.vision) inputCapabilities.image = true;
  return {
    id,
    publicName,
    capabilities: {
      inputCapabilities,
      outputCapabilities: { [options.output ?? 'text']: true },
    },
  };
}

export const DEFAULT_MODELS: RawModelFixture[] = [
  rawModel('id-gemini', 'gemini-3-pro', { vision: true }),
  rawModel('id-claude', 'claude-test'),
  rawModel('id-imagen', 'imagen-test', { output: 'image' }),
];

export const EVALUATION_CHUNKS = ['static/chunks/shared.js', 'static/chunks/evaluation.js'];

/** Landing page with the flight payload and one external bundle. */
export function landingPage(models: readonly unknown[] | null = DEFAULT_MODELS): string {
  const rows: string[] = [];
  if (models !== null) {
    rows.push(`0:${JSON.stringify(['$', 'main', null, { children: [{ initialModels: models }] }])}`);
  }
  rows.push(`5:I${JSON.stringify(['9001', ['11', EVALUATION_CHUNKS[0], '12', EVALUATION_CHUNKS[1]], 'Evaluation'])}`);
  rows.push(`6:I${JSON.stringify(['9002', ['13', 'static/chunks/other.js'], 'Sidebar'])}`);

  const push = `self.__next_f.push(${JSON.stringify([1, `${rows.join('\n')}\n`])})`;
  return [
    '<!DOCTYPE html><html><head>',
    '<script src="/_next/static/chunks/main.js"></script>',
    '<script src="https://cdn.elsewhere.test/lib.js"></script>',
    '</head><body>',
    `<script>${push}</script>`,
    '</body></html>',
  ].join('');
}

/** Bundle text with server references for `actions` (name → id). */
export function bundle(actions: Record<string, string>): string {
  return Object.entries(actions)
    .map(
      ([name, id]) =>
        `let ${name}=(0,s.createServerReference)("${id}",s.callServer,void 0,s.findSourceMapURL,"${name}");`,
    )
    .join('\n');
}

/** Routes landing page + bundles; the Evaluation chunk carries both upload actions. */
export function surfaceRoute(options: { models?: readonly unknown[] | null } = {}): StubRoute {
  return (request) => {
    if (request.url.endsWith('/_next/static/chunks/evaluation.js')) {
      return {
        chunks: [bundle({ generateUploadUrl: UPLOAD_ACTION_ID, getSignedUrl: SIGN_ACTION_ID })],
      };
    }
    if (request.url.includes('/_next/')) {
      return { chunks: ['console.log("nothing here")'] };
    }
    return { chunks: [landingPage(options.models === undefined ? DEFAULT_MODELS : options.models)] };
  };
}

/** Wire lines of one successful turn. */
export function turnLines(deltas: readonly string[], finish: Record<string, unknown> = { finishReason: 'stop' }): string {
  return [...deltas.map((d) => `a0:${JSON.stringify(d)}`), `ad:${JSON.stringify(finish)}`].join('\n') + '\n';
}
