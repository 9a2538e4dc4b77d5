/**
 * sessionDriver.ts — Owner of the authenticated browser session.
 *
 * RESPONSIBILITIES
 * ────────────────
 * The arena only answers requests that carry (a) the cookies of a browser
 * that passed its challenge widget and (b) a fresh challenge-provider token
 * minted inside that same browser.  The driver keeps one real browser alive
 * and hands both out:
 *
 *   bootstrap()          launch, pass consent + challenge, wait for auth cookie
 *   getCookies()         last snapshot, never touches the browser
 *   getRequestHeaders()  browser-like header set with the live user agent
 *   getCaptchaToken(p)   mint a token for purpose `p` inside the page
 *   markDegraded(r)      a block page was seen; next ensureReady() re-auths
 *   shutdown()           idempotent teardown
 *
 * Every operation that touches the page runs through the BrowserWorker, so
 * at most one of them is in flight at any time.
 */

import { BrowserManager } from '../core/browserManager';
import { BrowserWorker } from '../core/browserWorker';
import {
  ArenaError,
  AuthError,
  CloudflareError,
  TokenTimeoutError,
  TransientError,
  errorMessage,
} from '../core/errors';
import { Logger } from '../core/logger';
import type { CaptchaToken, ClientConfig, CookieJar, SessionState } from '../core/types';
import type { CredentialSource } from '../middleware/httpGateway';
import { isBlockPage, isChallengePage } from '../middleware/blockPage';
import type { BrowserTab, NavigationResponse } from '../middleware/browserTab';
import { sleep } from '../middleware/humanBehavior';
import { SessionStateMachine } from './sessionState';

const logger = new Logger('SessionDriver');

/** Any automation handle that can produce arena credentials. */
export interface SessionDriver extends CredentialSource {
  readonly state: SessionState;
  bootstrap(): Promise<void>;
  /** Bootstrap when uninitialized or degraded; no-op when ready. */
  ensureReady(): Promise<void>;
  getCookies(): CookieJar;
  getRequestHeaders(): Record<string, string>;
  getCaptchaToken(purpose: string): Promise<CaptchaToken>;
  markDegraded(reason: string): void;
  shutdown(): Promise<void>;
}

// ── Constants ──────────────────────────────────────────────

const CAPTCHA_ACTIONS: Readonly<Record<string, string>> = {
  'send-message': 'chat_submit',
};

const BASE_HEADERS: Readonly<Record<string, string>> = {
  accept: '*/*',
  'accept-language': 'en-US',
  'sec-ch-ua': '"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="99"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"Windows"',
  'sec-fetch-dest': 'empty',
  'sec-fetch-mode': 'cors',
  'sec-fetch-site': 'same-origin',
};

const FALLBACK_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36';

const SELECTORS = {
  appShell: 'body:not(.no-js)',
  acceptCookies: '::-p-text(Accept Cookies)',
  messageBox: 'textarea[name="message"]',
  turnstile: ['#cf-turnstile', '[style="display: grid;"]'],
};

const RECAPTCHA_READY = 'window.grecaptcha && window.grecaptcha.enterprise';

const COOKIE_POLL_INTERVAL_MS = 1_000;
const STEP_TIMEOUT_MS = 15_000;

/** Challenge-provider action name for a purpose tag; unknown tags pass through. */
export function captchaActionFor(purpose: string): string {
  return CAPTCHA_ACTIONS[purpose] ?? purpose;
}

/** Browser-like header set for same-origin API calls. */
export function buildRequestHeaders(
  origin: string,
  userAgent: string | null,
  language: string | null,
): Record<string, string> {
  const headers: Record<string, string> = {
    ...BASE_HEADERS,
    origin,
    referer: `${origin}/`,
    'user-agent': userAgent ?? FALLBACK_USER_AGENT,
  };
  if (language) {
    headers['accept-language'] = language;
  }
  return headers;
}

/** What the driver needs from the process-wide browser. */
export type BrowserHandle = Pick<BrowserManager, 'openTab' | 'userAgent' | 'isRunning' | 'close'>;

export interface BrowserSessionDriverOptions {
  browser?: BrowserHandle;
  worker?: BrowserWorker;
  /** Delay between auth-cookie polls during bootstrap. */
  cookiePollMs?: number;
}

export class BrowserSessionDriver implements SessionDriver {
  private readonly config: ClientConfig;
  private readonly browser: BrowserHandle;
  private readonly worker: BrowserWorker;
  private readonly cookiePollMs: number;
  private readonly machine = new SessionStateMachine();

  private tab: BrowserTab | null = null;
  private cookies: CookieJar = {};
  private userAgent: string | null = null;
  private language: string | null = null;

  private bootstrapInflight: Promise<void> | null = null;
  private shutdownInflight: Promise<void> | null = null;

  constructor(config: ClientConfig, options: BrowserSessionDriverOptions = {}) {
    this.config = config;
    this.browser = options.browser ?? BrowserManager.getInstance(config.browser);
    this.worker = options.worker ?? new BrowserWorker({ waitTimeoutMs: config.lockWaitTimeoutMs });
    this.cookiePollMs = options.cookiePollMs ?? COOKIE_POLL_INTERVAL_MS;
  }

  get state(): SessionState {
    return this.machine.state;
  }

  // ── Lifecycle ──────────────────────────────────────────

  bootstrap(): Promise<void> {
    if (this.machine.isTerminal()) {
      return Promise.reject(new AuthError('Session has been shut down'));
    }
    if (this.bootstrapInflight) {
      return this.bootstrapInflight;
    }
    if (this.machine.state === 'ready') {
      return Promise.resolve();
    }

    this.machine.transition('bootstrapping', this.machine.state === 'degraded' ? 're-auth' : undefined);
    const timeoutMs = this.config.bootstrapTimeoutMs;

    this.bootstrapInflight = this.worker
      .run('bootstrap', () => this.runBootstrap(Date.now() + timeoutMs), {
        timeoutMs,
        onTimeout: () => new AuthError(`Bootstrap did not complete within ${timeoutMs}ms`),
      })
      .then(
        () => {
          if (!this.machine.isTerminal()) {
            this.machine.transition('ready', 'auth cookie present');
          }
        },
        (err: unknown) => {
          if (!this.machine.isTerminal()) {
            this.machine.transition(this.machine.failureState(), 'bootstrap failed');
          }
          const failure =
            err instanceof ArenaError
              ? err
              : new AuthError(`Bootstrap failed: ${errorMessage(err)}`, { cause: err });
          logger.error('Bootstrap failed', failure);
          throw failure;
        },
      )
      .finally(() => {
        this.bootstrapInflight = null;
      });

    return this.bootstrapInflight;
  }

  async ensureReady(): Promise<void> {
    if (this.machine.isTerminal()) {
      throw new AuthError('Session has been shut down');
    }
    if (this.machine.state === 'ready' && !this.browserAlive()) {
      this.markDegraded('browser disconnected');
    }
    if (this.machine.state === 'ready') return;
    await this.bootstrap();
  }

  markDegraded(reason: string): void {
    if (this.machine.state !== 'ready') {
      logger.debug(`Ignoring degrade while ${this.machine.state}: ${reason}`);
      return;
    }
    this.machine.transition('degraded', reason);
  }

  shutdown(): Promise<void> {
    if (this.machine.state === 'closed') {
      return Promise.resolve();
    }
    if (this.shutdownInflight) {
      return this.shutdownInflight;
    }

    this.machine.transition('shutting-down');
    this.shutdownInflight = (async () => {
      // Stop the queue before closing so no queued job relaunches the browser.
      const stopping = this.worker.stop();
      await this.browser.close();
      await stopping;
      this.tab = null;
      this.cookies = {};
      this.machine.transition('closed');
    })();
    return this.shutdownInflight;
  }

  // ── Credentials ────────────────────────────────────────

  getCookies(): CookieJar {
    return this.cookies;
  }

  getRequestHeaders(): Record<string, string> {
    return buildRequestHeaders(this.config.origin, this.userAgent, this.language);
  }

  async getCaptchaToken(purpose: string): Promise<CaptchaToken> {
    await this.ensureReady();
    const action = captchaActionFor(purpose);
    const timeoutMs = this.config.tokenTimeoutMs;

    try {
      return await this.worker.run(
        `captcha-token:${action}`,
        async () => {
          const tab = this.requireTab();
          await tab.waitForExpression(RECAPTCHA_READY, timeoutMs);

          const value = await tab.evaluate(tokenScript(this.config.recaptchaSiteKey, action));
          if (typeof value !== 'string' || value.length === 0) {
            throw new TransientError(`Challenge provider returned no token for "${action}"`);
          }

          await this.refreshCookies(tab);
          logger.debug(`Minted challenge token for ${action} (${value.length} chars)`);
          return { value, purpose, issuedAt: Date.now() };
        },
        { timeoutMs, onTimeout: () => new TokenTimeoutError(purpose, timeoutMs) },
      );
    } catch (err) {
      throw this.tokenFailure(purpose, err);
    }
  }

  // ── Bootstrap steps ────────────────────────────────────

  private async runBootstrap(deadline: number): Promise<void> {
    const tab = await this.browser.openTab(this.config.bootstrapTimeoutMs);
    if (this.tab !== tab) {
      tab.onNavigationResponse((response) => {
        this.inspectResponse(response).catch((err: unknown) => {
          logger.debug(`Response inspection failed: ${errorMessage(err)}`);
        });
      });
      this.tab = tab;
    }

    const bootUrl = `${this.config.origin}${this.config.bootPath}`;
    logger.info(`Navigating to ${bootUrl}`);
    const html = await tab.navigate(bootUrl, Math.max(deadline - Date.now(), 1));
    if (isBlockPage(html, this.config.blockPageSignatures)) {
      throw new CloudflareError(`Block page served at ${bootUrl}`);
    }
    if (isChallengePage(html)) {
      logger.info('Challenge page served; waiting for the widget to clear');
    }

    await tab.waitForSelector(SELECTORS.appShell, STEP_TIMEOUT_MS);

    await this.bestEffort('accept cookies', async () => {
      await tab.waitForSelector(SELECTORS.acceptCookies, 5_000);
      await tab.humanClick(SELECTORS.acceptCookies);
    });

    // Typing wakes the challenge widget on pages that render it lazily.
    await this.bestEffort('type into message box', () => tab.humanType(SELECTORS.messageBox, 'Hello'));

    await this.waitForAuthCookie(tab, deadline, () =>
      this.bestEffort('click challenge widget', async () => {
        await tab.clickWidget(SELECTORS.turnstile);
      }),
    );

    await tab.waitForExpression(RECAPTCHA_READY, Math.max(deadline - Date.now(), 1));

    this.userAgent = await this.browser.userAgent();
    const language = await tab.evaluate('navigator.language');
    this.language = typeof language === 'string' && language ? language : null;
    logger.info(`Bootstrap complete (${Object.keys(this.cookies).length} cookies)`);
  }

  /**
   * Poll the cookie jar until the auth cookie shows up.  `nudge` runs every
   * few polls to re-engage the challenge widget.
   */
  private async waitForAuthCookie(tab: BrowserTab, deadline: number, nudge: () => Promise<void>): Promise<void> {
    const name = this.config.authCookieName;
    for (let attempt = 0; Date.now() < deadline; attempt++) {
      if (this.machine.isTerminal()) {
        throw new AuthError('Session shut down during bootstrap');
      }

      await this.refreshCookies(tab);
      if (Object.keys(this.cookies).some((cookie) => cookie.includes(name))) {
        return;
      }

      const html = await tab.content();
      if (isBlockPage(html, this.config.blockPageSignatures)) {
        throw new CloudflareError('Block page served while waiting for the auth cookie');
      }

      if (attempt % 5 === 0) {
        await nudge();
      }
      await sleep(this.cookiePollMs);
    }
    throw new AuthError(`Auth cookie "${name}" did not appear before the bootstrap deadline`);
  }

  // ── Helpers ────────────────────────────────────────────

  private async refreshCookies(tab: BrowserTab): Promise<void> {
    const jar: Record<string, string> = {};
    for (const cookie of await tab.cookies(this.config.origin)) {
      jar[cookie.name] = cookie.value;
    }
    this.cookies = jar;
  }

  /** Degrade the session when a top-level navigation lands on a block page. */
  private async inspectResponse(response: NavigationResponse): Promise<void> {
    if (response.status < 400) return;

    const body = await response.text();
    if (isBlockPage(body, this.config.blockPageSignatures)) {
      logger.warn(`Block page on navigation to ${response.url}`);
      this.markDegraded('block page on navigation');
    }
  }

  /** A dead browser degrades the session so the next ensureReady() relaunches it. */
  private tokenFailure(purpose: string, err: unknown): ArenaError {
    if (!this.browserAlive()) {
      this.markDegraded('browser disconnected');
    }
    if (err instanceof ArenaError) {
      return err;
    }
    return new TransientError(`Challenge token for "${purpose}" failed: ${errorMessage(err)}`, { cause: err });
  }

  private browserAlive(): boolean {
    return this.browser.isRunning() && this.tab !== null && !this.tab.isClosed();
  }

  private async bestEffort(step: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      logger.warn(`Skipped "${step}": ${errorMessage(err)}`);
    }
  }

  private requireTab(): BrowserTab {
    if (!this.tab) {
      throw new AuthError('No browser tab; bootstrap has not completed');
    }
    return this.tab;
  }
}

// ─── Page scripts ─────────────────────────────────────────────

function tokenScript(siteKey: string, action: string): string {
  return `new Promise((resolve) => {
    window.grecaptcha.enterprise.ready(async () => {
      try {
        resolve(await window.grecaptcha.enterprise.execute(${JSON.stringify(siteKey)}, { action: ${JSON.stringify(action)} }));
      } catch (e) {
        resolve(null);
      }
    });
  })`;
}
