/**
 * browserManager.ts — Process-wide owner of the stealth Chromium instance.
 *
 * One browser per process: the session driver asks for it through
 * `BrowserManager.getInstance(config)` and every later caller receives the
 * same manager.  Launch flags follow the config:
 *
 *   • headful unless `headless` is set (the challenge widget scores
 *     headless Chromium lower even with the stealth patches);
 *   • a persistent profile when `userDataDir` / `profileDirectory` is set,
 *     otherwise a guest profile in ./arena_browser_guest;
 *   • an executable path that does not exist is ignored with a warning, and
 *     the locally installed Chrome channel is used instead.
 */

import { existsSync } from 'fs';
import path from 'path';
import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser } from 'puppeteer-core';
import { PuppeteerTab, type BrowserTab } from '../middleware/browserTab';
import type { BrowserConfig } from './types';
import { Logger } from './logger';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
puppeteer.use(StealthPlugin());

export interface LaunchPlan {
  executablePath?: string;
  channel?: 'chrome';
  userDataDir: string;
  headless: boolean;
  args: string[];
}

/** Translate a BrowserConfig into concrete launch arguments. */
export function planLaunch(config: BrowserConfig, cwd: string = process.cwd()): LaunchPlan {
  const args = ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage'];
  if (config.incognito) {
    args.push('--incognito');
  }

  const usingProfile = Boolean(config.userDataDir || config.profileDirectory);
  const userDataDir =
    config.userDataDir ?? path.resolve(cwd, usingProfile ? 'arena_browser' : 'arena_browser_guest');
  if (!usingProfile) {
    args.unshift('--guest');
  }
  if (config.profileDirectory) {
    args.push(`--profile-directory=${config.profileDirectory}`);
  }

  let executablePath = config.executablePath;
  if (executablePath && !existsSync(executablePath)) {
    logger.warn(`Browser executable does not exist: ${executablePath} — using the installed Chrome`);
    executablePath = undefined;
  }

  return {
    executablePath,
    channel: executablePath ? undefined : 'chrome',
    userDataDir,
    headless: config.headless,
    args,
  };
}

export class BrowserManager {
  // ── Singleton plumbing ─────────────────────────────────

  private static instance: BrowserManager | null = null;
  private browser: Browser | null = null;
  private tab: PuppeteerTab | null = null;
  private readonly config: BrowserConfig;
  private exitHooksRegistered = false;

  private constructor(config: BrowserConfig) {
    this.config = config;
  }

  /** The first caller's config wins; a later, different config is ignored with a warning. */
  static getInstance(config: BrowserConfig): BrowserManager {
    if (!BrowserManager.instance) {
      BrowserManager.instance = new BrowserManager(config);
    } else if (JSON.stringify(BrowserManager.instance.config) !== JSON.stringify(config)) {
      logger.warn('Browser already configured for this process; ignoring the new browser config');
    }
    return BrowserManager.instance;
  }

  // ── Core API ───────────────────────────────────────────

  /**
   * Launch the browser if it is not running and return its first tab.  The
   * same BrowserTab comes back for as long as the underlying page lives.
   *
   * @param protocolTimeoutMs - Upper bound for any single DevTools call, so a
   *   wedged page cannot hold the browser worker forever.
   */
  async openTab(protocolTimeoutMs: number): Promise<BrowserTab> {
    const browser = await this.ensureBrowser(protocolTimeoutMs);
    const pages = await browser.pages();
    const page = pages[0] ?? (await browser.newPage());
    if (!this.tab || this.tab.page !== page) {
      this.tab = new PuppeteerTab(page);
    }
    return this.tab;
  }

  async userAgent(): Promise<string | null> {
    return this.browser ? this.browser.userAgent() : null;
  }

  isRunning(): boolean {
    return this.browser !== null && this.browser.connected;
  }

  /** Close the browser; safe to call repeatedly. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.tab = null;
    if (!browser) return;
    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (err) {
      logger.warn(`Browser close failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(protocolTimeoutMs: number): Promise<Browser> {
    if (this.browser && this.browser.connected) {
      return this.browser;
    }

    const plan = planLaunch(this.config);
    logger.info(
      `Launching browser (headless=${plan.headless}, profile=${plan.userDataDir}, ` +
        `executable=${plan.executablePath ?? `<${plan.channel}>`})`,
    );

    const browser: Browser = await puppeteer.launch({
      headless: plan.headless,
      executablePath: plan.executablePath,
      channel: plan.channel,
      userDataDir: plan.userDataDir,
      args: plan.args,
      defaultViewport: null,
      protocolTimeout: protocolTimeoutMs,
    });
    this.browser = browser;

    this.registerExitHooks();
    return browser;
  }

  private registerExitHooks(): void {
    if (this.exitHooksRegistered) return;
    this.exitHooksRegistered = true;

    const cleanup = async () => {
      await this.close();
      process.exit(0);
    };

    process.once('SIGINT', cleanup);
    process.once('SIGTERM', cleanup);
  }
}
