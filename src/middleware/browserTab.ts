/**
 * browserTab.ts — The slice of a browser tab the session driver works with.
 *
 * The driver never sees puppeteer directly: it drives a BrowserTab, and
 * PuppeteerTab maps each call onto puppeteer-core and ghost-cursor.  Tests
 * hand the driver an in-process tab instead.
 */

import type { GhostCursor } from 'ghost-cursor';
import type { HTTPResponse, Page } from 'puppeteer-core';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { createHumanCursor, humanClick, humanClickAt, humanType } from './humanBehavior';

const logger = new Logger('BrowserTab');

export interface CookieRecord {
  name: string;
  value: string;
}

export interface NavigationResponse {
  url: string;
  status: number;
  /** Body text; empty when the browser no longer holds it. */
  text(): Promise<string>;
}

export interface BrowserTab {
  /** Load `url` and return the HTML of the landing document. */
  navigate(url: string, timeoutMs: number): Promise<string>;
  content(): Promise<string>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  /** Resolve once `expression` evaluates truthy in the page. */
  waitForExpression(expression: string, timeoutMs: number): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
  cookies(url: string): Promise<CookieRecord[]>;
  humanClick(selector: string): Promise<void>;
  humanType(selector: string, text: string): Promise<void>;
  /** Click the first of `selectors` that renders a box; false when none does. */
  clickWidget(selectors: readonly string[]): Promise<boolean>;
  /** Subscribe to main-frame navigation responses. */
  onNavigationResponse(listener: (response: NavigationResponse) => void): void;
  isClosed(): boolean;
}

export class PuppeteerTab implements BrowserTab {
  private readonly cursor: GhostCursor;

  constructor(readonly page: Page) {
    this.cursor = createHumanCursor(page);
  }

  async navigate(url: string, timeoutMs: number): Promise<string> {
    const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    return response ? safeText(response) : this.page.content();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  async waitForExpression(expression: string, timeoutMs: number): Promise<void> {
    await this.page.waitForFunction(expression, { timeout: timeoutMs });
  }

  evaluate(expression: string): Promise<unknown> {
    return this.page.evaluate(expression);
  }

  async cookies(url: string): Promise<CookieRecord[]> {
    const cookies = await this.page.cookies(url);
    return cookies.map((cookie) => ({ name: cookie.name, value: cookie.value }));
  }

  humanClick(selector: string): Promise<void> {
    return humanClick(this.cursor, selector);
  }

  humanType(selector: string, text: string): Promise<void> {
    return humanType(this.page, selector, text);
  }

  async clickWidget(selectors: readonly string[]): Promise<boolean> {
    for (const selector of selectors) {
      const handle = await this.page.$(selector);
      const box = handle ? await handle.boundingBox() : null;
      if (box) {
        // The checkbox sits near the left edge of the cross-origin frame.
        await humanClickAt(this.page, this.cursor, { x: box.x + 30, y: box.y + box.height / 2 });
        return true;
      }
    }
    return false;
  }

  onNavigationResponse(listener: (response: NavigationResponse) => void): void {
    this.page.on('response', (response: HTTPResponse) => {
      const request = response.request();
      if (!request.isNavigationRequest() || request.frame() !== this.page.mainFrame()) {
        return;
      }
      listener({ url: response.url(), status: response.status(), text: () => safeText(response) });
    });
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }
}

/** Response bodies of redirects and aborted loads are unavailable. */
async function safeText(response: HTTPResponse): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    logger.debug(`Response body unavailable for ${response.url()}: ${errorMessage(err)}`);
    return '';
  }
}
