/**
 * humanBehavior.ts — Human-like pointer and keyboard input via ghost-cursor.
 *
 * The bootstrap needs three interactions that the challenge widget scores:
 * clicking the consent button, clicking inside the Turnstile frame, and
 * typing into the message box.  ghost-cursor moves along Bezier paths with
 * overshoot; typing uses a Gaussian inter-key delay.
 */

import { createCursor, type GhostCursor } from 'ghost-cursor';
import type { Page } from 'puppeteer-core';
import { Logger } from '../core/logger';

const logger = new Logger('HumanBehavior');

export interface Point {
  x: number;
  y: number;
}

export function createHumanCursor(page: Page): GhostCursor {
  return createCursor(page);
}

/** Move to `selector` and click it after a short perceptual pause. */
export async function humanClick(cursor: GhostCursor, selector: string): Promise<void> {
  logger.debug(`Human-clicking ${selector}`);
  await sleep(randomBetween(50, 150));
  await cursor.click(selector);
}

/**
 * Click an absolute viewport point (used for the challenge checkbox, which
 * lives inside a cross-origin frame and cannot be selected directly).
 */
export async function humanClickAt(page: Page, cursor: GhostCursor, point: Point): Promise<void> {
  logger.debug(`Human-clicking at (${Math.round(point.x)}, ${Math.round(point.y)})`);
  await cursor.moveTo(point);
  await sleep(randomBetween(50, 150));
  await page.mouse.click(point.x, point.y, { delay: randomBetween(40, 120) });
}

/** Type `text` one character at a time with human inter-key timing. */
export async function humanType(page: Page, selector: string, text: string): Promise<void> {
  logger.debug(`Human-typing ${text.length} characters into ${selector}`);

  await page.click(selector);
  await sleep(randomBetween(100, 300));

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    await page.keyboard.type(char);

    let delay = gaussianRandom(80, 30);
    if (char === ' ') {
      delay += randomBetween(100, 400);
    }
    await sleep(Math.max(20, Math.min(delay, 500)));
  }
}

// ─── Utility functions ──────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

/** Box-Muller transform. */
function gaussianRandom(mean: number, stdDev: number): number {
  const u1 = Math.random() || Number.MIN_VALUE;
  const u2 = Math.random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return z * stdDev + mean;
}
