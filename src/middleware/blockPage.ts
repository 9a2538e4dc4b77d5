/**
 * blockPage.ts — Status / body signatures the anti-bot layer answers with.
 *
 * Two different things look alike on the wire:
 *
 *   • a hard block page ("Sorry, you have been blocked") — nothing the
 *     session can do in place; the request fails with CloudflareError and
 *     the session is marked degraded;
 *   • an interactive challenge ("Just a moment…", a Turnstile widget) — the
 *     bootstrap engages it and waits.
 *
 * Literal fragments drift whenever the provider changes its templates, so
 * the block list is configuration (`ClientConfig.blockPageSignatures`).
 */

import { DEFAULT_BLOCK_PAGE_SIGNATURES } from '../core/types';

const CHALLENGE_SIGNATURES = [
  'just a moment...',
  'cf-turnstile',
  'challenge-platform',
  'cf-chl-',
];

const CAPTCHA_FAILURE_SIGNATURES = [
  'recaptcha validation failed',
  'recaptcha verification failed',
  'invalid recaptcha',
];

/** True when `body` contains one of the hard-block fragments. */
export function isBlockPage(
  body: string,
  signatures: readonly string[] = DEFAULT_BLOCK_PAGE_SIGNATURES,
): boolean {
  if (!body) return false;
  const lower = body.toLowerCase();
  return signatures.some((s) => s && lower.includes(s.toLowerCase()));
}

/** True when `body` is an interactive challenge rather than the app. */
export function isChallengePage(body: string): boolean {
  const lower = body.toLowerCase();
  return CHALLENGE_SIGNATURES.some((s) => lower.includes(s));
}

/** True when the server rejected the challenge token that came with a request. */
export function looksLikeCaptchaFailure(body: string): boolean {
  const lower = body.toLowerCase();
  return CAPTCHA_FAILURE_SIGNATURES.some((s) => lower.includes(s));
}

export function isAuthWallStatus(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403;
}

export function isRateLimitStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode === 402;
}
