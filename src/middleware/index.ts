/**
 * middleware/index.ts — Barrel export for the middleware layer.
 */

// ── HTTP ────────────────────────────────────────────────────
export { HttpGateway, GatewayResponse, hasAuthCookie, serializeCookies } from './httpGateway';
export type { CredentialSource, GatewayRequest, GatewayOptions } from './httpGateway';
export { gotTransport } from './transport';
export type { Transport, TransportRequest, TransportResponse, HttpMethod, HeaderMap } from './transport';

// ── Block pages ─────────────────────────────────────────────
export {
  isBlockPage,
  isChallengePage,
  looksLikeCaptchaFailure,
  isAuthWallStatus,
  isRateLimitStatus,
} from './blockPage';

// ── Browser tab ─────────────────────────────────────────────
export { PuppeteerTab } from './browserTab';
export type { BrowserTab, CookieRecord, NavigationResponse } from './browserTab';

// ── Human behaviour ─────────────────────────────────────────
export { createHumanCursor, humanClick, humanClickAt, humanType } from './humanBehavior';
