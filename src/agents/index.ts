/**
 * agents/index.ts — Barrel export for the stateful layer.
 *
 * `middleware/` holds request-level concerns (transport, classification,
 * input simulation).  `agents/` holds the modules that own state across
 * requests: the browser session, the discovered surface, uploads and turns.
 */

export { BrowserSessionDriver, buildRequestHeaders, captchaActionFor } from './sessionDriver';
export type { SessionDriver, BrowserHandle, BrowserSessionDriverOptions } from './sessionDriver';

export { SessionStateMachine, IllegalTransitionError } from './sessionState';

export { SurfaceDiscovery, LOGICAL_ACTIONS, buildCatalog } from './surfaceDiscovery';
export type { SurfaceSnapshot, SurfaceDiscoveryOptions } from './surfaceDiscovery';

export { Uploader } from './uploader';
export type { UploaderOptions } from './uploader';

export { ChatOrchestrator, buildTurnPayload } from './chatOrchestrator';
export type { SendRequest, TurnPayload, ChatOrchestratorOptions } from './chatOrchestrator';

export { TurnStream } from './turnStream';
export { decodeTurn, normalizeUsage } from './wireProtocol';
