/**
 * arena-bridge — programmatic access to the arena's chat through a real
 * browser session.
 */

export { ArenaClient, ChatSession, parseCliArgs } from './arenaClient';
export type { ArenaClientOverrides, CliArgs } from './arenaClient';

export * from './agents';
export * from './middleware';
export * from './core/errors';
export * from './core/types';
export { Logger, setLogSink } from './core/logger';
export type { LogLevel, LogSink } from './core/logger';
export { BrowserWorker } from './core/browserWorker';
export { BrowserManager, planLaunch } from './core/browserManager';
