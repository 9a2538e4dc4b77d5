#!/usr/bin/env node
/**
 * arenaClient.ts — Composition root and command-line entry point.
 *
 * Wires one ClientConfig through every layer:
 *
 *   BrowserSessionDriver ─┐ credentials
 *                         ├─ HttpGateway ─┬─ SurfaceDiscovery
 *                         │               ├─ Uploader
 *                         └───────────────┴─ ChatOrchestrator
 *
 * Library use:
 *
 *   const client = ArenaClient.create();
 *   const chat = client.chats.create('gemini-3-pro');
 *   const first = await chat.send('1+1=');
 *   const again = await client.send({ conversationRef: first.evaluationSessionId, lastUserMessage: 'and 2+2?' });
 *   await client.shutdown();
 *
 * CLI:
 *
 *   arena-bridge [--model <name>] [--resume <key>] [--stream] [--list-models] <message…>
 */

import { v7 as uuidv7 } from 'uuid';
import { ChatOrchestrator, type SendRequest } from './agents/chatOrchestrator';
import { BrowserSessionDriver, type SessionDriver } from './agents/sessionDriver';
import { SurfaceDiscovery } from './agents/surfaceDiscovery';
import type { TurnStream } from './agents/turnStream';
import { Uploader } from './agents/uploader';
import { errorMessage } from './core/errors';
import { Logger } from './core/logger';
import {
  loadClientConfig,
  type Attachment,
  type ChatCompletion,
  type ClientConfig,
  type Conversation,
  type ModelCatalog,
} from './core/types';
import { HttpGateway } from './middleware/httpGateway';
import type { Transport } from './middleware/transport';

const logger = new Logger('ArenaClient');

export interface ArenaClientOverrides {
  /** Replaces the puppeteer-backed session (tests, other automation handles). */
  session?: SessionDriver;
  /** Replaces the got-scraping transport. */
  transport?: Transport;
  /** Clock for discovery staleness. */
  now?: () => number;
  /** Id generator for conversations and messages. */
  newId?: () => string;
}

export class ArenaClient {
  readonly config: ClientConfig;
  readonly session: SessionDriver;
  readonly discovery: SurfaceDiscovery;
  readonly uploader: Uploader;
  private readonly orchestrator: ChatOrchestrator;
  private readonly newId: () => string;

  /** Chat-session helper: a conversation handle that tracks its resume key. */
  readonly chats = {
    create: (model = ''): ChatSession =>
      new ChatSession(this, { localConversationId: this.newId(), evaluationSessionId: null, model }),
    resume: (evaluationSessionId: string, model = ''): ChatSession =>
      new ChatSession(this, { localConversationId: evaluationSessionId, evaluationSessionId, model }),
  };

  constructor(config: ClientConfig, overrides: ArenaClientOverrides = {}) {
    this.config = config;
    this.newId = overrides.newId ?? uuidv7;
    this.session = overrides.session ?? new BrowserSessionDriver(config);

    const gateway = new HttpGateway({ config, credentials: this.session, transport: overrides.transport });
    this.discovery = new SurfaceDiscovery({ gateway, config, now: overrides.now });
    this.uploader = new Uploader({ gateway, discovery: this.discovery, config });
    this.orchestrator = new ChatOrchestrator({
      session: this.session,
      discovery: this.discovery,
      uploader: this.uploader,
      gateway,
      config,
      newId: this.newId,
    });
  }

  static create(config: ClientConfig = loadClientConfig(), overrides: ArenaClientOverrides = {}): ArenaClient {
    return new ArenaClient(config, overrides);
  }

  // ── Public API ─────────────────────────────────────────

  async bootstrap(): Promise<void> {
    await this.session.ensureReady();
  }

  async listModels(forceRefresh = false): Promise<ModelCatalog> {
    await this.session.ensureReady();
    return this.discovery.listModels(forceRefresh);
  }

  send(request: SendRequest & { wantStream: true }): Promise<TurnStream>;
  send(request: SendRequest & { wantStream?: false }): Promise<ChatCompletion>;
  send(request: SendRequest): Promise<TurnStream | ChatCompletion>;
  send(request: SendRequest): Promise<TurnStream | ChatCompletion> {
    return this.orchestrator.send(request);
  }

  async shutdown(): Promise<void> {
    await this.session.shutdown();
    logger.info('Client shut down');
  }
}

/**
 * One conversation.  Turns on the same ChatSession must not overlap: each
 * one needs the resume key the previous turn produced.
 */
export class ChatSession {
  private current: Conversation;

  constructor(
    private readonly client: ArenaClient,
    conversation: Conversation,
  ) {
    this.current = conversation;
  }

  get conversation(): Conversation {
    return this.current;
  }

  get id(): string {
    return this.current.localConversationId;
  }

  async send(message: string, attachments: readonly Attachment[] = []): Promise<ChatCompletion> {
    const completion = await this.client.send({
      conversationRef: this.current,
      model: this.current.model,
      lastUserMessage: message,
      attachments,
    });
    this.current = completion.conversation;
    return completion;
  }

  stream(message: string, attachments: readonly Attachment[] = []): Promise<TurnStream> {
    return this.client.send({
      conversationRef: this.current,
      model: this.current.model,
      lastUserMessage: message,
      attachments,
      wantStream: true,
      onComplete: (conversation) => {
        this.current = conversation;
      },
    });
  }
}

// ─── CLI ──────────────────────────────────────────────────────

export interface CliArgs {
  model: string;
  resume: string | null;
  stream: boolean;
  listModels: boolean;
  message: string;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { model: '', resume: null, stream: false, listModels: false, message: '' };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--model':
        args.model = argv[++i] ?? '';
        break;
      case '--resume':
        args.resume = argv[++i] ?? null;
        break;
      case '--stream':
        args.stream = true;
        break;
      case '--list-models':
        args.listModels = true;
        break;
      default:
        words.push(arg);
    }
  }

  args.message = words.join(' ');
  return args;
}

async function runCli(client: ArenaClient, args: CliArgs): Promise<void> {
  if (args.listModels) {
    const catalog = await client.listModels();
    for (const model of catalog.models) {
      const kinds = [model.outputsText && 'text', model.outputsImages && 'image', model.acceptsImages && 'vision']
        .filter(Boolean)
        .join(',');
      console.log(`${model.displayName}\t${model.id}\t${kinds}`);
    }
    console.log(`default: ${catalog.defaultModel ?? '(none)'}`);
    return;
  }

  const request: SendRequest = { conversationRef: args.resume, model: args.model, lastUserMessage: args.message };

  if (!args.stream) {
    const completion = await client.send({ ...request, wantStream: false });
    console.log(completion.text);
    for (const url of completion.images) console.log(url);
    console.log(`\nresume key: ${completion.evaluationSessionId}`);
    return;
  }

  const turn = await client.send({ ...request, wantStream: true });
  for await (const event of turn) {
    if (event.type === 'text-delta') process.stdout.write(event.text);
    else if (event.type === 'image-delta') process.stdout.write(`\n${event.url}\n`);
    else if (event.type === 'error') throw new Error(`${event.kind}: ${event.detail}`);
    else if (event.type === 'done') process.stdout.write(`\n\nresume key: ${event.evaluationSessionId}\n`);
  }
}

async function main(argv: readonly string[]): Promise<void> {
  const args = parseCliArgs(argv);
  if (!args.listModels && !args.message) {
    console.error(
      'Usage: arena-bridge [--model <name>] [--resume <key>] [--stream] [--list-models] <message…>',
    );
    process.exit(1);
  }

  // Closed explicitly: the exit hooks only cover SIGINT/SIGTERM.
  const client = ArenaClient.create();
  try {
    await runCli(client, args);
  } finally {
    await client.shutdown();
  }
}

const isDirectRun = require.main === module;
if (isDirectRun) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    logger.error(`Failed: ${errorMessage(err)}`, err);
    process.exit(1);
  });
}
