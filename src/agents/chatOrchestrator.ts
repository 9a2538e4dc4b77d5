/**
 * chatOrchestrator.ts — Runs one chat turn end to end.
 *
 * FLOW
 * ────
 *   1. session ready            (bootstrap / re-auth on demand)
 *   2. model resolved           (discovery; empty name → default model)
 *   3. attachments uploaded     (any failure aborts before the chat call)
 *   4. challenge token minted   (purpose "send-message")
 *   5. POST create-evaluation   (new conversation)
 *      POST post-to-evaluation/<resume key>   (continuation)
 *   6. response lines decoded into StreamEvents
 *
 * Only the latest user message is sent; the server holds the history and the
 * resume key selects it.  Nothing here retries: classified errors surface to
 * the caller as they are, and a block page also degrades the session.
 */

import { v7 as uuidv7 } from 'uuid';
import { CloudflareError, UnsupportedInputError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  Attachment,
  ChatCompletion,
  ClientConfig,
  Conversation,
  ConversationRef,
  Model,
  UploadedAttachment,
} from '../core/types';
import type { GatewayResponse, HttpGateway } from '../middleware/httpGateway';
import type { SessionDriver } from './sessionDriver';
import type { SurfaceDiscovery } from './surfaceDiscovery';
import { TurnStream } from './turnStream';
import type { Uploader } from './uploader';
import { decodeTurn } from './wireProtocol';

const logger = new Logger('ChatOrchestrator');

const CAPTCHA_PURPOSE = 'send-message';

export interface SendRequest {
  /** Resume key or a Conversation from an earlier turn; absent → new conversation. */
  conversationRef?: ConversationRef | null;
  /** Display name or id; empty → the catalog's default model. */
  model?: string;
  lastUserMessage: string;
  attachments?: readonly Attachment[];
  wantStream?: boolean;
  /** Aborts the turn like TurnStream.cancel(). */
  signal?: AbortSignal;
  /** Receives the conversation with its resume key when the turn completes. */
  onComplete?: (conversation: Conversation) => void;
}

/** Body of the create / post-to-evaluation call. */
export interface TurnPayload {
  id: string;
  mode: 'direct';
  modelAId: string;
  userMessageId: string;
  modelAMessageId: string;
  userMessage: {
    content: string;
    experimental_attachments: UploadedAttachment[];
    metadata: Record<string, never>;
  };
  modality: 'image' | 'chat';
  recaptchaV3Token: string;
}

export interface ChatOrchestratorOptions {
  session: SessionDriver;
  discovery: Pick<SurfaceDiscovery, 'resolveModel'>;
  uploader: Pick<Uploader, 'uploadAll'>;
  gateway: HttpGateway;
  config: Pick<ClientConfig, 'origin' | 'chatTimeoutMs'>;
  /** Id generator; UUIDv7 by default. */
  newId?: () => string;
}

export class ChatOrchestrator {
  private readonly session: SessionDriver;
  private readonly discovery: ChatOrchestratorOptions['discovery'];
  private readonly uploader: ChatOrchestratorOptions['uploader'];
  private readonly gateway: HttpGateway;
  private readonly config: ChatOrchestratorOptions['config'];
  private readonly newId: () => string;

  constructor(options: ChatOrchestratorOptions) {
    this.session = options.session;
    this.discovery = options.discovery;
    this.uploader = options.uploader;
    this.gateway = options.gateway;
    this.config = options.config;
    this.newId = options.newId ?? uuidv7;
  }

  send(request: SendRequest & { wantStream: true }): Promise<TurnStream>;
  send(request: SendRequest & { wantStream?: false }): Promise<ChatCompletion>;
  send(request: SendRequest): Promise<TurnStream | ChatCompletion>;
  async send(request: SendRequest): Promise<TurnStream | ChatCompletion> {
    const stream = await this.open(request);
    return request.wantStream ? stream : stream.collect();
  }

  // ── Turn assembly ──────────────────────────────────────

  private async open(request: SendRequest): Promise<TurnStream> {
    await this.session.ensureReady();

    const ref = request.conversationRef ?? null;
    const model = await this.discovery.resolveModel(request.model ?? (isConversation(ref) ? ref.model : ''));
    const attachments = request.attachments ?? [];
    if (attachments.length > 0 && !model.acceptsImages) {
      throw new UnsupportedInputError(`Model "${model.displayName}" does not accept image attachments`);
    }

    const conversation = this.resolveConversation(ref, model);
    const files = await this.guard(() => this.uploader.uploadAll(attachments));
    const token = await this.session.getCaptchaToken(CAPTCHA_PURPOSE);

    const continuing = conversation.evaluationSessionId !== null;
    const id = conversation.evaluationSessionId ?? conversation.localConversationId;
    const url = continuing
      ? `${this.config.origin}/nextjs-api/stream/post-to-evaluation/${encodeURIComponent(id)}`
      : `${this.config.origin}/nextjs-api/stream/create-evaluation`;

    const payload = buildTurnPayload({
      id,
      model,
      content: request.lastUserMessage,
      attachments: files,
      token: token.value,
      newId: this.newId,
    });

    const controller = new AbortController();
    const release = linkSignal(request.signal, controller);

    logger.info(
      `${continuing ? 'Continuing' : 'Starting'} conversation ${conversation.localConversationId} ` +
        `with ${model.displayName} (${files.length} attachments)`,
    );

    let response: GatewayResponse;
    try {
      response = await this.guard(() =>
        this.gateway.request({
          url,
          method: 'POST',
          json: payload,
          timeoutMs: this.config.chatTimeoutMs,
          signal: controller.signal,
          context: 'chat stream',
        }),
      );
    } catch (err) {
      release();
      throw err;
    }

    const events = decodeTurn(response.lines(), {
      sentId: id,
      knownResumeKey: conversation.evaluationSessionId,
      signal: controller.signal,
    });

    return new TurnStream(events, {
      controller,
      conversation,
      onComplete: request.onComplete,
      onSettled: release,
    });
  }

  private resolveConversation(ref: ConversationRef | null, model: Model): Conversation {
    if (ref === null) {
      return { localConversationId: this.newId(), evaluationSessionId: null, model: model.displayName };
    }
    if (typeof ref === 'string') {
      return { localConversationId: ref, evaluationSessionId: ref, model: model.displayName };
    }
    return { ...ref, model: model.displayName };
  }

  /** Run `op`; a block page degrades the session before the error propagates. */
  private async guard<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof CloudflareError || (err instanceof Error && err.cause instanceof CloudflareError)) {
        this.session.markDegraded('block page on request');
      }
      throw err;
    }
  }
}

// ─── Payload ──────────────────────────────────────────────────

export interface TurnPayloadInput {
  id: string;
  model: Model;
  content: string;
  attachments: UploadedAttachment[];
  token: string;
  newId: () => string;
}

export function buildTurnPayload(input: TurnPayloadInput): TurnPayload {
  return {
    id: input.id,
    mode: 'direct',
    modelAId: input.model.id,
    userMessageId: input.newId(),
    modelAMessageId: input.newId(),
    userMessage: {
      content: input.content,
      experimental_attachments: input.attachments,
      metadata: {},
    },
    modality: input.model.outputsImages ? 'image' : 'chat',
    recaptchaV3Token: input.token,
  };
}

/** Forward an abort from the caller's signal; returns the unsubscribe. */
function linkSignal(external: AbortSignal | undefined, controller: AbortController): () => void {
  if (!external) return () => {};
  if (external.aborted) {
    controller.abort();
    return () => {};
  }
  const onAbort = () => controller.abort();
  external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

function isConversation(ref: ConversationRef | null): ref is Conversation {
  return ref !== null && typeof ref !== 'string';
}
