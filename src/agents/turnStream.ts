/**
 * turnStream.ts — Single-pass handle on one chat turn.
 *
 * Iterate it for StreamEvents, or call `collect()` for a ChatCompletion;
 * either consumes the turn and a second attempt throws.  `cancel()` aborts
 * the underlying request and the sequence ends with a `cancelled` error
 * event that still carries any resume key observed so far.
 */

import { StreamError } from '../core/errors';
import { Logger } from '../core/logger';
import type { ChatCompletion, Conversation, StreamEvent, UsageStats } from '../core/types';

const logger = new Logger('TurnStream');

export interface TurnStreamOptions {
  /** Aborting this controller tears down the request. */
  controller: AbortController;
  conversation: Conversation;
  /** Invoked once with the updated conversation when the turn completes. */
  onComplete?: (conversation: Conversation) => void;
  /** Invoked once when the sequence ends, however it ends. */
  onSettled?: () => void;
}

export class TurnStream implements AsyncIterable<StreamEvent> {
  private readonly events: AsyncIterable<StreamEvent>;
  private readonly controller: AbortController;
  private readonly onComplete?: (conversation: Conversation) => void;
  private readonly onSettled?: () => void;
  private current: Conversation;
  private started = false;
  private finished = false;

  constructor(events: AsyncIterable<StreamEvent>, options: TurnStreamOptions) {
    this.events = events;
    this.controller = options.controller;
    this.current = options.conversation;
    this.onComplete = options.onComplete;
    this.onSettled = options.onSettled;
  }

  /** Conversation state; carries the resume key once the turn is done. */
  get conversation(): Conversation {
    return this.current;
  }

  get resumeKey(): string | null {
    return this.current.evaluationSessionId;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (this.finished || this.controller.signal.aborted) return;
    logger.info(`Cancelling turn for ${this.current.localConversationId}`);
    this.controller.abort();
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    if (this.started) {
      throw new Error('TurnStream can only be consumed once');
    }
    this.started = true;
    return this.run();
  }

  /** Drain the turn into a ChatCompletion; an error event throws StreamError. */
  async collect(): Promise<ChatCompletion> {
    let text = '';
    const images: string[] = [];
    let usage: UsageStats | null = null;

    for await (const event of this) {
      switch (event.type) {
        case 'text-delta':
          text += event.text;
          break;
        case 'image-delta':
          images.push(event.url);
          break;
        case 'usage':
          usage = event.usage;
          break;
        case 'error':
          throw new StreamError(`Turn failed (${event.kind}): ${event.detail}`, text, event.evaluationSessionId);
        case 'done':
          return {
            text,
            images,
            evaluationSessionId: event.evaluationSessionId,
            finishReason: event.finishReason,
            usage,
            conversation: this.current,
          };
      }
    }

    throw new StreamError('Turn ended without a terminal event', text, this.resumeKey);
  }

  // ── Internals ──────────────────────────────────────────

  private async *run(): AsyncGenerator<StreamEvent> {
    const iterator = this.events[Symbol.asyncIterator]();
    try {
      while (!this.finished) {
        if (this.controller.signal.aborted) {
          this.finished = true;
          yield {
            type: 'error',
            kind: 'cancelled',
            detail: 'turn cancelled by caller',
            evaluationSessionId: this.resumeKey,
          };
          return;
        }

        const next = await iterator.next();
        if (next.done) {
          this.finished = true;
          return;
        }

        const event = this.observe(next.value);
        if (event.type === 'done' || event.type === 'error') {
          this.finished = true;
        }
        yield event;
      }
    } finally {
      this.onSettled?.();
      if (iterator.return) {
        await iterator.return();
      }
    }
  }

  /**
   * Record the resume key from the terminal event.  A key, once set, never
   * changes; a different key from the server is logged and the original kept.
   */
  private observe(event: StreamEvent): StreamEvent {
    if (event.type === 'error') {
      return event.evaluationSessionId === null && this.resumeKey !== null
        ? { ...event, evaluationSessionId: this.resumeKey }
        : event;
    }
    if (event.type !== 'done') {
      return event;
    }

    const existing = this.current.evaluationSessionId;
    if (existing !== null && existing !== event.evaluationSessionId) {
      logger.warn(
        `Server reported resume key ${event.evaluationSessionId} for conversation ${existing}; keeping ${existing}`,
      );
    }
    const evaluationSessionId = existing ?? event.evaluationSessionId;
    this.current = { ...this.current, evaluationSessionId };
    this.onComplete?.(this.current);
    return { ...event, evaluationSessionId };
  }
}
