/**
 * wireProtocol.ts — Decoder for the arena's line-oriented chat stream.
 *
 * Each line is `<prefix>:<json>`:
 *
 *   a0:"text"                       text delta ("hasArenaError" = failure)
 *   a2:[{"type":"heartbeat"}]       keep-alive, ignored
 *   a2:[{"image":"https://…"}]      generated image
 *   ad:{"finishReason":…,"usage":…} terminal marker
 *   a3:"message"                    remote error
 *
 * Unknown prefixes are skipped.  The decoder always ends with exactly one
 * terminal event (`done` or `error`) and stops reading after it.
 */

import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type { StreamErrorKind, StreamEvent, UsageStats } from '../core/types';

const logger = new Logger('WireProtocol');

const ARENA_ERROR_MARKER = 'hasArenaError';

export interface DecodeOptions {
  /** Conversation id sent with the request; the resume key unless `ad:` names another. */
  sentId: string;
  /** Resume key already known before this turn (null for a new conversation). */
  knownResumeKey: string | null;
  /** Distinguishes caller cancellation from transport failure. */
  signal?: AbortSignal;
}

/** Turn a stream of wire lines into StreamEvents. */
export async function* decodeTurn(lines: AsyncIterable<string>, options: DecodeOptions): AsyncGenerator<StreamEvent> {
  const failure = (kind: StreamErrorKind, detail: string): StreamEvent => ({
    type: 'error',
    kind,
    detail,
    evaluationSessionId: options.knownResumeKey,
  });

  try {
    for await (const line of lines) {
      if (line.length < 3 || line[2] !== ':') {
        if (line.trim()) logger.debug(`Skipping unframed line: ${line.slice(0, 80)}`);
        continue;
      }
      const prefix = line.slice(0, 2);
      const raw = line.slice(3);

      switch (prefix) {
        case 'a0': {
          const chunk = parseJson(raw);
          if (chunk === ARENA_ERROR_MARKER) {
            yield failure('arena', 'arena reported an error for this turn');
            return;
          }
          if (typeof chunk !== 'string') {
            yield failure('malformed', `bad text delta: ${raw.slice(0, 200)}`);
            return;
          }
          if (chunk) yield { type: 'text-delta', text: chunk };
          break;
        }

        case 'a2': {
          const entries = parseJson(raw);
          if (!Array.isArray(entries)) {
            yield failure('malformed', `bad attachment delta: ${raw.slice(0, 200)}`);
            return;
          }
          for (const entry of entries) {
            if (isRecord(entry) && typeof entry.image === 'string' && entry.image) {
              yield { type: 'image-delta', url: entry.image };
            }
          }
          break;
        }

        case 'ad': {
          const finish = parseJson(raw);
          if (!isRecord(finish)) {
            yield failure('malformed', `bad terminal marker: ${raw.slice(0, 200)}`);
            return;
          }
          const finishReason = typeof finish.finishReason === 'string' ? finish.finishReason : null;
          const evaluationSessionId =
            typeof finish.evaluationSessionId === 'string' && finish.evaluationSessionId
              ? finish.evaluationSessionId
              : options.sentId;

          if (isRecord(finish.usage)) {
            yield { type: 'usage', usage: normalizeUsage(finish.usage), finishReason };
          }
          yield { type: 'done', evaluationSessionId, finishReason };
          return;
        }

        case 'a3': {
          const payload = parseJson(raw);
          yield failure('remote', typeof payload === 'string' ? payload : raw);
          return;
        }

        default:
          logger.debug(`Ignoring "${prefix}" line`);
      }
    }
  } catch (err) {
    const cancelled = options.signal?.aborted ?? false;
    yield failure(cancelled ? 'cancelled' : 'transport', cancelled ? 'turn cancelled by caller' : errorMessage(err));
    return;
  }

  yield failure('truncated', 'stream ended without a terminal marker');
}

// ── Usage ──────────────────────────────────────────────────

const PROMPT_KEYS = ['promptTokens', 'input_tokens', 'promptTokenCount', 'prompt_tokens'];
const COMPLETION_KEYS = ['completionTokens', 'output_tokens', 'candidatesTokenCount', 'completion_tokens'];
const TOTAL_KEYS = ['totalTokenCount', 'total_tokens'];

/** Map the backend-specific usage spellings onto UsageStats. */
export function normalizeUsage(raw: Record<string, unknown>): UsageStats {
  const promptTokens = firstCount(raw, PROMPT_KEYS);
  const completionTokens = firstCount(raw, COMPLETION_KEYS);
  let totalTokens = firstCount(raw, TOTAL_KEYS);
  if (totalTokens === null && promptTokens !== null && completionTokens !== null) {
    totalTokens = promptTokens + completionTokens;
  }
  return { promptTokens, completionTokens, totalTokens };
}

function firstCount(raw: Record<string, unknown>, keys: readonly string[]): number | null {
  for (const key of keys) {
    const value = raw[key];
    const count = typeof value === 'string' && value.trim() ? Number(value) : value;
    if (typeof count === 'number' && Number.isFinite(count)) {
      return Math.trunc(count);
    }
  }
  return null;
}

// ── Helpers ────────────────────────────────────────────────

/** Parsed JSON, or undefined when `text` is not JSON. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
