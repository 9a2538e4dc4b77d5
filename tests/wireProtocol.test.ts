import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodeTurn, normalizeUsage, type DecodeOptions } from '../src/agents/wireProtocol';
import type { StreamEvent } from '../src/core/types';
import { captureLogs } from './helpers';

async function* linesOf(lines: readonly string[], failAfter?: Error): AsyncGenerator<string> {
  for (const line of lines) yield line;
  if (failAfter) throw failAfter;
}

async function decode(
  lines: readonly string[],
  options: Partial<DecodeOptions> = {},
  failAfter?: Error,
): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of decodeTurn(linesOf(lines, failAfter), {
    sentId: 'sent-id',
    knownResumeKey: null,
    ...options,
  })) {
    events.push(event);
  }
  return events;
}

describe('decodeTurn', () => {
  const logs = captureLogs();
  after(() => logs.restore());

  it('yields N text deltas in order, then done with the resume key', async () => {
    const deltas = ['one ', 'two ', 'three'];
    const events = await decode([
      ...deltas.map((d) => `a0:${JSON.stringify(d)}`),
      'ad:{"finishReason":"stop","evaluationSessionId":"X"}',
    ]);

    assert.deepEqual(events, [
      { type: 'text-delta', text: 'one ' },
      { type: 'text-delta', text: 'two ' },
      { type: 'text-delta', text: 'three' },
      { type: 'done', evaluationSessionId: 'X', finishReason: 'stop' },
    ]);
  });

  it('falls back to the id it sent when the terminal marker names none', async () => {
    const events = await decode(['ad:{"finishReason":"stop"}']);
    assert.deepEqual(events, [{ type: 'done', evaluationSessionId: 'sent-id', finishReason: 'stop' }]);
  });

  it('emits usage before done when the terminal marker carries it', async () => {
    const events = await decode(['ad:{"finishReason":"length","usage":{"promptTokens":3,"completionTokens":4}}']);
    assert.deepEqual(events, [
      { type: 'usage', usage: { promptTokens: 3, completionTokens: 4, totalTokens: 7 }, finishReason: 'length' },
      { type: 'done', evaluationSessionId: 'sent-id', finishReason: 'length' },
    ]);
  });

  it('ignores heartbeats and unknown prefixes, and surfaces images', async () => {
    const events = await decode([
      'a2:[{"type":"heartbeat"}]',
      'f:{"messageId":"m1"}',
      'zz:"future"',
      '',
      'a2:[{"type":"image","image":"https://cdn.test/1.png"},{"image":"https://cdn.test/2.png"}]',
      'ad:{"finishReason":"stop"}',
    ]);
    assert.deepEqual(events, [
      { type: 'image-delta', url: 'https://cdn.test/1.png' },
      { type: 'image-delta', url: 'https://cdn.test/2.png' },
      { type: 'done', evaluationSessionId: 'sent-id', finishReason: 'stop' },
    ]);
  });

  it('stops at the terminal marker', async () => {
    const events = await decode(['ad:{}', 'a0:"after"']);
    assert.deepEqual(events, [{ type: 'done', evaluationSessionId: 'sent-id', finishReason: null }]);
  });

  it('turns the arena error marker into an arena error', async () => {
    const events = await decode(['a0:"Hi"', 'a0:"hasArenaError"', 'a0:"ignored"'], { knownResumeKey: 'k1' });
    assert.deepEqual(events, [
      { type: 'text-delta', text: 'Hi' },
      { type: 'error', kind: 'arena', detail: 'arena reported an error for this turn', evaluationSessionId: 'k1' },
    ]);
  });

  it('turns a3 into a remote error', async () => {
    const events = await decode(['a3:"model overloaded"']);
    assert.deepEqual(events, [
      { type: 'error', kind: 'remote', detail: 'model overloaded', evaluationSessionId: null },
    ]);
  });

  it('reports malformed JSON on a known prefix', async () => {
    const events = await decode(['a0:"ok"', 'a0:{not json']);
    assert.equal(events.length, 2);
    assert.deepEqual(events[1], {
      type: 'error',
      kind: 'malformed',
      detail: 'bad text delta: {not json',
      evaluationSessionId: null,
    });
  });

  it('reports a body that ends without a terminal marker as truncated', async () => {
    const events = await decode(['a0:"partial"']);
    assert.deepEqual(events.at(-1), {
      type: 'error',
      kind: 'truncated',
      detail: 'stream ended without a terminal marker',
      evaluationSessionId: null,
    });
  });

  it('reports transport failures, or cancellation when the signal fired', async () => {
    const failed = await decode(['a0:"x"'], {}, new Error('socket hang up'));
    assert.deepEqual(failed.at(-1), {
      type: 'error',
      kind: 'transport',
      detail: 'socket hang up',
      evaluationSessionId: null,
    });

    const controller = new AbortController();
    controller.abort();
    const cancelled = await decode(['a0:"x"'], { signal: controller.signal, knownResumeKey: 'k2' }, new Error('aborted'));
    assert.deepEqual(cancelled.at(-1), {
      type: 'error',
      kind: 'cancelled',
      detail: 'turn cancelled by caller',
      evaluationSessionId: 'k2',
    });
  });
});

describe('normalizeUsage', () => {
  it('reads the camel-case spelling', () => {
    assert.deepEqual(normalizeUsage({ promptTokens: 10, completionTokens: 5, totalTokenCount: 20 }), {
      promptTokens: 10,
      completionTokens: 5,
      totalTokens: 20,
    });
  });

  it('reads the snake-case and provider spellings', () => {
    assert.deepEqual(normalizeUsage({ input_tokens: 1, output_tokens: 2 }), {
      promptTokens: 1,
      completionTokens: 2,
      totalTokens: 3,
    });
    assert.deepEqual(normalizeUsage({ promptTokenCount: '7', candidatesTokenCount: 8, total_tokens: 99 }), {
      promptTokens: 7,
      completionTokens: 8,
      totalTokens: 99,
    });
  });

  it('leaves unknown counts null', () => {
    assert.deepEqual(normalizeUsage({ prompt_tokens: 4 }), {
      promptTokens: 4,
      completionTokens: null,
      totalTokens: null,
    });
  });
});
