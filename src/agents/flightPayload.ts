/**
 * flightPayload.ts — Parsers for the arena's server-rendered markup.
 *
 * The landing page streams its React server payload inline:
 *
 *   <script>self.__next_f.push([1,"0:[...]\n5:I[1234,[\"static/chunks/a.js\",…],\"Evaluation\"]\n…"])</script>
 *
 * Each pushed string is a run of `<hex id>:<row>` lines.  Two row kinds
 * matter here:
 *
 *   • JSON rows — somewhere inside one of them sits `{ initialModels: [...] }`;
 *   • `I[...]` rows — dynamic-import mappings; the one whose component name is
 *     "Evaluation" lists the chunk files that hold the chat page's server
 *     action references.
 *
 * Server action references in bundle text look like
 * `("7f3a…40+ hex…", …, "generateUploadUrl")`.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { Model } from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('FlightPayload');

const PUSH_PATTERN = /self\.__next_f\.push\((\[[\s\S]*\])\)/;
const LINE_PATTERN = /^([0-9a-fA-F]+):(.*)$/;
const ACTION_PATTERN = /\("([a-f0-9]{40,})".*?"(\w+)"\)/g;
const EVALUATION_COMPONENT = 'Evaluation';

export interface FlightLine {
  id: string;
  row: string;
}

// ── Schemas ────────────────────────────────────────────────

const pushSchema = z.tuple([z.unknown(), z.string()]).rest(z.unknown());

const capabilitySetSchema = z.record(z.unknown());

const rawModelSchema = z.object({
  id: z.string(),
  publicName: z.string(),
  capabilities: z
    .object({
      inputCapabilities: capabilitySetSchema.optional(),
      outputCapabilities: capabilitySetSchema.optional(),
    })
    .optional(),
});

export type RawModel = z.infer<typeof rawModelSchema>;

const importRowSchema = z.tuple([z.unknown(), z.array(z.unknown()), z.string()]).rest(z.unknown());

// ── Flight lines ───────────────────────────────────────────

/** Every `<id>:<row>` line pushed by inline scripts, in document order. */
export function extractFlightLines(html: string): FlightLine[] {
  const $ = cheerio.load(html);
  const lines: FlightLine[] = [];

  $('script:not([src])').each((_, el) => {
    const match = PUSH_PATTERN.exec($(el).text());
    if (!match) return;

    const pushed = pushSchema.safeParse(parseJson(match[1]));
    if (!pushed.success) return;

    for (const chunk of pushed.data[1].split('\n')) {
      const line = LINE_PATTERN.exec(chunk);
      if (line) {
        lines.push({ id: line[1], row: line[2] });
      }
    }
  });

  return lines;
}

// ── Models ─────────────────────────────────────────────────

/**
 * The `initialModels` array from the first JSON row that carries one, or null
 * when no row does.  Entries that do not look like models are skipped.
 */
export function findModelList(lines: readonly FlightLine[]): RawModel[] | null {
  for (const { row } of lines) {
    if (!row.startsWith('[') && !row.startsWith('{')) continue;

    const found = findKey(parseJson(row), 'initialModels');
    if (!Array.isArray(found)) continue;

    const models: RawModel[] = [];
    for (const entry of found) {
      const parsed = rawModelSchema.safeParse(entry);
      if (parsed.success) {
        models.push(parsed.data);
      } else {
        logger.debug(`Skipping malformed model entry: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
    }
    return models;
  }
  return null;
}

export function toModel(raw: RawModel): Model {
  const input = raw.capabilities?.inputCapabilities ?? {};
  const output = raw.capabilities?.outputCapabilities ?? {};
  return {
    id: raw.id,
    displayName: raw.publicName,
    outputsText: 'text' in output,
    outputsImages: 'image' in output,
    acceptsImages: 'image' in input,
  };
}

/** Depth-first search for the value stored under `key`. */
function findKey(value: unknown, key: string): unknown {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findKey(item, key);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (isRecord(value)) {
    if (key in value) return value[key];
    for (const child of Object.values(value)) {
      const found = findKey(child, key);
      if (found !== undefined) return found;
    }
  }
  return undefined;
}

// ── Bundles ────────────────────────────────────────────────

/**
 * Chunk paths (relative to `/_next/`) of the Evaluation import mapping, most
 * specific first.
 */
export function findEvaluationChunks(lines: readonly FlightLine[]): string[] {
  const paths: string[] = [];

  for (const { row } of lines) {
    if (!row.startsWith('I[')) continue;

    const parsed = importRowSchema.safeParse(parseJson(row.slice(1)));
    if (!parsed.success || parsed.data[2] !== EVALUATION_COMPONENT) continue;

    // [chunkId, path, chunkId, path, …]
    const pairs = parsed.data[1];
    for (let i = 1; i < pairs.length; i += 2) {
      const path = pairs[i];
      if (typeof path === 'string' && path) {
        paths.push(path);
      }
    }
  }

  return paths.reverse();
}

/** Absolute URLs of same-origin `<script src>` bundles, in document order. */
export function findScriptSources(html: string, origin: string): string[] {
  const $ = cheerio.load(html);
  const sources: string[] = [];

  $('script[src]').each((_, el) => {
    const src = $(el).attr('src');
    if (!src) return;
    let url: URL;
    try {
      url = new URL(src, origin);
    } catch {
      logger.debug(`Ignoring unparseable script src "${src}"`);
      return;
    }
    if (url.origin === origin && !sources.includes(url.href)) {
      sources.push(url.href);
    }
  });

  return sources;
}

/** Server action name → identifier for every reference found in `js`. */
export function extractActionIds(js: string): Map<string, string> {
  const actions = new Map<string, string>();
  for (const match of js.matchAll(ACTION_PATTERN)) {
    actions.set(match[2], match[1]);
  }
  return actions;
}

// ── Helpers ────────────────────────────────────────────────

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
