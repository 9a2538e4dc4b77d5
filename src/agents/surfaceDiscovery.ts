/**
 * surfaceDiscovery.ts — Learns the arena's model list and server action ids.
 *
 * Nothing about the arena's surface is hard-coded: model ids and the opaque
 * identifiers of the upload server actions change with every deploy.  One
 * refresh:
 *
 *   1. GET the landing page and walk its inline flight payload for
 *      `initialModels` (missing → DiscoveryError);
 *   2. fetch the Evaluation chunks (most specific first), then the page's
 *      `<script src>` bundles, and collect `("<hex id>", …, "<name>")`
 *      references until every required action is known.
 *
 * The result is cached as one immutable snapshot with a fetched-at stamp.
 * Concurrent misses share a single in-flight refresh; a stale snapshot is
 * replaced before it is returned.
 */

import { CloudflareError, AuthError, DiscoveryError, ModelNotFoundError, errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type { ActionRegistry, ClientConfig, Model, ModelCatalog } from '../core/types';
import type { HttpGateway } from '../middleware/httpGateway';
import {
  extractActionIds,
  extractFlightLines,
  findEvaluationChunks,
  findModelList,
  findScriptSources,
  toModel,
} from './flightPayload';

const logger = new Logger('SurfaceDiscovery');

/** Logical operation name → server action function name in the bundles. */
export const LOGICAL_ACTIONS: Readonly<Record<string, string>> = {
  'generate-upload-url': 'generateUploadUrl',
  'get-signed-url': 'getSignedUrl',
};

const REQUIRED_ACTIONS = Object.values(LOGICAL_ACTIONS);

export interface SurfaceSnapshot {
  catalog: ModelCatalog;
  registry: ActionRegistry;
}

export interface SurfaceDiscoveryOptions {
  gateway: HttpGateway;
  config: Pick<ClientConfig, 'origin' | 'bootPath' | 'discoveryTtlMs'>;
  /** Epoch-millis clock; injectable so staleness can be tested. */
  now?: () => number;
}

export class SurfaceDiscovery {
  private readonly gateway: HttpGateway;
  private readonly config: SurfaceDiscoveryOptions['config'];
  private readonly now: () => number;

  private snapshot: SurfaceSnapshot | null = null;
  private inflight: Promise<SurfaceSnapshot> | null = null;
  /** Bumped by invalidate() so a refresh already in flight is not stored. */
  private generation = 0;

  constructor(options: SurfaceDiscoveryOptions) {
    this.gateway = options.gateway;
    this.config = options.config;
    this.now = options.now ?? Date.now;
  }

  // ── Public API ─────────────────────────────────────────

  /** Fetch a new snapshot, joining a refresh that is already running. */
  refresh(): Promise<SurfaceSnapshot> {
    if (this.inflight) {
      return this.inflight;
    }

    const generation = this.generation;
    this.inflight = this.load()
      .then((snapshot) => {
        if (generation === this.generation) {
          this.snapshot = snapshot;
        }
        return snapshot;
      })
      .finally(() => {
        this.inflight = null;
      });
    return this.inflight;
  }

  async listModels(forceRefresh = false): Promise<ModelCatalog> {
    const snapshot = await this.current(forceRefresh);
    return snapshot.catalog;
  }

  /**
   * Identifier for a logical (`generate-upload-url`) or raw
   * (`generateUploadUrl`) operation name.  A miss triggers one refresh.
   */
  async resolveAction(name: string): Promise<string> {
    const key = LOGICAL_ACTIONS[name] ?? name;

    const cached = (await this.current()).registry.actions.get(key);
    if (cached) return cached;

    logger.info(`Action "${name}" not in registry; refreshing once`);
    const refreshed = (await this.refresh()).registry.actions.get(key);
    if (refreshed) return refreshed;

    throw new DiscoveryError(`Server action "${name}" not found in any bundle`);
  }

  /** Model by display name or id; an empty name selects the default model. */
  async resolveModel(nameOrId: string): Promise<Model> {
    const { catalog } = await this.current();
    const wanted = nameOrId.trim() || catalog.defaultModel;
    if (!wanted) {
      throw new ModelNotFoundError(nameOrId);
    }

    const model =
      catalog.models.find((m) => m.displayName === wanted) ?? catalog.models.find((m) => m.id === wanted);
    if (!model) {
      throw new ModelNotFoundError(wanted);
    }
    return model;
  }

  /** Drop the cached snapshot; the next access refreshes. */
  invalidate(): void {
    this.generation++;
    this.snapshot = null;
  }

  // ── Internals ──────────────────────────────────────────

  private async current(force = false): Promise<SurfaceSnapshot> {
    const snapshot = this.snapshot;
    if (!force && snapshot && this.now() - snapshot.catalog.fetchedAt < this.config.discoveryTtlMs) {
      return snapshot;
    }
    return this.refresh();
  }

  private async load(): Promise<SurfaceSnapshot> {
    const pageUrl = `${this.config.origin}${this.config.bootPath}`;
    logger.info(`Refreshing surface from ${pageUrl}`);

    const html = await (await this.gateway.request({ url: pageUrl, context: 'discovery page' })).text();
    const lines = extractFlightLines(html);

    const rawModels = findModelList(lines);
    if (!rawModels) {
      throw new DiscoveryError(`No initialModels payload in ${pageUrl} (${lines.length} flight lines)`);
    }

    const fetchedAt = this.now();
    const catalog = buildCatalog(rawModels.map(toModel), fetchedAt);

    const bundles = unique([
      ...findEvaluationChunks(lines).map((path) => `${this.config.origin}/_next/${path}`),
      ...findScriptSources(html, this.config.origin),
    ]);
    const actions = await this.scanBundles(bundles);

    logger.info(`Surface refreshed: ${catalog.models.length} models, ${actions.size} actions`);
    return { catalog, registry: { actions, fetchedAt } };
  }

  private async scanBundles(urls: readonly string[]): Promise<Map<string, string>> {
    const actions = new Map<string, string>();

    for (const url of urls) {
      if (REQUIRED_ACTIONS.every((name) => actions.has(name))) break;

      let js: string;
      try {
        js = await (await this.gateway.request({ url, context: 'discovery bundle' })).text();
      } catch (err) {
        if (err instanceof CloudflareError || err instanceof AuthError) throw err;
        logger.warn(`Bundle ${url} unavailable: ${errorMessage(err)}`);
        continue;
      }

      // Most specific bundle first, so the first identifier seen wins.
      for (const [name, id] of extractActionIds(js)) {
        if (!actions.has(name)) {
          actions.set(name, id);
        }
      }
    }

    const missing = REQUIRED_ACTIONS.filter((name) => !actions.has(name));
    if (missing.length > 0) {
      logger.warn(`Server actions not found after ${urls.length} bundles: ${missing.join(', ')}`);
    }
    return actions;
  }
}

// ─── Catalog ──────────────────────────────────────────────────

/** De-duplicate by id (first wins) and pick the default model. */
export function buildCatalog(models: readonly Model[], fetchedAt: number): ModelCatalog {
  const seen = new Set<string>();
  const ordered: Model[] = [];
  for (const model of models) {
    if (seen.has(model.id)) continue;
    seen.add(model.id);
    ordered.push(model);
  }

  const textNames = ordered.filter((m) => m.outputsText).map((m) => m.displayName).sort();
  const allNames = ordered.map((m) => m.displayName).sort();

  return {
    models: ordered,
    defaultModel: textNames[0] ?? allNames[0] ?? null,
    fetchedAt,
  };
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
