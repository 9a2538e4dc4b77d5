/**
 * types.ts — Shared type definitions and the process configuration loader.
 *
 * Every layer (session driver, discovery, uploader, orchestrator) agrees on
 * the shapes declared here.
 */

// ─── Session ───────────────────────────────────────────────

/** Cookie name → value, as the browser holds them for the target origin. */
export type CookieJar = Readonly<Record<string, string>>;

/** A challenge-provider token minted for one purpose. Tokens are single-use. */
export interface CaptchaToken {
  value: string;
  /** Purpose tag the caller asked for (e.g. "send-message"). */
  purpose: string;
  /** Epoch millis at which the browser produced the token. */
  issuedAt: number;
}

export type SessionState =
  | 'uninitialized'
  | 'bootstrapping'
  | 'ready'
  | 'degraded'
  | 'shutting-down'
  | 'closed';

// ─── Surface ───────────────────────────────────────────────

/** One chat model offered by the arena. */
export interface Model {
  /** Opaque id sent as `modelAId`. */
  id: string;
  /** Public name callers select the model by (e.g. "gemini-3-pro"). */
  displayName: string;
  outputsText: boolean;
  outputsImages: boolean;
  /** Whether the model accepts image attachments. */
  acceptsImages: boolean;
}

export interface ModelCatalog {
  /** Ordered as the site lists them, de-duplicated by id. */
  models: readonly Model[];
  /** Alphabetically first text model, or the first model of any kind. */
  defaultModel: string | null;
  fetchedAt: number;
}

export interface ActionRegistry {
  /** Logical or raw operation name → opaque server identifier. */
  actions: ReadonlyMap<string, string>;
  fetchedAt: number;
}

// ─── Conversation ──────────────────────────────────────────

export interface Conversation {
  localConversationId: string;
  /** Resume key; null until the server confirms the first turn. */
  evaluationSessionId: string | null;
  model: string;
}

/** A resume key, or a conversation a previous turn returned. */
export type ConversationRef = string | Conversation;

// ─── Attachments ───────────────────────────────────────────

export interface Attachment {
  filename: string;
  mimeType: string;
  data: Uint8Array;
}

export interface UploadTicket {
  uploadUrl: string;
  transferHeaders: Record<string, string>;
  /** Storage key the signing step turns into a durable URL. */
  rawRef: string;
}

/** Attachment descriptor embedded in the outbound message. */
export interface UploadedAttachment {
  name: string;
  contentType: string;
  url: string;
}

// ─── Stream events ─────────────────────────────────────────

export interface UsageStats {
  promptTokens: number | null;
  completionTokens: number | null;
  totalTokens: number | null;
}

export type StreamErrorKind =
  | 'arena'
  | 'remote'
  | 'malformed'
  | 'truncated'
  | 'transport'
  | 'cancelled';

export type StreamEvent =
  | { type: 'text-delta'; text: string }
  | { type: 'image-delta'; url: string }
  | { type: 'usage'; usage: UsageStats; finishReason: string | null }
  | {
      type: 'error';
      kind: StreamErrorKind;
      detail: string;
      /** Resume key observed before the failure, if any. */
      evaluationSessionId: string | null;
    }
  | { type: 'done'; evaluationSessionId: string; finishReason: string | null };

/** Buffered result of one turn. */
export interface ChatCompletion {
  text: string;
  images: string[];
  evaluationSessionId: string;
  finishReason: string | null;
  usage: UsageStats | null;
  conversation: Conversation;
}

// ─── Client configuration ──────────────────────────────────

export interface BrowserConfig {
  executablePath?: string;
  /** Persistent profile directory; a guest profile is used when unset. */
  userDataDir?: string;
  profileDirectory?: string;
  headless: boolean;
  incognito: boolean;
}

export interface ClientConfig {
  origin: string;
  bootPath: string;
  imagePath: string;
  recaptchaSiteKey: string;
  /** Substring identifying the authentication cookie. */
  authCookieName: string;
  /** Case-insensitive fragments that mark a hard block page. */
  blockPageSignatures: string[];

  chatTimeoutMs: number;
  uploadTimeoutMs: number;
  bootstrapTimeoutMs: number;
  tokenTimeoutMs: number;
  lockWaitTimeoutMs: number;
  discoveryTtlMs: number;

  uploadCache: boolean;
  browser: BrowserConfig;
}

export const DEFAULT_BLOCK_PAGE_SIGNATURES = [
  'sorry, you have been blocked',
  'cf-error-details',
  'attention required! | cloudflare',
  'used cloudflare to restrict access',
  'error code: 1020',
];

/** Build a ClientConfig from the environment with defaults. */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    origin: (env.ARENA_ORIGIN ?? 'https://lmarena.ai').replace(/\/+$/, ''),
    bootPath: env.ARENA_BOOT_PATH ?? '/?mode=direct',
    imagePath: env.ARENA_IMAGE_PATH ?? '/?chat-modality=image',
    recaptchaSiteKey:
      env.ARENA_RECAPTCHA_SITE_KEY ?? '6Led_uYrAAAAAKjxDIF58fgFtX3t8loNAK85bW9I',
    authCookieName: env.ARENA_AUTH_COOKIE ?? 'arena-auth-prod',
    blockPageSignatures: env.ARENA_BLOCK_SIGNATURES
      ? env.ARENA_BLOCK_SIGNATURES.split('|').map((s) => s.trim()).filter(Boolean)
      : [...DEFAULT_BLOCK_PAGE_SIGNATURES],

    chatTimeoutMs: parseInt(env.ARENA_TIMEOUT_MS ?? '300000', 10),
    uploadTimeoutMs: parseInt(env.ARENA_UPLOAD_TIMEOUT_MS ?? '600000', 10),
    bootstrapTimeoutMs: parseInt(env.ARENA_BOOTSTRAP_TIMEOUT_MS ?? '300000', 10),
    tokenTimeoutMs: parseInt(env.ARENA_TOKEN_TIMEOUT_MS ?? '60000', 10),
    lockWaitTimeoutMs: parseInt(env.ARENA_LOCK_WAIT_MS ?? '120000', 10),
    discoveryTtlMs: parseInt(env.ARENA_DISCOVERY_TTL_MS ?? '3600000', 10),

    uploadCache: parseFlag(env.ARENA_UPLOAD_CACHE, true),
    browser: {
      executablePath: env.ARENA_BROWSER_EXECUTABLE_PATH || undefined,
      userDataDir: env.ARENA_BROWSER_USER_DATA_DIR || undefined,
      profileDirectory: env.ARENA_BROWSER_PROFILE || undefined,
      headless: parseFlag(env.ARENA_HEADLESS, false),
      incognito: parseFlag(env.ARENA_INCOGNITO, false),
    },
  };
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}
