/**
 * uploader.ts — Three-phase attachment transfer.
 *
 *   slot      POST  <imagePath>  next-action: generateUploadUrl  body ["name","mime"]
 *   transfer  PUT   <uploadUrl>  raw bytes, no session cookies
 *   sign      POST  <imagePath>  next-action: getSignedUrl       body ["<key>"]
 *
 * Server actions answer with a text component stream; the `1:` line carries
 * `{ success, data }`.  A failure in any phase throws UploadError tagged with
 * that phase and is never retried here.
 *
 * Identical bytes (MD5) reuse the earlier descriptor when the cache is on.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { UploadError, errorMessage, type UploadPhase } from '../core/errors';
import { Logger } from '../core/logger';
import type { Attachment, ClientConfig, UploadTicket, UploadedAttachment } from '../core/types';
import type { HttpGateway } from '../middleware/httpGateway';
import type { SurfaceDiscovery } from './surfaceDiscovery';

const logger = new Logger('Uploader');

const actionResultSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
});

const slotSchema = z.object({ uploadUrl: z.string().min(1), key: z.string().min(1) });
const signedSchema = z.object({ url: z.string().min(1) });

export interface UploaderOptions {
  gateway: HttpGateway;
  discovery: Pick<SurfaceDiscovery, 'resolveAction'>;
  config: Pick<ClientConfig, 'origin' | 'imagePath' | 'uploadTimeoutMs' | 'uploadCache'>;
}

export class Uploader {
  private readonly gateway: HttpGateway;
  private readonly discovery: UploaderOptions['discovery'];
  private readonly config: UploaderOptions['config'];
  private readonly cache = new Map<string, UploadedAttachment>();

  constructor(options: UploaderOptions) {
    this.gateway = options.gateway;
    this.discovery = options.discovery;
    this.config = options.config;
  }

  private get actionUrl(): string {
    return `${this.config.origin}${this.config.imagePath}`;
  }

  /** Upload every attachment in order; the first failure aborts the rest. */
  async uploadAll(attachments: readonly Attachment[]): Promise<UploadedAttachment[]> {
    const uploaded: UploadedAttachment[] = [];
    for (const attachment of attachments) {
      uploaded.push(await this.upload(attachment));
    }
    return uploaded;
  }

  async upload(attachment: Attachment): Promise<UploadedAttachment> {
    const digest = createHash('md5').update(attachment.data).digest('hex');
    const cached = this.config.uploadCache ? this.cache.get(digest) : undefined;
    if (cached) {
      logger.debug(`Reusing upload for ${attachment.filename} (${digest})`);
      return cached;
    }

    const ticket = await this.requestUploadSlot(attachment.filename, attachment.mimeType, attachment.data.byteLength);
    await this.putBytes(ticket, attachment.data);
    const url = await this.confirmAndSign(ticket.rawRef);

    const descriptor: UploadedAttachment = { name: ticket.rawRef, contentType: attachment.mimeType, url };
    if (this.config.uploadCache) {
      this.cache.set(digest, descriptor);
    }
    logger.info(`Uploaded ${attachment.filename} → ${url}`);
    return descriptor;
  }

  // ── Phases ─────────────────────────────────────────────

  async requestUploadSlot(filename: string, mimeType: string, size: number): Promise<UploadTicket> {
    logger.debug(`Requesting upload slot for ${filename} (${mimeType}, ${size} bytes)`);
    const data = await this.callAction('slot', 'generate-upload-url', [filename, mimeType]);

    const slot = slotSchema.safeParse(data);
    if (!slot.success) {
      throw new UploadError('slot', `upload slot response missing uploadUrl/key: ${JSON.stringify(data)}`);
    }
    return {
      uploadUrl: slot.data.uploadUrl,
      transferHeaders: { 'content-type': mimeType },
      rawRef: slot.data.key,
    };
  }

  async putBytes(ticket: UploadTicket, bytes: Uint8Array): Promise<void> {
    try {
      const response = await this.gateway.request({
        url: ticket.uploadUrl,
        method: 'PUT',
        headers: ticket.transferHeaders,
        body: bytes,
        withSession: false,
        timeoutMs: this.config.uploadTimeoutMs,
        context: 'upload transfer',
      });
      await response.text();
    } catch (err) {
      throw new UploadError('transfer', errorMessage(err), { cause: err });
    }
  }

  async confirmAndSign(rawRef: string): Promise<string> {
    const data = await this.callAction('sign', 'get-signed-url', [rawRef]);

    const signed = signedSchema.safeParse(data);
    if (!signed.success) {
      throw new UploadError('sign', `signed URL response missing url: ${JSON.stringify(data)}`);
    }
    return signed.data.url;
  }

  // ── Internals ──────────────────────────────────────────

  /** Invoke a server action and return the `data` of its `1:` result line. */
  private async callAction(phase: UploadPhase, action: string, args: unknown[]): Promise<unknown> {
    let text: string;
    try {
      const actionId = await this.discovery.resolveAction(action);
      const response = await this.gateway.request({
        url: this.actionUrl,
        method: 'POST',
        headers: {
          accept: 'text/x-component',
          'content-type': 'text/plain;charset=UTF-8',
          'next-action': actionId,
          referer: this.actionUrl,
        },
        body: JSON.stringify(args),
        timeoutMs: this.config.uploadTimeoutMs,
        context: action,
      });
      text = await response.text();
    } catch (err) {
      throw new UploadError(phase, errorMessage(err), { cause: err });
    }

    const line = text.split('\n').find((l) => l.startsWith('1:'));
    if (!line) {
      throw new UploadError(phase, `${action} response has no result line`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line.slice(2));
    } catch (err) {
      throw new UploadError(phase, `${action} result is not JSON`, { cause: err });
    }

    const result = actionResultSchema.safeParse(parsed);
    if (!result.success || !result.data.success) {
      throw new UploadError(phase, `${action} failed: ${line.slice(2, 300)}`);
    }
    return result.data.data;
  }
}
