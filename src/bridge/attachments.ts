/**
 * Attachment pipeline for remote → local relays.
 *
 * Attachments run one after another, in the order the remote sent them, and
 * each is posted as a reply to the relayed text event. For every attachment:
 *
 *   native handle    → send as-is, nothing downloaded
 *   cached (w/ meta) → send the earlier upload, nothing downloaded
 *   too big          → skipped on the declared size, then on the final size
 *   otherwise        → download (404 retries the proxy URL), sniff, run the
 *                      handler for its kind, upload, send, cache
 *
 * A failing attachment is logged and skipped; the rest still go out.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import axios from "axios";
import type { LocalPlatform, MediaInfo, OutgoingMedia } from "../channels/types.js";
import { formatErrorMessage } from "../net-errors.js";
import type { AssetCache, AttachmentMeta } from "./asset-cache.js";
import { DownloadFailedError } from "./errors.js";
import type { RemoteAttachment } from "./frames.js";
import { kindForMime, type MediaKind, type MediaToolkit } from "./media.js";

export const DEFAULT_UPLOAD_LIMIT = 50 * 1024 * 1024;
export const DEFAULT_THUMBNAIL_THRESHOLD = 512 * 1024;
export const THUMBNAIL_MAX_WIDTH = 800;
export const THUMBNAIL_MAX_HEIGHT = 600;

/** Animated formats sharp cannot re-encode frame for frame. Other animated input is transcoded with every frame. */
const KEEP_AS_IS = new Set(["image/gif", "image/apng"]);

const MSGTYPE: Record<MediaKind, OutgoingMedia["msgtype"]> = {
  video: "m.video",
  image: "m.image",
  audio: "m.audio",
  file: "m.file",
};

export interface AttachmentPipelineOptions {
  platform: Pick<LocalPlatform, "sendMedia" | "uploadMedia" | "getUploadLimit">;
  cache: AssetCache;
  media: MediaToolkit;
  /** Overrides the homeserver's advertised limit. */
  maxUploadBytes?: number | null;
  thumbnailThresholdBytes?: number;
  downloadTimeoutMs?: number;
}

interface Thumbnail {
  data: Buffer;
  mimetype: string;
  width: number;
  height: number;
}

/** A file ready for upload. */
interface Prepared {
  data: Buffer;
  filename: string;
  mimetype: string;
  kind: MediaKind;
  width?: number;
  height?: number;
  thumbnail?: Thumbnail;
}

interface HandlerContext {
  attachment: RemoteAttachment;
  data: Buffer;
  mimetype: string;
  inputPath: string;
  workDir: string;
}

type Handler = (ctx: HandlerContext) => Promise<Prepared>;

function dimensions(attachment: RemoteAttachment): { width?: number; height?: number } {
  return {
    width: attachment.width ?? undefined,
    height: attachment.height ?? undefined,
  };
}

function withExtension(filename: string, ext: string): string {
  const parsed = path.parse(filename);
  return `${parsed.name || "image"}${ext}`;
}

function safeName(filename: string): string {
  return path.basename(filename).replace(/[^\w.-]+/g, "_") || "attachment";
}

export class AttachmentPipeline {
  private readonly thumbnailThreshold: number;
  private readonly downloadTimeoutMs: number;
  private uploadLimitCache: number | null = null;
  private readonly handlers: Record<MediaKind, Handler>;

  constructor(private readonly options: AttachmentPipelineOptions) {
    this.thumbnailThreshold = options.thumbnailThresholdBytes ?? DEFAULT_THUMBNAIL_THRESHOLD;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 60_000;
    this.handlers = {
      video: (ctx) => this.prepareVideo(ctx),
      image: (ctx) => this.prepareImage(ctx),
      audio: async (ctx) => this.passThrough(ctx, "audio"),
      file: async (ctx) => this.passThrough(ctx, "file"),
    };
  }

  /** Config override, else the homeserver's advertised limit, else 50 MiB. */
  async uploadLimit(): Promise<number> {
    if (this.options.maxUploadBytes) return this.options.maxUploadBytes;
    if (this.uploadLimitCache !== null) return this.uploadLimitCache;
    let limit: number | null = null;
    try {
      limit = await this.options.platform.getUploadLimit();
    } catch (err) {
      console.warn("[attachments] Could not read upload limit:", formatErrorMessage(err));
    }
    this.uploadLimitCache = limit ?? DEFAULT_UPLOAD_LIMIT;
    return this.uploadLimitCache;
  }

  /**
   * Relay every attachment as a reply to `replyTo`. Returns the IDs of the
   * events that were sent, in order.
   */
  async relay(roomId: string, replyTo: string, attachments: RemoteAttachment[]): Promise<string[]> {
    const sent: string[] = [];
    for (const attachment of attachments) {
      try {
        const eventId = await this.relayOne(roomId, replyTo, attachment);
        if (eventId) sent.push(eventId);
      } catch (err) {
        if (err instanceof DownloadFailedError) {
          console.warn(`[attachments] Skipping ${attachment.filename}: ${err.message}`);
        } else {
          console.error(`[attachments] Failed to relay ${attachment.filename}:`, err);
        }
      }
    }
    return sent;
  }

  /** Relay one attachment. Returns the sent event ID, or null if it was skipped. */
  async relayOne(roomId: string, replyTo: string, attachment: RemoteAttachment): Promise<string | null> {
    const { platform, cache } = this.options;

    if (attachment.url.startsWith("mxc://")) {
      return platform.sendMedia(roomId, {
        msgtype: MSGTYPE[kindForMime(attachment.content_type)],
        body: attachment.filename,
        url: attachment.url,
        info: { mimetype: attachment.content_type, size: attachment.size },
        replyTo,
      });
    }

    const cached = cache.get("attachment", attachment.url);
    if (cached?.meta) {
      console.debug(`[attachments] Cache hit for ${attachment.filename}`);
      return platform.sendMedia(roomId, this.fromMeta(cached.handle, cached.meta, replyTo));
    }

    const limit = await this.uploadLimit();
    if (attachment.size > limit) {
      console.warn(`[attachments] Skipping ${attachment.filename}: ${attachment.size} bytes exceeds limit ${limit}`);
      return null;
    }

    const data = await this.download(attachment);
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "crossline-att-"));
    try {
      const inputPath = path.join(workDir, safeName(attachment.filename));
      await fs.writeFile(inputPath, data);

      const { kind, mimetype } = await this.options.media.classify(data, attachment.content_type);
      const prepared = await this.handlers[kind]({ attachment, data, mimetype, inputPath, workDir });

      if (prepared.data.length > limit) {
        console.warn(
          `[attachments] Skipping ${attachment.filename}: ${prepared.data.length} bytes after processing exceeds limit ${limit}`,
        );
        return null;
      }

      const uploaded = await this.upload(prepared);
      const eventId = await platform.sendMedia(roomId, this.fromMeta(uploaded.handle, uploaded.meta, replyTo));
      cache.put("attachment", attachment.url, uploaded.handle, uploaded.meta);
      return eventId;
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  // -------------------------------------------------------------------------
  // Download
  // -------------------------------------------------------------------------

  private async fetch(url: string): Promise<{ status: number; data: Buffer }> {
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        timeout: this.downloadTimeoutMs,
        validateStatus: () => true,
      });
      return { status: response.status, data: Buffer.from(response.data) };
    } catch (err) {
      throw new DownloadFailedError(`Download failed: ${formatErrorMessage(err)}`, url, undefined, { cause: err });
    }
  }

  private async download(attachment: RemoteAttachment): Promise<Buffer> {
    let url = attachment.url;
    let response = await this.fetch(url);
    if (response.status === 404 && attachment.proxy_url) {
      console.debug(`[attachments] 404 for ${attachment.filename}, retrying via proxy`);
      url = attachment.proxy_url;
      response = await this.fetch(url);
    }
    if (response.status !== 200) {
      throw new DownloadFailedError(`HTTP ${response.status}`, url, response.status);
    }
    return response.data;
  }

  // -------------------------------------------------------------------------
  // Per-kind handlers
  // -------------------------------------------------------------------------

  private passThrough(ctx: HandlerContext, kind: MediaKind): Prepared {
    return {
      data: ctx.data,
      filename: ctx.attachment.filename,
      mimetype: ctx.mimetype,
      kind,
      ...dimensions(ctx.attachment),
    };
  }

  private async prepareVideo(ctx: HandlerContext): Promise<Prepared> {
    const prepared = this.passThrough(ctx, "video");
    try {
      const frame = await this.options.media.firstFrame(ctx.inputPath, path.join(ctx.workDir, "frame.webp"));
      prepared.thumbnail = { data: frame.data, mimetype: "image/webp", width: frame.width, height: frame.height };
      prepared.width ??= frame.width;
      prepared.height ??= frame.height;
    } catch (err) {
      console.warn(`[attachments] No thumbnail for ${ctx.attachment.filename}:`, formatErrorMessage(err));
    }
    return prepared;
  }

  private async prepareImage(ctx: HandlerContext): Promise<Prepared> {
    const keepAsIs = KEEP_AS_IS.has(ctx.mimetype) || KEEP_AS_IS.has(ctx.attachment.content_type);
    if (keepAsIs) return this.passThrough(ctx, "image");

    let prepared: Prepared;
    try {
      const webp = await this.options.media.toWebp(ctx.data);
      prepared = {
        data: webp.data,
        filename: withExtension(ctx.attachment.filename, ".webp"),
        mimetype: "image/webp",
        kind: "image",
        width: webp.width,
        height: webp.height,
      };
    } catch (err) {
      console.warn(`[attachments] Could not transcode ${ctx.attachment.filename}:`, formatErrorMessage(err));
      return this.passThrough(ctx, "image");
    }

    if (prepared.data.length > this.thumbnailThreshold) {
      try {
        const thumb = await this.options.media.thumbnail(prepared.data, THUMBNAIL_MAX_WIDTH, THUMBNAIL_MAX_HEIGHT);
        prepared.thumbnail = { data: thumb.data, mimetype: "image/webp", width: thumb.width, height: thumb.height };
      } catch (err) {
        console.warn(`[attachments] No thumbnail for ${ctx.attachment.filename}:`, formatErrorMessage(err));
      }
    }
    return prepared;
  }

  // -------------------------------------------------------------------------
  // Upload
  // -------------------------------------------------------------------------

  private async upload(prepared: Prepared): Promise<{ handle: string; meta: AttachmentMeta }> {
    const { platform } = this.options;
    const meta: AttachmentMeta = {
      msgtype: MSGTYPE[prepared.kind],
      filename: prepared.filename,
      mimetype: prepared.mimetype,
      size: prepared.data.length,
    };
    if (prepared.width !== undefined) meta.width = prepared.width;
    if (prepared.height !== undefined) meta.height = prepared.height;

    if (prepared.thumbnail) {
      const thumb = prepared.thumbnail;
      const url = await platform.uploadMedia(thumb.data, `${prepared.filename}-thumbnail.webp`, thumb.mimetype);
      meta.thumbnail = {
        url,
        mimetype: thumb.mimetype,
        size: thumb.data.length,
        width: thumb.width,
        height: thumb.height,
      };
    }

    const handle = await platform.uploadMedia(prepared.data, prepared.filename, prepared.mimetype);
    return { handle, meta };
  }

  private fromMeta(handle: string, meta: AttachmentMeta, replyTo: string): OutgoingMedia {
    const info: MediaInfo = { mimetype: meta.mimetype, size: meta.size };
    if (meta.width !== undefined) info.w = meta.width;
    if (meta.height !== undefined) info.h = meta.height;
    if (meta.thumbnail) {
      info.thumbnail_url = meta.thumbnail.url;
      info.thumbnail_info = {
        mimetype: meta.thumbnail.mimetype,
        size: meta.thumbnail.size,
        w: meta.thumbnail.width,
        h: meta.thumbnail.height,
      };
    }
    return { msgtype: meta.msgtype, body: meta.filename, url: handle, info, replyTo };
  }
}
