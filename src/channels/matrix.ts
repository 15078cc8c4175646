/**
 * Matrix client-server adapter.
 *
 * Implements LocalPlatform over plain HTTP (axios). Events arrive through a
 * /sync long-poll; the first sync only records the position so the backlog
 * is never replayed, and fires the ready handler. Rate limits (429) and
 * server errors (5xx) are retried with backoff, honouring `retry_after_ms`.
 */

import axios, { type Method } from "axios";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { computeBackoff, sleep } from "../util/backoff.js";
import { formatErrorMessage, isTransientNetworkError } from "../net-errors.js";
import { markdownToHtml } from "./markdown.js";
import type {
  LocalEventContent,
  LocalMessageEvent,
  LocalPlatform,
  LocalRedactionEvent,
  OutgoingMedia,
  OutgoingText,
  UserProfile,
} from "./types.js";

const CLIENT = "/_matrix/client/v3";
const MEDIA = "/_matrix/media/v3";

/** Retries for ordinary requests. The sync loop does its own. */
const MAX_RETRIES = 3;
const RETRY_BASE_MS = 1000;
const RETRY_MAX_MS = 30_000;
const REQUEST_TIMEOUT_MS = 30_000;
const UPLOAD_TIMEOUT_MS = 120_000;

export interface MatrixChannelOptions {
  homeserver: string;
  userId: string;
  accessToken: string;
  /** Long-poll timeout passed to /sync. */
  syncTimeoutMs?: number;
  /** Backoff for a failing sync loop. */
  syncRetryBaseMs?: number;
  syncRetryMaxMs?: number;
}

export class MatrixError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly errcode: string,
  ) {
    super(message);
    this.name = "MatrixError";
  }
}

// ---------------------------------------------------------------------------
// Wire shapes (only the fields read here)
// ---------------------------------------------------------------------------

const roomEventSchema = Type.Object({
  type: Type.String(),
  event_id: Type.String(),
  sender: Type.String(),
  origin_server_ts: Type.Number(),
  content: Type.Record(Type.String(), Type.Unknown()),
  redacts: Type.Optional(Type.String()),
});

const syncSchema = Type.Object({
  next_batch: Type.String(),
  rooms: Type.Optional(Type.Object({
    join: Type.Optional(Type.Record(Type.String(), Type.Object({
      timeline: Type.Optional(Type.Object({
        events: Type.Array(Type.Unknown()),
      })),
    }))),
  })),
});

type RoomEvent = Static<typeof roomEventSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/** Build a LocalMessageEvent from an m.room.message event, or null if unusable. */
export function parseMessageEvent(roomId: string, event: RoomEvent): LocalMessageEvent | null {
  const content = event.content;
  const body = stringField(content, "body");
  const msgtype = stringField(content, "msgtype");
  if (body === undefined || msgtype === undefined) return null;

  const message: LocalMessageEvent = {
    roomId,
    eventId: event.event_id,
    sender: event.sender,
    timestamp: event.origin_server_ts,
    body,
    msgtype,
  };

  const url = stringField(content, "url");
  if (url && ["m.image", "m.video", "m.audio", "m.file"].includes(msgtype)) {
    const info = isRecord(content.info) ? content.info : {};
    message.media = {
      url,
      mimetype: stringField(info, "mimetype") ?? "",
      filename: stringField(content, "filename") ?? body,
    };
  }

  const relates = content["m.relates_to"];
  const replacement = content["m.new_content"];
  if (isRecord(relates) && relates.rel_type === "m.replace" && isRecord(replacement)) {
    const originalId = stringField(relates, "event_id");
    const newBody = stringField(replacement, "body");
    if (originalId && newBody !== undefined) {
      message.replaces = { eventId: originalId, body: newBody };
    }
  }

  return message;
}

/** Build a LocalRedactionEvent. Room v11 moved `redacts` into the content. */
export function parseRedactionEvent(roomId: string, event: RoomEvent): LocalRedactionEvent | null {
  const redacts = event.redacts ?? stringField(event.content, "redacts");
  if (!redacts) return null;
  const reason = stringField(event.content, "reason");
  return {
    roomId,
    eventId: event.event_id,
    sender: event.sender,
    timestamp: event.origin_server_ts,
    redacts,
    ...(reason ? { reason } : {}),
  };
}

// ---------------------------------------------------------------------------
// Channel
// ---------------------------------------------------------------------------

export class MatrixChannel implements LocalPlatform {
  readonly name = "matrix";
  readonly userId: string;

  private readonly homeserver: string;
  private readonly syncTimeoutMs: number;
  private messageHandler: ((event: LocalMessageEvent) => Promise<void>) | null = null;
  private redactionHandler: ((event: LocalRedactionEvent) => Promise<void>) | null = null;
  private readyHandler: (() => Promise<void>) | null = null;
  private readonly directRooms = new Map<string, string>();
  private since: string | null = null;
  private txnCounter = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: MatrixChannelOptions) {
    this.homeserver = options.homeserver.replace(/\/+$/, "");
    this.userId = options.userId;
    this.syncTimeoutMs = options.syncTimeoutMs ?? 30_000;
  }

  onMessage(handler: (event: LocalMessageEvent) => Promise<void>): void {
    this.messageHandler = handler;
  }

  onRedaction(handler: (event: LocalRedactionEvent) => Promise<void>): void {
    this.redactionHandler = handler;
  }

  onReady(handler: () => Promise<void>): void {
    this.readyHandler = handler;
  }

  /**
   * Run the initial sync, fire the ready handler, and start the sync loop.
   * Rejects if the homeserver cannot be reached or rejects the token.
   */
  async start(): Promise<void> {
    if (this.loop) return;
    const whoami = await this.request("GET", `${CLIENT}/account/whoami`);
    const actual = stringField(whoami, "user_id");
    if (actual && actual !== this.userId) {
      console.warn(`[matrix] Access token belongs to ${actual}, not ${this.userId}`);
    }

    const initial = await this.sync(0, null);
    this.since = initial.next_batch;
    console.info(`[matrix] Logged in as ${this.userId}`);

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.syncLoop(controller.signal)
      .catch((err) => console.error("[matrix] Sync loop crashed:", err))
      .finally(() => {
        this.loop = null;
      });

    if (this.readyHandler) {
      await this.readyHandler();
    }
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.controller = null;
  }

  // -------------------------------------------------------------------------
  // Sync
  // -------------------------------------------------------------------------

  private async sync(timeoutMs: number, since: string | null, signal?: AbortSignal) {
    const params: Record<string, string> = { timeout: String(timeoutMs) };
    if (since) {
      params.since = since;
    } else {
      params.filter = JSON.stringify({ room: { timeline: { limit: 1 } } });
    }
    const data = await this.request("GET", `${CLIENT}/sync`, {
      params,
      timeoutMs: timeoutMs + REQUEST_TIMEOUT_MS,
      retries: 0,
      signal,
    });
    if (!Value.Check(syncSchema, data)) {
      throw new MatrixError("Malformed sync response", 200, "M_UNKNOWN");
    }
    return data;
  }

  private async syncLoop(signal: AbortSignal): Promise<void> {
    let retries = 0;
    while (!signal.aborted) {
      try {
        const response = await this.sync(this.syncTimeoutMs, this.since, signal);
        this.since = response.next_batch;
        retries = 0;
        for (const [roomId, room] of Object.entries(response.rooms?.join ?? {})) {
          for (const raw of room.timeline?.events ?? []) {
            this.dispatch(roomId, raw);
          }
        }
      } catch (err) {
        if (signal.aborted) break;
        const delay = computeBackoff(retries++, {
          baseMs: this.options.syncRetryBaseMs ?? RETRY_BASE_MS,
          capMs: this.options.syncRetryMaxMs ?? 60_000,
        });
        console.warn(`[matrix] Sync failed (${formatErrorMessage(err)}), retrying in ${Math.round(delay)}ms`);
        await sleep(delay, signal);
      }
    }
  }

  private dispatch(roomId: string, raw: unknown): void {
    if (!Value.Check(roomEventSchema, raw)) return;

    if (raw.type === "m.room.message" && this.messageHandler) {
      const event = parseMessageEvent(roomId, raw);
      if (!event) return;
      this.messageHandler(event).catch((err) => {
        console.error(`[matrix] Message handler failed for ${event.eventId}:`, err);
      });
    } else if (raw.type === "m.room.redaction" && this.redactionHandler) {
      const event = parseRedactionEvent(roomId, raw);
      if (!event) return;
      this.redactionHandler(event).catch((err) => {
        console.error(`[matrix] Redaction handler failed for ${event.eventId}:`, err);
      });
    }
  }

  // -------------------------------------------------------------------------
  // HTTP
  // -------------------------------------------------------------------------

  private txnId(): string {
    return `crossline.${Date.now()}.${++this.txnCounter}`;
  }

  private async request(
    method: Method,
    path: string,
    options: {
      data?: unknown;
      params?: Record<string, string>;
      headers?: Record<string, string>;
      timeoutMs?: number;
      retries?: number;
      signal?: AbortSignal;
    } = {},
  ): Promise<Record<string, unknown>> {
    const maxRetries = options.retries ?? MAX_RETRIES;

    for (let attempt = 0; ; attempt++) {
      let status: number;
      let data: unknown;
      try {
        const response = await axios.request<unknown>({
          method,
          url: `${this.homeserver}${path}`,
          data: options.data,
          params: options.params,
          headers: { Authorization: `Bearer ${this.options.accessToken}`, ...options.headers },
          timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
          signal: options.signal,
          validateStatus: () => true,
        });
        status = response.status;
        data = response.data;
      } catch (err) {
        if (attempt < maxRetries && isTransientNetworkError(err) && !options.signal?.aborted) {
          await sleep(computeBackoff(attempt, { baseMs: RETRY_BASE_MS, capMs: RETRY_MAX_MS }), options.signal);
          continue;
        }
        throw err;
      }

      const body = isRecord(data) ? data : {};
      if (status >= 200 && status < 300) return body;

      const errcode = stringField(body, "errcode") ?? "M_UNKNOWN";
      if ((status === 429 || status >= 500) && attempt < maxRetries) {
        const retryAfter = body.retry_after_ms;
        const delay = typeof retryAfter === "number"
          ? retryAfter
          : computeBackoff(attempt, { baseMs: RETRY_BASE_MS, capMs: RETRY_MAX_MS });
        console.debug(`[matrix] ${method} ${path} got ${status}, retrying in ${Math.round(delay)}ms`);
        await sleep(delay, options.signal);
        continue;
      }

      const detail = stringField(body, "error") ?? "";
      throw new MatrixError(`${method} ${path} failed: ${status} ${errcode} ${detail}`.trim(), status, errcode);
    }
  }

  private roomPath(roomId: string): string {
    return `${CLIENT}/rooms/${encodeURIComponent(roomId)}`;
  }

  private async sendEvent(roomId: string, type: string, content: Record<string, unknown>): Promise<string> {
    const path = `${this.roomPath(roomId)}/send/${encodeURIComponent(type)}/${encodeURIComponent(this.txnId())}`;
    const response = await this.request("PUT", path, { data: content });
    const eventId = stringField(response, "event_id");
    if (!eventId) throw new MatrixError(`No event_id in response to ${type}`, 200, "M_UNKNOWN");
    return eventId;
  }

  // -------------------------------------------------------------------------
  // LocalPlatform
  // -------------------------------------------------------------------------

  async sendMessage(roomId: string, message: OutgoingText): Promise<string> {
    const content: Record<string, unknown> = {
      msgtype: message.msgtype ?? "m.text",
      body: message.body,
      ...message.extra,
    };
    if (message.html) {
      content.format = "org.matrix.custom.html";
      content.formatted_body = message.html;
    }
    if (message.replyTo) {
      content["m.relates_to"] = { "m.in_reply_to": { event_id: message.replyTo } };
    }
    return this.sendEvent(roomId, "m.room.message", content);
  }

  async sendMedia(roomId: string, media: OutgoingMedia): Promise<string> {
    const content: Record<string, unknown> = {
      msgtype: media.msgtype,
      body: media.body,
      filename: media.body,
      url: media.url,
    };
    if (media.info) content.info = media.info;
    if (media.replyTo) {
      content["m.relates_to"] = { "m.in_reply_to": { event_id: media.replyTo } };
    }
    return this.sendEvent(roomId, "m.room.message", content);
  }

  async editMessage(roomId: string, eventId: string, message: OutgoingText): Promise<string> {
    const newContent: Record<string, unknown> = {
      msgtype: message.msgtype ?? "m.text",
      body: message.body,
      ...message.extra,
    };
    const content: Record<string, unknown> = {
      msgtype: message.msgtype ?? "m.text",
      body: `* ${message.body}`,
      ...message.extra,
      "m.new_content": newContent,
      "m.relates_to": { rel_type: "m.replace", event_id: eventId },
    };
    if (message.html) {
      newContent.format = "org.matrix.custom.html";
      newContent.formatted_body = message.html;
      content.format = "org.matrix.custom.html";
      content.formatted_body = `* ${message.html}`;
    }
    return this.sendEvent(roomId, "m.room.message", content);
  }

  async redactMessage(roomId: string, eventId: string, reason?: string): Promise<void> {
    const path = `${this.roomPath(roomId)}/redact/${encodeURIComponent(eventId)}/${encodeURIComponent(this.txnId())}`;
    await this.request("PUT", path, { data: reason ? { reason } : {} });
  }

  async addReaction(roomId: string, eventId: string, key: string): Promise<void> {
    await this.sendEvent(roomId, "m.reaction", {
      "m.relates_to": { rel_type: "m.annotation", event_id: eventId, key },
    });
  }

  async getEventContent(roomId: string, eventId: string): Promise<LocalEventContent | null> {
    try {
      const event = await this.request("GET", `${this.roomPath(roomId)}/event/${encodeURIComponent(eventId)}`);
      return isRecord(event.content) ? event.content : null;
    } catch (err) {
      console.warn(`[matrix] Could not fetch event ${eventId}:`, formatErrorMessage(err));
      return null;
    }
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    try {
      const profile = await this.request("GET", `${CLIENT}/profile/${encodeURIComponent(userId)}`);
      return {
        displayName: stringField(profile, "displayname") ?? null,
        avatarUrl: stringField(profile, "avatar_url") ?? null,
      };
    } catch (err) {
      console.warn(`[matrix] Could not fetch profile of ${userId}:`, formatErrorMessage(err));
      return null;
    }
  }

  /** DM a user, creating the direct room on first use. */
  async sendDirect(userId: string, markdown: string): Promise<void> {
    let roomId = this.directRooms.get(userId);
    if (!roomId) {
      const created = await this.request("POST", `${CLIENT}/createRoom`, {
        data: { is_direct: true, invite: [userId], preset: "trusted_private_chat" },
      });
      roomId = stringField(created, "room_id");
      if (!roomId) throw new MatrixError("No room_id in createRoom response", 200, "M_UNKNOWN");
      this.directRooms.set(userId, roomId);
      console.info(`[matrix] Opened direct room ${roomId} with ${userId}`);
    }
    await this.sendMessage(roomId, { body: markdown, html: markdownToHtml(markdown), msgtype: "m.notice" });
  }

  async uploadMedia(data: Buffer, filename: string, mimetype: string): Promise<string> {
    const response = await this.request("POST", `${MEDIA}/upload`, {
      data,
      params: { filename },
      headers: { "Content-Type": mimetype },
      timeoutMs: UPLOAD_TIMEOUT_MS,
    });
    const uri = stringField(response, "content_uri");
    if (!uri) throw new MatrixError("No content_uri in upload response", 200, "M_UNKNOWN");
    return uri;
  }

  async getUploadLimit(): Promise<number | null> {
    const config = await this.request("GET", `${MEDIA}/config`);
    const size = config["m.upload.size"];
    return typeof size === "number" && size > 0 ? size : null;
  }

  mxcToHttp(url: string): string {
    const match = /^mxc:\/\/([^/]+)\/([^/?#]+)/.exec(url);
    if (!match) return url;
    return `${this.homeserver}${MEDIA}/download/${match[1]}/${match[2]}`;
  }

  isNativeMediaUrl(url: string): boolean {
    return url.startsWith("mxc://");
  }

  markdownToHtml(markdown: string): string {
    return markdownToHtml(markdown);
  }
}
