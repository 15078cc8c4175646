/**
 * HTTP client for the remote side.
 *
 * Three surfaces:
 *   webhook        POST/PATCH/DELETE {webhook_url}[/messages/{id}]  (impersonation)
 *   bridge service POST {bridge_endpoint}, PATCH/DELETE {bridge_endpoint}/messages/{id},
 *                  GET/DELETE {bridge_endpoint}/bind/{user}, GET {bridge_endpoint}/bind/new
 *   platform API   GET {remote_api_base}/guilds/{guild}/members/{id} or /users/{id}
 *
 * Every call uses validateStatus: () => true and maps the status itself.
 * Network failures surface as TransientNetworkError where classifiable.
 * Responses that carry message IDs are read as text and parsed with the
 * snowflake fields quoted, so 64-bit IDs survive.
 */

import axios from "axios";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { formatErrorMessage, isTransientNetworkError } from "../net-errors.js";
import { RemoteRejectedError, TooLongError, TransientNetworkError } from "./errors.js";
import { quoteSnowflakes } from "./frames.js";
import type { Route, UserIdentity } from "./types.js";

export interface RemoteApiConfig {
  bridgeEndpoint: string;
  token: string;
  webhookUrl: string | null;
  webhookWait: boolean;
  remoteApiBase: string;
  guildId: string | null;
  timeoutMs?: number;
}

/** Body of an impersonated (webhook) send. */
export interface WebhookMessage {
  content: string;
  username: string;
  avatarUrl?: string | null;
}

/** Body of an authenticated relay send. */
export interface RelayMessage {
  message: string;
  sender: string;
  room: string;
}

export type BindStatus =
  | { status: "pending"; url: string }
  | { status: "ok" }
  | { status: "error"; detail: string };

export const USERNAME_MAX = 32;
export const TOO_LONG_DETAIL = "Message too long.";
const AVATAR_CDN = "https://cdn.discordapp.com/avatars";

const idBodySchema = Type.Object({ id: Type.String() });
const detailBodySchema = Type.Object({ detail: Type.String() });
const bindingSchema = Type.Object({ discord: Type.String() });
const bindResponseSchema = Type.Object({
  status: Type.String(),
  url: Type.Optional(Type.String()),
});
const remoteUserSchema = Type.Object({
  username: Type.String(),
  global_name: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  avatar: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});
const memberSchema = Type.Object({
  nick: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  avatar: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  user: remoteUserSchema,
});

function parseJson(text: unknown): unknown {
  if (typeof text !== "string") return text;
  if (!text) return null;
  try {
    return JSON.parse(quoteSnowflakes(text, ["id", "discord", "message_id"]));
  } catch {
    return null;
  }
}

function readId(text: unknown): string | null {
  const body = parseJson(text);
  return Value.Check(idBodySchema, body) ? body.id : null;
}

function readDetail(text: unknown): string | undefined {
  const body = parseJson(text);
  return Value.Check(detailBodySchema, body) ? body.detail : undefined;
}

function isOk(status: number): boolean {
  return status >= 200 && status < 300;
}

function stripSigil(userId: string): string {
  return userId.startsWith("@") ? userId.slice(1) : userId;
}

function networkError(action: string, err: unknown): Error {
  if (isTransientNetworkError(err)) {
    return new TransientNetworkError(`${action}: ${formatErrorMessage(err)}`, { cause: err });
  }
  return err instanceof Error ? err : new Error(`${action}: ${formatErrorMessage(err)}`);
}

export function avatarCdnUrl(userId: string, hash: string): string {
  return `${AVATAR_CDN}/${userId}/${hash}.webp?size=256`;
}

export class RemoteApi {
  private readonly bridgeEndpoint: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: RemoteApiConfig) {
    this.bridgeEndpoint = config.bridgeEndpoint.replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? 30_000;
  }

  get hasWebhook(): boolean {
    return this.config.webhookUrl !== null && this.config.webhookUrl !== "";
  }

  private get bearer(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.token}` };
  }

  private async request(
    action: string,
    method: "get" | "post" | "patch" | "delete",
    url: string,
    options: { data?: unknown; params?: Record<string, string>; headers?: Record<string, string> } = {},
  ): Promise<{ status: number; data: string }> {
    try {
      const response = await axios.request<string>({
        method,
        url,
        data: options.data,
        params: options.params,
        headers: options.headers,
        responseType: "text",
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
      return { status: response.status, data: typeof response.data === "string" ? response.data : "" };
    } catch (err) {
      throw networkError(action, err);
    }
  }

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  /**
   * Send through the webhook. Returns the new message ID when the webhook
   * waits for and echoes the created message, else null.
   */
  async sendWebhook(message: WebhookMessage): Promise<string | null> {
    const webhookUrl = this.config.webhookUrl;
    if (!webhookUrl) throw new Error("No webhook configured");

    const body: Record<string, unknown> = {
      content: message.content,
      username: message.username.slice(0, USERNAME_MAX),
      allowed_mentions: { parse: ["users"], replied_user: true },
    };
    if (message.avatarUrl) body.avatar_url = message.avatarUrl;

    const { status, data } = await this.request("webhook send", "post", webhookUrl, {
      data: body,
      params: { wait: String(this.config.webhookWait) },
    });
    if (!isOk(status)) {
      throw new RemoteRejectedError(`Webhook send failed (${status})`, status, readDetail(data));
    }
    return this.config.webhookWait ? readId(data) : null;
  }

  /**
   * Send through the bridge service. Throws TooLongError when the remote
   * refuses the length, RemoteRejectedError for any other non-2xx.
   */
  async sendRelay(message: RelayMessage): Promise<string | null> {
    const { status, data } = await this.request("relay send", "post", this.bridgeEndpoint, {
      data: { secret: this.config.token, ...message },
      headers: this.bearer,
    });
    if (isOk(status)) return readId(data);

    const detail = readDetail(data);
    if (status === 400 && detail === TOO_LONG_DETAIL) {
      throw new TooLongError(TOO_LONG_DETAIL);
    }
    throw new RemoteRejectedError(`Relay send failed (${status})`, status, detail);
  }

  private messageUrl(route: Route | null, remoteId: string): { url: string; headers?: Record<string, string> } {
    if (route === "primary" && this.config.webhookUrl) {
      return { url: `${this.config.webhookUrl}/messages/${remoteId}` };
    }
    return { url: `${this.bridgeEndpoint}/messages/${remoteId}`, headers: this.bearer };
  }

  async editMessage(route: Route | null, remoteId: string, content: string): Promise<void> {
    const { url, headers } = this.messageUrl(route, remoteId);
    const { status, data } = await this.request("edit", "patch", url, { data: { content }, headers });
    if (!isOk(status)) {
      throw new RemoteRejectedError(`Edit of ${remoteId} failed (${status})`, status, readDetail(data));
    }
  }

  async deleteMessage(route: Route | null, remoteId: string): Promise<void> {
    const { url, headers } = this.messageUrl(route, remoteId);
    const { status, data } = await this.request("delete", "delete", url, { headers });
    if (!isOk(status)) {
      throw new RemoteRejectedError(`Delete of ${remoteId} failed (${status})`, status, readDetail(data));
    }
  }

  // -------------------------------------------------------------------------
  // Account binding
  // -------------------------------------------------------------------------

  /** Remote account bound to a local user, or null if none. Throws on other failures. */
  async getBinding(localUserId: string): Promise<string | null> {
    const user = encodeURIComponent(stripSigil(localUserId));
    const { status, data } = await this.request("bind lookup", "get", `${this.bridgeEndpoint}/bind/${user}`, {
      headers: this.bearer,
    });
    if (status === 404) return null;
    if (!isOk(status)) throw new RemoteRejectedError(`Bind lookup failed (${status})`, status);
    const body = parseJson(data);
    return Value.Check(bindingSchema, body) ? body.discord : null;
  }

  async requestBind(localUserId: string): Promise<BindStatus> {
    const { status, data } = await this.request("bind", "get", `${this.bridgeEndpoint}/bind/new`, {
      params: { mx_id: stripSigil(localUserId) },
      headers: this.bearer,
    });
    return this.toBindStatus(status, data);
  }

  async requestUnbind(localUserId: string): Promise<BindStatus> {
    const user = encodeURIComponent(stripSigil(localUserId));
    const { status, data } = await this.request("unbind", "delete", `${this.bridgeEndpoint}/bind/${user}`, {
      headers: this.bearer,
    });
    return this.toBindStatus(status, data);
  }

  private toBindStatus(status: number, data: string): BindStatus {
    const body = parseJson(data);
    if (!isOk(status) || !Value.Check(bindResponseSchema, body)) {
      return { status: "error", detail: `HTTP ${status}` };
    }
    if (body.status === "pending" && body.url) return { status: "pending", url: body.url };
    if (body.status === "ok") return { status: "ok" };
    return { status: "error", detail: `unexpected status "${body.status}"` };
  }

  // -------------------------------------------------------------------------
  // Remote users
  // -------------------------------------------------------------------------

  /**
   * Display name and avatar of a remote user: the guild member when a guild
   * is configured (nickname and guild avatar win), else the global user.
   * Returns null when the user cannot be read.
   */
  async fetchRemoteUser(remoteUserId: string): Promise<UserIdentity | null> {
    const base = this.config.remoteApiBase.replace(/\/$/, "");
    const url = this.config.guildId
      ? `${base}/guilds/${this.config.guildId}/members/${remoteUserId}`
      : `${base}/users/${remoteUserId}`;
    const { status, data } = await this.request("user lookup", "get", url, {
      headers: { Authorization: `Bot ${this.config.token}` },
    });
    if (status !== 200) {
      console.warn(`[remote] User lookup for ${remoteUserId} failed (${status})`);
      return null;
    }

    const body = parseJson(data);
    if (Value.Check(memberSchema, body)) {
      const avatar = body.avatar ?? body.user.avatar;
      return {
        displayName: body.nick || body.user.global_name || body.user.username,
        avatarUrl: avatar ? avatarCdnUrl(remoteUserId, avatar) : null,
      };
    }
    if (Value.Check(remoteUserSchema, body)) {
      return {
        displayName: body.global_name || body.username,
        avatarUrl: body.avatar ? avatarCdnUrl(remoteUserId, body.avatar) : null,
      };
    }
    console.warn(`[remote] Unexpected user payload for ${remoteUserId}`);
    return null;
  }
}
