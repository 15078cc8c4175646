/**
 * Outbound dispatcher (local → remote).
 *
 *   RESOLVE_IDENTITY → TRY_PRIMARY → done
 *                    ↘ TRY_FALLBACK → done | too_long | failed
 *
 * The primary path posts through the webhook as the sender (name + avatar).
 * Any failure there, or no webhook at all, falls back to the bridge service.
 * A fallback refusal is shown on the originating local event as a reaction:
 * 🖨️ for "too long", ❌ for anything else. Errors never escape.
 */

import type { LocalPlatform } from "../channels/types.js";
import { formatErrorMessage } from "../net-errors.js";
import { TooLongError } from "./errors.js";
import type { IdentityResolver } from "./identity-resolver.js";
import type { IdentityStore } from "./identity-store.js";
import type { RemoteApi } from "./remote-api.js";
import type { IdentityMapping, Route } from "./types.js";

export const REACTION_TOO_LONG = "\u{1F5A8}\u{FE0F}";
export const REACTION_FAILED = "\u{274C}";
export const REDACTION_REASON_MAX = 1900;

export type DispatchOutcome = "sent" | "too_long" | "failed";

export interface OutboundMessage {
  roomId: string;
  eventId: string;
  sender: string;
  /** Text as it should appear on the remote side. */
  content: string;
}

export interface DispatcherDeps {
  api: Pick<RemoteApi, "hasWebhook" | "sendWebhook" | "sendRelay" | "editMessage" | "deleteMessage">;
  identities: Pick<IdentityResolver, "resolveSender">;
  store: IdentityStore;
  platform: Pick<LocalPlatform, "addReaction">;
  /** Called with the displayed author after every successful send. */
  onRelayed?: (author: string) => void;
}

export function redactionNotice(reason: string): string {
  return `*Message was redacted: ${Array.from(reason).slice(0, REDACTION_REASON_MAX).join("")}*`;
}

export class Dispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async send(message: OutboundMessage): Promise<DispatchOutcome> {
    const { api, identities, store } = this.deps;
    const identity = await identities.resolveSender(message.sender);

    if (api.hasWebhook) {
      try {
        const remoteId = await api.sendWebhook({
          content: message.content,
          username: identity.displayName,
          avatarUrl: identity.avatarUrl,
        });
        if (remoteId) store.record(message.eventId, remoteId, "content", "primary");
        this.deps.onRelayed?.(identity.displayName);
        console.debug(`[dispatch] ${message.eventId} sent via webhook`);
        return "sent";
      } catch (err) {
        console.warn(
          `[dispatch] Webhook send of ${message.eventId} failed, falling back: ${formatErrorMessage(err)}`,
        );
      }
    }

    try {
      const remoteId = await api.sendRelay({
        message: message.content,
        sender: identity.displayName,
        room: message.roomId,
      });
      if (remoteId) store.record(message.eventId, remoteId, "content", "fallback");
      this.deps.onRelayed?.(identity.displayName);
      console.debug(`[dispatch] ${message.eventId} sent via bridge service`);
      return "sent";
    } catch (err) {
      if (err instanceof TooLongError) {
        console.warn(`[dispatch] ${message.eventId} is too long for the remote side`);
        await this.react(message, REACTION_TOO_LONG);
        return "too_long";
      }
      console.error(`[dispatch] Failed to relay ${message.eventId}:`, err);
      await this.react(message, REACTION_FAILED);
      return "failed";
    }
  }

  /**
   * Edit the remote copy of `originalId`. The edit event is recorded as an
   * alias so later edits and redactions of it resolve too.
   */
  async edit(originalId: string, editEventId: string, content: string): Promise<boolean> {
    const { api, store } = this.deps;
    const mapping = this.outbound(originalId);
    if (!mapping) {
      console.warn(`[dispatch] Unrecognised replacement of ${originalId}, dropping`);
      return false;
    }

    try {
      await api.editMessage(mapping.route, mapping.remoteId, content);
    } catch (err) {
      console.warn(`[dispatch] Edit of ${originalId} failed: ${formatErrorMessage(err)}`);
    }
    store.record(editEventId, mapping.remoteId, mapping.kind, mapping.route);
    return true;
  }

  /**
   * Mirror a local redaction. With a reason the remote message is replaced
   * by a notice; without one it is deleted. The correlation is dropped either
   * way.
   */
  async redact(redactedId: string, reason?: string): Promise<boolean> {
    const { api, store } = this.deps;
    const mapping = this.outbound(redactedId);
    if (!mapping) {
      console.debug(`[dispatch] Ignoring redaction of unknown event ${redactedId}`);
      return false;
    }

    try {
      if (reason) {
        await api.editMessage(mapping.route, mapping.remoteId, redactionNotice(reason));
      } else {
        await api.deleteMessage(mapping.route, mapping.remoteId);
      }
    } catch (err) {
      console.warn(`[dispatch] Redaction of ${redactedId} failed: ${formatErrorMessage(err)}`);
    }
    store.forget({ remoteId: mapping.remoteId });
    return true;
  }

  /**
   * Mapping of a local event this dispatcher sent out. Copies relayed in from
   * the remote side carry no route and are never edited or deleted remotely.
   */
  private outbound(localId: string): (IdentityMapping & { route: Route }) | null {
    const mapping = this.deps.store.resolveRemote(localId);
    if (!mapping) return null;
    const { route } = mapping;
    if (route === null) {
      console.debug(`[dispatch] ${localId} is a relayed copy of remote ${mapping.remoteId}, not mirroring`);
      return null;
    }
    return { ...mapping, route };
  }

  private async react(message: OutboundMessage, key: string): Promise<void> {
    try {
      await this.deps.platform.addReaction(message.roomId, message.eventId, key);
    } catch (err) {
      console.warn(`[dispatch] Could not react to ${message.eventId}: ${formatErrorMessage(err)}`);
    }
  }
}
