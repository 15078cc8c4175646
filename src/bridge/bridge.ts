/**
 * Bridge instance: one local room paired with one remote channel.
 *
 * Remote → local: the supervisor hands decoded frames to handleFrame(),
 * which creates, edits or redacts the local copies. Local → remote: the
 * platform's message and redaction events go through the listener filters
 * into the dispatcher.
 *
 * Both directions share one send queue, so relays happen in arrival order
 * and the grouping state (`lastRelayed`) is only touched from inside it.
 */

import type { LocalMessageEvent, LocalPlatform, LocalRedactionEvent, OutgoingText } from "../channels/types.js";
import { formatErrorMessage } from "../net-errors.js";
import { SendQueue } from "../send-queue.js";
import type { AvatarResolver } from "./asset-cache.js";
import type { AttachmentPipeline } from "./attachments.js";
import { Dispatcher, redactionNotice, type DispatcherDeps } from "./dispatcher.js";
import type { RemoteFrame } from "./frames.js";
import type { IdentityResolver } from "./identity-resolver.js";
import type { IdentityStore } from "./identity-store.js";
import { DEFAULT_GROUPING_WINDOW_SECONDS, renderContent, shouldPrependAuthor } from "./render.js";
import { ConnectionSupervisor, type SupervisorOptions } from "./supervisor.js";
import { AUTHOR_ANNOTATION, type LastRelayed, type RenderedMessage } from "./types.js";

export const DEFAULT_IGNORED_PREFIXES = ["!", "?", ".", "-"];

export interface BridgeOptions {
  /** Local room the bridge relays to and listens in. */
  roomId: string;
  /** Remote author name of the companion bot; its frames are echoes. */
  selfAuthor?: string | null;
  commandPrefix?: string;
  ignoredPrefixes?: string[];
  /** Prepended to links of relayed local videos. */
  videoEmbedPrefix?: string;
  groupingWindowSeconds?: number;
  /** Push stream settings. Without them the bridge only handles frames it is given. */
  stream?: Omit<SupervisorOptions, "onFrame">;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

export interface BridgeDeps {
  platform: LocalPlatform;
  api: DispatcherDeps["api"];
  identities: Pick<IdentityResolver, "resolveSender">;
  store: IdentityStore;
  avatars: Pick<AvatarResolver, "resolve">;
  attachments: Pick<AttachmentPipeline, "relay">;
}

/** Mutable state of one bridge instance. */
export interface RelayState {
  lastRelayed: LastRelayed | null;
}

export class Bridge {
  readonly state: RelayState = { lastRelayed: null };
  readonly queue = new SendQueue("bridge");
  readonly dispatcher: Dispatcher;
  private readonly supervisor: ConnectionSupervisor | null;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly windowSeconds: number;
  private readonly skipPrefixes: string[];
  private stopping = false;

  constructor(
    private readonly deps: BridgeDeps,
    private readonly options: BridgeOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.windowSeconds = options.groupingWindowSeconds ?? DEFAULT_GROUPING_WINDOW_SECONDS;
    this.skipPrefixes = [
      ...(options.commandPrefix ? [options.commandPrefix] : []),
      ...(options.ignoredPrefixes ?? DEFAULT_IGNORED_PREFIXES),
    ].filter((prefix) => prefix !== "");

    this.dispatcher = new Dispatcher({
      api: deps.api,
      identities: deps.identities,
      store: deps.store,
      platform: deps.platform,
      onRelayed: (author) => {
        this.state.lastRelayed = { author, at: this.now() / 1000 };
      },
    });

    this.supervisor = options.stream
      ? new ConnectionSupervisor({ ...options.stream, onFrame: (frame) => this.handleFrame(frame) })
      : null;
  }

  /**
   * Register the local listeners on the platform. `intercept` sees every
   * message first; returning true keeps it from being relayed.
   */
  attach(intercept?: (event: LocalMessageEvent) => Promise<boolean>): void {
    this.deps.platform.onMessage(async (event) => {
      if (intercept && (await intercept(event))) return;
      await this.handleLocalMessage(event);
    });
    this.deps.platform.onRedaction((event) => this.handleLocalRedaction(event));
  }

  start(): void {
    if (!this.supervisor) {
      console.warn("[bridge] No push stream configured, remote messages will not be relayed");
      return;
    }
    console.info(`[bridge] Relaying into ${this.options.roomId}`);
    this.supervisor.start();
  }

  /** Stop the push stream, refuse new local events and wait for queued relays. */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.supervisor?.stop();
    await this.queue.idle();
  }

  get isStreaming(): boolean {
    return this.supervisor?.isRunning ?? false;
  }

  // -------------------------------------------------------------------------
  // Remote → local
  // -------------------------------------------------------------------------

  /** Apply one remote frame. Never rejects. */
  async handleFrame(frame: RemoteFrame): Promise<void> {
    if (this.stopping) return;
    if (this.options.selfAuthor && frame.author === this.options.selfAuthor) {
      console.debug(`[bridge] Ignoring own message ${frame.message_id}`);
      return;
    }
    if (frame.is_automated) {
      console.debug(`[bridge] Ignoring automated message ${frame.message_id}`);
      return;
    }

    try {
      await this.queue.run(async () => {
        switch (frame.event_type) {
          case "create":
            return this.relayCreate(frame);
          case "edit":
            return this.relayEdit(frame);
          case "redact":
            return this.relayRedact(frame);
        }
      });
    } catch (err) {
      console.error(`[bridge] Failed to relay ${frame.event_type} of ${frame.message_id}:`, err);
    }
  }

  private async relayCreate(frame: RemoteFrame): Promise<void> {
    const { platform, store, attachments } = this.deps;

    let replyTo: string | undefined;
    if (frame.reply_to) {
      replyTo = store.resolveLocal(frame.reply_to.message_id) ?? undefined;
      if (!replyTo) console.warn(`[bridge] Unknown reply target ${frame.reply_to.message_id}`);
    }

    const includeAuthor = shouldPrependAuthor(frame, this.state.lastRelayed, this.windowSeconds);
    const rendered = await this.render(frame, includeAuthor);
    const eventId = await platform.sendMessage(this.options.roomId, { ...toOutgoing(rendered), replyTo });

    store.record(eventId, frame.message_id, "content");
    this.state.lastRelayed = { author: frame.author, at: frame.at };
    console.debug(`[bridge] ${frame.message_id} → ${eventId}`);

    if (frame.attachments.length === 0) return;
    const sent = await attachments.relay(this.options.roomId, eventId, frame.attachments);
    for (const attachmentEventId of sent) {
      store.record(attachmentEventId, frame.message_id, "attachment");
    }
  }

  private async relayEdit(frame: RemoteFrame): Promise<void> {
    const { platform, store } = this.deps;
    const localId = store.resolveLocal(frame.message_id);
    if (!localId) {
      console.warn(`[bridge] Edit of unknown message ${frame.message_id}, dropping`);
      return;
    }

    const original = await platform.getEventContent(this.options.roomId, localId);
    const includeAuthor = original?.[AUTHOR_ANNOTATION] === "true";
    const rendered = await this.render(frame, includeAuthor);
    await platform.editMessage(this.options.roomId, localId, toOutgoing(rendered));
  }

  private async relayRedact(frame: RemoteFrame): Promise<void> {
    const { platform, store } = this.deps;
    const mappings = store.resolveAllLocal(frame.message_id);
    if (mappings.length === 0) {
      console.debug(`[bridge] Redaction of unknown message ${frame.message_id}, ignoring`);
      return;
    }

    if (frame.reason) {
      const target = mappings.find((m) => m.kind === "content") ?? mappings[0];
      const notice = redactionNotice(frame.reason);
      await platform.editMessage(this.options.roomId, target.localId, {
        body: notice,
        html: platform.markdownToHtml(notice),
        msgtype: "m.text",
      });
    } else {
      for (const mapping of mappings) {
        try {
          await platform.redactMessage(this.options.roomId, mapping.localId);
        } catch (err) {
          console.warn(`[bridge] Could not redact ${mapping.localId}:`, formatErrorMessage(err));
        }
      }
    }
    store.forget({ remoteId: frame.message_id });
  }

  private async render(frame: RemoteFrame, includeAuthor: boolean): Promise<RenderedMessage> {
    const avatarHandle = includeAuthor && frame.avatar ? await this.deps.avatars.resolve(frame.avatar) : null;
    return renderContent(frame, {
      includeAuthor,
      avatarHandle,
      markdownToHtml: (markdown) => this.deps.platform.markdownToHtml(markdown),
    });
  }

  // -------------------------------------------------------------------------
  // Local → remote
  // -------------------------------------------------------------------------

  private isRelevant(event: { roomId: string; timestamp: number }): boolean {
    if (this.stopping) return false;
    return event.roomId === this.options.roomId && event.timestamp >= this.startedAt;
  }

  /** Relay one local message event. Never rejects. */
  async handleLocalMessage(event: LocalMessageEvent): Promise<void> {
    if (!this.isRelevant(event)) return;
    if (event.sender === this.deps.platform.userId) return;
    if (this.skipPrefixes.some((prefix) => event.body.startsWith(prefix))) return;

    try {
      const replaces = event.replaces;
      if (replaces) {
        await this.queue.run(() => this.dispatcher.edit(replaces.eventId, event.eventId, replaces.body));
        return;
      }

      await this.queue.run(() =>
        this.dispatcher.send({
          roomId: event.roomId,
          eventId: event.eventId,
          sender: event.sender,
          content: this.outboundContent(event),
        }),
      );
    } catch (err) {
      console.error(`[bridge] Failed to relay local event ${event.eventId}:`, err);
    }
  }

  /** Relay one local redaction. Never rejects. */
  async handleLocalRedaction(event: LocalRedactionEvent): Promise<void> {
    if (!this.isRelevant(event)) return;

    try {
      await this.queue.run(() => this.dispatcher.redact(event.redacts, event.reason));
    } catch (err) {
      console.error(`[bridge] Failed to relay redaction ${event.eventId}:`, err);
    }
  }

  /** Text to send remotely. Media becomes a link to the public download URL. */
  private outboundContent(event: LocalMessageEvent): string {
    if (!event.media) return event.body;
    let url = this.deps.platform.mxcToHttp(event.media.url);
    if (event.media.mimetype.startsWith("video/") && this.options.videoEmbedPrefix) {
      url = this.options.videoEmbedPrefix + url;
    }
    return `[${event.media.filename}](${url})`;
  }
}

function toOutgoing(rendered: RenderedMessage): OutgoingText {
  return {
    body: rendered.body,
    html: rendered.richBody,
    msgtype: "m.text",
    extra: { [AUTHOR_ANNOTATION]: rendered.includedAuthor ? "true" : "false" },
  };
}
