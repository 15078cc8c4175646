/**
 * Shared bridge types: correlation records, relay state, and the shapes
 * passed between renderer, pipeline and dispatcher.
 */

export type { RemoteAttachment, RemoteFrame } from "./frames.js";

/** A relayed remote message produces one content event plus one event per attachment. */
export type MappingKind = "content" | "attachment";

/** Which outbound path delivered a local message to the remote side. */
export type Route = "primary" | "fallback";

export interface IdentityMapping {
  localId: string;
  /** Remote snowflake, kept as a string (exceeds Number.MAX_SAFE_INTEGER). */
  remoteId: string;
  kind: MappingKind;
  /** Null for remote → local relays. */
  route: Route | null;
  /** Unix ms. */
  createdAt: number;
}

/** The last message relayed in either direction, for author grouping. */
export interface LastRelayed {
  author: string;
  /** Unix seconds, same clock as frame `at`. */
  at: number;
}

export interface RenderedMessage {
  /** Plain-text fallback. */
  body: string;
  /** Rich body (HTML). */
  richBody: string;
  includedAuthor: boolean;
}

/** Display metadata for a remote user, used to impersonate on the primary path. */
export interface UserIdentity {
  displayName: string;
  avatarUrl: string | null;
}

/** Event content key carrying the author-header decision of a relayed message. */
export const AUTHOR_ANNOTATION = "org.crossline.bridge.author";
