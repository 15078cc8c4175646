/**
 * Local platform interface.
 *
 * The bridge talks to the local chat platform only through this interface:
 * sending, editing and redacting events, reactions, profile lookup, media
 * upload and URL resolution, and markdown rendering. `MatrixChannel` is the
 * production implementation; tests use an in-memory fake.
 */

/** Matrix-style message types used for relayed content. */
export type MessageType = "m.text" | "m.notice" | "m.image" | "m.video" | "m.audio" | "m.file";

export interface MediaInfo {
  mimetype?: string;
  size?: number;
  w?: number;
  h?: number;
  thumbnail_url?: string;
  thumbnail_info?: {
    mimetype?: string;
    size?: number;
    w?: number;
    h?: number;
  };
}

export interface OutgoingText {
  /** Plain-text body (`body` field). */
  body: string;
  /** Rendered HTML (`formatted_body`); omitted for plain messages. */
  html?: string;
  msgtype?: "m.text" | "m.notice";
  /** Event this message replies to. */
  replyTo?: string;
  /** Extra top-level content keys, e.g. bridge annotations. */
  extra?: Record<string, string>;
}

export interface OutgoingMedia {
  msgtype: "m.image" | "m.video" | "m.audio" | "m.file";
  /** Filename, shown as the body. */
  body: string;
  /** Uploaded media handle (mxc:// URI). */
  url: string;
  info?: MediaInfo;
  replyTo?: string;
}

export interface UserProfile {
  displayName: string | null;
  /** Native avatar handle (mxc:// URI). */
  avatarUrl: string | null;
}

export interface LocalMedia {
  /** Native media handle (mxc:// URI). */
  url: string;
  mimetype: string;
  filename: string;
}

export interface LocalMessageEvent {
  roomId: string;
  eventId: string;
  sender: string;
  /** Origin server timestamp in milliseconds. */
  timestamp: number;
  body: string;
  msgtype: string;
  /** Present for media messages. */
  media?: LocalMedia;
  /** Present for replacement (edit) events. */
  replaces?: { eventId: string; body: string };
}

export interface LocalRedactionEvent {
  roomId: string;
  eventId: string;
  sender: string;
  timestamp: number;
  /** Event being redacted. */
  redacts: string;
  reason?: string;
}

export interface LocalEventContent {
  [key: string]: unknown;
}

export interface LocalPlatform {
  readonly name: string;
  /** Fully qualified ID of the account the bridge runs as. */
  readonly userId: string;

  start(): Promise<void>;
  stop(): Promise<void>;

  /** Send a text message, returns the new event ID. */
  sendMessage(roomId: string, message: OutgoingText): Promise<string>;

  /** Send an uploaded media item, returns the new event ID. */
  sendMedia(roomId: string, media: OutgoingMedia): Promise<string>;

  /** Replace the content of a previously sent event. */
  editMessage(roomId: string, eventId: string, message: OutgoingText): Promise<string>;

  /** Redact (delete) an event. */
  redactMessage(roomId: string, eventId: string, reason?: string): Promise<void>;

  /** Annotate an event with a reaction. */
  addReaction(roomId: string, eventId: string, key: string): Promise<void>;

  /** Fetch an event's content, or null if it cannot be read. */
  getEventContent(roomId: string, eventId: string): Promise<LocalEventContent | null>;

  /** Look up a user's profile, or null if it cannot be read. */
  getProfile(userId: string): Promise<UserProfile | null>;

  /** Send a private message to a user (used for binding links). */
  sendDirect(userId: string, markdown: string): Promise<void>;

  /** Upload media, returns the native handle. */
  uploadMedia(data: Buffer, filename: string, mimetype: string): Promise<string>;

  /** Largest upload the platform accepts, or null if unknown. */
  getUploadLimit(): Promise<number | null>;

  /** Resolve a native media handle to a public HTTP URL. */
  mxcToHttp(url: string): string;

  /** True if the URL already is a native media handle. */
  isNativeMediaUrl(url: string): boolean;

  /** Render markdown into the platform's rich markup. */
  markdownToHtml(markdown: string): string;

  /** Register handlers. One handler per kind. */
  onMessage(handler: (event: LocalMessageEvent) => Promise<void>): void;
  onRedaction(handler: (event: LocalRedactionEvent) => Promise<void>): void;
  /** Called once after the first successful sync. */
  onReady(handler: () => Promise<void>): void;
}
