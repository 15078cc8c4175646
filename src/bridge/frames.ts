/**
 * Push-stream frame codec.
 *
 * Frames arrive as JSON text. Remote message IDs are 64-bit snowflakes that
 * JSON.parse would round, so every `"message_id": <digits>` is rewritten to a
 * string before parsing. The result is validated against a TypeBox schema
 * with defaults applied.
 */

import type { Static } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { formatErrorMessage } from "../net-errors.js";
import { FrameValidationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const attachmentSchema = Type.Object({
  url: Type.String(),
  proxy_url: Type.String(),
  filename: Type.String(),
  size: Type.Integer({ minimum: 0 }),
  width: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
  height: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
  content_type: Type.String({ default: "application/octet-stream" }),
});

/** Only the ID of a replied-to message is used; the rest of it is ignored. */
const replyRefSchema = Type.Object({
  message_id: Type.String(),
});

const frameSchema = Type.Object({
  event_type: Type.Union(
    [Type.Literal("create"), Type.Literal("edit"), Type.Literal("redact")],
    { default: "create" },
  ),
  message_id: Type.String({ pattern: "^[0-9]+$" }),
  author: Type.String(),
  is_automated: Type.Boolean({ default: false }),
  avatar: Type.String({ default: "" }),
  content: Type.String({ default: "" }),
  clean_content: Type.String({ default: "" }),
  /** Unix seconds, fractional. */
  at: Type.Number(),
  attachments: Type.Array(attachmentSchema, { default: [] }),
  reply_to: Type.Optional(Type.Union([replyRefSchema, Type.Null()])),
  /** Redaction reason, redact frames only. */
  reason: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type RemoteAttachment = Static<typeof attachmentSchema>;
export type RemoteFrame = Static<typeof frameSchema>;

export type DecodedFrame =
  | { kind: "ping" }
  | { kind: "message"; frame: RemoteFrame };

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Rewrite bare integers under the given keys as JSON strings, at any depth.
 */
export function quoteSnowflakes(raw: string, fields: readonly string[] = ["message_id"]): string {
  const pattern = new RegExp(`("(?:${fields.join("|")})"\\s*:\\s*)(-?\\d+)`, "g");
  return raw.replace(pattern, '$1"$2"');
}

function isPing(value: unknown): boolean {
  return typeof value === "object" && value !== null && "status" in value && value.status === "ping";
}

/**
 * Decode one frame. Throws FrameValidationError on invalid JSON or a frame
 * that does not match the schema.
 */
export function decodeFrame(raw: string): DecodedFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(quoteSnowflakes(raw));
  } catch (err) {
    throw new FrameValidationError(`Invalid JSON frame: ${formatErrorMessage(err)}`, raw);
  }

  if (isPing(parsed)) return { kind: "ping" };

  const value = Value.Default(frameSchema, parsed);
  if (!Value.Check(frameSchema, value)) {
    const first = Value.Errors(frameSchema, value).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "unknown error";
    throw new FrameValidationError(`Invalid frame (${where})`, raw);
  }
  return { kind: "message", frame: value };
}
