/**
 * Content renderer for remote → local relays.
 *
 * Pure functions: given a remote message and the grouping state, decide
 * whether to show the author header and produce the rich and plain bodies.
 * Consecutive messages from one author within the grouping window collapse
 * under a single header.
 */

import { escapeHtml, escapeHtmlAttr, escapeMarkdown } from "../channels/markdown.js";
import type { RemoteFrame } from "./frames.js";
import type { LastRelayed, RenderedMessage } from "./types.js";

export const DEFAULT_GROUPING_WINDOW_SECONDS = 300;

type GroupableMessage = Pick<RemoteFrame, "author" | "at" | "content">;
type RenderableMessage = Pick<RemoteFrame, "author" | "content" | "clean_content" | "attachments">;

export function shouldPrependAuthor(
  message: GroupableMessage,
  lastRelayed: LastRelayed | null,
  windowSeconds = DEFAULT_GROUPING_WINDOW_SECONDS,
): boolean {
  if (!lastRelayed) return true;
  const withinWindow = message.at - lastRelayed.at < windowSeconds;
  return !(withinWindow && message.author === lastRelayed.author && message.content !== "");
}

const STRIKETHROUGH = /(?<!\\)~~([^~]+?)(?<!\\)~~/g;
const CODE_SEGMENT = /(<pre[\s\S]*?<\/pre>|<code[\s\S]*?<\/code>)/;

/**
 * Turn unescaped `~~x~~` left in rendered HTML into `<del>x</del>`.
 * Text inside <code> and <pre> is left alone.
 */
export function convertStrikethrough(html: string): string {
  return html
    .split(CODE_SEGMENT)
    .map((part, i) => (i % 2 === 1 ? part : part.replace(STRIKETHROUGH, "<del>$1</del>")))
    .join("");
}

export function avatarImgTag(handle: string): string {
  return `<img src="${escapeHtmlAttr(handle)}" width="16" height="16" alt="[\u{1F464}]"> `;
}

/** Put the avatar inside the bold author header, before the name. */
function spliceAvatar(html: string, handle: string): string {
  const img = avatarImgTag(handle);
  const at = html.indexOf("<strong>");
  if (at === -1) return img + html;
  const insert = at + "<strong>".length;
  return html.slice(0, insert) + img + html.slice(insert);
}

export interface RenderOptions {
  includeAuthor: boolean;
  /** Local handle of the author's round avatar, if one could be resolved. */
  avatarHandle?: string | null;
  markdownToHtml: (markdown: string) => string;
}

export function renderContent(message: RenderableMessage, options: RenderOptions): RenderedMessage {
  if (message.content) {
    const header = options.includeAuthor ? `**${escapeMarkdown(message.author)}:**\n` : "";
    let richBody = options.markdownToHtml(header + message.clean_content);
    if (options.includeAuthor && options.avatarHandle) {
      richBody = spliceAvatar(richBody, options.avatarHandle);
    }
    return {
      body: `**${message.author}:**\n${message.clean_content}`,
      richBody: convertStrikethrough(richBody),
      includedAuthor: options.includeAuthor,
    };
  }

  const count = message.attachments.length;
  const summary = count > 0
    ? `${message.author} sent ${count} attachments.`
    : `${message.author} sent no content.`;
  return { body: summary, richBody: escapeHtml(summary), includedAuthor: false };
}
