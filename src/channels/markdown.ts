/**
 * Markdown to Matrix HTML.
 *
 * markdown-it with raw HTML disabled (remote content is untrusted), bare URLs
 * linkified and single newlines kept as <br>. Matrix's allowed tag list has
 * <del> but not <s>, so strikethrough spans are emitted as <del>.
 */

import MarkdownIt from "markdown-it";

const md = new MarkdownIt({
  html: false,
  linkify: true,
  breaks: true,
});

md.renderer.rules.s_open = () => "<del>";
md.renderer.rules.s_close = () => "</del>";

export function markdownToHtml(markdown: string): string {
  if (!markdown) return "";
  return md.render(markdown).trimEnd();
}

/**
 * Backslash-escape markdown punctuation so a literal string (e.g. a display
 * name) renders verbatim.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[\\`*_{}[\]()#+\-.!~|<>]/g, (ch) => `\\${ch}`);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeHtmlAttr(text: string): string {
  return escapeHtml(text).replace(/"/g, "&quot;");
}
