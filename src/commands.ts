/**
 * Chat commands.
 *
 * `!bind` links a local account to a remote one so relayed messages show the
 * remote name and avatar; `!unbind` removes the link. The bridge service owns
 * the actual binding flow and hands back a URL that is DMed to the user.
 */

import type { LocalMessageEvent, LocalPlatform } from "./channels/types.js";
import type { IdentityResolver } from "./bridge/identity-resolver.js";
import type { RemoteApi } from "./bridge/remote-api.js";
import { formatErrorMessage } from "./net-errors.js";

const CROSS = "\u{274C}";
const HOURGLASS = "\u{23F3}";
const CHECK = "\u{2705}";

export interface CommandContext {
  prefix: string;
  api: Pick<RemoteApi, "requestBind" | "requestUnbind">;
  identities: Pick<IdentityResolver, "getBinding" | "invalidateBinding">;
  platform: Pick<LocalPlatform, "userId" | "sendMessage" | "sendDirect" | "markdownToHtml">;
}

/** Name of the command in `body`, or null if it is not a command. */
export function parseCommand(body: string, prefix: string): string | null {
  if (!prefix || !body.startsWith(prefix)) return null;
  const name = body.slice(prefix.length).trim().split(/\s+/, 1)[0];
  return name ? name.toLowerCase() : null;
}

async function reply(msg: LocalMessageEvent, context: CommandContext, markdown: string): Promise<void> {
  await context.platform.sendMessage(msg.roomId, {
    body: markdown,
    html: context.platform.markdownToHtml(markdown),
    msgtype: "m.notice",
    replyTo: msg.eventId,
  });
}

async function bind(msg: LocalMessageEvent, context: CommandContext): Promise<void> {
  const existing = await context.identities.getBinding(msg.sender);
  if (existing) {
    await reply(
      msg,
      context,
      `${CROSS} You have already bound your account to \`${existing}\`.\nUse \`${context.prefix}unbind\` to unbind your account.`,
    );
    return;
  }

  const result = await context.api.requestBind(msg.sender);
  context.identities.invalidateBinding(msg.sender);
  if (result.status !== "pending") {
    if (result.status === "error") console.warn(`[commands] Bind of ${msg.sender} failed: ${result.detail}`);
    await reply(msg, context, `${CROSS} Failed to bind your account. Please try again later.`);
    return;
  }

  await context.platform.sendDirect(msg.sender, `Please click [here](${result.url}) to bind your remote account.`);
  await reply(msg, context, `${HOURGLASS} I have sent you a link in a direct room.`);
}

async function unbind(msg: LocalMessageEvent, context: CommandContext): Promise<void> {
  const existing = await context.identities.getBinding(msg.sender);
  if (!existing) {
    await reply(msg, context, `${CROSS} You have not bound your account to any remote account.`);
    return;
  }

  const result = await context.api.requestUnbind(msg.sender);
  context.identities.invalidateBinding(msg.sender);
  switch (result.status) {
    case "pending":
      await context.platform.sendDirect(msg.sender, `Please click [here](${result.url}) to unbind your remote account.`);
      await reply(msg, context, `${HOURGLASS} I have sent you a link in a direct room.`);
      return;
    case "ok":
      await reply(msg, context, `${CHECK} Your account has been unbound.`);
      return;
    case "error":
      console.warn(`[commands] Unbind of ${msg.sender} failed: ${result.detail}`);
      await reply(msg, context, `${CROSS} Failed to unbind your account. Please try again later.`);
  }
}

/**
 * Handle `msg` if it is a known command. Returns true if it was one, so the
 * caller does not relay it.
 */
export async function handleCommand(msg: LocalMessageEvent, context: CommandContext): Promise<boolean> {
  if (msg.sender === context.platform.userId || msg.replaces) return false;
  const name = parseCommand(msg.body, context.prefix);
  if (name !== "bind" && name !== "unbind") return false;

  try {
    if (name === "bind") {
      await bind(msg, context);
    } else {
      await unbind(msg, context);
    }
  } catch (err) {
    console.error(`[commands] ${name} for ${msg.sender} failed:`, err);
    await reply(msg, context, `${CROSS} Something went wrong: ${formatErrorMessage(err)}`).catch((replyErr) =>
      console.warn("[commands] Could not send failure reply:", formatErrorMessage(replyErr)),
    );
  }
  return true;
}
