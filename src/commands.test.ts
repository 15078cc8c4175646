import { describe, it, expect, vi, beforeEach } from "vitest";
import { handleCommand, parseCommand, type CommandContext } from "./commands.js";
import type { LocalMessageEvent, OutgoingText } from "./channels/types.js";
import type { BindStatus } from "./bridge/remote-api.js";

function message(body: string, overrides: Partial<LocalMessageEvent> = {}): LocalMessageEvent {
  return {
    roomId: "!room:hs.test",
    eventId: "$cmd",
    sender: "@alice:hs.test",
    timestamp: 1,
    body,
    msgtype: "m.text",
    ...overrides,
  };
}

describe("parseCommand", () => {
  it("extracts the command name", () => {
    expect(parseCommand("!bind", "!")).toBe("bind");
    expect(parseCommand("!UNBIND  now", "!")).toBe("unbind");
    expect(parseCommand("hello", "!")).toBeNull();
    expect(parseCommand("!", "!")).toBeNull();
    expect(parseCommand("!bind", "")).toBeNull();
  });
});

describe("handleCommand", () => {
  const sendMessage = vi.fn(async (_roomId: string, _msg: OutgoingText) => "$reply");
  const sendDirect = vi.fn(async (_userId: string, _markdown: string) => undefined);
  const getBinding = vi.fn(async (_user: string): Promise<string | null> => null);
  const invalidateBinding = vi.fn();
  const requestBind = vi.fn(async (_user: string): Promise<BindStatus> => ({ status: "pending", url: "https://bind.test/x" }));
  const requestUnbind = vi.fn(async (_user: string): Promise<BindStatus> => ({ status: "ok" }));

  const context: CommandContext = {
    prefix: "!",
    api: { requestBind, requestUnbind },
    identities: { getBinding, invalidateBinding },
    platform: { userId: "@relay:hs.test", sendMessage, sendDirect, markdownToHtml: (md) => md },
  };

  const replies = () => sendMessage.mock.calls.map(([, msg]) => msg.body);

  beforeEach(() => {
    vi.clearAllMocks();
    getBinding.mockResolvedValue(null);
  });

  it("ignores ordinary messages", async () => {
    await expect(handleCommand(message("hello"), context)).resolves.toBe(false);
    await expect(handleCommand(message("!other"), context)).resolves.toBe(false);
    expect(sendMessage).not.toHaveBeenCalled();
  });

  it("ignores its own messages", async () => {
    await expect(handleCommand(message("!bind", { sender: "@relay:hs.test" }), context)).resolves.toBe(false);
  });

  describe("bind", () => {
    it("sends the binding link by DM", async () => {
      await expect(handleCommand(message("!bind"), context)).resolves.toBe(true);

      expect(requestBind).toHaveBeenCalledWith("@alice:hs.test");
      expect(sendDirect).toHaveBeenCalledWith(
        "@alice:hs.test",
        "Please click [here](https://bind.test/x) to bind your remote account.",
      );
      expect(replies()).toEqual(["\u{23F3} I have sent you a link in a direct room."]);
      expect(sendMessage.mock.calls[0][1]).toMatchObject({ msgtype: "m.notice", replyTo: "$cmd" });
      expect(invalidateBinding).toHaveBeenCalledWith("@alice:hs.test");
    });

    it("refuses when already bound", async () => {
      getBinding.mockResolvedValue("123456789012345678");
      await handleCommand(message("!bind"), context);

      expect(requestBind).not.toHaveBeenCalled();
      expect(replies()).toEqual([
        "\u{274C} You have already bound your account to `123456789012345678`.\nUse `!unbind` to unbind your account.",
      ]);
    });

    it("reports a failed request", async () => {
      requestBind.mockResolvedValueOnce({ status: "error", detail: "HTTP 500" });
      await handleCommand(message("!bind"), context);

      expect(sendDirect).not.toHaveBeenCalled();
      expect(replies()).toEqual(["\u{274C} Failed to bind your account. Please try again later."]);
    });

    it("reports unexpected errors", async () => {
      requestBind.mockRejectedValueOnce(new Error("socket hang up"));
      await expect(handleCommand(message("!bind"), context)).resolves.toBe(true);
      expect(replies()).toEqual(["\u{274C} Something went wrong: socket hang up"]);
    });
  });

  describe("unbind", () => {
    beforeEach(() => {
      getBinding.mockResolvedValue("42");
    });

    it("refuses when not bound", async () => {
      getBinding.mockResolvedValue(null);
      await handleCommand(message("!unbind"), context);
      expect(requestUnbind).not.toHaveBeenCalled();
      expect(replies()).toEqual(["\u{274C} You have not bound your account to any remote account."]);
    });

    it("confirms an immediate unbind", async () => {
      await handleCommand(message("!unbind"), context);
      expect(replies()).toEqual(["\u{2705} Your account has been unbound."]);
      expect(invalidateBinding).toHaveBeenCalledWith("@alice:hs.test");
    });

    it("sends a confirmation link when the service asks for one", async () => {
      requestUnbind.mockResolvedValueOnce({ status: "pending", url: "https://bind.test/y" });
      await handleCommand(message("!unbind"), context);
      expect(sendDirect).toHaveBeenCalledWith(
        "@alice:hs.test",
        "Please click [here](https://bind.test/y) to unbind your remote account.",
      );
    });

    it("reports a refusal", async () => {
      requestUnbind.mockResolvedValueOnce({ status: "error", detail: "HTTP 404" });
      await handleCommand(message("!unbind"), context);
      expect(replies()).toEqual(["\u{274C} Failed to unbind your account. Please try again later."]);
    });
  });
});
