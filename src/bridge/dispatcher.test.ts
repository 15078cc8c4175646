import { describe, it, expect, vi, beforeEach } from "vitest";
import { Dispatcher, redactionNotice, REACTION_FAILED, REACTION_TOO_LONG } from "./dispatcher.js";
import { createMemoryIdentityStore, type IdentityStore } from "./identity-store.js";
import { RemoteRejectedError, TooLongError } from "./errors.js";
import type { Route, UserIdentity } from "./types.js";

function fakeApi(hasWebhook = true) {
  return {
    hasWebhook,
    sendWebhook: vi.fn(async (_msg: { content: string; username: string; avatarUrl?: string | null }): Promise<string | null> => "900"),
    sendRelay: vi.fn(async (_msg: { message: string; sender: string; room: string }): Promise<string | null> => "901"),
    editMessage: vi.fn(async (_route: Route | null, _id: string, _content: string) => undefined),
    deleteMessage: vi.fn(async (_route: Route | null, _id: string) => undefined),
  };
}

const MESSAGE = { roomId: "!room:hs", eventId: "$local1", sender: "@alice:hs", content: "hello" };

describe("Dispatcher", () => {
  let store: IdentityStore;
  let api: ReturnType<typeof fakeApi>;
  const addReaction = vi.fn(async (_room: string, _event: string, _key: string) => undefined);
  const resolveSender = vi.fn(async (_user: string): Promise<UserIdentity> => ({
    displayName: "Alice",
    avatarUrl: "https://av.test/a",
  }));
  const onRelayed = vi.fn();

  const make = () => new Dispatcher({ api, identities: { resolveSender }, store, platform: { addReaction }, onRelayed });

  beforeEach(() => {
    store = createMemoryIdentityStore();
    api = fakeApi();
    addReaction.mockClear();
    onRelayed.mockClear();
  });

  describe("send", () => {
    it("uses the webhook as the resolved sender", async () => {
      await expect(make().send(MESSAGE)).resolves.toBe("sent");
      expect(api.sendWebhook).toHaveBeenCalledWith({ content: "hello", username: "Alice", avatarUrl: "https://av.test/a" });
      expect(api.sendRelay).not.toHaveBeenCalled();
      expect(store.resolveRemote("$local1")).toMatchObject({ remoteId: "900", route: "primary" });
      expect(onRelayed).toHaveBeenCalledWith("Alice");
    });

    it("does not record a mapping when the webhook returns no ID", async () => {
      api.sendWebhook.mockResolvedValue(null);
      await make().send(MESSAGE);
      expect(store.resolveRemote("$local1")).toBeNull();
      expect(onRelayed).toHaveBeenCalledTimes(1);
    });

    it("falls back when the webhook fails", async () => {
      api.sendWebhook.mockRejectedValue(new RemoteRejectedError("nope", 500));
      await expect(make().send(MESSAGE)).resolves.toBe("sent");
      expect(api.sendRelay).toHaveBeenCalledWith({ message: "hello", sender: "Alice", room: "!room:hs" });
      expect(store.resolveRemote("$local1")).toMatchObject({ remoteId: "901", route: "fallback" });
    });

    it("goes straight to the fallback without a webhook", async () => {
      api = fakeApi(false);
      await make().send(MESSAGE);
      expect(api.sendWebhook).not.toHaveBeenCalled();
      expect(api.sendRelay).toHaveBeenCalledTimes(1);
    });

    it("reacts with a printer when the message is too long", async () => {
      api = fakeApi(false);
      api.sendRelay.mockRejectedValue(new TooLongError("Message too long."));
      await expect(make().send(MESSAGE)).resolves.toBe("too_long");
      expect(addReaction).toHaveBeenCalledWith("!room:hs", "$local1", REACTION_TOO_LONG);
      expect(REACTION_TOO_LONG).toBe("\u{1F5A8}\u{FE0F}");
      expect(onRelayed).not.toHaveBeenCalled();
    });

    it("reacts with a cross on any other failure", async () => {
      api.sendWebhook.mockRejectedValue(new Error("ECONNRESET"));
      api.sendRelay.mockRejectedValue(new RemoteRejectedError("bad", 502));
      await expect(make().send(MESSAGE)).resolves.toBe("failed");
      expect(addReaction).toHaveBeenCalledWith("!room:hs", "$local1", REACTION_FAILED);
    });

    it("survives a failing reaction", async () => {
      api = fakeApi(false);
      api.sendRelay.mockRejectedValue(new Error("boom"));
      addReaction.mockRejectedValueOnce(new Error("M_FORBIDDEN"));
      await expect(make().send(MESSAGE)).resolves.toBe("failed");
    });
  });

  describe("edit", () => {
    it("edits through the recorded route and aliases the edit event", async () => {
      store.record("$local1", "900", "content", "primary");
      await expect(make().edit("$local1", "$edit1", "hello again")).resolves.toBe(true);
      expect(api.editMessage).toHaveBeenCalledWith("primary", "900", "hello again");
      expect(store.resolveRemote("$edit1")).toMatchObject({ remoteId: "900", route: "primary" });
    });

    it("drops edits of unknown events", async () => {
      await expect(make().edit("$unknown", "$edit1", "x")).resolves.toBe(false);
      expect(api.editMessage).not.toHaveBeenCalled();
      expect(store.resolveRemote("$edit1")).toBeNull();
    });

    it("does not edit relayed copies of remote messages", async () => {
      store.record("$copy", "42", "content");
      await expect(make().edit("$copy", "$edit1", "x")).resolves.toBe(false);
      expect(api.editMessage).not.toHaveBeenCalled();
      expect(store.resolveRemote("$edit1")).toBeNull();
    });

    it("still records the alias when the remote edit fails", async () => {
      store.record("$local1", "901", "content", "fallback");
      api.editMessage.mockRejectedValue(new RemoteRejectedError("gone", 404));
      await make().edit("$local1", "$edit1", "x");
      expect(store.resolveRemote("$edit1")?.remoteId).toBe("901");
    });
  });

  describe("redact", () => {
    it("edits to a notice when a reason is given and forgets once", async () => {
      store.record("$local1", "900", "content", "primary");
      store.record("$edit1", "900", "content", "primary");
      const forget = vi.spyOn(store, "forget");

      await expect(make().redact("$local1", "spam")).resolves.toBe(true);
      expect(api.editMessage).toHaveBeenCalledWith("primary", "900", "*Message was redacted: spam*");
      expect(api.deleteMessage).not.toHaveBeenCalled();
      expect(forget).toHaveBeenCalledTimes(1);
      expect(forget).toHaveBeenCalledWith({ remoteId: "900" });
      expect(store.resolveRemote("$edit1")).toBeNull();
    });

    it("deletes without a reason", async () => {
      store.record("$local1", "901", "content", "fallback");
      await make().redact("$local1");
      expect(api.deleteMessage).toHaveBeenCalledWith("fallback", "901");
      expect(store.resolveRemote("$local1")).toBeNull();
    });

    it("ignores redactions of unknown events", async () => {
      await expect(make().redact("$unknown", "x")).resolves.toBe(false);
      expect(api.editMessage).not.toHaveBeenCalled();
      expect(api.deleteMessage).not.toHaveBeenCalled();
    });

    it("leaves relayed copies of remote messages alone", async () => {
      store.record("$copy", "42", "content");
      store.record("$copy-att", "42", "attachment");

      await expect(make().redact("$copy-att")).resolves.toBe(false);
      await expect(make().redact("$copy", "spam")).resolves.toBe(false);

      expect(api.deleteMessage).not.toHaveBeenCalled();
      expect(api.editMessage).not.toHaveBeenCalled();
      expect(store.resolveAllLocal("42").map((m) => m.localId)).toEqual(["$copy", "$copy-att"]);
    });

    it("forgets the mapping even when the remote call fails", async () => {
      store.record("$local1", "900", "content", "primary");
      api.deleteMessage.mockRejectedValue(new Error("ETIMEDOUT"));
      await make().redact("$local1");
      expect(store.resolveRemote("$local1")).toBeNull();
    });
  });

  describe("redactionNotice", () => {
    it("truncates long reasons to 1900 characters", () => {
      const notice = redactionNotice("r".repeat(2500));
      expect(notice).toBe(`*Message was redacted: ${"r".repeat(1900)}*`);
    });
  });
});
