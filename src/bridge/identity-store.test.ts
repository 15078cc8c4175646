import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  createMemoryIdentityStore,
  createSqliteIdentityStore,
  type IdentityStore,
} from "./identity-store.js";

const BIG_ID = "1234567890123456789";

const implementations: Array<[string, () => { store: IdentityStore; cleanup: () => void }]> = [
  ["sqlite", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "crossline-ids-test-"));
    const store = createSqliteIdentityStore(path.join(dir, "identity.db"));
    return {
      store,
      cleanup: () => {
        store.close();
        fs.rmSync(dir, { recursive: true, force: true });
      },
    };
  }],
  ["memory", () => {
    const store = createMemoryIdentityStore();
    return { store, cleanup: () => store.close() };
  }],
];

describe.each(implementations)("identity store (%s)", (_name, factory) => {
  let store: IdentityStore;
  let cleanup: () => void;

  beforeEach(() => {
    ({ store, cleanup } = factory());
  });

  afterEach(() => {
    cleanup();
  });

  it("round-trips a mapping in both directions", () => {
    store.record("$evt1", BIG_ID, "content");
    expect(store.resolveLocal(BIG_ID)).toBe("$evt1");
    const mapping = store.resolveRemote("$evt1");
    expect(mapping).toMatchObject({ localId: "$evt1", remoteId: BIG_ID, kind: "content", route: null });
    expect(typeof mapping?.createdAt).toBe("number");
  });

  it("returns null for unknown IDs", () => {
    expect(store.resolveLocal("1")).toBeNull();
    expect(store.resolveRemote("$missing")).toBeNull();
    expect(store.resolveAllLocal("1")).toEqual([]);
  });

  it("prefers the content mapping over attachments", () => {
    store.record("$att1", "7", "attachment");
    store.record("$text", "7", "content");
    store.record("$att2", "7", "attachment");
    expect(store.resolveLocal("7")).toBe("$text");
  });

  it("falls back to the earliest mapping when there is no content event", () => {
    store.record("$att1", "7", "attachment");
    store.record("$att2", "7", "attachment");
    expect(store.resolveLocal("7")).toBe("$att1");
  });

  it("lists every local event for a remote ID in creation order", () => {
    store.record("$text", "7", "content");
    store.record("$att1", "7", "attachment");
    store.record("$other", "8", "content");
    expect(store.resolveAllLocal("7").map((m) => m.localId)).toEqual(["$text", "$att1"]);
  });

  it("overwrites on the same local ID", () => {
    store.record("$evt", "1", "content");
    store.record("$evt", "2", "content", "primary");
    expect(store.resolveRemote("$evt")).toMatchObject({ remoteId: "2", route: "primary" });
    expect(store.resolveLocal("1")).toBeNull();
  });

  it("keeps the delivery route", () => {
    store.record("$evt", "1", "content", "fallback");
    expect(store.resolveRemote("$evt")?.route).toBe("fallback");
  });

  it("forgets by remote ID and reports the count", () => {
    store.record("$text", "7", "content");
    store.record("$att1", "7", "attachment");
    store.record("$other", "8", "content");
    expect(store.forget({ remoteId: "7" })).toBe(2);
    expect(store.resolveLocal("7")).toBeNull();
    expect(store.resolveRemote("$att1")).toBeNull();
    expect(store.resolveLocal("8")).toBe("$other");
  });

  it("forgets by local ID", () => {
    store.record("$text", "7", "content");
    store.record("$edit", "7", "content");
    expect(store.forget({ localId: "$edit" })).toBe(1);
    expect(store.forget({ localId: "$edit" })).toBe(0);
    expect(store.resolveLocal("7")).toBe("$text");
  });
});

describe("createSqliteIdentityStore", () => {
  it("persists mappings across reopen", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "crossline-ids-test-"));
    const dbPath = path.join(dir, "nested", "identity.db");
    try {
      const first = createSqliteIdentityStore(dbPath);
      first.record("$evt", BIG_ID, "content");
      first.close();

      const second = createSqliteIdentityStore(dbPath);
      expect(second.resolveLocal(BIG_ID)).toBe("$evt");
      second.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
