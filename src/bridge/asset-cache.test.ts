import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import axios from "axios";
import { AvatarResolver, createAssetCache, type AssetCache, type AttachmentMeta } from "./asset-cache.js";

vi.mock("axios");
const mockedAxios = vi.mocked(axios, true);

const META: AttachmentMeta = {
  msgtype: "m.image",
  filename: "cat.webp",
  mimetype: "image/webp",
  size: 1234,
  width: 20,
  height: 10,
};

describe("createAssetCache", () => {
  let dir: string;
  let cache: AssetCache;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "crossline-assets-test-"));
    cache = createAssetCache(path.join(dir, "avatars.db"));
  });

  afterEach(() => {
    cache.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns null on a miss", () => {
    expect(cache.get("avatar", "https://cdn.example/a.png")).toBeNull();
  });

  it("stores handles without metadata", () => {
    cache.put("avatar", "https://cdn.example/a.png", "mxc://example.org/a");
    expect(cache.get("avatar", "https://cdn.example/a.png")).toEqual({ handle: "mxc://example.org/a", meta: null });
  });

  it("round-trips attachment metadata", () => {
    cache.put("attachment", "https://cdn.example/cat.png", "mxc://example.org/cat", META);
    expect(cache.get("attachment", "https://cdn.example/cat.png")).toEqual({ handle: "mxc://example.org/cat", meta: META });
  });

  it("is write-once", () => {
    cache.put("attachment", "https://cdn.example/a.png", "mxc://example.org/first");
    cache.put("attachment", "https://cdn.example/a.png", "mxc://example.org/second", META);
    expect(cache.get("attachment", "https://cdn.example/a.png")).toEqual({ handle: "mxc://example.org/first", meta: null });
  });

  it("keeps avatar and attachment uploads of one URL apart", () => {
    cache.put("avatar", "https://cdn.example/me.png", "mxc://example.org/round");
    expect(cache.get("attachment", "https://cdn.example/me.png")).toBeNull();

    cache.put("attachment", "https://cdn.example/me.png", "mxc://example.org/full", META);
    expect(cache.get("attachment", "https://cdn.example/me.png")).toEqual({ handle: "mxc://example.org/full", meta: META });
    expect(cache.get("avatar", "https://cdn.example/me.png")).toEqual({ handle: "mxc://example.org/round", meta: null });
  });
});

describe("AvatarResolver", () => {
  let dir: string;
  let cache: AssetCache;
  const uploadMedia = vi.fn<(data: Buffer, filename: string, mimetype: string) => Promise<string>>();
  const roundAvatar = vi.fn<(data: Buffer, size: number) => Promise<Buffer>>();

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "crossline-avatar-test-"));
    cache = createAssetCache(path.join(dir, "avatars.db"));
    mockedAxios.get = vi.fn();
    uploadMedia.mockReset().mockResolvedValue("mxc://example.org/round");
    roundAvatar.mockReset().mockResolvedValue(Buffer.from("round"));
  });

  afterEach(() => {
    cache.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uploads a round copy once and then serves it from cache", async () => {
    mockedAxios.get = vi.fn().mockResolvedValue({ status: 200, data: new Uint8Array([1, 2, 3]).buffer });
    const resolver = new AvatarResolver(cache, { uploadMedia }, { roundAvatar });

    await expect(resolver.resolve("https://cdn.example/a.png")).resolves.toBe("mxc://example.org/round");
    await expect(resolver.resolve("https://cdn.example/a.png")).resolves.toBe("mxc://example.org/round");

    expect(mockedAxios.get).toHaveBeenCalledTimes(1);
    expect(roundAvatar).toHaveBeenCalledWith(Buffer.from([1, 2, 3]), 16);
    expect(uploadMedia).toHaveBeenCalledWith(Buffer.from("round"), "avatar.png", "image/png");
    expect(cache.get("avatar", "https://cdn.example/a.png")?.handle).toBe("mxc://example.org/round");
    expect(cache.get("attachment", "https://cdn.example/a.png")).toBeNull();
  });

  it("shares one upload between concurrent lookups", async () => {
    mockedAxios.get = vi.fn().mockResolvedValue({ status: 200, data: new Uint8Array([1]).buffer });
    const resolver = new AvatarResolver(cache, { uploadMedia }, { roundAvatar });

    const results = await Promise.all([
      resolver.resolve("https://cdn.example/b.png"),
      resolver.resolve("https://cdn.example/b.png"),
    ]);
    expect(results).toEqual(["mxc://example.org/round", "mxc://example.org/round"]);
    expect(uploadMedia).toHaveBeenCalledTimes(1);
  });

  it("returns null when the download fails and caches nothing", async () => {
    mockedAxios.get = vi.fn().mockResolvedValue({ status: 404, data: new ArrayBuffer(0) });
    const resolver = new AvatarResolver(cache, { uploadMedia }, { roundAvatar });

    await expect(resolver.resolve("https://cdn.example/gone.png")).resolves.toBeNull();
    expect(cache.get("avatar", "https://cdn.example/gone.png")).toBeNull();
    expect(uploadMedia).not.toHaveBeenCalled();
  });

  it("returns null when the upload throws", async () => {
    mockedAxios.get = vi.fn().mockResolvedValue({ status: 200, data: new Uint8Array([1]).buffer });
    uploadMedia.mockRejectedValue(new Error("M_LIMIT_EXCEEDED"));
    const resolver = new AvatarResolver(cache, { uploadMedia }, { roundAvatar });

    await expect(resolver.resolve("https://cdn.example/c.png")).resolves.toBeNull();
  });

  it("returns null for an empty URL", async () => {
    const resolver = new AvatarResolver(cache, { uploadMedia }, { roundAvatar });
    await expect(resolver.resolve("")).resolves.toBeNull();
    expect(mockedAxios.get).not.toHaveBeenCalled();
  });
});
