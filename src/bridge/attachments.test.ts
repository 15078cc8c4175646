import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import fs from "node:fs";
import axios from "axios";
import { AttachmentPipeline, DEFAULT_UPLOAD_LIMIT } from "./attachments.js";
import type { AssetCache, CachedAsset } from "./asset-cache.js";
import type { MediaToolkit } from "./media.js";
import type { RemoteAttachment } from "./frames.js";
import type { OutgoingMedia } from "../channels/types.js";

vi.mock("axios");
const mockedAxios = vi.mocked(axios, true);

function memoryCache(): AssetCache & { rows: Map<string, CachedAsset> } {
  const rows = new Map<string, CachedAsset>();
  return {
    rows,
    get: (kind, url) => rows.get(`${kind} ${url}`) ?? null,
    put: (kind, url, handle, meta = null) => {
      if (!rows.has(`${kind} ${url}`)) rows.set(`${kind} ${url}`, { handle, meta });
    },
    close: () => rows.clear(),
  };
}

function fakeMedia(overrides: Partial<MediaToolkit> = {}): MediaToolkit {
  return {
    classify: vi.fn(async (_data: Buffer, declared: string) => ({
      kind: declared.startsWith("image/") ? "image" as const : declared.startsWith("video/") ? "video" as const : "file" as const,
      mimetype: declared,
    })),
    toWebp: vi.fn(async () => ({ data: Buffer.from("webp-bytes"), width: 40, height: 30 })),
    thumbnail: vi.fn(async () => ({ data: Buffer.from("thumb"), width: 8, height: 6 })),
    firstFrame: vi.fn(async () => ({ data: Buffer.from("frame"), width: 64, height: 48 })),
    roundAvatar: vi.fn(async () => Buffer.from("round")),
    ...overrides,
  };
}

function attachment(overrides: Partial<RemoteAttachment> = {}): RemoteAttachment {
  return {
    url: "https://cdn.test/a/pic.png",
    proxy_url: "https://media.test/a/pic.png",
    filename: "pic.png",
    size: 100,
    width: 40,
    height: 30,
    content_type: "image/png",
    ...overrides,
  };
}

describe("AttachmentPipeline", () => {
  type SendMedia = (roomId: string, media: OutgoingMedia) => Promise<string>;
  type UploadMedia = (data: Buffer, filename: string, mimetype: string) => Promise<string>;
  type GetUploadLimit = () => Promise<number | null>;
  let sendMedia: Mock<SendMedia>;
  let uploadMedia: Mock<UploadMedia>;
  let getUploadLimit: Mock<GetUploadLimit>;
  let cache: ReturnType<typeof memoryCache>;
  let uploads: number;

  beforeEach(() => {
    uploads = 0;
    sendMedia = vi.fn<SendMedia>(async () => "$sent");
    uploadMedia = vi.fn<UploadMedia>(async () => `mxc://hs.test/up${++uploads}`);
    getUploadLimit = vi.fn<GetUploadLimit>(async () => null);
    cache = memoryCache();
    mockedAxios.get = vi.fn().mockResolvedValue({ status: 200, data: new Uint8Array([1, 2, 3]).buffer });
  });

  const pipeline = (media = fakeMedia(), extra: { maxUploadBytes?: number; thumbnailThresholdBytes?: number } = {}) =>
    new AttachmentPipeline({
      platform: { sendMedia, uploadMedia, getUploadLimit },
      cache,
      media,
      ...extra,
    });

  it("sends native handles without downloading", async () => {
    const ids = await pipeline().relay("!room", "$root", [
      attachment({ url: "mxc://hs.test/native", content_type: "video/mp4", filename: "clip.mp4", size: 9 }),
    ]);
    expect(ids).toEqual(["$sent"]);
    expect(mockedAxios.get).not.toHaveBeenCalled();
    expect(sendMedia).toHaveBeenCalledWith("!room", {
      msgtype: "m.video",
      body: "clip.mp4",
      url: "mxc://hs.test/native",
      info: { mimetype: "video/mp4", size: 9 },
      replyTo: "$root",
    });
  });

  it("transcodes PNG to WebP and caches the upload", async () => {
    const media = fakeMedia();
    await pipeline(media).relay("!room", "$root", [attachment()]);

    expect(media.toWebp).toHaveBeenCalledWith(Buffer.from([1, 2, 3]));
    expect(uploadMedia).toHaveBeenCalledWith(Buffer.from("webp-bytes"), "pic.webp", "image/webp");
    expect(sendMedia).toHaveBeenCalledWith("!room", {
      msgtype: "m.image",
      body: "pic.webp",
      url: "mxc://hs.test/up1",
      info: { mimetype: "image/webp", size: 10, w: 40, h: 30 },
      replyTo: "$root",
    });
    expect(cache.get("attachment", "https://cdn.test/a/pic.png")?.handle).toBe("mxc://hs.test/up1");
  });

  it("does not transcode GIFs", async () => {
    const media = fakeMedia();
    await pipeline(media).relay("!room", "$root", [
      attachment({ url: "https://cdn.test/a/dance.gif", filename: "dance.gif", content_type: "image/gif" }),
    ]);
    expect(media.toWebp).not.toHaveBeenCalled();
    expect(uploadMedia).toHaveBeenCalledWith(Buffer.from([1, 2, 3]), "dance.gif", "image/gif");
  });

  it("does not transcode images sniffed as APNG", async () => {
    const media = fakeMedia({
      classify: vi.fn(async () => ({ kind: "image" as const, mimetype: "image/apng" })),
    });
    await pipeline(media).relay("!room", "$root", [attachment({ filename: "spin.png" })]);
    expect(media.toWebp).not.toHaveBeenCalled();
    expect(uploadMedia).toHaveBeenCalledWith(Buffer.from([1, 2, 3]), "spin.png", "image/apng");
  });

  it("hands animated WebP to the transcoder and keeps its frame size", async () => {
    const media = fakeMedia({
      toWebp: vi.fn(async () => ({ data: Buffer.from("anim"), width: 40, height: 30 })),
    });
    await pipeline(media).relay("!room", "$root", [
      attachment({ url: "https://cdn.test/a/wave.webp", filename: "wave.webp", content_type: "image/webp" }),
    ]);
    expect(media.toWebp).toHaveBeenCalledWith(Buffer.from([1, 2, 3]));
    expect(sendMedia).toHaveBeenCalledWith("!room", expect.objectContaining({
      body: "wave.webp",
      info: { mimetype: "image/webp", size: 4, w: 40, h: 30 },
    }));
  });

  it("never downloads a URL that is already cached", async () => {
    const first = pipeline();
    await first.relay("!room", "$root", [attachment()]);
    expect(mockedAxios.get).toHaveBeenCalledTimes(1);

    mockedAxios.get = vi.fn();
    await pipeline().relay("!room", "$root2", [attachment()]);
    expect(mockedAxios.get).not.toHaveBeenCalled();
    expect(uploadMedia).toHaveBeenCalledTimes(1);
    expect(sendMedia).toHaveBeenLastCalledWith("!room", expect.objectContaining({
      url: "mxc://hs.test/up1",
      body: "pic.webp",
      replyTo: "$root2",
    }));
  });

  it("retries the proxy URL after a 404", async () => {
    mockedAxios.get = vi.fn()
      .mockResolvedValueOnce({ status: 404, data: new ArrayBuffer(0) })
      .mockResolvedValueOnce({ status: 200, data: new Uint8Array([9]).buffer });
    await pipeline().relay("!room", "$root", [attachment()]);

    expect(mockedAxios.get).toHaveBeenNthCalledWith(2, "https://media.test/a/pic.png", expect.anything());
    expect(sendMedia).toHaveBeenCalledTimes(1);
  });

  it("skips a failed download and continues with the rest", async () => {
    mockedAxios.get = vi.fn()
      .mockResolvedValueOnce({ status: 403, data: new ArrayBuffer(0) })
      .mockResolvedValueOnce({ status: 200, data: new Uint8Array([1]).buffer });
    const ids = await pipeline().relay("!room", "$root", [
      attachment({ url: "https://cdn.test/a/denied.png" }),
      attachment({ url: "https://cdn.test/a/ok.bin", filename: "ok.bin", content_type: "application/zip" }),
    ]);
    expect(ids).toEqual(["$sent"]);
    expect(uploadMedia).toHaveBeenCalledWith(Buffer.from([1]), "ok.bin", "application/zip");
  });

  it("skips attachments whose declared size exceeds the limit", async () => {
    const ids = await pipeline(fakeMedia(), { maxUploadBytes: 50 }).relay("!room", "$root", [attachment({ size: 51 })]);
    expect(ids).toEqual([]);
    expect(mockedAxios.get).not.toHaveBeenCalled();
  });

  it("skips attachments that are too big after processing", async () => {
    const ids = await pipeline(fakeMedia(), { maxUploadBytes: 5 }).relay("!room", "$root", [attachment({ size: 3 })]);
    expect(ids).toEqual([]);
    expect(uploadMedia).not.toHaveBeenCalled();
  });

  it("adds a thumbnail to large images", async () => {
    const media = fakeMedia();
    await pipeline(media, { thumbnailThresholdBytes: 4 }).relay("!room", "$root", [attachment()]);

    expect(media.thumbnail).toHaveBeenCalledWith(Buffer.from("webp-bytes"), 800, 600);
    expect(uploadMedia).toHaveBeenNthCalledWith(1, Buffer.from("thumb"), "pic.webp-thumbnail.webp", "image/webp");
    expect(sendMedia).toHaveBeenCalledWith("!room", expect.objectContaining({
      url: "mxc://hs.test/up2",
      info: {
        mimetype: "image/webp",
        size: 10,
        w: 40,
        h: 30,
        thumbnail_url: "mxc://hs.test/up1",
        thumbnail_info: { mimetype: "image/webp", size: 5, w: 8, h: 6 },
      },
    }));
  });

  it("uploads a first-frame thumbnail for videos", async () => {
    const media = fakeMedia();
    await pipeline(media).relay("!room", "$root", [
      attachment({ url: "https://cdn.test/a/clip.mp4", filename: "clip.mp4", content_type: "video/mp4", width: null, height: null }),
    ]);

    expect(media.firstFrame).toHaveBeenCalledTimes(1);
    expect(uploadMedia).toHaveBeenNthCalledWith(1, Buffer.from("frame"), "clip.mp4-thumbnail.webp", "image/webp");
    expect(uploadMedia).toHaveBeenNthCalledWith(2, Buffer.from([1, 2, 3]), "clip.mp4", "video/mp4");
    expect(sendMedia).toHaveBeenCalledWith("!room", expect.objectContaining({
      msgtype: "m.video",
      info: expect.objectContaining({ w: 64, h: 48, thumbnail_url: "mxc://hs.test/up1" }),
    }));
  });

  it("removes its scratch directory", async () => {
    let workDir = "";
    const media = fakeMedia({
      firstFrame: vi.fn(async (input: string) => {
        workDir = input.slice(0, input.lastIndexOf("/"));
        return { data: Buffer.from("frame"), width: 1, height: 1 };
      }),
    });
    await pipeline(media).relay("!room", "$root", [
      attachment({ url: "https://cdn.test/a/clip.mp4", filename: "clip.mp4", content_type: "video/mp4" }),
    ]);
    expect(workDir).not.toBe("");
    expect(fs.existsSync(workDir)).toBe(false);
  });

  describe("uploadLimit", () => {
    it("prefers the configured limit", async () => {
      getUploadLimit.mockResolvedValue(10);
      await expect(pipeline(fakeMedia(), { maxUploadBytes: 99 }).uploadLimit()).resolves.toBe(99);
    });

    it("uses the homeserver's limit once", async () => {
      getUploadLimit.mockResolvedValue(1234);
      const p = pipeline();
      await expect(p.uploadLimit()).resolves.toBe(1234);
      await p.uploadLimit();
      expect(getUploadLimit).toHaveBeenCalledTimes(1);
    });

    it("defaults to 50 MiB", async () => {
      getUploadLimit.mockRejectedValue(new Error("M_UNRECOGNIZED"));
      await expect(pipeline().uploadLimit()).resolves.toBe(DEFAULT_UPLOAD_LIMIT);
    });
  });
});
