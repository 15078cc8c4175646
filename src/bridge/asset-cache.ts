/**
 * Asset cache: write-once memo from a source media URL to the local media
 * handle it was uploaded as, keyed per asset kind.
 *
 * Avatars map a CDN URL to a round 16px upload. Relayed attachments also
 * store `meta`, enough to send the cached upload again without downloading
 * anything. The same URL can be both an avatar and an attachment; the two
 * uploads differ, so each kind keeps its own row. Entries never expire:
 * remote CDN URLs are content-addressed.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import axios from "axios";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { LocalPlatform } from "../channels/types.js";
import type { MediaToolkit } from "./media.js";
import { formatErrorMessage } from "../net-errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const attachmentMetaSchema = Type.Object({
  msgtype: Type.Union([
    Type.Literal("m.image"),
    Type.Literal("m.video"),
    Type.Literal("m.audio"),
    Type.Literal("m.file"),
  ]),
  filename: Type.String(),
  mimetype: Type.String(),
  size: Type.Integer(),
  width: Type.Optional(Type.Integer()),
  height: Type.Optional(Type.Integer()),
  thumbnail: Type.Optional(Type.Object({
    url: Type.String(),
    mimetype: Type.String(),
    size: Type.Integer(),
    width: Type.Integer(),
    height: Type.Integer(),
  })),
});

export type AttachmentMeta = Static<typeof attachmentMetaSchema>;

export interface CachedAsset {
  handle: string;
  /** Null for avatars and rows written without metadata. */
  meta: AttachmentMeta | null;
}

export type AssetKind = "avatar" | "attachment";

export interface AssetCache {
  get(kind: AssetKind, sourceUrl: string): CachedAsset | null;
  /** First write wins; later writes for the same kind and URL are ignored. */
  put(kind: AssetKind, sourceUrl: string, handle: string, meta?: AttachmentMeta | null): void;
  close(): void;
}

function parseMeta(raw: string | null): AttachmentMeta | null {
  if (!raw) return null;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  return Value.Check(attachmentMetaSchema, value) ? value : null;
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

export function createAssetCache(dbPath: string): AssetCache {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS asset_cache (
      kind       TEXT NOT NULL,
      source_url TEXT NOT NULL,
      handle     TEXT NOT NULL,
      meta       TEXT,
      PRIMARY KEY (kind, source_url)
    );
  `);

  const stmtGet = db.prepare<[AssetKind, string], { handle: string; meta: string | null }>(
    `SELECT handle, meta FROM asset_cache WHERE kind = ? AND source_url = ?`,
  );
  const stmtPut = db.prepare<[AssetKind, string, string, string | null]>(
    `INSERT OR IGNORE INTO asset_cache (kind, source_url, handle, meta) VALUES (?, ?, ?, ?)`,
  );

  return {
    get(kind, sourceUrl) {
      const row = stmtGet.get(kind, sourceUrl);
      if (!row) return null;
      return { handle: row.handle, meta: parseMeta(row.meta) };
    },

    put(kind, sourceUrl, handle, meta = null) {
      stmtPut.run(kind, sourceUrl, handle, meta ? JSON.stringify(meta) : null);
    },

    close() {
      db.close();
    },
  };
}

// ---------------------------------------------------------------------------
// Avatars
// ---------------------------------------------------------------------------

export const AVATAR_SIZE = 16;

/**
 * Resolve a remote avatar URL to a local handle, uploading a round copy on
 * first use. Concurrent lookups for one URL share a single upload.
 */
export class AvatarResolver {
  private readonly inflight = new Map<string, Promise<string | null>>();

  constructor(
    private readonly cache: AssetCache,
    private readonly platform: Pick<LocalPlatform, "uploadMedia">,
    private readonly media: Pick<MediaToolkit, "roundAvatar">,
  ) {}

  async resolve(url: string): Promise<string | null> {
    if (!url) return null;
    const cached = this.cache.get("avatar", url);
    if (cached) return cached.handle;

    const pending = this.inflight.get(url);
    if (pending) return pending;

    const upload = this.upload(url).finally(() => this.inflight.delete(url));
    this.inflight.set(url, upload);
    return upload;
  }

  private async upload(url: string): Promise<string | null> {
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        timeout: 15_000,
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        console.warn(`[avatar] Failed to fetch avatar (${response.status}): ${url}`);
        return null;
      }
      const round = await this.media.roundAvatar(Buffer.from(response.data), AVATAR_SIZE);
      const handle = await this.platform.uploadMedia(round, "avatar.png", "image/png");
      this.cache.put("avatar", url, handle);
      return handle;
    } catch (err) {
      console.warn(`[avatar] Could not cache avatar ${url}:`, formatErrorMessage(err));
      return null;
    }
  }
}
