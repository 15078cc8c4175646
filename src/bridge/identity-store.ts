/**
 * Identity store: durable correlation between local event IDs and remote
 * message IDs.
 *
 * A local ID maps to exactly one remote ID. A remote ID can map to several
 * local IDs: the text event plus one event per attachment, and edit events
 * recorded as aliases of the message they replaced.
 *
 * The SQLite store lives in its own database file (identity_store_path).
 * Every operation is a single statement, so a crash never leaves half a
 * mapping behind.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { IdentityMapping, MappingKind, Route } from "./types.js";

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export type ForgetKey = { localId: string } | { remoteId: string };

export interface IdentityStore {
  /** Insert or overwrite the mapping for `localId`. */
  record(localId: string, remoteId: string, kind: MappingKind, route?: Route | null): void;

  /** Local ID of the content event for a remote message, else the earliest mapping. */
  resolveLocal(remoteId: string): string | null;

  /** Every local event for a remote message, oldest first. */
  resolveAllLocal(remoteId: string): IdentityMapping[];

  resolveRemote(localId: string): IdentityMapping | null;

  /** Remove all mappings with the given key. Returns the number removed. */
  forget(key: ForgetKey): number;

  close(): void;
}

function toKind(value: string): MappingKind {
  return value === "attachment" ? "attachment" : "content";
}

function toRoute(value: string | null): Route | null {
  return value === "primary" || value === "fallback" ? value : null;
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

interface LinkRow {
  local_id: string;
  remote_id: string;
  kind: string;
  route: string | null;
  created_at: number;
}

function fromRow(row: LinkRow): IdentityMapping {
  return {
    localId: row.local_id,
    remoteId: row.remote_id,
    kind: toKind(row.kind),
    route: toRoute(row.route),
    createdAt: row.created_at,
  };
}

export function createSqliteIdentityStore(dbPath: string): IdentityStore {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS message_links (
      local_id   TEXT PRIMARY KEY,
      remote_id  TEXT NOT NULL,
      kind       TEXT NOT NULL CHECK (kind IN ('content', 'attachment')),
      route      TEXT CHECK (route IN ('primary', 'fallback')),
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_message_links_remote ON message_links(remote_id);
  `);

  const stmtUpsert = db.prepare<[string, string, string, string | null, number]>(`
    INSERT INTO message_links (local_id, remote_id, kind, route, created_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(local_id) DO UPDATE SET
      remote_id  = excluded.remote_id,
      kind       = excluded.kind,
      route      = excluded.route,
      created_at = excluded.created_at
  `);
  const stmtResolveLocal = db.prepare<[string], { local_id: string }>(`
    SELECT local_id FROM message_links
    WHERE remote_id = ?
    ORDER BY (kind = 'content') DESC, created_at ASC, rowid ASC
    LIMIT 1
  `);
  const stmtResolveAll = db.prepare<[string], LinkRow>(`
    SELECT local_id, remote_id, kind, route, created_at FROM message_links
    WHERE remote_id = ?
    ORDER BY created_at ASC, rowid ASC
  `);
  const stmtResolveRemote = db.prepare<[string], LinkRow>(`
    SELECT local_id, remote_id, kind, route, created_at FROM message_links
    WHERE local_id = ?
  `);
  const stmtForgetLocal = db.prepare<[string]>(`DELETE FROM message_links WHERE local_id = ?`);
  const stmtForgetRemote = db.prepare<[string]>(`DELETE FROM message_links WHERE remote_id = ?`);

  return {
    record(localId, remoteId, kind, route = null) {
      stmtUpsert.run(localId, remoteId, kind, route, Date.now());
    },

    resolveLocal(remoteId) {
      return stmtResolveLocal.get(remoteId)?.local_id ?? null;
    },

    resolveAllLocal(remoteId) {
      return stmtResolveAll.all(remoteId).map(fromRow);
    },

    resolveRemote(localId) {
      const row = stmtResolveRemote.get(localId);
      return row ? fromRow(row) : null;
    },

    forget(key) {
      const result = "localId" in key
        ? stmtForgetLocal.run(key.localId)
        : stmtForgetRemote.run(key.remoteId);
      return result.changes;
    },

    close() {
      db.close();
    },
  };
}

// ---------------------------------------------------------------------------
// In-memory (tests)
// ---------------------------------------------------------------------------

export function createMemoryIdentityStore(now: () => number = Date.now): IdentityStore {
  // Map iteration order doubles as the rowid tiebreaker.
  const links = new Map<string, IdentityMapping>();

  const byRemote = (remoteId: string): IdentityMapping[] =>
    [...links.values()]
      .filter((m) => m.remoteId === remoteId)
      .sort((a, b) => a.createdAt - b.createdAt);

  return {
    record(localId, remoteId, kind, route = null) {
      links.set(localId, { localId, remoteId, kind, route, createdAt: now() });
    },

    resolveLocal(remoteId) {
      const all = byRemote(remoteId);
      return (all.find((m) => m.kind === "content") ?? all[0])?.localId ?? null;
    },

    resolveAllLocal(remoteId) {
      return byRemote(remoteId).map((m) => ({ ...m }));
    },

    resolveRemote(localId) {
      const mapping = links.get(localId);
      return mapping ? { ...mapping } : null;
    },

    forget(key) {
      if ("localId" in key) return links.delete(key.localId) ? 1 : 0;
      let removed = 0;
      for (const mapping of [...links.values()]) {
        if (mapping.remoteId === key.remoteId) {
          links.delete(mapping.localId);
          removed++;
        }
      }
      return removed;
    },

    close() {
      links.clear();
    },
  };
}
