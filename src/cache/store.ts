// ── Batch cache — one SQLite file holding the last complete batch ─────────

import Database, { type Database as DatabaseType } from "better-sqlite3";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { logCache } from "../logging.js";
import { SymbolRecordSchema, type Batch } from "../screener/types.js";

export const CACHE_SCHEMA_VERSION = 1;

const CACHE_SCHEMA_SQL = `
  CREATE TABLE cache_meta (
    schema_version INTEGER NOT NULL,
    saved_at TEXT NOT NULL,
    record_count INTEGER NOT NULL
  );

  CREATE TABLE symbol_records (
    position INTEGER PRIMARY KEY,
    symbol TEXT NOT NULL,
    payload TEXT NOT NULL      -- JSON SymbolRecord
  );
`;

const MetaRowSchema = z.object({
  schema_version: z.number().int(),
  saved_at: z.string(),
  record_count: z.number().int().nonnegative(),
});

const RecordRowSchema = z.object({
  position: z.number().int(),
  symbol: z.string(),
  payload: z.string(),
});

export type CacheErrorKind = "CacheMissing" | "CacheCorrupt";

export interface CacheError {
  kind: CacheErrorKind;
  message: string;
}

export type CacheLoadResult =
  | { ok: true; batch: Batch; savedAt: string }
  | { ok: false; error: CacheError };

export interface CacheStore {
  readonly path: string;
  /** Replace the artifact with `batch`. */
  save(batch: Batch): void;
  load(): CacheLoadResult;
}

function corrupt(message: string): CacheLoadResult {
  return { ok: false, error: { kind: "CacheCorrupt", message } };
}

export function createCacheStore(filePath: string, clock: () => Date = () => new Date()): CacheStore {
  function save(batch: Batch): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    // Build the new artifact beside the old one, then swap it in whole
    const tmpPath = `${filePath}.tmp`;
    fs.rmSync(tmpPath, { force: true });

    const db = new Database(tmpPath);
    try {
      db.exec(CACHE_SCHEMA_SQL);
      const insertMeta = db.prepare(
        "INSERT INTO cache_meta (schema_version, saved_at, record_count) VALUES (?, ?, ?)",
      );
      const insertRecord = db.prepare("INSERT INTO symbol_records (position, symbol, payload) VALUES (?, ?, ?)");

      const writeAll = db.transaction((records: Batch) => {
        insertMeta.run(CACHE_SCHEMA_VERSION, clock().toISOString(), records.length);
        records.forEach((record, position) => {
          insertRecord.run(position, record.info.symbol, JSON.stringify(record));
        });
      });
      writeAll(batch);
    } finally {
      db.close();
    }

    fs.renameSync(tmpPath, filePath);
    logCache.info({ path: filePath, records: batch.length }, "Saved batch to cache");
  }

  function load(): CacheLoadResult {
    if (!fs.existsSync(filePath)) {
      logCache.error({ path: filePath }, "Cache file not found");
      return { ok: false, error: { kind: "CacheMissing", message: `no cache file at ${filePath}` } };
    }

    let db: DatabaseType | undefined;
    try {
      db = new Database(filePath, { readonly: true, fileMustExist: true });

      const meta = MetaRowSchema.safeParse(
        db.prepare("SELECT schema_version, saved_at, record_count FROM cache_meta").get(),
      );
      if (!meta.success) return corrupt("cache metadata is missing or malformed");
      if (meta.data.schema_version !== CACHE_SCHEMA_VERSION) {
        return corrupt(
          `cache schema version ${meta.data.schema_version} is not supported (expected ${CACHE_SCHEMA_VERSION})`,
        );
      }

      const rows = z
        .array(RecordRowSchema)
        .safeParse(db.prepare("SELECT position, symbol, payload FROM symbol_records ORDER BY position").all());
      if (!rows.success) return corrupt("cache records are malformed");
      if (rows.data.length !== meta.data.record_count) {
        return corrupt(`cache holds ${rows.data.length} records, metadata says ${meta.data.record_count}`);
      }

      const batch: Batch = [];
      for (const row of rows.data) {
        const record = SymbolRecordSchema.safeParse(JSON.parse(row.payload));
        if (!record.success) {
          return corrupt(`record ${row.position} (${row.symbol}) does not match the record schema`);
        }
        batch.push(record.data);
      }

      logCache.info({ path: filePath, records: batch.length, savedAt: meta.data.saved_at }, "Loaded batch from cache");
      return { ok: true, batch, savedAt: meta.data.saved_at };
    } catch (e: unknown) {
      logCache.error({ path: filePath, err: e }, "Cache file could not be read");
      return corrupt(`cache file could not be read: ${e instanceof Error ? e.message : String(e)}`);
    } finally {
      db?.close();
    }
  }

  return { path: filePath, save, load };
}
