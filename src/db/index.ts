import Database from "better-sqlite3";
import { z } from "zod";
import type { Descriptor } from "../descriptors/types";
import type { EntryId, EntryRecord, EntryStore, NewEntry } from "../gallery/types";
import type { HistoryReader, HistoryRecord, HistorySink } from "../history/types";
import { createLogger } from "../logger";
import type { RecognitionRun } from "../recognition/types";

const log = createLogger("db");

export interface DbStats {
  totalEntries: number;
  totalRuns: number;
  totalFacesDetected: number;
  totalFacesRecognized: number;
  averageProcessingMs: number | null;
  lastRunAt: string | null;
}

interface EntryRow {
  id: number;
  label: string;
  descriptor_kind: string;
  descriptor: string;
  attributes: string | null;
  created_at: string;
}

interface RunRow {
  id: number;
  run: string;
}

const descriptorSchema = z.object({
  kind: z.enum(["embedding", "histogram"]),
  values: z.array(z.number()),
});

const attributesSchema = z.record(z.string());

let db: Database.Database | null = null;

function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized (call initDatabase first)");
  }
  return db;
}

export function initDatabase(path: string): void {
  if (db) {
    db.close();
  }
  db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  db.exec(`
    -- Enrolled identities; the authoritative list a gallery is built from
    CREATE TABLE IF NOT EXISTS entries (
      id INTEGER PRIMARY KEY,
      label TEXT NOT NULL,
      descriptor_kind TEXT NOT NULL,
      descriptor TEXT NOT NULL,
      attributes TEXT,
      created_at TEXT NOT NULL
    );

    -- One row per recognition run, append only
    CREATE TABLE IF NOT EXISTS recognition_runs (
      id INTEGER PRIMARY KEY,
      created_at TEXT NOT NULL,
      source TEXT,
      total_detected INTEGER NOT NULL,
      total_recognized INTEGER NOT NULL,
      gallery_version INTEGER NOT NULL,
      processing_ms REAL NOT NULL,
      run TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_runs_created ON recognition_runs(created_at);

    -- Single row counting entry changes; seeds gallery versions
    CREATE TABLE IF NOT EXISTS gallery_state (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      revision INTEGER NOT NULL
    );

    INSERT OR IGNORE INTO gallery_state (id, revision) VALUES (1, 0);
  `);

  log.debug({ path }, "Database initialized");
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function rowToEntry(row: EntryRow): EntryRecord {
  const descriptor: Descriptor = descriptorSchema.parse(JSON.parse(row.descriptor));
  const attributes = row.attributes ? attributesSchema.parse(JSON.parse(row.attributes)) : {};
  return {
    id: row.id,
    label: row.label,
    descriptor,
    attributes,
  };
}

function bumpRevision(database: Database.Database): void {
  database.prepare("UPDATE gallery_state SET revision = revision + 1 WHERE id = 1").run();
}

export function getGalleryRevision(): number {
  const database = getDb();
  const row = database.prepare("SELECT revision FROM gallery_state WHERE id = 1").get() as
    | { revision: number }
    | undefined;
  return row?.revision ?? 0;
}

// Entry functions
export function insertEntry(entry: NewEntry): EntryRecord {
  const database = getDb();
  const now = new Date().toISOString();

  const insert = database.transaction((): EntryRow => {
    const inserted = database
      .prepare(
        `INSERT INTO entries (label, descriptor_kind, descriptor, attributes, created_at)
         VALUES (@label, @kind, @descriptor, @attributes, @now)
         RETURNING *`
      )
      .get({
        label: entry.label,
        kind: entry.descriptor.kind,
        descriptor: JSON.stringify({ kind: entry.descriptor.kind, values: entry.descriptor.values }),
        attributes: JSON.stringify(entry.attributes),
        now,
      }) as EntryRow;
    bumpRevision(database);
    return inserted;
  });

  return rowToEntry(insert());
}

export function deleteEntry(id: EntryId): boolean {
  const database = getDb();
  const remove = database.transaction((): boolean => {
    const result = database.prepare("DELETE FROM entries WHERE id = ?").run(id);
    if (result.changes === 0) return false;
    bumpRevision(database);
    return true;
  });
  return remove();
}

export function getEntry(id: EntryId): EntryRecord | null {
  const database = getDb();
  const row = database.prepare("SELECT * FROM entries WHERE id = ?").get(id) as EntryRow | undefined;
  return row ? rowToEntry(row) : null;
}

export function getAllEntries(): EntryRecord[] {
  const database = getDb();
  const rows = database.prepare("SELECT * FROM entries ORDER BY id").all() as EntryRow[];
  return rows.map(rowToEntry);
}

// Recognition history functions
export function saveRecognitionRun(run: RecognitionRun): number {
  const database = getDb();
  const result = database
    .prepare(
      `INSERT INTO recognition_runs
         (created_at, source, total_detected, total_recognized, gallery_version, processing_ms, run)
       VALUES (@createdAt, @source, @totalDetected, @totalRecognized, @galleryVersion, @processingMs, @run)`
    )
    .run({
      createdAt: run.timestamp,
      source: run.metadata.source ?? null,
      totalDetected: run.totalDetected,
      totalRecognized: run.totalRecognized,
      galleryVersion: run.galleryVersion,
      processingMs: run.processingDurationMs,
      run: JSON.stringify(run),
    });
  return Number(result.lastInsertRowid);
}

function rowToHistory(row: RunRow): HistoryRecord {
  // Runs are written only by saveRecognitionRun, so the stored JSON has the run's shape
  const run = JSON.parse(row.run) as RecognitionRun;
  return { id: row.id, run };
}

export function getRecentRuns(limit = 50): HistoryRecord[] {
  const database = getDb();
  const rows = database
    .prepare("SELECT id, run FROM recognition_runs ORDER BY id DESC LIMIT ?")
    .all(limit) as RunRow[];
  return rows.map(rowToHistory);
}

export function getRunById(id: number): HistoryRecord | null {
  const database = getDb();
  const row = database.prepare("SELECT id, run FROM recognition_runs WHERE id = ?").get(id) as RunRow | undefined;
  return row ? rowToHistory(row) : null;
}

export function getStats(): DbStats {
  const database = getDb();
  const entries = database.prepare("SELECT COUNT(*) as count FROM entries").get() as { count: number };
  const runs = database
    .prepare(
      `SELECT COUNT(*) as count,
              COALESCE(SUM(total_detected), 0) as detected,
              COALESCE(SUM(total_recognized), 0) as recognized,
              AVG(processing_ms) as avgMs,
              MAX(created_at) as lastRunAt
       FROM recognition_runs`
    )
    .get() as { count: number; detected: number; recognized: number; avgMs: number | null; lastRunAt: string | null };

  return {
    totalEntries: entries.count,
    totalRuns: runs.count,
    totalFacesDetected: runs.detected,
    totalFacesRecognized: runs.recognized,
    averageProcessingMs: runs.avgMs,
    lastRunAt: runs.lastRunAt,
  };
}

/** EntryStore over the entries table. */
export class SqliteEntryStore implements EntryStore {
  async loadEntries(): Promise<EntryRecord[]> {
    return getAllEntries();
  }

  async loadRevision(): Promise<number> {
    return getGalleryRevision();
  }

  async insertEntry(entry: NewEntry): Promise<EntryRecord> {
    return insertEntry(entry);
  }

  async deleteEntry(id: EntryId): Promise<boolean> {
    return deleteEntry(id);
  }

  async getEntry(id: EntryId): Promise<EntryRecord | null> {
    return getEntry(id);
  }
}

/** HistorySink over the recognition_runs table. */
export class SqliteHistorySink implements HistorySink, HistoryReader {
  async append(run: RecognitionRun): Promise<void> {
    saveRecognitionRun(run);
  }

  async listRuns(limit?: number): Promise<HistoryRecord[]> {
    return getRecentRuns(limit);
  }

  async getRun(id: number): Promise<HistoryRecord | null> {
    return getRunById(id);
  }
}
