import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { GalleryRegistry } from "../../gallery/registry";
import { embeddingKind } from "../../descriptors/types";
import type { RecognitionRun } from "../../recognition/types";
import { embedding } from "../../__tests__/fakes";
import {
  SqliteEntryStore,
  SqliteHistorySink,
  closeDatabase,
  deleteEntry,
  getAllEntries,
  getGalleryRevision,
  getStats,
  initDatabase,
  insertEntry,
} from "../index";

function run(overrides: Partial<RecognitionRun> = {}): RecognitionRun {
  return {
    timestamp: "2026-03-01T09:00:00.000Z",
    totalDetected: 2,
    totalRecognized: 1,
    perFaceResults: [
      {
        matchedEntryId: 1,
        label: "Grace",
        attributes: { department: "Navy" },
        rawDistance: 0.1,
        confidence: 90,
        isKnown: true,
        observation: { index: 0, boundingBox: { top: 1, right: 2, bottom: 3, left: 0 }, descriptor: null },
      },
    ],
    processingDurationMs: 12,
    galleryVersion: 3,
    metadata: { warnings: [], facesFound: 2, imageWidth: 100, imageHeight: 80, threshold: 0.6, source: "a.jpg" },
    ...overrides,
  };
}

describe("SQLite stores", () => {
  beforeEach(() => {
    initDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
  });

  it("stores and reads back entries in id order", async () => {
    const store = new SqliteEntryStore();

    const grace = await store.insertEntry({
      label: "Grace",
      descriptor: embedding(0.1, 0.2),
      attributes: { department: "Navy" },
    });
    const alan = await store.insertEntry({ label: "Alan", descriptor: embedding(0.3, 0.4), attributes: {} });

    expect(grace).toEqual({
      id: 1,
      label: "Grace",
      descriptor: embedding(0.1, 0.2),
      attributes: { department: "Navy" },
    });
    expect(alan.id).toBe(2);
    expect(await store.loadEntries()).toEqual([grace, alan]);
    expect(await store.getEntry(2)).toEqual(alan);
    expect(await store.getEntry(7)).toBeNull();
  });

  it("deletes entries", async () => {
    const store = new SqliteEntryStore();
    const entry = await store.insertEntry({ label: "Grace", descriptor: embedding(1, 0), attributes: {} });

    expect(await store.deleteEntry(entry.id)).toBe(true);
    expect(await store.deleteEntry(entry.id)).toBe(false);
    expect(getAllEntries()).toEqual([]);
  });

  it("feeds a registry refresh", async () => {
    insertEntry({ label: "Grace", descriptor: embedding(1, 0), attributes: {} });
    const registry = new GalleryRegistry(embeddingKind(2));

    const gallery = await registry.refresh(new SqliteEntryStore());

    expect(gallery.version).toBe(1);
    expect(gallery.entries.map((e) => e.label)).toEqual(["Grace"]);
  });

  it("counts entry changes and seeds gallery versions from them", async () => {
    expect(getGalleryRevision()).toBe(0);

    const first = insertEntry({ label: "Grace", descriptor: embedding(1, 0), attributes: {} });
    insertEntry({ label: "Alan", descriptor: embedding(0, 1), attributes: {} });
    expect(deleteEntry(first.id)).toBe(true);
    expect(deleteEntry(first.id)).toBe(false);
    expect(getGalleryRevision()).toBe(3);

    // A registry in a new process continues from the stored count
    const registry = new GalleryRegistry(embeddingKind(2));
    const gallery = await registry.refresh(new SqliteEntryStore());

    expect(gallery.version).toBe(3);
    expect(gallery.entries.map((e) => e.label)).toEqual(["Alan"]);
  });

  it("appends runs and lists the newest first", async () => {
    const history = new SqliteHistorySink();

    await history.append(run({ timestamp: "2026-03-01T09:00:00.000Z" }));
    await history.append(run({ timestamp: "2026-03-02T09:00:00.000Z", totalRecognized: 2 }));

    const records = await history.listRuns();
    expect(records.map((r) => r.id)).toEqual([2, 1]);
    expect(records[0].run.totalRecognized).toBe(2);
    expect((await history.listRuns(1)).map((r) => r.id)).toEqual([2]);
    expect(await history.getRun(1)).toEqual({ id: 1, run: run({ timestamp: "2026-03-01T09:00:00.000Z" }) });
    expect(await history.getRun(9)).toBeNull();
  });

  it("summarises entries and runs", async () => {
    insertEntry({ label: "Grace", descriptor: embedding(1, 0), attributes: {} });
    const history = new SqliteHistorySink();
    await history.append(run({ processingDurationMs: 10 }));
    await history.append(run({ processingDurationMs: 20, timestamp: "2026-03-05T10:00:00.000Z" }));

    expect(getStats()).toEqual({
      totalEntries: 1,
      totalRuns: 2,
      totalFacesDetected: 4,
      totalFacesRecognized: 2,
      averageProcessingMs: 15,
      lastRunAt: "2026-03-05T10:00:00.000Z",
    });
  });

  it("reports empty stats for a fresh database", () => {
    expect(getStats()).toEqual({
      totalEntries: 0,
      totalRuns: 0,
      totalFacesDetected: 0,
      totalFacesRecognized: 0,
      averageProcessingMs: null,
      lastRunAt: null,
    });
  });

  it("refuses to work before initialization", () => {
    closeDatabase();
    expect(() => getAllEntries()).toThrow("Database not initialized");
  });
});
