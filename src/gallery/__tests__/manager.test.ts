import { describe, it, expect, beforeEach } from "vitest";
import { embeddingKind } from "../../descriptors/types";
import { EntryNotFoundError, InvalidEntryError, MultipleFacesDetectedError } from "../../errors";
import { Enroller } from "../../recognition/enrollment";
import { FakeDecoder, FakeDetector, FakeEmbedder, box, embedding, rawImage } from "../../__tests__/fakes";
import { GalleryManager } from "../manager";
import { MemoryEntryStore } from "../memory";
import { GalleryRegistry } from "../registry";

const KIND = embeddingKind(2);

describe("GalleryManager", () => {
  let store: MemoryEntryStore;
  let registry: GalleryRegistry;

  beforeEach(() => {
    store = new MemoryEntryStore();
    registry = new GalleryRegistry(KIND);
  });

  function managerWith(detector: FakeDetector): GalleryManager {
    const enroller = new Enroller({
      decoder: new FakeDecoder(),
      detector,
      embedder: new FakeEmbedder(KIND, () => embedding(1, 0)),
    });
    return new GalleryManager(store, registry, enroller);
  }

  it("stores the entry and publishes a gallery containing it", async () => {
    const manager = managerWith(new FakeDetector([box(0)]));

    const { entry, gallery } = await manager.enroll(rawImage("ada.jpg"), {
      label: "Ada",
      attributes: { employee_id: "E-1" },
    });

    expect(entry).toEqual({ id: 1, label: "Ada", descriptor: embedding(1, 0), attributes: { employee_id: "E-1" } });
    expect(gallery.version).toBe(1);
    expect(registry.snapshot()).toBe(gallery);
    expect(gallery.get(1)?.label).toBe("Ada");
  });

  it("validates metadata before touching the detector", async () => {
    const detector = new FakeDetector([box(0)]);
    const manager = managerWith(detector);

    await expect(manager.enroll(rawImage(), { label: "" })).rejects.toThrow(InvalidEntryError);
    expect(detector.calls).toBe(0);
    expect(await store.loadEntries()).toEqual([]);
  });

  it("stores nothing when the photo has several faces", async () => {
    const manager = managerWith(new FakeDetector([box(0), box(50)]));

    await expect(manager.enroll(rawImage(), { label: "Ada" })).rejects.toThrow(MultipleFacesDetectedError);
    expect(await store.loadEntries()).toEqual([]);
    expect(registry.version).toBe(0);
  });

  it("removes an entry by publishing a rebuilt gallery", async () => {
    const manager = managerWith(new FakeDetector([box(0)]));
    const { gallery: withAda } = await manager.enroll(rawImage(), { label: "Ada" });

    const withoutAda = await manager.remove(1);

    expect(withoutAda.version).toBe(2);
    expect(withoutAda.size).toBe(0);
    expect(withAda.size).toBe(1);
    expect(manager.snapshot()).toBe(withoutAda);
  });

  it("fails to remove an unknown entry", async () => {
    const manager = managerWith(new FakeDetector([box(0)]));

    await expect(manager.remove(99)).rejects.toThrow(EntryNotFoundError);
    expect(registry.version).toBe(0);
  });

  it("reloads changes made to the store directly", async () => {
    const manager = managerWith(new FakeDetector([box(0)]));
    await store.insertEntry({ label: "Grace", descriptor: embedding(0, 1), attributes: {} });

    const gallery = await manager.reload();

    expect(gallery.entries.map((e) => e.label)).toEqual(["Grace"]);
  });
});
