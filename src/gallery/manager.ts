import { EntryNotFoundError } from "../errors";
import type { RawImage } from "../faces/types";
import { createLogger } from "../logger";
import type { Enroller } from "../recognition/enrollment";
import { validateEntryMetadata, type EntryMetadataInput } from "./attributes";
import type { Gallery } from "./gallery";
import type { GalleryRegistry } from "./registry";
import type { EntryId, EntryRecord, EntryStore } from "./types";

const log = createLogger("gallery-manager");

export interface EnrollResult {
  entry: EntryRecord;
  gallery: Gallery;
}

/**
 * Every mutation goes through the store first, then a full rebuild is
 * published; published galleries are never edited in place.
 */
export class GalleryManager {
  private store: EntryStore;
  private registry: GalleryRegistry;
  private enroller: Enroller;

  constructor(store: EntryStore, registry: GalleryRegistry, enroller: Enroller) {
    this.store = store;
    this.registry = registry;
    this.enroller = enroller;
  }

  async enroll(image: RawImage, metadata: EntryMetadataInput): Promise<EnrollResult> {
    const { label, attributes } = validateEntryMetadata(metadata);
    const descriptor = await this.enroller.prepareEntry(image);

    const entry = await this.store.insertEntry({ label, descriptor, attributes });
    log.info({ id: entry.id, label, source: image.source }, "Entry enrolled");

    const gallery = await this.registry.refresh(this.store);
    return { entry, gallery };
  }

  async remove(id: EntryId): Promise<Gallery> {
    const deleted = await this.store.deleteEntry(id);
    if (!deleted) {
      throw new EntryNotFoundError(id);
    }
    log.info({ id }, "Entry removed");
    return this.registry.refresh(this.store);
  }

  /** Rebuild from the store, e.g. after it was changed by another process. */
  async reload(): Promise<Gallery> {
    return this.registry.refresh(this.store);
  }

  snapshot(): Gallery {
    return this.registry.snapshot();
  }
}
