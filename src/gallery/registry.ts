import Bottleneck from "bottleneck";
import type { DescriptorKind } from "../descriptors/types";
import { createLogger } from "../logger";
import { Gallery } from "./gallery";
import type { EntrySource } from "./types";

const log = createLogger("gallery");

/**
 * Holds the published gallery. Readers take a snapshot reference and keep it
 * for the length of a run; writers build a new gallery and swap it in.
 */
export class GalleryRegistry {
  readonly kind: DescriptorKind;
  private published: Gallery;
  private lastVersion: number;
  // Serializes refreshes so versions are built and published in order
  private refreshLimiter = new Bottleneck({ maxConcurrent: 1 });

  constructor(kind: DescriptorKind, initial?: Gallery) {
    this.kind = kind;
    this.published = initial ?? Gallery.empty(kind);
    this.lastVersion = this.published.version;
  }

  snapshot(): Gallery {
    return this.published;
  }

  get version(): number {
    return this.published.version;
  }

  /** Reserve the version number for a gallery about to be built. */
  nextVersion(): number {
    this.lastVersion += 1;
    return this.lastVersion;
  }

  /**
   * Make `next` visible to new snapshots. Returns false when `next` is not
   * newer than the published gallery, which then stays in place.
   */
  publish(next: Gallery): boolean {
    const current = this.published;
    if (next.version <= current.version) {
      log.warn(
        { published: current.version, rejected: next.version },
        "Ignoring stale gallery publish"
      );
      return false;
    }

    this.published = next;
    this.lastVersion = Math.max(this.lastVersion, next.version);
    log.info(
      { version: next.version, previous: current.version, entries: next.size },
      "Gallery published"
    );
    return true;
  }

  /**
   * Rebuild from the authoritative entry list and publish the result.
   */
  async refresh(source: EntrySource): Promise<Gallery> {
    return this.refreshLimiter.schedule(async () => {
      const records = await source.loadEntries();
      const revision = source.loadRevision ? await source.loadRevision() : 0;
      const next = Gallery.build(records, this.kind, Math.max(this.nextVersion(), revision));
      this.publish(next);
      return next;
    });
  }
}
