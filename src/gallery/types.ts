import type { Descriptor } from "../descriptors/types";

/** Stable identifier of an enrolled entry; the persisted record id. */
export type EntryId = number | string;

export type EntryAttributes = Readonly<Record<string, string>>;

export interface Entry {
  readonly id: EntryId;
  readonly label: string;
  readonly descriptor: Descriptor;
  readonly attributes: EntryAttributes;
}

/** Shape of an entry as the persistence collaborator hands it over. */
export interface EntryRecord {
  id: EntryId;
  label: string;
  descriptor: Descriptor;
  attributes?: Record<string, string>;
}

export interface EntrySource {
  loadEntries(): Promise<EntryRecord[]>;
  /**
   * Number of changes the source has recorded. Galleries built from it are
   * versioned at least this high, so versions stay comparable across processes.
   */
  loadRevision?(): Promise<number>;
}

export interface NewEntry {
  label: string;
  descriptor: Descriptor;
  attributes: Record<string, string>;
}

export interface EntryStore extends EntrySource {
  insertEntry(entry: NewEntry): Promise<EntryRecord>;
  deleteEntry(id: EntryId): Promise<boolean>;
  getEntry(id: EntryId): Promise<EntryRecord | null>;
}

/**
 * Order entry ids: numerically when both are numbers, otherwise by string value.
 */
export function compareEntryIds(a: EntryId, b: EntryId): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}
