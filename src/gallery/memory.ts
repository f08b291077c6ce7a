import type { EntryId, EntryRecord, EntryStore, NewEntry } from "./types";

/** Entry store kept in process; ids are assigned sequentially from 1. */
export class MemoryEntryStore implements EntryStore {
  private entries = new Map<string, EntryRecord>();
  private nextId = 1;

  constructor(initial: EntryRecord[] = []) {
    for (const record of initial) {
      this.entries.set(String(record.id), record);
      if (typeof record.id === "number" && record.id >= this.nextId) {
        this.nextId = record.id + 1;
      }
    }
  }

  async loadEntries(): Promise<EntryRecord[]> {
    return Array.from(this.entries.values());
  }

  async insertEntry(entry: NewEntry): Promise<EntryRecord> {
    const record: EntryRecord = { id: this.nextId++, ...entry };
    this.entries.set(String(record.id), record);
    return record;
  }

  async deleteEntry(id: EntryId): Promise<boolean> {
    return this.entries.delete(String(id));
  }

  async getEntry(id: EntryId): Promise<EntryRecord | null> {
    return this.entries.get(String(id)) ?? null;
  }
}
