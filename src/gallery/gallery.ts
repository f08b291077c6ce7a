import { checkDescriptor, describeKind, type DescriptorKind } from "../descriptors/types";
import { DuplicateEntryError, InvalidEntryError, MixedDescriptorKindError } from "../errors";
import type { Entry, EntryId, EntryRecord } from "./types";

/**
 * An immutable, versioned set of enrolled entries sharing one descriptor kind.
 * Changes never touch a built gallery; they build a new one and publish it.
 */
export class Gallery {
  readonly version: number;
  readonly kind: DescriptorKind;
  readonly entries: readonly Entry[];
  private readonly byId: ReadonlyMap<string, Entry>;

  private constructor(version: number, kind: DescriptorKind, entries: readonly Entry[]) {
    this.version = version;
    this.kind = Object.freeze({ ...kind });
    this.entries = Object.freeze(entries);
    this.byId = new Map(entries.map((entry) => [String(entry.id), entry]));
    Object.freeze(this);
  }

  static build(records: readonly EntryRecord[], kind: DescriptorKind, version: number): Gallery {
    const seen = new Set<string>();
    const entries: Entry[] = [];

    for (const record of records) {
      const key = String(record.id);
      if (seen.has(key)) {
        throw new DuplicateEntryError(record.id);
      }
      seen.add(key);

      if (record.label.trim() === "") {
        throw new InvalidEntryError([`entry ${record.id} has an empty label`]);
      }

      const problem = checkDescriptor(record.descriptor, kind);
      if (problem) {
        throw new MixedDescriptorKindError(
          `Entry ${record.id} (${record.label}) does not match gallery kind ${describeKind(kind)}: ${problem}`
        );
      }

      entries.push(
        Object.freeze({
          id: record.id,
          label: record.label,
          descriptor: Object.freeze({
            kind: record.descriptor.kind,
            values: Object.freeze([...record.descriptor.values]),
          }),
          attributes: Object.freeze({ ...(record.attributes ?? {}) }),
        })
      );
    }

    return new Gallery(version, kind, entries);
  }

  static empty(kind: DescriptorKind, version = 0): Gallery {
    return new Gallery(version, kind, []);
  }

  get size(): number {
    return this.entries.length;
  }

  get(id: EntryId): Entry | undefined {
    return this.byId.get(String(id));
  }
}
