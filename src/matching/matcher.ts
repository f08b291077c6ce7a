import { checkDescriptor, describeKind, type Descriptor } from "../descriptors/types";
import { distanceFor } from "../descriptors/metrics";
import { DescriptorMismatchError } from "../errors";
import type { Gallery } from "../gallery/gallery";
import { compareEntryIds, type Entry, type EntryAttributes, type EntryId } from "../gallery/types";
import { calibrate } from "./calibrator";

export interface Match {
  matchedEntryId: EntryId | null;
  label: string | null;
  attributes: EntryAttributes | null;
  rawDistance: number | null;
  confidence: number;
  isKnown: boolean;
}

/**
 * Nearest-neighbour lookup of one query descriptor in a gallery snapshot.
 * Implementations must be deterministic for the same (query, gallery, threshold).
 */
export interface Matcher {
  match(query: Descriptor, gallery: Gallery, threshold: number): Match;
}

export const UNMATCHED: Readonly<Match> = Object.freeze({
  matchedEntryId: null,
  label: null,
  attributes: null,
  rawDistance: null,
  confidence: 0,
  isKnown: false,
});

export function unknownMatch(rawDistance: number | null): Match {
  return { ...UNMATCHED, rawDistance };
}

/**
 * Brute-force scan over every entry. Gallery sizes here are in the tens to low
 * thousands, so no index is kept.
 */
export class LinearScanMatcher implements Matcher {
  match(query: Descriptor, gallery: Gallery, threshold: number): Match {
    if (gallery.entries.length === 0) {
      return unknownMatch(null);
    }

    const problem = checkDescriptor(query, gallery.kind);
    if (problem) {
      throw new DescriptorMismatchError(
        `Query does not match gallery kind ${describeKind(gallery.kind)}: ${problem}`
      );
    }

    const distance = distanceFor(gallery.kind);
    let best: Entry | null = null;
    let bestDistance = Infinity;

    for (const entry of gallery.entries) {
      const d = distance(query.values, entry.descriptor.values);
      if (
        best === null ||
        d < bestDistance ||
        (d === bestDistance && compareEntryIds(entry.id, best.id) < 0)
      ) {
        best = entry;
        bestDistance = d;
      }
    }

    if (best === null || !(bestDistance <= threshold)) {
      return unknownMatch(best === null ? null : bestDistance);
    }

    return {
      matchedEntryId: best.id,
      label: best.label,
      attributes: best.attributes,
      rawDistance: bestDistance,
      confidence: calibrate(bestDistance, threshold, gallery.kind),
      isKnown: true,
    };
  }
}
