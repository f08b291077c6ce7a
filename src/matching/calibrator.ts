import type { DescriptorKind } from "../descriptors/types";

function clampScore(value: number): number {
  return Math.round(Math.min(100, Math.max(0, value)) * 100) / 100;
}

/**
 * Map a raw distance to a confidence score in [0, 100].
 *
 * Histogram distances are unbounded, so the score is the remaining margin
 * below the threshold. Embedding distances are read as a dissimilarity in
 * [0, 1]. Either way the score never increases as the distance grows.
 */
export function calibrate(distance: number, threshold: number, kind: DescriptorKind): number {
  if (!Number.isFinite(distance) || distance < 0) return 0;

  if (kind.type === "histogram") {
    if (!(threshold > 0) || distance >= threshold) return 0;
    return clampScore(((threshold - distance) / threshold) * 100);
  }

  return clampScore(Math.max(0, 1 - distance) * 100);
}
