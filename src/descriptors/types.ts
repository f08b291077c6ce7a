export type EmbeddingMetric = "euclidean";
export type HistogramMetric = "chi-square" | "bhattacharyya";

export type DescriptorKind =
  | { type: "embedding"; dim: number; metric: EmbeddingMetric }
  | { type: "histogram"; dim: number; metric: HistogramMetric };

export type DescriptorType = DescriptorKind["type"];

/** Feature vector for one detected face, as produced by the embedder. */
export interface Descriptor {
  kind: DescriptorType;
  values: readonly number[];
}

export function embeddingKind(dim: number): DescriptorKind {
  return { type: "embedding", dim, metric: "euclidean" };
}

export function histogramKind(dim: number, metric: HistogramMetric = "chi-square"): DescriptorKind {
  return { type: "histogram", dim, metric };
}

export function describeKind(kind: DescriptorKind): string {
  return `${kind.type}(dim=${kind.dim}, metric=${kind.metric})`;
}

/**
 * Returns null when the descriptor fits the kind, otherwise the reason it does not.
 */
export function checkDescriptor(descriptor: Descriptor, kind: DescriptorKind): string | null {
  if (descriptor.kind !== kind.type) {
    return `expected ${kind.type} descriptor, got ${descriptor.kind}`;
  }
  if (descriptor.values.length !== kind.dim) {
    return `expected ${kind.dim} values, got ${descriptor.values.length}`;
  }
  if (!descriptor.values.every((v) => Number.isFinite(v))) {
    return "descriptor contains non-finite values";
  }
  if (kind.type === "histogram" && descriptor.values.some((v) => v < 0)) {
    return "histogram descriptor contains negative bins";
  }
  return null;
}
