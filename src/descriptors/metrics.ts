import type { DescriptorKind } from "./types";

export type DistanceFn = (a: readonly number[], b: readonly number[]) => number;

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Symmetric chi-square distance between two histograms.
 * Bins empty in both histograms are skipped.
 */
export function chiSquareDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const total = a[i] + b[i];
    if (total > 0) {
      const d = a[i] - b[i];
      sum += (d * d) / total;
    }
  }
  return sum;
}

/**
 * Bhattacharyya (Hellinger) distance in [0, 1]; the histograms need not be normalised.
 */
export function bhattacharyyaDistance(a: readonly number[], b: readonly number[]): number {
  const n = a.length;
  if (n === 0) return 0;

  let sumA = 0;
  let sumB = 0;
  let coefficient = 0;
  for (let i = 0; i < n; i++) {
    sumA += a[i];
    sumB += b[i];
    coefficient += Math.sqrt(a[i] * b[i]);
  }

  if (sumA === 0 && sumB === 0) return 0;
  if (sumA === 0 || sumB === 0) return 1;

  // sqrt(mean(a) * mean(b) * n^2) == sqrt(sumA * sumB)
  const normalised = coefficient / Math.sqrt(sumA * sumB);
  return Math.sqrt(Math.max(0, 1 - normalised));
}

export function distanceFor(kind: DescriptorKind): DistanceFn {
  switch (kind.metric) {
    case "euclidean":
      return euclideanDistance;
    case "chi-square":
      return chiSquareDistance;
    case "bhattacharyya":
      return bhattacharyyaDistance;
  }
}
