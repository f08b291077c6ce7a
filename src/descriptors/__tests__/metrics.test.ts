import { describe, it, expect } from "vitest";
import {
  bhattacharyyaDistance,
  chiSquareDistance,
  distanceFor,
  euclideanDistance,
} from "../metrics";
import { checkDescriptor, embeddingKind, histogramKind } from "../types";

describe("euclideanDistance", () => {
  it("computes the straight-line distance", () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(euclideanDistance([1, 0, 0], [0.95, 0, 0])).toBeCloseTo(0.05, 10);
  });

  it("is zero for identical vectors", () => {
    expect(euclideanDistance([0.2, 0.4, 0.6], [0.2, 0.4, 0.6])).toBe(0);
  });
});

describe("chiSquareDistance", () => {
  it("skips bins that are empty in both histograms", () => {
    // bin 0 equal, bin 1: (2 - 0)^2 / 2 = 2, bin 2 empty in both
    expect(chiSquareDistance([1, 2, 0], [1, 0, 0])).toBe(2);
  });

  it("is symmetric", () => {
    const a = [4, 1, 0, 3];
    const b = [2, 2, 5, 1];
    expect(chiSquareDistance(a, b)).toBe(chiSquareDistance(b, a));
  });
});

describe("bhattacharyyaDistance", () => {
  it("is zero for identical histograms", () => {
    expect(bhattacharyyaDistance([1, 4, 9], [1, 4, 9])).toBe(0);
  });

  it("is one for histograms with no overlap", () => {
    expect(bhattacharyyaDistance([1, 0], [0, 1])).toBe(1);
  });

  it("handles empty histograms", () => {
    expect(bhattacharyyaDistance([0, 0], [0, 0])).toBe(0);
    expect(bhattacharyyaDistance([0, 0], [1, 1])).toBe(1);
    expect(bhattacharyyaDistance([], [])).toBe(0);
  });
});

describe("distanceFor", () => {
  it("picks the metric bound to the kind", () => {
    expect(distanceFor(embeddingKind(3))).toBe(euclideanDistance);
    expect(distanceFor(histogramKind(3))).toBe(chiSquareDistance);
    expect(distanceFor(histogramKind(3, "bhattacharyya"))).toBe(bhattacharyyaDistance);
  });
});

describe("checkDescriptor", () => {
  it("accepts a descriptor of the right type and length", () => {
    expect(checkDescriptor({ kind: "embedding", values: [1, 2, 3] }, embeddingKind(3))).toBeNull();
  });

  it("reports type, length and value problems", () => {
    expect(checkDescriptor({ kind: "histogram", values: [1, 2, 3] }, embeddingKind(3))).toBe(
      "expected embedding descriptor, got histogram"
    );
    expect(checkDescriptor({ kind: "embedding", values: [1, 2] }, embeddingKind(3))).toBe(
      "expected 3 values, got 2"
    );
    expect(checkDescriptor({ kind: "embedding", values: [1, NaN, 3] }, embeddingKind(3))).toBe(
      "descriptor contains non-finite values"
    );
    expect(checkDescriptor({ kind: "histogram", values: [1, -1] }, histogramKind(2))).toBe(
      "histogram descriptor contains negative bins"
    );
  });
});
