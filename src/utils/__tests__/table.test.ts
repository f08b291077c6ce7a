import { describe, it, expect } from "vitest";
import type { MatchResult } from "../../recognition/types";
import { formatBox, formatFaceRow } from "../table";

const known: MatchResult = {
  matchedEntryId: 4,
  label: "Katherine Johnson",
  attributes: { employee_id: "NASA-1953" },
  rawDistance: 0.12346,
  confidence: 87.64,
  isKnown: true,
  observation: { index: 0, boundingBox: { top: 5, right: 60, bottom: 70, left: 10 }, descriptor: null },
};

const unknown: MatchResult = {
  matchedEntryId: null,
  label: null,
  attributes: null,
  rawDistance: null,
  confidence: 0,
  isKnown: false,
  observation: { index: 11, boundingBox: { top: 1, right: 2, bottom: 3, left: 0 }, descriptor: null },
};

describe("formatFaceRow", () => {
  it("formats a recognized face", () => {
    expect(formatFaceRow(known, { label: 10, attribute: 6 })).toBe(
      "  1  Katheri... 87.6%      0.1235     NAS... 10,5-60,70"
    );
  });

  it("formats an unknown face", () => {
    expect(formatFaceRow(unknown, { label: 10, attribute: 6 })).toBe(
      " 12  Unknown    -          -                 0,1-2,3"
    );
  });
});

describe("formatBox", () => {
  it("prints left,top-right,bottom", () => {
    expect(formatBox(known)).toBe("10,5-60,70");
  });
});
