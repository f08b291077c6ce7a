import { describe, it, expect } from "vitest";
import type { RecognitionRun } from "../../recognition/types";
import { MemoryHistorySink } from "../memory";

function run(galleryVersion: number): RecognitionRun {
  return {
    timestamp: "2026-01-01T00:00:00.000Z",
    totalDetected: 0,
    totalRecognized: 0,
    perFaceResults: [],
    processingDurationMs: 1,
    galleryVersion,
    metadata: { warnings: [], facesFound: 0, imageWidth: 10, imageHeight: 10, threshold: 0.6 },
  };
}

describe("MemoryHistorySink", () => {
  it("numbers runs in append order and lists the newest first", async () => {
    const sink = new MemoryHistorySink();
    await sink.append(run(1));
    await sink.append(run(2));
    await sink.append(run(3));

    expect((await sink.listRuns()).map((r) => r.id)).toEqual([3, 2, 1]);
    expect((await sink.listRuns(2)).map((r) => r.run.galleryVersion)).toEqual([3, 2]);
    expect((await sink.getRun(2))?.run.galleryVersion).toBe(2);
    expect(await sink.getRun(4)).toBeNull();
    expect(sink.size).toBe(3);
  });
});
