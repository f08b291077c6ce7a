import type { RecognitionRun } from "../recognition/types";

/** Append-only record of recognition runs, read by reporting and export. */
export interface HistorySink {
  append(run: RecognitionRun): Promise<void>;
}

export interface HistoryRecord {
  id: number;
  run: RecognitionRun;
}

export interface HistoryReader {
  listRuns(limit?: number): Promise<HistoryRecord[]>;
  getRun(id: number): Promise<HistoryRecord | null>;
}
