import type { RecognitionRun } from "../recognition/types";
import type { HistoryReader, HistoryRecord, HistorySink } from "./types";

export class MemoryHistorySink implements HistorySink, HistoryReader {
  private records: HistoryRecord[] = [];

  async append(run: RecognitionRun): Promise<void> {
    this.records.push({ id: this.records.length + 1, run });
  }

  async listRuns(limit = 50): Promise<HistoryRecord[]> {
    return this.records.slice(-limit).reverse();
  }

  async getRun(id: number): Promise<HistoryRecord | null> {
    return this.records.find((record) => record.id === id) ?? null;
  }

  get size(): number {
    return this.records.length;
  }
}
