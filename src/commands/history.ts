import { loadConfig } from "../config";
import { initDatabase, getRecentRuns, getRunById, closeDatabase } from "../db";
import { printFaceTable } from "../utils/table";

interface HistoryListOptions {
  limit?: number;
  json?: boolean;
}

export async function historyListCommand(options: HistoryListOptions = {}): Promise<void> {
  const config = loadConfig();
  initDatabase(config.database.path);
  const records = getRecentRuns(options.limit ?? 20);
  closeDatabase();

  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  if (records.length === 0) {
    console.log("No recognition runs recorded yet.");
    return;
  }

  console.log("\nRecent recognition runs:\n");
  console.log("  ID     Date                  Faces  Known  Time      Gallery  Image");
  console.log("  " + "─".repeat(80));
  for (const { id, run } of records) {
    const date = new Date(run.timestamp).toLocaleString();
    const time = `${run.processingDurationMs.toFixed(0)}ms`;
    console.log(
      `  ${String(id).padEnd(6)} ${date.padEnd(21)} ${String(run.totalDetected).padEnd(6)} ` +
        `${String(run.totalRecognized).padEnd(6)} ${time.padEnd(9)} v${String(run.galleryVersion).padEnd(7)} ` +
        `${run.metadata.source ?? "-"}`
    );
  }
}

interface HistoryShowOptions {
  json?: boolean;
}

export async function historyShowCommand(idArg: string, options: HistoryShowOptions = {}): Promise<void> {
  const id = parseInt(idArg, 10);
  if (Number.isNaN(id)) {
    console.error(`Invalid run ID: ${idArg}`);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  initDatabase(config.database.path);
  const record = getRunById(id);
  closeDatabase();

  if (!record) {
    console.error(`Run ${id} not found.`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(record, null, 2));
    return;
  }

  const { run } = record;
  console.log(`\nRun #${id} - ${new Date(run.timestamp).toLocaleString()}`);
  console.log(`  Image: ${run.metadata.source ?? "-"}`);
  console.log(`  Faces: ${run.totalDetected} processed (${run.metadata.facesFound} found), ${run.totalRecognized} recognized`);
  console.log(`  Gallery version: ${run.galleryVersion}, threshold ${run.metadata.threshold}`);
  console.log(`  Duration: ${run.processingDurationMs.toFixed(1)}ms`);
  for (const warning of run.metadata.warnings) {
    console.log(`  ⚠ ${warning}`);
  }
  if (run.perFaceResults.length > 0) {
    console.log();
    printFaceTable(run.perFaceResults);
  }
}
