import { existsSync } from "fs";
import ora from "ora";
import { loadConfig, getConfigPath, thresholdFor } from "../config";
import { initDatabase, getStats, closeDatabase } from "../db";
import { describeKind } from "../descriptors/types";
import { errorMessage } from "../errors";
import { galleryKind } from "../services";

export async function statusCommand(): Promise<void> {
  const spinner = ora();
  const configPath = getConfigPath();

  console.log("Configuration:");
  if (existsSync(configPath)) {
    console.log(`  ✓ Config file: ${configPath}`);
  } else {
    console.log(`  ○ No config file, using defaults (run 'rollcall init')`);
  }

  const config = loadConfig();

  console.log("\nLocal Database:");
  spinner.start("Reading database...");
  try {
    initDatabase(config.database.path);
    const stats = getStats();
    closeDatabase();
    spinner.stop();

    console.log(`  ✓ Path: ${config.database.path}`);
    console.log(`  ✓ Enrolled entries: ${stats.totalEntries}`);
    console.log(`  ✓ Recognition runs: ${stats.totalRuns}`);
    if (stats.totalRuns > 0) {
      const rate = stats.totalFacesDetected > 0
        ? ((stats.totalFacesRecognized / stats.totalFacesDetected) * 100).toFixed(0)
        : "0";
      console.log(`      Faces: ${stats.totalFacesDetected} processed, ${stats.totalFacesRecognized} recognized (${rate}%)`);
      if (stats.averageProcessingMs !== null) {
        console.log(`      Average run: ${stats.averageProcessingMs.toFixed(0)}ms`);
      }
      if (stats.lastRunAt) {
        console.log(`      Last run: ${new Date(stats.lastRunAt).toLocaleString()}`);
      }
    }
  } catch (error) {
    spinner.fail(`Could not read database: ${errorMessage(error)}`);
  }

  console.log("\nSettings:");
  console.log(`  Gallery kind: ${describeKind(galleryKind(config))}`);
  console.log(`  Match threshold: ${thresholdFor(config)}`);
  console.log(`  Max faces per image: ${config.recognition.maxFaces}`);
  console.log(`  Detector: ${config.detector.backend}`);
  console.log(`  Face service: ${config.faceService.url}`);
  if (config.detector.backend === "rekognition") {
    console.log(`  AWS Region: ${config.aws.region}`);
  }
}
