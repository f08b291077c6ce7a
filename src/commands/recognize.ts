import ora from "ora";
import cliProgress from "cli-progress";
import { loadConfig } from "../config";
import { closeDatabase } from "../db";
import { errorMessage } from "../errors";
import { readImageFile } from "../faces/image";
import type { RecognitionRun } from "../recognition/types";
import { createServices, type Services } from "../services";
import { printFaceTable } from "../utils/table";

interface RecognizeOptions {
  threshold?: number;
  maxFaces?: number;
  json?: boolean;
}

interface ImageOutcome {
  path: string;
  run?: RecognitionRun;
  error?: string;
}

function printRun(path: string, run: RecognitionRun): void {
  console.log(`\n${path}`);
  console.log(
    `  ${run.totalDetected} face(s) processed, ${run.totalRecognized} recognized ` +
      `in ${run.processingDurationMs.toFixed(0)}ms (gallery v${run.galleryVersion})`
  );
  for (const warning of run.metadata.warnings) {
    console.log(`  ⚠ ${warning}`);
  }
  if (run.perFaceResults.length > 0) {
    console.log();
    printFaceTable(run.perFaceResults);
  }
}

export async function recognizeCommand(imagePaths: string[], options: RecognizeOptions = {}): Promise<void> {
  const config = loadConfig();
  const spinner = ora();

  spinner.start("Loading gallery...");
  let services: Services;
  try {
    services = await createServices(config);
  } catch (error) {
    spinner.fail(`Could not load gallery: ${errorMessage(error)}`);
    closeDatabase();
    process.exitCode = 1;
    return;
  }
  const gallery = services.registry.snapshot();
  spinner.succeed(`Gallery v${gallery.version} loaded (${gallery.size} entries)`);

  if (gallery.size === 0) {
    console.warn("Gallery is empty; every face will be reported as unknown. Run 'rollcall enroll' first.");
  }

  const threshold = options.threshold ?? services.threshold;
  const maxFaces = options.maxFaces ?? config.recognition.maxFaces;
  const outcomes: ImageOutcome[] = [];

  const progressBar =
    imagePaths.length > 1 && !options.json
      ? new cliProgress.SingleBar(
          { format: "Recognizing |{bar}| {percentage}% | {value}/{total} | {image}" },
          cliProgress.Presets.shades_classic
        )
      : null;
  progressBar?.start(imagePaths.length, 0, { image: "" });

  try {
    for (const path of imagePaths) {
      progressBar?.increment({ image: path });
      try {
        const image = await readImageFile(path);
        // Every image in this invocation is judged against the same snapshot
        const run = await services.recognizer.recognize(image, gallery, {
          threshold,
          maxFaces,
          signal: AbortSignal.timeout(config.recognition.timeoutMs),
        });
        outcomes.push({ path, run });
      } catch (error) {
        outcomes.push({ path, error: errorMessage(error) });
      }
    }
  } finally {
    progressBar?.stop();
    closeDatabase();
  }

  if (options.json) {
    console.log(JSON.stringify(outcomes, null, 2));
  } else {
    for (const outcome of outcomes) {
      if (outcome.run) {
        printRun(outcome.path, outcome.run);
      } else {
        console.log(`\n${outcome.path}`);
        console.log(`  ✗ ${outcome.error}`);
      }
    }
  }

  if (outcomes.some((o) => o.error !== undefined)) {
    process.exitCode = 1;
  }
}
