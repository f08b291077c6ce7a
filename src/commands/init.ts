import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { loadConfig, getDefaultConfig, getGlobalConfigDir } from "../config";
import { initDatabase, closeDatabase } from "../db";
import { errorMessage } from "../errors";

export interface InitOptions {
  local?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  // Determine config path based on --local flag
  let configPath: string;
  if (options.local) {
    configPath = join(process.cwd(), "config.yaml");
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (!existsSync(configPath)) {
    spinner.start("Creating config file...");
    writeFileSync(configPath, getDefaultConfig());
    spinner.succeed(`Created config file: ${configPath}`);
  } else {
    spinner.info(`Config file already exists: ${configPath}`);
  }

  spinner.start("Initializing database...");
  try {
    const config = loadConfig();
    initDatabase(config.database.path);
    closeDatabase();
    spinner.succeed(`Database ready: ${config.database.path}`);
  } catch (error) {
    spinner.fail(`Failed to initialize: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  console.log("\nInitialization complete!");
  console.log("\nNext steps:");
  console.log("1. Start the face service configured under faceService.url");
  console.log("2. Run: rollcall enroll photo.jpg --label \"Ada Lovelace\"");
  console.log("3. Run: rollcall recognize group.jpg");
}
