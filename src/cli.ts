#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { initCommand } from "./commands/init";
import { enrollCommand } from "./commands/enroll";
import { removeCommand } from "./commands/remove";
import { recognizeCommand } from "./commands/recognize";
import { galleryListCommand, galleryShowCommand } from "./commands/gallery";
import { historyListCommand, historyShowCommand } from "./commands/history";
import { statusCommand } from "./commands/status";
import { errorMessage } from "./errors";

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer: ${value}`);
  }
  return parsed;
}

const program = new Command();

program
  .name("rollcall")
  .description("Identify enrolled people in photos by face")
  .version("0.1.0");

program
  .command("init")
  .description("Create the config file and database")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("enroll")
  .description("Enroll one person from a photo containing exactly one face")
  .argument("<image>", "Path to the enrollment photo")
  .requiredOption("--label <name>", "Display name")
  .option("--employee-id <id>", "Employee ID")
  .option("--department <name>", "Department")
  .option("--position <title>", "Position")
  .option("--email <address>", "Email address")
  .option("--phone <number>", "Phone number")
  .option("--json", "Output as JSON")
  .action(enrollCommand);

program
  .command("remove")
  .description("Remove an enrolled entry")
  .argument("<id>", "Entry ID")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(removeCommand);

program
  .command("recognize")
  .description("Recognize faces in one or more photos")
  .argument("<images...>", "Photos to recognize")
  .option("-t, --threshold <n>", "Match threshold (overrides config)", parseNumber)
  .option("--max-faces <n>", "Max faces processed per photo", parsePositiveInt)
  .option("--json", "Output as JSON")
  .action(recognizeCommand);

// Gallery command group
const gallery = program
  .command("gallery")
  .description("List enrolled entries")
  .option("--json", "Output as JSON")
  .action(galleryListCommand);

gallery
  .command("show")
  .description("Show one enrolled entry")
  .argument("<id>", "Entry ID")
  .option("--json", "Output as JSON")
  .action(galleryShowCommand);

// History command group
const history = program
  .command("history")
  .description("List recent recognition runs")
  .option("-l, --limit <number>", "Number of runs to show", parsePositiveInt)
  .option("--json", "Output as JSON")
  .action(historyListCommand);

history
  .command("show")
  .description("Show the faces of one recognition run")
  .argument("<id>", "Run ID")
  .option("--json", "Output as JSON")
  .action(historyShowCommand);

program
  .command("status")
  .description("Show configuration and database stats")
  .action(statusCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
