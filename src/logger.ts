import pino, { type Logger, type LevelWithSilent } from "pino";

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

const envLevel = process.env.LOG_LEVEL;

// Logs go to stderr so command output on stdout stays machine readable.
const root: Logger = pino(
  {
    name: "rollcall",
    level: isLevel(envLevel) ? envLevel : "info",
  },
  pino.destination(2)
);

// Children copy the level when created, so setLogLevel updates each one
const children: Logger[] = [];

export type { Logger };

export function createLogger(module: string): Logger {
  const child = root.child({ module });
  children.push(child);
  return child;
}

/**
 * Apply the configured level unless LOG_LEVEL overrides it.
 */
export function setLogLevel(level: LevelWithSilent): void {
  if (isLevel(envLevel)) return;
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
}
