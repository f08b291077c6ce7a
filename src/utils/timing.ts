import { performance } from "perf_hooks";
import type { Logger } from "../logger";
import { errorMessage } from "../errors";

export function elapsedMs(start: number): number {
  return Math.round((performance.now() - start) * 1000) / 1000;
}

/**
 * Run `fn` and log how long it took, whether it resolved or threw.
 */
export async function timed<T>(
  log: Logger,
  operation: string,
  fn: () => Promise<T>,
  fields: Record<string, unknown> = {}
): Promise<T> {
  const start = performance.now();
  try {
    const result = await fn();
    log.info({ ...fields, operation, durationMs: elapsedMs(start) }, `${operation} completed`);
    return result;
  } catch (error) {
    log.warn(
      { ...fields, operation, durationMs: elapsedMs(start), error: errorMessage(error) },
      `${operation} failed`
    );
    throw error;
  }
}
