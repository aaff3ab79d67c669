import type { Logger } from "./logging";

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs a construction step for a process entry point. A failure is logged as
 * `config_invalid` and the process exits with status 1 before anything listens.
 */
export function buildOrExit<T>(logger: Logger, build: () => T): T {
  try {
    return build();
  } catch (err) {
    logger.log("error", "config_invalid", {
      error: describeError(err),
      error_name: err instanceof Error ? err.name : undefined,
    });
    return process.exit(1);
  }
}
