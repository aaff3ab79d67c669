import cluster from "cluster";
import dotenv from "dotenv";
import { buildOrExit, describeError } from "./lib/boot";
import { createSpineLogger, type Logger } from "./lib/logging";
import { loadServerConfig, type ServerConfig } from "./lib/serverConfig";
import { listen } from "./server/listen";

dotenv.config();

const WORKER_BOOT_ERROR = 3;

/**
 * Production process manager: the primary forks `workers` processes, each of
 * which loads `wsgi.ts` and listens on the shared bind address.
 */

function runPrimary(config: ServerConfig, logger: Logger): void {
  let shuttingDown = false;

  logger.log("info", "starting", {
    bind: `${config.bind.host}:${config.bind.port}`,
    workers: config.workers,
    timeout_s: config.timeout,
    keepalive_s: config.keepalive,
  });

  if (config.workerClass !== "sync") {
    logger.log("warn", "worker_class_ignored", { worker_class: config.workerClass });
  }
  if (config.threads > 1) {
    logger.log("warn", "threads_ignored", { threads: config.threads });
  }

  for (let i = 0; i < config.workers; i += 1) {
    cluster.fork();
  }

  cluster.on("exit", (worker, code, signal) => {
    if (shuttingDown) return;
    if (code === WORKER_BOOT_ERROR) {
      // A worker that cannot boot stops the whole pool.
      shuttingDown = true;
      logger.log("error", "worker_boot_failed", { worker_pid: worker.process.pid });
      process.exitCode = 1;
      cluster.disconnect();
      return;
    }
    logger.log("warn", "worker_exited", { worker_pid: worker.process.pid, code, signal });
    cluster.fork();
  });

  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log("info", "shutting_down", { signal });
    cluster.disconnect(() => process.exit(0));
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function runWorker(config: ServerConfig): Promise<void> {
  const { app } = await import("./wsgi");
  await listen(app, config.bind, { timeout: config.timeout, keepalive: config.keepalive });
}

function main(): void {
  const bootLogger = createSpineLogger({ app: "serve", domain: cluster.isPrimary ? "primary" : "worker" });
  const config = buildOrExit(bootLogger, () => loadServerConfig());

  const logger = createSpineLogger({
    app: "serve",
    domain: cluster.isPrimary ? "primary" : "worker",
    minLevel: config.logLevel,
  });

  if (cluster.isPrimary) {
    runPrimary(config, logger);
    return;
  }

  runWorker(config).catch((err: unknown) => {
    logger.log("error", "boot_failed", { error: describeError(err), pid: process.pid });
    process.exit(WORKER_BOOT_ERROR);
  });
}

main();
