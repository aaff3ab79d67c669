import dotenv from "dotenv";
import { APP_NAME, createApp, type CreateAppOptions } from "./app/createApp";
import type { Application } from "./app/types";
import { buildOrExit, describeError } from "./lib/boot";
import { createSpineLogger, parseLogLevel } from "./lib/logging";
import { parseBind } from "./lib/serverConfig";
import { listen } from "./server/listen";

dotenv.config();

/**
 * Development runner. Importing this module only builds the application;
 * running it directly (`npm run dev`, which restarts on file changes) also
 * forces DEBUG on and starts a single-process server with debug logging.
 *
 * Do not use this in production; `npm run serve` drives `wsgi.ts` instead.
 */
const isMain = require.main === module;

export function devServerOptions(): CreateAppOptions {
  return { debug: true, logLevel: "debug" };
}

function build(): Application {
  return createApp(undefined, isMain ? devServerOptions() : { logLevel: parseLogLevel(process.env.LOG_LEVEL) });
}

export const app = isMain ? buildOrExit(createSpineLogger({ app: APP_NAME, domain: "main" }), build) : build();

if (isMain) {
  const serverLogger = app.logger.withDomain("server");
  const bind = buildOrExit(serverLogger, () =>
    parseBind(`${process.env.HOST || "127.0.0.1"}:${process.env.PORT || "5000"}`),
  );
  listen(app, bind).catch((err: unknown) => {
    serverLogger.log("error", "listen_failed", { error: describeError(err) });
    process.exitCode = 1;
  });
}
