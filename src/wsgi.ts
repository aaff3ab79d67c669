import dotenv from "dotenv";
import { createApp } from "./app/createApp";
import { parseLogLevel } from "./lib/logging";

dotenv.config();

/**
 * Production entry. The process manager (`serve.ts`) loads this module in each
 * worker and serves `handler`; nothing here listens or enables debug behaviour.
 */
export const app = createApp(undefined, {
  logLevel: parseLogLevel(process.env.GUNICORN_LOGLEVEL),
});

export const handler = app.server;
