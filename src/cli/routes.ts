import dotenv from "dotenv";
import { APP_NAME, createApp } from "../app/createApp";
import { buildOrExit } from "../lib/boot";
import { createSpineLogger } from "../lib/logging";
import { formatRouteTable } from "../routes/table";

dotenv.config();

// Usage: npm run routes [-- <profile>]
const logger = createSpineLogger({ app: APP_NAME, domain: "routes" });
const app = buildOrExit(logger, () => createApp(process.argv[2], { logLevel: "warn" }));
// eslint-disable-next-line no-console
console.log(formatRouteTable(app.routes));
