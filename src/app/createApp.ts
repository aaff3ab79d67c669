import express from "express";
import { baseProfile, resolveProfile, type ConfigValue, type Env, type ResolvedConfig } from "../lib/config";
import { ConfigResolutionError } from "../lib/errors";
import { defaultInstancePath, loadInstanceConfig } from "../lib/instanceConfig";
import { createSpineLogger, type LogLevel, type LogSink } from "../lib/logging";
import { errorHandler, notFound } from "../http/errorHandler";
import { requestLogging } from "../http/requestLogging";
import { registerRoutes } from "../routes/main";
import type { Application } from "./types";

export const APP_NAME = "app";

export interface CreateAppOptions {
  env?: Env;
  /** Directory holding the machine-local `config.yaml`; defaults to `<cwd>/instance`. */
  instancePath?: string;
  templatesPath?: string;
  /** Forces DEBUG after every source is merged, as a debug server run does. */
  debug?: boolean;
  logLevel?: LogLevel;
  logSink?: LogSink;
}

/**
 * Builds the application.
 *
 * Configuration sources, later ones overwriting earlier keys:
 * 1. the base profile (environment-derived defaults)
 * 2. the named variant, when one is given (`development`, `testing`, `production`)
 * 3. `instance/config.yaml`, skipped when the file does not exist
 * 4. `options.debug`, when set
 *
 * An unknown variant or an override file that does not parse throws
 * `ConfigResolutionError`; nothing is returned half-configured.
 */
export function createApp(variant?: string, options: CreateAppOptions = {}): Application {
  const env = options.env ?? process.env;
  const instancePath = options.instancePath ?? defaultInstancePath();
  const logger = createSpineLogger({
    app: APP_NAME,
    domain: "factory",
    minLevel: options.logLevel,
    sink: options.logSink,
  });

  const server = express();
  const store: Record<string, ConfigValue> = {};

  Object.assign(store, baseProfile(env));

  if (variant) {
    Object.assign(store, resolveProfile(variant, env));
  }

  const overrides = loadInstanceConfig(instancePath, { silent: true, logger });
  if (overrides) {
    Object.assign(store, overrides);
  }

  if (options.debug !== undefined) {
    store.DEBUG = options.debug;
  }

  const config = toResolvedConfig(store);

  server.disable("x-powered-by");
  server.set("env", config.DEBUG ? "development" : "production");
  server.use(requestLogging({ app: APP_NAME, minLevel: options.logLevel, sink: options.logSink }));
  const routes = registerRoutes(server, { templatesPath: options.templatesPath });
  server.use(notFound());
  server.use(errorHandler({ debug: config.DEBUG, logger: logger.withDomain("http") }));

  logger.log("info", "app_created", {
    variant: variant ?? "base",
    instance_path: instancePath,
    instance_config_applied: overrides !== null,
    debug: config.DEBUG,
    testing: config.TESTING,
    routes: routes.length,
  });

  return Object.freeze({
    name: APP_NAME,
    instancePath,
    config,
    routes,
    logger,
    server,
  });
}

/**
 * The override file may replace SECRET_KEY, DEBUG or TESTING with any scalar,
 * so the profile keys are checked again after merging.
 */
function toResolvedConfig(store: Record<string, ConfigValue>): ResolvedConfig {
  const { SECRET_KEY, DEBUG, TESTING } = store;
  if (typeof SECRET_KEY !== "string") {
    throw new ConfigResolutionError("instance", "SECRET_KEY must be a string");
  }
  if (typeof DEBUG !== "boolean") {
    throw new ConfigResolutionError("instance", "DEBUG must be a boolean");
  }
  if (typeof TESTING !== "boolean") {
    throw new ConfigResolutionError("instance", "TESTING must be a boolean");
  }
  return Object.freeze({ ...store, SECRET_KEY, DEBUG, TESTING });
}
