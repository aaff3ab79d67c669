import type { Express, RequestHandler } from "express";
import type { ResolvedConfig } from "../lib/config";
import type { Logger } from "../lib/logging";

export type HttpMethod = "GET";

export interface RouteEntry {
  /** `<group>.<handler>`, e.g. `main.health`. */
  endpoint: string;
  method: HttpMethod;
  path: string;
  handler: RequestHandler;
}

export interface Application {
  readonly name: string;
  readonly instancePath: string;
  readonly config: ResolvedConfig;
  readonly routes: readonly RouteEntry[];
  readonly logger: Logger;
  /** The request callable handed to an HTTP server. */
  readonly server: Express;
}
