import path from "path";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import type { RouteEntry } from "../app/types";

const GROUP_NAME = "main";

function defaultTemplatesPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, "templates");
}

const HEALTH_PAYLOAD = Object.freeze({
  message: "Hello, Flask!",
  status: "ok",
});

function health(_req: Request, res: Response): void {
  res.status(200).json(HEALTH_PAYLOAD);
}

function createMainRoutes(args: { templatesPath: string }): RouteEntry[] {
  const index = (_req: Request, res: Response, next: NextFunction) => {
    res.sendFile("index.html", { root: args.templatesPath }, (err) => {
      if (err) next(err);
    });
  };

  return [
    { endpoint: `${GROUP_NAME}.index`, method: "GET", path: "/", handler: index },
    { endpoint: `${GROUP_NAME}.health`, method: "GET", path: "/api/health", handler: health },
  ];
}

/**
 * Mounts the `main` route group on the server and returns the entries it bound.
 */
export function registerRoutes(
  server: Express,
  options: { templatesPath?: string } = {},
): readonly RouteEntry[] {
  const routes = createMainRoutes({ templatesPath: options.templatesPath ?? defaultTemplatesPath() });
  const router = express.Router();

  for (const route of routes) {
    router.get(route.path, route.handler);
  }

  server.use("/", router);
  return Object.freeze(routes.map((r) => Object.freeze(r)));
}
