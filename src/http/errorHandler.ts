import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "../lib/logging";

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "Not found" });
  };
}

/**
 * Turns a failure inside one request into a 500 for that request only.
 * With `debug` the error message is echoed back as `detail`.
 */
export function errorHandler(args: { debug: boolean; logger: Logger }): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const log = req.ctx ? req.ctx.withDomain("http") : args.logger;
    log.log("error", "unexpected_error", {
      error: err instanceof Error ? err.message : String(err),
      error_name: err instanceof Error ? err.name : undefined,
      error_stack: err instanceof Error && args.debug ? err.stack : undefined,
    });

    if (res.headersSent) {
      next(err);
      return;
    }

    res.status(500).json({
      ok: false,
      error: "Internal server error",
      ...(args.debug ? { detail: err instanceof Error ? err.message : String(err) } : {}),
    });
  };
}
