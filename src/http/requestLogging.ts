import crypto from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { createRequestContext, type LogLevel, type LogSink } from "../lib/logging";

export interface RequestLoggingOptions {
  app: string;
  minLevel?: LogLevel;
  sink?: LogSink;
}

/**
 * Gives every request a context logger (`req.ctx`) and writes one access line
 * when the response finishes.
 */
export function requestLogging(options: RequestLoggingOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const ctx = createRequestContext({
      app: options.app,
      requestId,
      minLevel: options.minLevel,
      sink: options.sink,
    });
    const httpCtx = ctx.withDomain("http");

    ctx.set({ method: req.method, path: req.path });
    req.ctx = ctx;

    httpCtx.log("debug", "request_received");

    res.on("finish", () => {
      const contentLength = res.getHeader("content-length");
      httpCtx.log("info", "response_finished", {
        status_code: res.statusCode,
        duration_ms: Date.now() - ctx.startedAtMs,
        ...(contentLength !== undefined ? { content_length: contentLength } : {}),
      });
    });

    next();
  };
}
