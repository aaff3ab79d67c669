import http from "http";
import type { Application } from "../app/types";
import type { BindAddress } from "../lib/serverConfig";

export interface ListenOptions {
  /** Seconds; 0 disables the limit. */
  timeout?: number;
  /** Seconds an idle keep-alive connection stays open; 0 closes every connection after its response. */
  keepalive?: number;
}

/**
 * HTTP transport only: wraps the application's request callable in a server.
 */
export function createHttpServer(application: Application, options: ListenOptions = {}): http.Server {
  const closeAfterResponse = options.keepalive === 0;
  const server = http.createServer((req, res) => {
    if (closeAfterResponse) {
      res.setHeader("Connection", "close");
    }
    application.server(req, res);
  });

  if (options.timeout !== undefined) {
    server.requestTimeout = options.timeout * 1000;
  }
  if (options.keepalive !== undefined && !closeAfterResponse) {
    server.keepAliveTimeout = options.keepalive * 1000;
  }

  return server;
}

/**
 * Binds the application on `bind`. Resolves once the socket is listening.
 */
export function listen(
  application: Application,
  bind: BindAddress,
  options: ListenOptions = {},
): Promise<http.Server> {
  const server = createHttpServer(application, options);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(bind.port, bind.host, () => {
      server.off("error", reject);
      application.logger.withDomain("server").log("info", "listening", {
        url: `http://${bind.host.includes(":") ? `[${bind.host}]` : bind.host}:${bind.port}`,
        pid: process.pid,
      });
      resolve(server);
    });
  });
}
