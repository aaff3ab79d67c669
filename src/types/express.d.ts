import type { RequestContext } from "../lib/logging";

declare global {
  namespace Express {
    interface Request {
      /** Set by the request logging middleware. */
      ctx?: RequestContext;
    }
  }
}

export {};
