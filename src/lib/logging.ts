export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

export interface Logger {
  log(level: LogLevel, event: string, fields?: Record<string, unknown>): void;
  withDomain(domain: string): Logger;
  set(fields: Record<string, unknown>): void;
}

export interface RequestContext {
  app: string;
  requestId: string;
  startedAtMs: number;
  domain: string;
  base: Record<string, unknown>;
  log(level: LogLevel, event: string, fields?: Record<string, unknown>): void;
  withDomain(domain: string): RequestContext;
  set(fields: Record<string, unknown>): void;
}

export interface LoggerOptions {
  app: string;
  domain: string;
  requestId?: string;
  minLevel?: LogLevel;
  sink?: LogSink;
}

function defaultSink(line: string): void {
  // eslint-disable-next-line no-console
  console.log(line);
}

/**
 * Maps process-manager style level names (`warning`, `critical`) onto ours.
 * Unknown names fall back to `info`.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  switch ((raw ?? "").trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
    case "critical":
      return "error";
    default:
      return "info";
  }
}

function mergeDomain(base: string, next: string): string {
  if (!base) return next;
  if (!next) return base;
  return `${base}:${next}`;
}

export function formatValue(value: unknown): string | null {
  if (value === undefined) return null;
  if (value === null) return "null";
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value === "string") {
    const needsQuotes = value === "" || /\s/.test(value) || /["=]/.test(value);
    if (!needsQuotes) return value;
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  if (value instanceof Error) {
    const msg = value.message || String(value);
    return `"${msg.replace(/"/g, '\\"')}"`;
  }
  const json = JSON.stringify(value);
  return json ?? '"[unserializable]"';
}

export function formatSpineLines(args: {
  level: LogLevel;
  app: string;
  domain: string;
  action: string;
  requestId?: string;
  base?: Record<string, unknown>;
  fields?: Record<string, unknown>;
}): string {
  const domain = args.domain || "process";
  const rid = args.requestId ? args.requestId.slice(0, 8) : undefined;
  const mergedFields = { ...(args.base ?? {}), ...(args.fields ?? {}) };
  const headerParts = [
    `${args.level.toUpperCase()}: [${args.app}:${domain}] ${args.action}`,
    rid ? `rid=${rid}` : null,
  ].filter(Boolean);
  const lines: string[] = [headerParts.join(" ")];

  for (const [key, value] of Object.entries(mergedFields)) {
    const formatted = formatValue(value);
    if (formatted === null) continue;
    lines.push(`  ${key}=${formatted}`);
  }

  return lines.join("\n");
}

export function createSpineLogger(args: LoggerOptions): Logger {
  const { app, domain, requestId } = args;
  const minLevel = args.minLevel ?? "info";
  const sink = args.sink ?? defaultSink;
  let base: Record<string, unknown> = {};
  return {
    log(level: LogLevel, event: string, fields?: Record<string, unknown>) {
      if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
      sink(formatSpineLines({ level, app, domain, action: event, requestId, base, fields }));
    },
    withDomain(nextDomain: string) {
      const child = createSpineLogger({
        app,
        domain: mergeDomain(domain, nextDomain),
        requestId,
        minLevel,
        sink,
      });
      child.set(base);
      return child;
    },
    set(fields: Record<string, unknown>) {
      base = { ...base, ...fields };
    },
  };
}

function buildRequestContext(args: {
  app: string;
  requestId: string;
  startedAtMs: number;
  domain: string;
  base: Record<string, unknown>;
  minLevel?: LogLevel;
  sink?: LogSink;
}): RequestContext {
  const base = args.base;
  const logger = createSpineLogger({
    app: args.app,
    domain: args.domain,
    requestId: args.requestId,
    minLevel: args.minLevel,
    sink: args.sink,
  });

  return {
    app: args.app,
    requestId: args.requestId,
    startedAtMs: args.startedAtMs,
    domain: args.domain,
    base,
    // `base` is shared with every child context, so read it at log time.
    log(level: LogLevel, event: string, fields?: Record<string, unknown>) {
      logger.log(level, event, { ...base, ...fields });
    },
    withDomain(nextDomain: string) {
      return buildRequestContext({
        ...args,
        domain: mergeDomain(args.domain, nextDomain),
      });
    },
    set(fields: Record<string, unknown>) {
      Object.assign(base, fields);
    },
  };
}

export function createRequestContext(args: {
  app: string;
  requestId: string;
  minLevel?: LogLevel;
  sink?: LogSink;
}): RequestContext {
  return buildRequestContext({
    app: args.app,
    requestId: args.requestId,
    startedAtMs: Date.now(),
    domain: "",
    base: {},
    minLevel: args.minLevel,
    sink: args.sink,
  });
}
