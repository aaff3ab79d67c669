import os from "os";
import type { Env } from "./config";
import { ConfigResolutionError } from "./errors";
import { parseLogLevel, type LogLevel } from "./logging";

export interface BindAddress {
  host: string;
  port: number;
}

export interface ServerConfig {
  bind: BindAddress;
  workers: number;
  threads: number;
  workerClass: string;
  /** Seconds. */
  timeout: number;
  /** Seconds. */
  keepalive: number;
  logLevel: LogLevel;
}

const DEFAULT_BIND = "127.0.0.1:8000";

function parsePort(raw: string, label: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigResolutionError("server", `Invalid ${label}: ${raw}`);
  }
  return port;
}

export function parseBind(raw: string): BindAddress {
  const value = raw.trim();
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(value);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(bracketed[2], "bind port") };
  }

  const idx = value.lastIndexOf(":");
  if (idx <= 0 || idx === value.length - 1) {
    throw new ConfigResolutionError("server", `Invalid bind address '${raw}' (expected host:port)`);
  }
  const host = value.slice(0, idx);
  if (host.includes(":")) {
    throw new ConfigResolutionError("server", `Invalid bind address '${raw}' (wrap IPv6 hosts in brackets)`);
  }
  return { host, port: parsePort(value.slice(idx + 1), "bind port") };
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigResolutionError("server", `Invalid ${name} value: ${raw}`);
  }
  return value;
}

export function defaultWorkerCount(cpuCount: number = os.cpus().length): number {
  return Math.max(cpuCount, 1) * 2 + 1;
}

/**
 * Settings for the production process manager.
 *
 * Bind priority: `PORT` (platform-provided, binds every interface), then
 * `GUNICORN_BIND`, then 127.0.0.1:8000.
 */
export function loadServerConfig(env: Env = process.env, cpuCount?: number): ServerConfig {
  const port = env.PORT;
  const bind = port
    ? { host: "0.0.0.0", port: parsePort(port, "PORT") }
    : parseBind(env.GUNICORN_BIND || DEFAULT_BIND);

  return {
    bind,
    workers: readInt(env, "GUNICORN_WORKERS", defaultWorkerCount(cpuCount), 1),
    threads: readInt(env, "GUNICORN_THREADS", 1, 1),
    workerClass: env.GUNICORN_WORKER_CLASS || "sync",
    timeout: readInt(env, "GUNICORN_TIMEOUT", 30, 0),
    keepalive: readInt(env, "GUNICORN_KEEPALIVE", 2, 0),
    logLevel: parseLogLevel(env.GUNICORN_LOGLEVEL ?? "info"),
  };
}
