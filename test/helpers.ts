import fs from "fs";
import os from "os";
import path from "path";
import { createApp, type CreateAppOptions } from "../src/app/createApp";
import type { Application } from "../src/app/types";

const tempDirs: string[] = [];

export function makeTempDir(prefix = "app-scaffold-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** Instance directory containing `config.yaml` with the given text. */
export function makeInstanceDir(yamlText: string): string {
  const dir = makeTempDir();
  fs.writeFileSync(path.join(dir, "config.yaml"), yamlText, "utf8");
  return dir;
}

/** Builds the app against an empty instance directory with logging captured. */
export function buildApp(
  variant?: string,
  options: CreateAppOptions = {},
): { app: Application; lines: string[] } {
  const lines: string[] = [];
  const app = createApp(variant, {
    env: {},
    instancePath: makeTempDir(),
    logSink: (line) => lines.push(line),
    ...options,
  });
  return { app, lines };
}
