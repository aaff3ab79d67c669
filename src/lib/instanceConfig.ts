import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import type { ConfigMapping, ConfigValue } from "./config";
import { ConfigResolutionError } from "./errors";
import type { Logger } from "./logging";

const INSTANCE_CONFIG_FILE = "config.yaml";

const OPTION_NAME = /^[A-Z][A-Z0-9_]*$/;

export function defaultInstancePath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, "instance");
}

function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

function toConfigValue(filePath: string, key: string, value: unknown): ConfigValue {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw new ConfigResolutionError(
    "instance",
    `${filePath}: option '${key}' must be a string, boolean or integer`,
  );
}

/**
 * Only upper-case option names are taken; other keys (helpers, notes) are
 * skipped. Values must be strings, booleans or integers.
 */
export function parseInstanceConfig(filePath: string, yamlText: string, logger?: Logger): ConfigMapping {
  let raw: unknown;
  try {
    raw = yaml.load(yamlText, { filename: filePath });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigResolutionError("instance", `${filePath}: invalid YAML: ${reason}`, { cause: err });
  }

  // An empty document loads as undefined.
  if (raw === undefined || raw === null) {
    return {};
  }

  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigResolutionError("instance", `${filePath}: expected a mapping of option name -> value`);
  }

  const overrides: Record<string, ConfigValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!OPTION_NAME.test(key)) {
      logger?.log("debug", "instance_option_ignored", { file: filePath, key });
      continue;
    }
    overrides[key] = toConfigValue(filePath, key, value);
  }
  return overrides;
}

/**
 * Reads `<instancePath>/config.yaml`. With `silent`, a missing file yields
 * `null`; a file that exists but does not parse is always an error.
 */
export function loadInstanceConfig(
  instancePath: string,
  options: { silent: boolean; logger?: Logger },
): ConfigMapping | null {
  const filePath = path.join(instancePath, INSTANCE_CONFIG_FILE);

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if (options.silent && isMissingFileError(err)) {
      return null;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigResolutionError("instance", `Unable to load configuration file (${reason})`, { cause: err });
  }

  return parseInstanceConfig(filePath, text, options.logger);
}
