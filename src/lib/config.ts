import { ConfigResolutionError } from "./errors";

export type ConfigValue = string | boolean | number;

export type ConfigMapping = Readonly<Record<string, ConfigValue>>;

export interface ConfigProfile extends ConfigMapping {
  /** Signs session cookies and CSRF tokens. */
  readonly SECRET_KEY: string;
  readonly DEBUG: boolean;
  readonly TESTING: boolean;
}

/** The merged configuration; override files may add keys beyond the profile ones. */
export type ResolvedConfig = ConfigProfile;

export type ProfileName = "development" | "testing" | "production";

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_SECRET_KEY = "dev-secret-change-me";

export function baseProfile(env: Env = process.env): ConfigProfile {
  return {
    SECRET_KEY: env.SECRET_KEY ?? DEFAULT_SECRET_KEY,
    DEBUG: (env.FLASK_DEBUG ?? "0") === "1",
    TESTING: false,
  };
}

const VARIANTS: Record<ProfileName, (env: Env) => ConfigProfile> = {
  development: (env) => ({ ...baseProfile(env), DEBUG: true }),
  testing: (env) => ({ ...baseProfile(env), TESTING: true, DEBUG: true }),
  production: (env) => ({ ...baseProfile(env), DEBUG: false }),
};

const CLASS_ALIASES: Record<string, ProfileName> = {
  developmentconfig: "development",
  testingconfig: "testing",
  productionconfig: "production",
};

export function profileNames(): ProfileName[] {
  return ["development", "testing", "production"];
}

function isProfileName(value: string): value is ProfileName {
  return value === "development" || value === "testing" || value === "production";
}

/**
 * Accepts `development`, `DevelopmentConfig` or `config.DevelopmentConfig`
 * (and the same for the other variants), case-insensitively.
 */
export function normalizeProfileName(identifier: string): ProfileName | null {
  let key = identifier.trim().toLowerCase();
  if (key.startsWith("config.")) {
    key = key.slice("config.".length);
  }
  if (isProfileName(key)) return key;
  return CLASS_ALIASES[key] ?? null;
}

export function resolveProfile(identifier: string, env: Env = process.env): ConfigProfile {
  const name = normalizeProfileName(identifier);
  if (!name) {
    throw new ConfigResolutionError(
      "profile",
      `Unknown configuration profile '${identifier}' (expected one of: ${profileNames().join(", ")})`,
    );
  }
  return VARIANTS[name](env);
}
