import { describe, expect, it } from "vitest";
import { createApp } from "../src/app/createApp";
import { DEFAULT_SECRET_KEY } from "../src/lib/config";
import { ConfigResolutionError } from "../src/lib/errors";
import { buildApp, makeInstanceDir } from "./helpers";

describe("createApp configuration", () => {
  it("uses the base profile when no variant is given", () => {
    const { app } = buildApp();
    expect(app.config).toEqual({ SECRET_KEY: DEFAULT_SECRET_KEY, DEBUG: false, TESTING: false });
  });

  it("follows FLASK_DEBUG without a variant", () => {
    const { app } = buildApp(undefined, { env: { FLASK_DEBUG: "1" } });
    expect(app.config.DEBUG).toBe(true);
    expect(app.config.TESTING).toBe(false);
  });

  it("applies the testing variant over the environment", () => {
    const { app } = buildApp("testing", { env: { FLASK_DEBUG: "0" } });
    expect(app.config.TESTING).toBe(true);
    expect(app.config.DEBUG).toBe(true);
  });

  it("production variant turns debug off", () => {
    const { app } = buildApp("production", { env: { FLASK_DEBUG: "1" } });
    expect(app.config.DEBUG).toBe(false);
    expect(app.config.TESTING).toBe(false);
    expect(app.server.get("env")).toBe("production");
  });

  it("lets the instance file win over base and variant", () => {
    const instancePath = makeInstanceDir("SECRET_KEY: local-secret\nEXTRA: 3\n");
    const { app } = buildApp("development", {
      env: { SECRET_KEY: "test-secret" },
      instancePath,
    });
    expect(app.config).toEqual({
      SECRET_KEY: "local-secret",
      DEBUG: true,
      TESTING: false,
      EXTRA: 3,
    });
  });

  it("matches base + variant when there is no instance file", () => {
    const { app } = buildApp("testing", { env: { SECRET_KEY: "test-secret" } });
    expect(app.config).toEqual({ SECRET_KEY: "test-secret", DEBUG: true, TESTING: true });
  });

  it("forces DEBUG on after every source when debug is set", () => {
    const instancePath = makeInstanceDir("DEBUG: false\n");
    const { app } = buildApp("production", { instancePath, debug: true });
    expect(app.config.DEBUG).toBe(true);
    expect(app.config.TESTING).toBe(false);
    expect(app.server.get("env")).toBe("development");
  });

  it("can force DEBUG off", () => {
    const { app } = buildApp("testing", { debug: false });
    expect(app.config).toEqual({ SECRET_KEY: DEFAULT_SECRET_KEY, DEBUG: false, TESTING: true });
  });

  it("fails on an unknown variant", () => {
    expect(() => buildApp("staging")).toThrow(ConfigResolutionError);
  });

  it("fails on a malformed instance file", () => {
    const instancePath = makeInstanceDir("SECRET_KEY: [oops\n");
    expect(() => buildApp(undefined, { instancePath })).toThrow(ConfigResolutionError);
  });

  it("fails when the instance file gives DEBUG a non-boolean", () => {
    const instancePath = makeInstanceDir('DEBUG: "yes"\n');
    expect(() => buildApp(undefined, { instancePath })).toThrow("DEBUG must be a boolean");
  });

  it("freezes the application and its configuration", () => {
    const { app } = buildApp();
    expect(Object.isFrozen(app)).toBe(true);
    expect(Object.isFrozen(app.config)).toBe(true);
    expect(Object.isFrozen(app.routes)).toBe(true);
  });

  it("records both routes", () => {
    const { app } = buildApp();
    expect(app.routes.map((r) => [r.endpoint, r.method, r.path])).toEqual([
      ["main.index", "GET", "/"],
      ["main.health", "GET", "/api/health"],
    ]);
  });

  it("logs construction without the secret", () => {
    const { lines } = buildApp("production", { env: { SECRET_KEY: "test-secret" } });
    expect(lines).toHaveLength(1);
    expect(lines[0].split("\n")[0]).toBe("INFO: [app:factory] app_created");
    expect(lines[0]).toContain("  variant=production");
    expect(lines[0]).toContain("  instance_config_applied=false");
    expect(lines[0]).not.toContain("test-secret");
  });

  it("defaults the instance path to the working directory", () => {
    const app = createApp(undefined, { env: {}, logSink: () => undefined });
    expect(app.instancePath).toBe(`${process.cwd()}/instance`);
  });
});
