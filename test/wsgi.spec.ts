import request from "supertest";
import { describe, expect, it } from "vitest";
import { app, handler } from "../src/wsgi";

describe("production entry", () => {
  it("exposes the request handler of a base-configured app", async () => {
    expect(handler).toBe(app.server);
    expect(app.config.TESTING).toBe(false);

    const res = await request(handler).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "Hello, Flask!", status: "ok" });
  });
});
