import request from "supertest";
import { describe, expect, it } from "vitest";
import { createHttpServer } from "../src/server/listen";
import { buildApp } from "./helpers";

describe("createHttpServer", () => {
  it("maps timeout and keepalive seconds onto the server", () => {
    const { app } = buildApp();
    const server = createHttpServer(app, { timeout: 30, keepalive: 2 });
    expect(server.requestTimeout).toBe(30_000);
    expect(server.keepAliveTimeout).toBe(2_000);
  });

  it("closes every connection when keepalive is 0", async () => {
    const { app } = buildApp();
    const res = await request(createHttpServer(app, { keepalive: 0 })).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.headers.connection).toBe("close");
    expect(res.body).toEqual({ message: "Hello, Flask!", status: "ok" });
  });
});
