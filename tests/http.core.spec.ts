import request from "supertest";
import { describe, expect, it } from "vitest";

import { makeApp } from "./test-app.js";

describe("HTTP core", () => {
  it("GET /health returns service status", async () => {
    const app = makeApp();

    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "ok",
      service: "collectibles-admin-api",
      version: "1.0.0",
      environment: "test",
      store: "memory",
      timestamp: expect.any(String),
    });
  });

  it("GET /api-docs.json returns OpenAPI document", async () => {
    const app = makeApp();

    const res = await request(app).get("/api-docs.json");

    expect(res.status).toBe(200);
    expect(res.body).toEqual(
      expect.objectContaining({
        openapi: "3.0.0",
        info: expect.objectContaining({
          title: "Collectibles Admin API",
          version: "1.0.0",
        }),
      })
    );
  });

  it("Unknown /api route returns structured 404", async () => {
    const app = makeApp();

    const res = await request(app).get("/api/does-not-exist");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      code: "NOT_FOUND",
      message: "Route with ID '/api/does-not-exist' not found",
      statusCode: 404,
      details: null,
      timestamp: expect.any(String),
    });
  });

  it("Unknown non-API route returns the same 404 payload without the query", async () => {
    const app = makeApp();

    const res = await request(app).get("/catalog/missing?page=2");

    expect(res.status).toBe(404);
    expect(res.headers["content-type"]).toMatch(/^application\/json/);
    expect(res.body).toEqual({
      code: "NOT_FOUND",
      message: "Route with ID '/catalog/missing' not found",
      statusCode: 404,
      details: null,
      timestamp: expect.any(String),
    });
  });

  it("Invalid JSON body returns 400 INVALID_JSON", async () => {
    const app = makeApp();

    const res = await request(app)
      .post("/api/auth/login")
      .set("Content-Type", "application/json")
      .send('{"broken":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      code: "INVALID_JSON",
      message: "Invalid JSON body",
      statusCode: 400,
      details: null,
      timestamp: expect.any(String),
    });
  });

  it("Error payloads carry exactly the documented fields", async () => {
    const app = makeApp();

    const res = await request(app).get("/api/auth/me");

    expect(res.status).toBe(401);
    expect(Object.keys(res.body).sort()).toEqual(["code", "details", "message", "statusCode", "timestamp"]);
    expect(Number.isNaN(Date.parse(res.body.timestamp))).toBe(false);
  });

  it("Allows configured CORS origins", async () => {
    const app = makeApp();

    const res = await request(app).get("/health").set("Origin", "http://localhost:5173");

    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:5173");
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
  });
});
