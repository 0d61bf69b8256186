import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { stopServer } from "../src/core/server/listen";
import { request, serveOnEphemeralPort } from "./helpers/http-client";

describe("entry module", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.stubEnv("PYTHON_ENV", "");
    vi.stubEnv("DATABASE_URL", "postgres://x");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("exports an app configured from process.env", async () => {
    const { app, config } = await import("../src/main");
    expect(config.environment).toBe("development");

    const server = await serveOnEphemeralPort(app);
    try {
      const res = await request(server, { path: "/health" });
      expect(res.json()).toEqual({
        status: "healthy",
        environment: "development",
        database_url: "postgres://x",
      });
    } finally {
      await stopServer(server);
    }
  });

  it("picks up PYTHON_ENV", async () => {
    vi.stubEnv("PYTHON_ENV", "production");
    const { config } = await import("../src/main");

    expect(config.environment).toBe("production");
    expect(config.databaseUrl).toBe("postgres://x");
  });
});
