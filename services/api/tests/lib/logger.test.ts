import type { Server } from "node:http";
import express from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, requestLogger } from "../../src/lib/logger";

describe("createLogger", () => {
  beforeEach(() => {
    vi.stubEnv("LOG_LEVEL", "info");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prefixes messages with the scope and passes metadata through", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createLogger("store").info("created document", { id: "abc" });
    expect(log).toHaveBeenCalledWith("[store] created document", { id: "abc" });
  });

  it("routes warnings and errors to their console methods", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("api");
    logger.warn("slow");
    logger.error("broken");
    expect(warn).toHaveBeenCalledWith("[api] slow");
    expect(error).toHaveBeenCalledWith("[api] broken");
  });

  it("drops messages below LOG_LEVEL", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("api");
    logger.debug("hidden");
    expect(log).not.toHaveBeenCalled();

    vi.stubEnv("LOG_LEVEL", "debug");
    logger.debug("shown");
    expect(log).toHaveBeenCalledWith("[api] shown");
  });
});

describe("requestLogger", () => {
  it("logs the start and the end of each request", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const app = express();
    app.use(requestLogger(logger));
    app.get("/test", (_req, res) => {
      res.status(201).json({ message: "Test route" });
    });

    const server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    try {
      const address = server.address();
      if (!address || typeof address === "string") throw new Error("server is not listening on a port");
      const res = await fetch(`http://127.0.0.1:${address.port}/test`);
      expect(res.status).toBe(201);
      await res.json();
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }

    expect(logger.info).toHaveBeenCalledWith("Starting request", { method: "GET", path: "/test" });
    expect(logger.info).toHaveBeenCalledWith("Finished request", {
      method: "GET",
      path: "/test",
      status: 201,
      durationMs: expect.any(Number)
    });
  });
});
