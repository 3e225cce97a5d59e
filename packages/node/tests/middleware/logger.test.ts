/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { asAccount, createTestApp, fund } from "../setup.js";
import { levelForStatus } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    const res = await app.request("/health");

    expect(entries).toHaveLength(1);
    expect(entries[0]!.level).toBe("info");
    expect(entries[0]!.method).toBe("GET");
    expect(entries[0]!.path).toBe("/health");
    expect(entries[0]!.status).toBe(200);
    expect(entries[0]!.durationMs).toBeGreaterThanOrEqual(0);
    expect(entries[0]!.requestId).toBe(res.headers.get("X-Request-Id"));
  });

  it("logs the status of failed operations", async () => {
    const entries: RequestLogEntry[] = [];
    const { app, service } = createTestApp({ logFn: (entry) => entries.push(entry) });
    fund(service, "alice", "1");

    await app.request(asAccount("alice", "/api/v1/stake", "POST", { amount: "1" }));
    await app.request(asAccount("alice", "/api/v1/claim"));

    expect(entries.map((e) => [e.level, e.method, e.path, e.status])).toEqual([
      ["info", "POST", "/api/v1/stake", 200],
      ["warn", "POST", "/api/v1/claim", 422],
    ]);
  });
});

describe("levelForStatus", () => {
  it("maps status classes to log levels", () => {
    expect(levelForStatus(200)).toBe("info");
    expect(levelForStatus(304)).toBe("info");
    expect(levelForStatus(404)).toBe("warn");
    expect(levelForStatus(503)).toBe("error");
  });
});
