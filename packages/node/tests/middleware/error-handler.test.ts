/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to HTTP status codes by `code`
 * and that unknown errors never leak their message.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { StakeLedgerError } from "@stakewell/ledger";
import { EventStoreError } from "@stakewell/event-store";
import { handleError } from "../../src/middleware/error-handler.js";

function appThrowing(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function errorOf(err: Error): Promise<{ status: number; body: unknown }> {
  const res = await appThrowing(err).request("/boom");
  return { status: res.status, body: await res.json() };
}

describe("handleError", () => {
  it.each([
    ["INVALID_AMOUNT", 400],
    ["INVALID_ADDRESS", 400],
    ["NOT_AUTHORIZED", 403],
    ["LOCK_ALREADY_ACTIVE", 409],
    ["NO_LOCK_ACTIVE", 409],
    ["REENTRANT_CALL", 409],
    ["INSUFFICIENT_STAKE", 422],
    ["INSUFFICIENT_RESERVE", 422],
    ["INSUFFICIENT_ASSET_BALANCE", 422],
    ["NO_REWARD", 422],
  ] as const)("maps %s to %i", async (code, status) => {
    const result = await errorOf(new StakeLedgerError(code, `failed with ${code}`));

    expect(result.status).toBe(status);
    expect(result.body).toEqual({ error: { code, message: `failed with ${code}` } });
  });

  it("maps event store errors to 400", async () => {
    const result = await errorOf(new EventStoreError("INVALID_STREAM_ID", "Stream ID must not be empty"));

    expect(result.status).toBe(400);
    expect(result.body).toEqual({
      error: { code: "INVALID_STREAM_ID", message: "Stream ID must not be empty" },
    });
  });

  it("hides the message of an unknown error", async () => {
    const result = await errorOf(new Error("connection string with test-secret"));

    expect(result.status).toBe(500);
    expect(result.body).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("treats an unmapped code as internal", async () => {
    const err = Object.assign(new Error("disk full"), { code: "ENOSPC" });
    const result = await errorOf(err);

    expect(result.status).toBe(500);
    expect(result.body).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});
