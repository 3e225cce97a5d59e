/**
 * Tests for event query routes.
 *
 * Every successful ledger operation appends one event to the
 * acting account's stream.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { HashedStoredEvent } from "@stakewell/event-store";
import { ADMIN, DAY, T0, asAccount, createTestApp, fund, jsonRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

interface EventPage {
  data: HashedStoredEvent[];
  pagination: { cursor: string | null; hasMore: boolean };
}

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
  fund(instance.service, "alice", "100");
});

describe("GET /api/v1/events", () => {
  it("returns empty list when no events exist", async () => {
    const res = await instance.app.request("/api/v1/events");

    expect(res.status).toBe(200);
    const body = (await res.json()) as EventPage;
    expect(body.data).toEqual([]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("records a stake with the request ID as correlation ID", async () => {
    const { app } = instance;
    await app.request(
      jsonRequest("/api/v1/stake", "POST", { amount: "100" }, {
        "X-Account": "alice",
        "X-Request-Id": "req-1",
      }),
    );

    const res = await app.request("/api/v1/events");
    const body = (await res.json()) as EventPage;

    expect(body.data).toHaveLength(1);
    const stored = body.data[0]!;
    expect(stored.streamId).toBe("account-alice");
    expect(stored.version).toBe(1);
    expect(stored.globalPosition).toBe(1);
    expect(stored.previousHash).toBe("genesis");
    expect(stored.event.type).toBe("stake.staked");
    expect(stored.event.metadata.correlationId).toBe("req-1");
    expect(stored.event.metadata.actor).toBe("alice");
    expect(stored.event.metadata.timestamp).toBe("2023-11-14T22:13:20.000Z");
    expect(stored.event.payload).toEqual({
      account: "alice",
      amount: "100000000000000000000",
      at: T0,
    });
  });

  it("records nothing for a failed operation", async () => {
    const { app } = instance;
    await app.request(asAccount("alice", "/api/v1/unstake", "POST", { amount: "1" }));

    const res = await app.request("/api/v1/events");
    const body = (await res.json()) as EventPage;
    expect(body.data).toEqual([]);
  });

  it("pages with a cursor", async () => {
    const { app, clock } = instance;
    await app.request(asAccount("alice", "/api/v1/stake", "POST", { amount: "100" }));
    clock.advance(DAY);
    await app.request(asAccount("alice", "/api/v1/claim"));
    await app.request(asAccount("alice", "/api/v1/unstake", "POST", { amount: "100" }));

    const first = (await (await app.request("/api/v1/events?limit=2")).json()) as EventPage;
    expect(first.data.map((e) => e.event.type)).toEqual(["stake.staked", "stake.reward.claimed"]);
    expect(first.pagination.hasMore).toBe(true);
    expect(first.pagination.cursor).not.toBeNull();

    const second = (await (
      await app.request(`/api/v1/events?limit=2&cursor=${first.pagination.cursor ?? ""}`)
    ).json()) as EventPage;
    expect(second.data.map((e) => e.globalPosition)).toEqual([3]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("starts after a global position", async () => {
    const { app, clock } = instance;
    await app.request(asAccount("alice", "/api/v1/stake", "POST", { amount: "100" }));
    clock.advance(DAY);
    await app.request(asAccount("alice", "/api/v1/claim"));

    const res = await app.request("/api/v1/events?afterPosition=1");
    const body = (await res.json()) as EventPage;
    expect(body.data.map((e) => e.event.type)).toEqual(["stake.reward.claimed"]);
  });

  it("returns 400 for an out-of-range limit", async () => {
    const res = await instance.app.request("/api/v1/events?limit=0");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/events/:address", () => {
  beforeEach(async () => {
    const { app, clock, service } = instance;
    fund(service, ADMIN, "50");
    await app.request(asAccount("alice", "/api/v1/stake", "POST", { amount: "100" }));
    await app.request(asAccount(ADMIN, "/api/v1/reserve/deposit", "POST", { amount: "50" }));
    clock.advance(DAY);
    await app.request(asAccount("alice", "/api/v1/claim"));
  });

  it("lists only the account's events", async () => {
    const res = await instance.app.request("/api/v1/events/alice");

    expect(res.status).toBe(200);
    const body = (await res.json()) as EventPage;
    expect(body.data.map((e) => [e.version, e.globalPosition])).toEqual([
      [1, 1],
      [2, 3],
    ]);
  });

  it("keeps reserve deposits on the administrator's stream", async () => {
    const res = await instance.app.request(`/api/v1/events/${ADMIN}`);

    const body = (await res.json()) as EventPage;
    expect(body.data.map((e) => e.event.type)).toEqual(["stake.reserve.deposited"]);
  });

  it("starts after a stream version", async () => {
    const res = await instance.app.request("/api/v1/events/alice?afterVersion=1");

    const body = (await res.json()) as EventPage;
    expect(body.data.map((e) => e.event.type)).toEqual(["stake.reward.claimed"]);
  });

  it("returns an empty page for an account with no events", async () => {
    const res = await instance.app.request("/api/v1/events/bob");

    const body = (await res.json()) as EventPage;
    expect(body.data).toEqual([]);
  });
});
