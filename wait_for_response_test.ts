import { describe, expect, it } from "vitest";
import type { CorrelatedMsg } from "./protocol.ts";
import type { ResponseStore } from "./shared_types.ts";
import { waitForResponse } from "./wait_for_response.ts";

const response = (id: number, result: unknown): CorrelatedMsg => ({
  jsonrpc: "2.0",
  id,
  result,
});

describe("waitForResponse()", () => {
  it("returns the matching response and removes it", async () => {
    const store: ResponseStore = new Map([[1, response(1, "one")]]);

    expect(await waitForResponse(store, 1, { timeoutMs: 50 })).toEqual(
      response(1, "one"),
    );
    expect(store.has(1)).toBe(false);
  });

  it("matches a response only once", async () => {
    const store: ResponseStore = new Map([[1, response(1, "one")]]);

    await waitForResponse(store, 1, { timeoutMs: 50 });

    expect(
      await waitForResponse(store, 1, { timeoutMs: 20, pollIntervalMs: 5 }),
    ).toBeUndefined();
  });

  it("leaves responses for other ids alone", async () => {
    const store: ResponseStore = new Map([
      [1, response(1, "one")],
      [2, response(2, "two")],
    ]);

    await waitForResponse(store, 2, { timeoutMs: 50 });

    expect([...store.keys()]).toEqual([1]);
  });

  it("waits for a response stored later", async () => {
    const store: ResponseStore = new Map();
    setTimeout(() => store.set(7, response(7, "late")), 15);

    const msg = await waitForResponse(store, 7, {
      timeoutMs: 1000,
      pollIntervalMs: 5,
    });

    expect(msg?.result).toBe("late");
    expect(store.size).toBe(0);
  });

  it("returns undefined on timeout and keeps what arrives afterwards", async () => {
    const store: ResponseStore = new Map();

    const msg = await waitForResponse(store, 3, {
      timeoutMs: 20,
      pollIntervalMs: 5,
    });
    store.set(3, response(3, "too late"));

    expect(msg).toBeUndefined();
    expect(store.get(3)?.result).toBe("too late");
  });
});
