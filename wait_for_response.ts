import type { CorrelatedMsg, ResponseId } from "./protocol.ts";
import type { ResponseStore } from "./shared_types.ts";
import { sleep } from "./sleep.ts";

export type WaitForResponseOptions = {
  /** Defaults to 8000ms. */
  timeoutMs?: number;
  /** Defaults to 100ms. */
  pollIntervalMs?: number;
};

/**
 * Poll `store` until the response for `id` shows up, then remove and return it.
 * Resolves `undefined` on timeout; a response arriving later stays in the store.
 */
export const waitForResponse = async (
  store: ResponseStore,
  id: ResponseId,
  options?: WaitForResponseOptions,
): Promise<CorrelatedMsg | undefined> => {
  const { timeoutMs = 8000, pollIntervalMs = 100 } = options ?? {};
  const deadline = Date.now() + timeoutMs;

  while (true) {
    const msg = store.get(id);
    if (msg) {
      store.delete(id);
      return msg;
    }
    if (Date.now() >= deadline) return undefined;
    await sleep(pollIntervalMs);
  }
};
