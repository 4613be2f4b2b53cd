import { sleep } from "./sleep.ts";

export type WaitForSessionOptions = {
  /** Defaults to 5000ms. */
  maxWaitMs?: number;
  /** Defaults to 100ms. */
  pollIntervalMs?: number;
};

/**
 * Wait for the listener to capture the session token before any call is sent.
 *
 * @param getSessionId Reads the token captured so far.
 * @returns `true` once a token is present, `false` if `maxWaitMs` passes first.
 */
export const waitForSession = async (
  getSessionId: () => string | undefined,
  options?: WaitForSessionOptions,
): Promise<boolean> => {
  const { maxWaitMs = 5000, pollIntervalMs = 100 } = options ?? {};
  const deadline = Date.now() + maxWaitMs;

  while (true) {
    if (getSessionId() !== undefined) return true;
    if (Date.now() >= deadline) return false;
    await sleep(pollIntervalMs);
  }
};
