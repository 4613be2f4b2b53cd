import type { RequestId } from "./protocol.ts";

/** Returns a generator of request ids: 1, 2, 3, … Each generator counts on its own. */
export const createIdGenerator = (): () => RequestId => {
  let last = 0;
  return () => ++last;
};
