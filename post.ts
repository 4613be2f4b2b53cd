import type { RequestMsg } from "./protocol.ts";
import type { FetchLike, Logger } from "./shared_types.ts";

export type PostOptions = {
  fetch: FetchLike;
  logger: Logger;
  sessionId: string;
  /** Aborts the POST when it takes longer. */
  timeoutMs?: number;
};

/** Statuses meaning the request was taken for asynchronous processing. */
const ACCEPTED = [200, 202];

/** Append the session token to the side-channel url. */
export const withSessionId = (url: string, sessionId: string) => {
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}session_id=${encodeURIComponent(sessionId)}`;
};

/**
 * POST a request envelope to the side channel.
 * Resolves `true` when the server accepted it; any other status or a thrown
 * transport error is logged and resolves `false`.
 */
export const post = async (
  url: string,
  msg: RequestMsg,
  options: PostOptions,
): Promise<boolean> => {
  const { fetch, logger, sessionId, timeoutMs } = options;
  try {
    logger.debug(`[sse-rpc] sending ${msg.method} (id=${msg.id})`);
    const response = await fetch(withSessionId(url, sessionId), {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify(msg),
      signal: timeoutMs === undefined
        ? undefined
        : AbortSignal.timeout(timeoutMs),
    });

    if (ACCEPTED.includes(response.status)) {
      logger.debug(`[sse-rpc] ${msg.method} accepted (HTTP ${response.status})`);
      await response.body?.cancel();
      return true;
    }
    const text = await response.text();
    logger.error(`[sse-rpc] HTTP ${response.status}: ${text}`);
    return false;
  } catch (error) {
    logger.error(`[sse-rpc] sending ${msg.method} failed:`, error);
    return false;
  }
};
