import { EventSourceParserStream } from "eventsource-parser/stream";
import { isCorrelated, type ResponseMsg, responseMsgSchema } from "./protocol.ts";
import type { FetchLike, Logger, ResponseStore } from "./shared_types.ts";

const SESSION_MARKER = "session_id=";

export type ListenOptions = {
  fetch: FetchLike;
  store: ResponseStore;
  logger: Logger;
  /** Stops listening. Aborting is not reported as a failure. */
  signal?: AbortSignal;
  /** Current session token, if one was captured already. */
  getSessionId: () => string | undefined;
  onSessionId: (sessionId: string) => void;
  /** Called once the stream responded with 200. */
  onOpen?: () => void;
};

/**
 * Extract the session token from a stream line, e.g. `/messages/?session_id=abc`.
 * Returns `undefined` when the marker is missing or nothing follows it.
 */
export const extractSessionId = (line: string): string | undefined => {
  const start = line.indexOf(SESSION_MARKER);
  if (start < 0) return undefined;
  const sessionId = line.slice(start + SESSION_MARKER.length).trim();
  return sessionId || undefined;
};

// malformed data is not an error: it is skipped.
const decode = (data: string): ResponseMsg | undefined => {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return undefined;
  }
  const parsed = responseMsgSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
};

/**
 * Open the event stream at `url` and dispatch its messages until it ends,
 * fails, or `signal` is aborted.
 *
 * The first line carrying `session_id=` (a data or comment line) hands its
 * token to `onSessionId`. Every other data line is decoded on its own as a
 * JSON-RPC envelope; those with a string or numeric id are put in `store`
 * under that id, replacing any previous entry.
 *
 * Never rejects: a non-200 status or a broken stream is only logged, and
 * whatever was stored before remains.
 */
export const listen = async (
  url: string,
  options: ListenOptions,
): Promise<void> => {
  const { fetch, store, logger, signal, getSessionId, onSessionId, onOpen } =
    options;

  const captureSessionId = (line: string) => {
    if (getSessionId() !== undefined) return false;
    const sessionId = extractSessionId(line);
    if (sessionId === undefined) return false;
    onSessionId(sessionId);
    logger.debug(`[sse-rpc] session id: ${sessionId}`);
    return true;
  };

  // one envelope per data line
  const dispatchLine = (line: string) => {
    if (captureSessionId(line)) return;

    const text = line.trim();
    if (!text) return;
    const msg = decode(text);
    if (!msg) return;

    if (isCorrelated(msg)) {
      store.set(msg.id, msg);
      logger.debug(`[sse-rpc] response received for request ${msg.id}`);
    } else {
      logger.debug("[sse-rpc] event:", msg);
    }
  };

  const dispatch = (data: string) => data.split("\n").forEach(dispatchLine);

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: { Accept: "text/event-stream" },
      signal,
    });
    if (response.status !== 200) {
      logger.error(`[sse-rpc] stream responded with HTTP ${response.status}`);
      await response.body?.cancel();
      return;
    }
    if (!response.body) {
      logger.error("[sse-rpc] stream response has no body");
      return;
    }

    onOpen?.();
    const reader = response.body
      .pipeThrough(new TextDecoderStream())
      .pipeThrough(
        new EventSourceParserStream({
          onComment: (comment) => {
            captureSessionId(comment);
          },
        }),
      )
      .getReader();

    while (!signal?.aborted) {
      const { done, value } = await reader.read();
      if (done) break;
      dispatch(value.data);
    }
  } catch (error) {
    if (signal?.aborted) {
      logger.debug("[sse-rpc] stream closed");
    } else {
      logger.error("[sse-rpc] stream failed:", error);
    }
  }
};
