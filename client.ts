import { messagesUrl, parseServerConfig, sseStreamUrl } from "./config.ts";
import { createIdGenerator } from "./gen_id.ts";
import { listen } from "./on.ts";
import { post } from "./post.ts";
import {
  type ClientInfo,
  createRequest,
  errorObjectSchema,
  initializeResultSchema,
  listToolsResultSchema,
  PROTOCOL_VERSION,
  type Tool,
} from "./protocol.ts";
import type { ResponseStore } from "./shared_types.ts";
import type { CreateClientOptions, SseRpcClient } from "./types.ts";
import { waitForSession } from "./wait_for_ready.ts";
import { waitForResponse } from "./wait_for_response.ts";

const DEFAULT_CLIENT_INFO: ClientInfo = {
  name: "tools-discovery",
  version: "1.0.0",
};

/**
 * Create a client for a JSON-RPC server that answers over Server-Sent Events.
 *
 * Requests are POSTed to the messages endpoint with the session token the
 * stream announced; their responses come back on the stream and are matched
 * by id. No connection is made until {@linkcode SseRpcClient.startSession}.
 *
 * @example
 * ```ts ignore
 * const client = createClient({ baseUrl: "http://127.0.0.1", port: 8000 });
 * try {
 *   if (await client.startSession()) {
 *     await client.initialize();
 *     const tools = await client.listTools();
 *   }
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export const createClient = (options: CreateClientOptions): SseRpcClient => {
  const {
    fetch = globalThis.fetch,
    logger = console,
    clientInfo = DEFAULT_CLIENT_INFO,
    pollIntervalMs = 100,
    sessionWaitMs = 5000,
    ...serverConfig
  } = options;
  const config = parseServerConfig(serverConfig);

  const responses: ResponseStore = new Map();
  const nextId = createIdGenerator();

  let sessionId: string | undefined;
  let listening = false;
  let controller: AbortController | undefined;
  let listener: Promise<void> | undefined;
  let closed = false;

  const getSessionId = () => sessionId;

  const startSession = async () => {
    if (closed) {
      throw new Error("client has been closed");
    }
    if (listener) {
      throw new Error("session already started");
    }

    controller = new AbortController();
    listener = listen(sseStreamUrl(config), {
      fetch,
      store: responses,
      logger,
      signal: controller.signal,
      getSessionId,
      onSessionId: (id) => {
        sessionId = id;
      },
      onOpen: () => {
        listening = true;
      },
    }).finally(() => {
      listening = false;
    });

    if (
      !await waitForSession(getSessionId, {
        maxWaitMs: sessionWaitMs,
        pollIntervalMs,
      })
    ) {
      logger.error("[sse-rpc] timed out waiting for the session id");
      return false;
    }
    logger.info(`[sse-rpc] session started: ${sessionId}`);
    return true;
  };

  const sendAndWait: SseRpcClient["sendAndWait"] = async (
    method,
    params,
    sendOptions,
  ) => {
    if (sessionId === undefined) {
      logger.error("[sse-rpc] no session id, start the session first");
      return undefined;
    }

    const msg = createRequest(nextId(), method, params);
    const accepted = await post(messagesUrl(config), msg, {
      fetch,
      logger,
      sessionId,
      timeoutMs: config.timeoutMs,
    });
    if (!accepted) return undefined;

    const response = await waitForResponse(responses, msg.id, {
      timeoutMs: sendOptions?.timeoutMs,
      pollIntervalMs,
    });
    if (!response) {
      logger.warn(`[sse-rpc] timed out waiting for the response to ${method}`);
    }
    return response;
  };

  const initialize = async () => {
    const response = await sendAndWait("initialize", {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: {} },
      clientInfo,
    });
    if (!response || !("result" in response)) {
      logger.warn("[sse-rpc] initialize failed");
      return false;
    }

    const parsed = initializeResultSchema.safeParse(response.result);
    const serverInfo = parsed.success ? parsed.data.serverInfo : undefined;
    logger.info(
      `[sse-rpc] initialized: ${serverInfo?.name ?? "N/A"} ${
        serverInfo?.version ?? "N/A"
      }`,
    );
    return true;
  };

  const listTools = async (): Promise<Tool[]> => {
    const response = await sendAndWait("tools/list");
    const parsed = listToolsResultSchema.safeParse(response?.result);
    if (parsed.success) {
      return parsed.data.tools;
    }

    logger.error("[sse-rpc] listing tools failed");
    const error = errorObjectSchema.safeParse(response?.error);
    if (error.success) {
      logger.error(`[sse-rpc] ${error.data.code}: ${error.data.message}`);
    } else if (response?.error !== undefined) {
      logger.error("[sse-rpc] error:", response.error);
    }
    return [];
  };

  const stopSession = async () => {
    listening = false;
    controller?.abort();
    await listener;
    listener = undefined;
  };

  const close = async () => {
    closed = true;
    await stopSession();
  };

  return {
    get sessionId() {
      return sessionId;
    },
    get listening() {
      return listening;
    },
    responses,
    startSession,
    sendAndWait,
    initialize,
    listTools,
    stopSession,
    close,
  };
};
