import type { ServerConfigInput } from "./config.ts";
import type {
  ClientInfo,
  CorrelatedMsg,
  Params,
  Tool,
} from "./protocol.ts";
import type { FetchLike, Logger, ResponseStore } from "./shared_types.ts";

/** Options accepted by {@linkcode createClient} besides the server address. */
export type ClientOptions = {
  /** Defaults to the global `fetch`. */
  fetch?: FetchLike;
  /** Defaults to `console`. */
  logger?: Logger;
  /** Identity sent with `initialize`. Defaults to `tools-discovery` 1.0.0. */
  clientInfo?: ClientInfo;
  /** Interval for polling the session token and responses. Defaults to 100ms. */
  pollIntervalMs?: number;
  /** How long `startSession` waits for the session token. Defaults to 5000ms. */
  sessionWaitMs?: number;
};

export type SendOptions = {
  /** How long to wait for the response on the stream. Defaults to 8000ms. */
  timeoutMs?: number;
};

export type CreateClientOptions = ServerConfigInput & ClientOptions;

export interface SseRpcClient {
  /** Token captured from the stream, `undefined` until then. */
  readonly sessionId: string | undefined;
  /** Whether the stream is open and being read. */
  readonly listening: boolean;
  /** Responses received but not consumed yet, keyed by request id. */
  readonly responses: ResponseStore;

  /**
   * Start listening in the background and wait for the session token.
   * Resolves `false` when no token arrived in time.
   */
  startSession(): Promise<boolean>;
  /**
   * Send a request and wait for its response on the stream.
   * Resolves `undefined` whenever there is no response to return.
   */
  sendAndWait(
    method: string,
    params?: Params,
    options?: SendOptions,
  ): Promise<CorrelatedMsg | undefined>;
  /** Protocol handshake. Resolves `true` when the server answered with a result. */
  initialize(): Promise<boolean>;
  /** Tools offered by the server, `[]` on any failure. */
  listTools(): Promise<Tool[]>;
  stopSession(): Promise<void>;
  /** Stop the session for good. */
  close(): Promise<void>;
}
