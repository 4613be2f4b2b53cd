// Transport and reporting seams shared by the listener and the sender.
import type { CorrelatedMsg, ResponseId } from "./protocol.ts";

/**
 * The subset of `fetch` the client relies on.
 * The global `fetch` satisfies it; tests substitute an in-process server.
 */
export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

/** Where failures and progress are reported. `console` satisfies it. */
export interface Logger {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

/** Mapping from request id to the response the stream delivered for it. */
export type ResponseStore = Map<ResponseId, CorrelatedMsg>;
