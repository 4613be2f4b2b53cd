export { createClient } from "./client.ts";
export {
  messagesUrl,
  parseServerConfig,
  serverConfigSchema,
  sseStreamUrl,
} from "./config.ts";
export { formatTools } from "./format_tools.ts";
export { createIdGenerator } from "./gen_id.ts";
export { extractSessionId, listen } from "./on.ts";
export { post, withSessionId } from "./post.ts";
export {
  createRequest,
  isCorrelated,
  JSONRPC_VERSION,
  PROTOCOL_VERSION,
  responseMsgSchema,
  toolSchema,
} from "./protocol.ts";
export { waitForSession } from "./wait_for_ready.ts";
export { waitForResponse } from "./wait_for_response.ts";

export type * from "./types.ts";
export type * from "./shared_types.ts";
export type {
  ClientInfo,
  CorrelatedMsg,
  ErrorObject,
  Params,
  RequestId,
  RequestMsg,
  ResponseId,
  ResponseMsg,
  Tool,
} from "./protocol.ts";
export type { ServerConfig, ServerConfigInput } from "./config.ts";
export type { ListenOptions } from "./on.ts";
export type { PostOptions } from "./post.ts";
export type { WaitForSessionOptions } from "./wait_for_ready.ts";
export type { WaitForResponseOptions } from "./wait_for_response.ts";
