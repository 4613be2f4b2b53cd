// JSON-RPC 2.0 frames exchanged over the POST side channel and the SSE stream.
import { z } from "zod";

export const JSONRPC_VERSION = "2.0";

export type RequestId = number;

/** Ids a response may carry. Requests sent by this client only use numbers. */
export type ResponseId = number | string;

export type Params = Record<string, unknown>;

export type RequestMsg = {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  method: string;
  params: Params;
};

export const errorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
}).passthrough();

export type ErrorObject = z.infer<typeof errorObjectSchema>;

/**
 * Anything decoded from a data line that is a JSON object.
 * Fields are not checked here: whatever carries a string or numeric `id` is a
 * response, everything else an unsolicited event.
 */
export const responseMsgSchema = z.object({
  jsonrpc: z.unknown().optional(),
  id: z.unknown().optional(),
  method: z.unknown().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: z.unknown().optional(),
}).passthrough();

export type ResponseMsg = z.infer<typeof responseMsgSchema>;

/** A response that answers a request, i.e. one carrying a usable id. */
export type CorrelatedMsg = ResponseMsg & { id: ResponseId };

export const isCorrelated = (msg: ResponseMsg): msg is CorrelatedMsg =>
  typeof msg.id === "number" || typeof msg.id === "string";

export const createRequest = (
  id: RequestId,
  method: string,
  params?: Params,
): RequestMsg => ({
  jsonrpc: JSONRPC_VERSION,
  id,
  method,
  params: params ?? {},
});

// MCP payloads carried in `result`.

export const PROTOCOL_VERSION = "2024-11-05";

export type ClientInfo = { name: string; version: string };

const propertySchema = z.object({
  type: z.union([z.string(), z.array(z.string())]).optional(),
  description: z.string().optional(),
}).passthrough();

export const toolSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  inputSchema: z.object({
    type: z.string().optional(),
    properties: z.record(propertySchema).optional(),
    required: z.array(z.string()).optional(),
  }).passthrough().optional(),
}).passthrough();

export type Tool = z.infer<typeof toolSchema>;

export const listToolsResultSchema = z.object({
  tools: z.array(toolSchema),
}).passthrough();

export const initializeResultSchema = z.object({
  protocolVersion: z.string().optional(),
  serverInfo: z.object({
    name: z.string().optional(),
    version: z.string().optional(),
  }).passthrough().optional(),
}).passthrough();
