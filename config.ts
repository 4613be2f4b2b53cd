import { z } from "zod";

export const serverConfigSchema = z.object({
  /** Scheme and host, without port or trailing slash, e.g. `http://127.0.0.1`. */
  baseUrl: z.string().url().transform((url) => url.replace(/\/+$/, "")),
  port: z.number().int().min(1).max(65535).default(8000),
  /** Upper bound for a single POST on the side channel. */
  timeoutMs: z.number().int().positive().default(15000),
  ssePath: z.string().startsWith("/").default("/sse"),
  messagesPath: z.string().startsWith("/").default("/messages/"),
});

export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type ServerConfig = z.output<typeof serverConfigSchema>;

/** Validate a server configuration and fill in its defaults. Throws a `ZodError` when invalid. */
export const parseServerConfig = (input: ServerConfigInput): ServerConfig =>
  serverConfigSchema.parse(input);

export const sseStreamUrl = (config: ServerConfig) =>
  `${config.baseUrl}:${config.port}${config.ssePath}`;

export const messagesUrl = (config: ServerConfig) =>
  `${config.baseUrl}:${config.port}${config.messagesPath}`;
