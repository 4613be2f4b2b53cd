import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { messagesUrl, parseServerConfig, sseStreamUrl } from "./config.ts";

describe("parseServerConfig()", () => {
  it("fills in the defaults", () => {
    expect(parseServerConfig({ baseUrl: "http://127.0.0.1" })).toEqual({
      baseUrl: "http://127.0.0.1",
      port: 8000,
      timeoutMs: 15000,
      ssePath: "/sse",
      messagesPath: "/messages/",
    });
  });

  it("drops trailing slashes from the base url", () => {
    expect(parseServerConfig({ baseUrl: "http://localhost//" }).baseUrl).toBe(
      "http://localhost",
    );
  });

  it("rejects invalid values", () => {
    expect(() => parseServerConfig({ baseUrl: "not a url" })).toThrow(ZodError);
    expect(() => parseServerConfig({ baseUrl: "http://h", port: 0 })).toThrow(
      ZodError,
    );
    expect(() => parseServerConfig({ baseUrl: "http://h", ssePath: "sse" }))
      .toThrow(ZodError);
  });
});

describe("endpoint urls", () => {
  it("joins base url, port and path", () => {
    const config = parseServerConfig({
      baseUrl: "http://127.0.0.1",
      port: 3001,
      messagesPath: "/rpc",
    });

    expect(sseStreamUrl(config)).toBe("http://127.0.0.1:3001/sse");
    expect(messagesUrl(config)).toBe("http://127.0.0.1:3001/rpc");
  });
});
