// Discover the tools of a local MCP server over SSE.
//
//   npm run demo -- http://127.0.0.1:8000
import { z } from "zod";
import {
  createClient,
  formatTools,
  messagesUrl,
  parseServerConfig,
  sseStreamUrl,
} from "./mod.ts";

const targetSchema = z.string().url().default("http://127.0.0.1:8000");

const main = async (argv: string[]): Promise<number> => {
  const url = new URL(targetSchema.parse(argv[0]));
  const server = {
    baseUrl: `${url.protocol}//${url.hostname}`,
    port: url.port ? Number(url.port) : 8000,
  };
  const config = parseServerConfig(server);

  console.log("MCP tools discovery via SSE");
  console.log(`stream:   ${sseStreamUrl(config)}`);
  console.log(`messages: ${messagesUrl(config)}`);
  console.log("=".repeat(60));

  const client = createClient(server);
  try {
    if (!await client.startSession()) {
      console.error("could not start the session");
      return 1;
    }

    await client.initialize();
    const tools = await client.listTools();
    console.log(formatTools(tools));
    if (tools.length) {
      console.log(`\n${tools.length} tool(s) discovered`);
    } else {
      console.log("\nno tools discovered");
    }
    return 0;
  } finally {
    await client.close();
  }
};

process.exitCode = await main(process.argv.slice(2));
