import type { Tool } from "./protocol.ts";

const typeLabel = (type: string | string[] | undefined) =>
  Array.isArray(type) ? type.join(" | ") : type ?? "";

/** Render discovered tools as a numbered listing with their parameters. */
export const formatTools = (tools: Tool[]): string => {
  if (!tools.length) return "No tools found";

  let output = `\n${tools.length} TOOL(S) DISCOVERED:\n` + "=".repeat(60) +
    "\n";

  tools.forEach((tool, index) => {
    output += `\n${index + 1}. ${tool.name || "N/A"}\n`;
    output += `   ${tool.description ?? "No description"}\n`;

    const properties = tool.inputSchema?.properties;
    if (properties) {
      const required = tool.inputSchema?.required ?? [];
      output += "   Parameters:\n";
      for (const [name, info] of Object.entries(properties)) {
        const mark = required.includes(name) ? " *" : "";
        output += `      - ${name}${mark} (${typeLabel(info.type)}): ${
          info.description ?? ""
        }\n`;
      }
    }

    output += "\n" + "-".repeat(50) + "\n";
  });

  return output;
};
