#!/usr/bin/env tsx
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod/v4";

import pkg from "../../package.json";
import { loadConfig } from "../config/defaults.ts";
import { handleTagCloud } from "./tools.ts";

const config = loadConfig();

const server = new McpServer({
  name: "tagcloud",
  version: pkg.version,
});

server.registerTool(
  "tag_cloud",
  {
    title: "Tag Cloud",
    description: `Actions: generate(text) — HTML tag cloud of the most frequent words | top(text) — ranked words with counts and font sizes. Optional: count (default: ${config.defaultCount}), title.`,
    inputSchema: {
      action: z.enum(["generate", "top"]).describe("What to produce"),
      text: z.string().describe("Document text"),
      title: z.string().optional().describe("Title shown in the heading (generate only)"),
      count: z.number().int().optional().describe("Number of words to select"),
    },
  },
  async (args) => handleTagCloud(config, args),
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("tagcloud MCP server running on stdio");
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
