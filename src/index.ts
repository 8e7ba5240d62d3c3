#!/usr/bin/env node
/**
 * mailvault MCP server.
 * Exposes multi-account mail retrieval, search, sending and the local
 * attachment archive as MCP tools over stdio.
 */

import "dotenv/config";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { ArchiveManager } from "./archive.js";
import { AttachmentManager } from "./attachments.js";
import { AccountRegistry, loadServerConfig, type ServerConfig } from "./config.js";
import { createLogger, setLogLevel } from "./log.js";
import { MailTools, TOOL_DEFINITIONS, type ToolContext } from "./tools.js";

const log = createLogger("server");

function createToolContext(config: ServerConfig): ToolContext {
  const archives = new ArchiveManager({
    maxDepth: config.maxExtractDepth,
    offsetMinutes: config.timezoneOffsetMinutes,
  });
  return {
    config,
    registry: new AccountRegistry({ file: config.accountsFile }),
    archives,
    attachments: new AttachmentManager({
      baseDir: config.attachmentsDir,
      offsetMinutes: config.timezoneOffsetMinutes,
      autoExtract: config.autoExtract,
      archives,
    }),
    storeOptions: { offsetMinutes: config.timezoneOffsetMinutes },
  };
}

function createServer(tools: MailTools): Server {
  const server = new Server(
    {
      name: "mailvault",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const response = await tools.invoke(name, args ?? {});
    return {
      content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
      isError: response.status === "error",
    };
  });

  return server;
}

async function main() {
  const config = loadServerConfig();
  setLogLevel(config.logLevel);
  const tools = new MailTools(createToolContext(config));
  const server = createServer(tools);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("mailvault MCP server running on stdio");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
