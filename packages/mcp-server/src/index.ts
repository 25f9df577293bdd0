#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  createCollaborators,
  createSessionStore,
  loadSettings,
  setLogLevel,
} from "@competitive-intel/agents";
import { registerAnalysisTools } from "./tools/analysis.js";

const settings = loadSettings();
setLogLevel(settings.logLevel);

const server = new McpServer({
  name: "competitive-intel-mcp",
  version: "0.1.0",
});

registerAnalysisTools(server, {
  store: createSessionStore(settings),
  defaultConcurrency: settings.concurrency,
  collaborators: ({ memory, fetchPages }) =>
    createCollaborators(
      { ...settings, fetchPages: fetchPages ?? settings.fetchPages },
      { onUsage: usage => memory.addTokensUsed(usage.inputTokens + usage.outputTokens) },
    ),
});

const transport = new StdioServerTransport();
await server.connect(transport);
