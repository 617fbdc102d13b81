import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadAgentEnv } from "../config/env.js";
import { createAutoAnswerService } from "../services/autoAnswer.js";
import { asErrorMessage } from "../utils/async.js";
import { registerTools } from "./tools.js";

// stdout carries the protocol; everything else goes to stderr.
const stderrLogger = {
  debug: (...args: unknown[]) => console.error(...args),
  info: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.error(...args),
  error: (...args: unknown[]) => console.error(...args),
};

async function main() {
  const service = createAutoAnswerService(loadAgentEnv(), stderrLogger);
  await service.init();

  const server = new McpServer({
    name: "phone-assist-agent",
    version: "0.1.0",
  });
  registerTools(server, service);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

void main().catch((error) => {
  console.error(asErrorMessage(error));
  process.exit(1);
});
