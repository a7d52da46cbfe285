import { createAdaptorServer } from "@hono/node-server";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger } from "@/common/logger";
import { resolveServerConfig, type ServerConfig } from "@/config";
import { createMcpServer } from "@/mcp/createMcpServer";
import { createApp } from "./createApp";

/** MCP over stdin/stdout. */
async function startStdioServer(config: ServerConfig) {
  const server = createMcpServer({ config });
  await server.connect(new StdioServerTransport());
  logger.info({ transport: "stdio", toolMode: config.toolMode }, "MCP server started on stdio");
  return { kind: "stdio" as const, server };
}

/** MCP over HTTP + SSE. */
function startSseServer(config: ServerConfig) {
  const app = createApp({ config });
  const { host, port } = config;
  const server = createAdaptorServer({ fetch: app.fetch, hostname: host });

  server.listen(port, host, () => {
    const info = server.address();
    const actualPort = typeof info === "object" && info ? info.port : port;
    logger.info(
      { transport: "sse", hostname: host, port: actualPort, toolMode: config.toolMode },
      `MCP server listening on http://${host}:${actualPort}/sse`,
    );
  });

  return { kind: "sse" as const, app, server };
}

/** 按 TRANSPORT 选择传输方式启动。 */
export async function startServer(config: ServerConfig = resolveServerConfig()) {
  if (config.transport === "sse") return startSseServer(config);
  return startStdioServer(config);
}
