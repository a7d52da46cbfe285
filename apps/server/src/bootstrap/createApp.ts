import type { HttpBindings } from "@hono/node-server";
import { RESPONSE_ALREADY_SENT } from "@hono/node-server/utils/response";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { TOOL_CATALOG } from "@plotwire/api";
import { Hono } from "hono";
import { logger as honoLogger } from "hono/logger";
import { logger } from "@/common/logger";
import type { ServerConfig } from "@/config";
import { createMcpServer } from "@/mcp/createMcpServer";
import { createChartService, type ChartService } from "@/modules/chart/chartService";

export const SSE_PATH = "/sse";
export const MESSAGES_PATH = "/messages";

/**
 * 创建 Hono app（SSE 传输）：
 * - GET /sse 建立事件流，每个连接一个 McpServer
 * - POST /messages?sessionId= 投递客户端消息
 * - listen 相关逻辑在 startServer 中处理
 */
export function createApp(options: { config: ServerConfig; createServer?: () => McpServer }) {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const sessions = new Map<string, SSEServerTransport>();
  let service: ChartService | undefined;
  const createServer =
    options.createServer ??
    (() => {
      // 逻辑：默认工厂首次建连时创建服务，各会话共享。
      service ??= createChartService({ config: options.config });
      return createMcpServer({ config: options.config, service });
    });

  app.use(honoLogger((message) => logger.debug(message)));

  app.get("/health", (c) =>
    c.json({
      ok: true,
      transport: "sse",
      sessions: sessions.size,
      tools: TOOL_CATALOG.map((item) => item.id),
    }),
  );

  app.get(SSE_PATH, async (c) => {
    const { outgoing } = c.env;
    const transport = new SSEServerTransport(MESSAGES_PATH, outgoing);
    const sessionId = transport.sessionId;
    const server = createServer();
    sessions.set(sessionId, transport);
    outgoing.on("close", () => {
      sessions.delete(sessionId);
      server.close().catch((error: unknown) => {
        logger.warn({ err: error, sessionId }, "Failed to close MCP session");
      });
      logger.info({ sessionId }, "SSE session closed");
    });
    await server.connect(transport);
    logger.info({ sessionId }, "SSE session opened");
    return RESPONSE_ALREADY_SENT;
  });

  app.post(MESSAGES_PATH, async (c) => {
    const sessionId = c.req.query("sessionId");
    const transport = sessionId ? sessions.get(sessionId) : undefined;
    if (!transport) {
      return c.json({ error: "session_not_found" }, 404);
    }
    await transport.handlePostMessage(c.env.incoming, c.env.outgoing);
    return RESPONSE_ALREADY_SENT;
  });

  return app;
}
