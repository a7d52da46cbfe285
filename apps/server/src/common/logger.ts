import pino from "pino";
import { getRequestContext } from "./requestContext";

type LogLevel = pino.LevelWithSilent;

/**
 * Normalize and validate log level string for pino.
 */
function normalizeLogLevel(raw: unknown): LogLevel | undefined {
  if (typeof raw !== "string") return;
  const level = raw.trim().toLowerCase();
  const allowed: LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
  return allowed.find((entry) => entry === level);
}

const defaultLevel: LogLevel = process.env.NODE_ENV === "production" ? "info" : "debug";
const level: LogLevel = normalizeLogLevel(process.env.LOG_LEVEL) ?? defaultLevel;

// 统一 server 侧日志入口；stdout 留给 stdio 协议，日志一律写 stderr。
export const logger = pino(
  {
    level,
    base: { service: "plotwire-server" },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
      const ctx = getRequestContext();
      return {
        requestId: ctx?.requestId,
        tool: ctx?.tool,
        sessionId: ctx?.sessionId,
      };
    },
  },
  pino.destination(2),
);
