import { getEnvChoice, getEnvInt, getEnvNumber, getEnvString } from "@plotwire/config";
import {
  DEFAULT_QUICKCHART_BASE_URL,
  DEFAULT_RENDER_SIZE,
  type ChartRenderOptions,
} from "@/modules/chart/chartUrl";

export const TRANSPORT_MODES = ["stdio", "sse"] as const;
export type TransportMode = (typeof TRANSPORT_MODES)[number];

export const CHART_TOOL_MODES = ["all", "strict", "lenient"] as const;
export type ChartToolMode = (typeof CHART_TOOL_MODES)[number];

export type ServerConfig = {
  /** Renderer endpoint, default https://quickchart.io/chart. */
  quickchartBaseUrl: string;
  /** Transport for the MCP host. */
  transport: TransportMode;
  /** SSE listener host. */
  host: string;
  /** SSE listener port. */
  port: number;
  /** Which chart tools are registered. */
  toolMode: ChartToolMode;
  /** Image size parameters sent to the renderer. */
  render: Omit<ChartRenderOptions, "baseUrl">;
};

/** Read the server configuration from environment variables. */
export function resolveServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const baseUrl = getEnvString(env, "QUICKCHART_BASE_URL", {
    defaultValue: DEFAULT_QUICKCHART_BASE_URL,
  }) ?? DEFAULT_QUICKCHART_BASE_URL;
  return {
    // 逻辑：去掉末尾 /，避免拼接重复。
    quickchartBaseUrl: baseUrl.replace(/\/$/, ""),
    // 逻辑：只有显式 sse 才走 HTTP，其余一律 stdio。
    transport: getEnvChoice(env, "TRANSPORT", TRANSPORT_MODES, "stdio"),
    host: getEnvString(env, "HOST", { defaultValue: "127.0.0.1" }) ?? "127.0.0.1",
    port: getEnvInt(env, "PORT", { defaultValue: 8050 }) ?? 8050,
    toolMode: getEnvChoice(env, "CHART_TOOL_MODE", CHART_TOOL_MODES, "all"),
    render: {
      width: getEnvInt(env, "CHART_WIDTH", { defaultValue: DEFAULT_RENDER_SIZE.width }) ?? DEFAULT_RENDER_SIZE.width,
      height:
        getEnvInt(env, "CHART_HEIGHT", { defaultValue: DEFAULT_RENDER_SIZE.height }) ?? DEFAULT_RENDER_SIZE.height,
      devicePixelRatio:
        getEnvNumber(env, "CHART_DEVICE_PIXEL_RATIO", {
          defaultValue: DEFAULT_RENDER_SIZE.devicePixelRatio,
        }) ?? DEFAULT_RENDER_SIZE.devicePixelRatio,
    },
  };
}
