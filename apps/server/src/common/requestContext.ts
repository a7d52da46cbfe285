import { AsyncLocalStorage } from "node:async_hooks";

export type RequestContext = {
  /** Correlation id of a single tool call. */
  requestId: string;
  /** Tool id being executed. */
  tool: string;
  /** Transport session id (SSE only). */
  sessionId?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

/** Run `fn` with the given request context attached to every log line it emits. */
export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

/** 获取本次请求上下文（可能为空）。 */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
