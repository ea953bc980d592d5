import { AsyncLocalStorage } from "async_hooks";

export type SessionOperation = "start" | "sendMessage" | "createDraft" | "generate";

// Attached to every trace line written inside the context.
export type TraceContext = {
  sessionId?: string;
  operation?: SessionOperation;
};

const storage = new AsyncLocalStorage<TraceContext>();

export function withTraceContext<T>(ctx: TraceContext, fn: () => Promise<T>): Promise<T> {
  return storage.run(ctx, fn);
}

export function getTraceContext(): TraceContext | undefined {
  return storage.getStore();
}
