import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { trace, traceText } from "./trace";
import { withTraceContext } from "./traceContext";

const PREFIX = "[DECK_TRACE] ";

describe("trace", () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  const lines = (): unknown[] =>
    log.mock.calls.map((call) => {
      const line = String(call[0]);
      expect(line.startsWith(PREFIX)).toBe(true);
      return JSON.parse(line.slice(PREFIX.length));
    });

  it("stays silent unless enabled", () => {
    vi.stubEnv("DECK_TRACE", "");
    trace("chat.started");
    expect(log).not.toHaveBeenCalled();
  });

  it("tags lines with the session and operation in scope", async () => {
    vi.stubEnv("DECK_TRACE", "1");
    await withTraceContext({ sessionId: "session-1", operation: "createDraft" }, async () => {
      trace("chat.draft", { slides: 3 });
    });

    expect(lines()).toEqual([
      expect.objectContaining({ event: "chat.draft", slides: 3, sessionId: "session-1", operation: "createDraft" }),
    ]);
  });

  it("keeps explicitly passed fields over the context", async () => {
    vi.stubEnv("DECK_TRACE", "1");
    await withTraceContext({ sessionId: "session-1", operation: "start" }, async () => {
      trace("chat.reply", { sessionId: "session-2", operation: "sendMessage" });
    });

    expect(lines()).toEqual([expect.objectContaining({ sessionId: "session-2", operation: "sendMessage" })]);
  });

  it("truncates long text unless full tracing is on", () => {
    vi.stubEnv("DECK_TRACE", "1");
    traceText("chat.reply", "abcdef", { maxLen: 3 });

    expect(lines()).toEqual([expect.objectContaining({ text: "abc…(truncated, len=6)" })]);
    expect(lines()[0]).not.toHaveProperty("operation");
  });
});
