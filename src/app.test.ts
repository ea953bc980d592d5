import fs from "fs";
import type { Server } from "http";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { SessionStore } from "./sessions/sessionStore";
import { FakeBackend, FakeRenderer, OUTLINE, createTestCatalog } from "./test-utils/fakes";

const StartResponseSchema = z.object({ sessionId: z.string(), message: z.string() });

type SseEvent = { event: string; data: unknown };

function parseSse(body: string): SseEvent[] {
  return body
    .split("\n\n")
    .filter((block) => block.trim() && !block.startsWith(":"))
    .map((block) => {
      let event = "message";
      let data = "";
      for (const line of block.split("\n")) {
        if (line.startsWith("event: ")) event = line.slice("event: ".length);
        if (line.startsWith("data: ")) data += line.slice("data: ".length);
      }
      return { event, data: JSON.parse(data) };
    });
}

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  let backend: FakeBackend;
  let renderer: FakeRenderer;

  beforeEach(async () => {
    backend = new FakeBackend();
    renderer = new FakeRenderer();
    const app = createApp({
      config: loadConfig({ DECK_LLM_TIMEOUT_MS: "5000" }),
      catalog: createTestCatalog(),
      backend,
      renderer,
      store: new SessionStore({ idleTimeoutMs: 60_000, maxHistory: 100 }),
    });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server did not bind a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const post = (url: string, body?: unknown) =>
    fetch(`${baseUrl}${url}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  async function startSession(): Promise<string> {
    const res = await post("/api/v1/chat/start", { template: "project_init" });
    return StartResponseSchema.parse(await res.json()).sessionId;
  }

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "healthy", service: "deckflow", version: "0.1.0", activeSessions: 0 });
  });

  it("lists templates", async () => {
    const res = await fetch(`${baseUrl}/api/v1/templates`);
    expect(await res.json()).toEqual({
      templates: [
        { key: "general", name: "General", description: "", guidedModeEnabled: false },
        { key: "project_init", name: "Project Kick-off", description: "", guidedModeEnabled: true },
      ],
    });
  });

  it("walks a guided session from start to download link", async () => {
    const start = await post("/api/v1/chat/start", { template: "project_init" });
    expect(start.status).toBe(201);
    const { sessionId, message } = StartResponseSchema.parse(await start.json());
    expect(message).toBe("Hi there");

    backend.reply = () => ["Great idea! [READY_", "FOR_DRA", "FT] Let's draft it."];
    const chat = await post(`/api/v1/chat/${sessionId}/message`, { message: "I want an app for X" });
    expect(chat.status).toBe(200);
    expect(chat.headers.get("content-type")).toContain("text/event-stream");

    const events = parseSse(await chat.text());
    expect(events.every((e) => e.event === "message")).toBe(true);
    expect(events.map((e) => e.data)).toEqual([
      { content: "Gre", done: false, is_ready_for_draft: false },
      { content: "at idea", done: false, is_ready_for_draft: false },
      { content: "! ", done: false, is_ready_for_draft: false },
      { content: " Let's draft it.", done: true, is_ready_for_draft: true },
    ]);

    const draft = await post(`/api/v1/chat/${sessionId}/draft`);
    expect(draft.status).toBe(200);
    expect(await draft.json()).toEqual({ sessionId, draft: OUTLINE });

    const generated = await post(`/api/v1/chat/${sessionId}/generate`);
    expect(await generated.json()).toEqual({
      success: true,
      fileId: "artifact-1",
      downloadUrl: "/api/v1/download/artifact-1",
      preview: OUTLINE,
    });

    const info = await fetch(`${baseUrl}/api/v1/chat/${sessionId}`);
    expect(await info.json()).toMatchObject({ sessionId, state: "COMPLETED", messageCount: 3, hasDraft: true });
  });

  it("answers state and lookup errors with JSON before any stream starts", async () => {
    const sessionId = await startSession();

    const early = await post(`/api/v1/chat/${sessionId}/draft`);
    expect(early.status).toBe(409);
    expect(await early.json()).toEqual({
      success: false,
      error: {
        code: "DRAFT_NOT_READY",
        message: "Not enough information gathered yet. Keep the conversation going before creating a draft.",
      },
    });

    const missing = await post("/api/v1/chat/unknown-id/message", { message: "hello" });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ success: false, error: { code: "SESSION_NOT_FOUND" } });

    const noDraft = await post(`/api/v1/chat/${sessionId}/generate`);
    expect(noDraft.status).toBe(409);
    expect(await noDraft.json()).toMatchObject({ error: { code: "NO_DRAFT" } });
  });

  it("validates request bodies", async () => {
    const sessionId = await startSession();

    const empty = await post(`/api/v1/chat/${sessionId}/message`, { message: "" });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });

    const broken = await fetch(`${baseUrl}/api/v1/chat/start`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{ nope",
    });
    expect(broken.status).toBe(400);
    expect(await broken.json()).toEqual({
      success: false,
      error: { code: "VALIDATION_ERROR", message: "Request body is not valid JSON." },
    });

    const guided = await post("/api/v1/chat/start", { template: "general" });
    expect(guided.status).toBe(400);
    expect(await guided.json()).toMatchObject({ error: { code: "GUIDED_MODE_NOT_SUPPORTED" } });
  });

  it("returns 503 when the model fails before replying", async () => {
    const sessionId = await startSession();
    backend.reply = () => [];
    backend.streamError = new Error("connection refused");

    const res = await post(`/api/v1/chat/${sessionId}/message`, { message: "hello" });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: "BACKEND_UNAVAILABLE", message: "Language model backend is unavailable: connection refused" },
    });
  });

  it("reports a failure mid-stream as an error event", async () => {
    const sessionId = await startSession();
    backend.reply = () => ["This first part is longer than sixteen."];
    backend.streamError = new Error("connection reset");

    const res = await post(`/api/v1/chat/${sessionId}/message`, { message: "hello" });
    expect(res.status).toBe(200);
    const events = parseSse(await res.text());

    expect(events).toEqual([
      { event: "message", data: { content: "This first part is long", done: false, is_ready_for_draft: false } },
      {
        event: "error",
        data: { code: "BACKEND_UNAVAILABLE", message: "Language model backend is unavailable: connection reset" },
      },
    ]);
    const info = await fetch(`${baseUrl}/api/v1/chat/${sessionId}`);
    expect(await info.json()).toMatchObject({ messageCount: 1, state: "COLLECTING" });
  });

  it("generates a deck in quick mode and serves the file", async () => {
    const res = await post("/api/v1/generate", { topic: "Cats", slides: 3 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ success: true, fileId: "artifact-1", preview: OUTLINE });
    expect(backend.completeRequests[0]).toMatchObject({
      system: "You design presentations.",
      history: [{ role: "user", content: "Outline about Cats in en with 3 slides." }],
      temperature: 0.2,
    });

    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "deck-download-")), "artifact-1.pptx");
    fs.writeFileSync(file, "PK-test");
    renderer.files.set("artifact-1", file);

    const download = await fetch(`${baseUrl}/api/v1/download/artifact-1`);
    expect(download.status).toBe(200);
    expect(download.headers.get("content-disposition")).toContain("presentation-artifact-1.pptx");
    expect(await download.text()).toBe("PK-test");

    const missing = await fetch(`${baseUrl}/api/v1/download/artifact-9`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ error: { code: "ARTIFACT_NOT_FOUND" } });
  });

  it("rejects quick-mode requests over the slide limit", async () => {
    const res = await post("/api/v1/generate", { topic: "Cats", slides: 15 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: "VALIDATION_ERROR", message: "slides must be between 1 and 10." },
    });
  });

  it("deletes sessions once", async () => {
    const sessionId = await startSession();

    const first = await fetch(`${baseUrl}/api/v1/chat/${sessionId}`, { method: "DELETE" });
    expect(await first.json()).toEqual({ success: true });

    const second = await fetch(`${baseUrl}/api/v1/chat/${sessionId}`, { method: "DELETE" });
    expect(second.status).toBe(404);
  });
});
