import { Router } from "express";
import { z } from "zod";
import { SessionNotFoundError } from "../errors";
import type { GuidedSessionService, MessageEvent } from "../services/sessionService";
import { sendError, toErrorResponse, validationError } from "./errors";

const StartBodySchema = z.object({
  template: z.string().trim().min(1).max(100).default("project_init"),
});

const MessageBodySchema = z.object({
  message: z.string().trim().min(1).max(4000),
});

const HEARTBEAT_MS = 15000;

export function createChatRouter(service: GuidedSessionService): Router {
  const router = Router();

  router.post("/start", async (req, res) => {
    const parsed = StartBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendError(res, validationError(parsed.error), "POST /chat/start");
    try {
      const { sessionId, greetingText } = await service.start(parsed.data.template);
      res.status(201).json({ sessionId, message: greetingText });
    } catch (err) {
      sendError(res, err, "POST /chat/start");
    }
  });

  // Server-sent events: one `data:` line per reply fragment, the last one with done=true.
  router.post("/:id/message", async (req, res) => {
    const id = req.params.id;
    const parsed = MessageBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendError(res, validationError(parsed.error), "POST /chat/:id/message");

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    const events = service.sendMessage(id, parsed.data.message, { signal: controller.signal });

    // Pull the first event before committing to a stream so that state and
    // lookup errors still get a proper status code.
    let current: IteratorResult<MessageEvent, void>;
    try {
      current = await events.next();
    } catch (err) {
      return sendError(res, err, "POST /chat/:id/message");
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    const heartbeat = setInterval(() => {
      res.write(`: ping ${Date.now()}\n\n`);
    }, HEARTBEAT_MS);

    try {
      while (!current.done) {
        const ev = current.value;
        res.write(`data: ${JSON.stringify({ content: ev.fragment, done: ev.done, is_ready_for_draft: ev.readyForDraft })}\n\n`);
        current = await events.next();
      }
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      if (status >= 500) console.error("Error in POST /chat/:id/message stream:", err);
      res.write(`event: error\ndata: ${JSON.stringify(body.error)}\n\n`);
    } finally {
      clearInterval(heartbeat);
      res.end();
    }
  });

  router.post("/:id/draft", async (req, res) => {
    const id = req.params.id;
    try {
      const draft = await service.createDraft(id);
      res.status(200).json({ sessionId: id, draft });
    } catch (err) {
      sendError(res, err, "POST /chat/:id/draft");
    }
  });

  router.post("/:id/generate", async (req, res) => {
    const id = req.params.id;
    try {
      const result = await service.generate(id);
      res.status(200).json({
        success: true,
        fileId: result.artifactId,
        downloadUrl: `/api/v1/download/${result.artifactId}`,
        preview: result.outline,
      });
    } catch (err) {
      sendError(res, err, "POST /chat/:id/generate");
    }
  });

  router.get("/:id", (req, res) => {
    try {
      res.status(200).json(service.getSessionInfo(req.params.id));
    } catch (err) {
      sendError(res, err, "GET /chat/:id");
    }
  });

  router.delete("/:id", async (req, res) => {
    const id = req.params.id;
    try {
      const deleted = await service.deleteSession(id);
      if (!deleted) return sendError(res, new SessionNotFoundError(id), "DELETE /chat/:id");
      res.status(200).json({ success: true });
    } catch (err) {
      sendError(res, err, "DELETE /chat/:id");
    }
  });

  return router;
}
