import cors from "cors";
import express, { type Express } from "express";
import { APP_NAME, APP_VERSION, type AppConfig } from "./config";
import type { ModelBackend } from "./infra/llm";
import type { Renderer } from "./infra/render/pptxRenderer";
import { createChatRouter } from "./routes/chat";
import { errorMiddleware } from "./routes/errors";
import { createPresentationsRouter } from "./routes/presentations";
import { createDraftService } from "./services/draftService";
import { createGuidedSessionService } from "./services/sessionService";
import type { SessionStore } from "./sessions/sessionStore";
import type { TemplateCatalog } from "./templates/catalog";

export type AppDeps = {
  config: AppConfig;
  catalog: TemplateCatalog;
  backend: ModelBackend;
  renderer: Renderer;
  store: SessionStore;
};

export function createApp(deps: AppDeps): Express {
  const { config, catalog, backend, renderer, store } = deps;

  const drafts = createDraftService({ backend, renderer, timeoutMs: config.llm.timeoutMs });
  const sessions = createGuidedSessionService({
    store,
    catalog,
    backend,
    drafts,
    readyMarker: config.sessions.readyMarker,
    timeoutMs: config.llm.timeoutMs,
  });

  const app = express();
  app.use(cors({ origin: config.corsOrigins }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "healthy",
      service: APP_NAME,
      version: APP_VERSION,
      activeSessions: store.size(),
    });
  });

  app.use(
    "/api/v1",
    createPresentationsRouter({
      catalog,
      drafts,
      renderer,
      maxSlides: config.maxSlides,
      defaultSlides: config.defaultSlides,
    })
  );
  app.use("/api/v1/chat", createChatRouter(sessions));

  app.use(errorMiddleware);
  return app;
}
