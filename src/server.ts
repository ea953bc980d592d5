import dotenv from "dotenv";
import { createApp } from "./app";
import { APP_NAME, APP_VERSION, loadConfig } from "./config";
import { createModelBackend } from "./infra/llm";
import { createPptxRenderer } from "./infra/render/pptxRenderer";
import { SessionStore } from "./sessions/sessionStore";
import { loadTemplateCatalog } from "./templates/catalog";

dotenv.config();

function main(): void {
  const config = loadConfig();
  const catalog = loadTemplateCatalog(config.templatesPath);
  const backend = createModelBackend(config.llm);
  const renderer = createPptxRenderer({ outputDir: config.render.outputDir, timeoutMs: config.render.timeoutMs });

  const store = new SessionStore({
    idleTimeoutMs: config.sessions.idleTimeoutMs,
    maxHistory: config.sessions.maxHistory,
  });
  store.startSweeper(config.sessions.sweepIntervalMs);

  const app = createApp({ config, catalog, backend, renderer, store });
  const server = app.listen(config.port, () => {
    console.log(`${APP_NAME} ${APP_VERSION} listening on port ${config.port} (model: ${backend.name})`);
  });

  const shutdown = () => {
    store.stopSweeper();
    server.close();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  console.error("Failed to start server:", err instanceof Error ? err.message : err);
  process.exit(1);
}
