import { Router } from "express";
import { z } from "zod";
import { ArtifactNotFoundError } from "../errors";
import type { Renderer } from "../infra/render/pptxRenderer";
import type { DraftService } from "../services/draftService";
import { generatePresentation } from "../services/presentationService";
import type { TemplateCatalog } from "../templates/catalog";
import { sendError, validationError } from "./errors";

const GenerateBodySchema = z.object({
  topic: z.string().trim().min(1).max(500),
  language: z.string().trim().min(2).max(10).optional(),
  slides: z.number().int().min(1).max(20).optional(),
  template: z.string().trim().min(1).max(100).optional(),
});

export type PresentationsRouterDeps = {
  catalog: TemplateCatalog;
  drafts: DraftService;
  renderer: Renderer;
  maxSlides: number;
  defaultSlides: number;
};

export function createPresentationsRouter(deps: PresentationsRouterDeps): Router {
  const router = Router();

  router.get("/templates", (_req, res) => {
    res.status(200).json({ templates: deps.catalog.list() });
  });

  router.get("/templates/defaults", (_req, res) => {
    res.status(200).json(deps.catalog.defaults());
  });

  // Quick mode: topic in, deck out.
  router.post("/generate", async (req, res) => {
    const parsed = GenerateBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendError(res, validationError(parsed.error), "POST /generate");
    try {
      const result = await generatePresentation(deps, parsed.data);
      res.status(200).json({
        success: true,
        fileId: result.artifactId,
        downloadUrl: `/api/v1/download/${result.artifactId}`,
        preview: result.outline,
      });
    } catch (err) {
      sendError(res, err, "POST /generate");
    }
  });

  router.get("/download/:fileId", async (req, res) => {
    const fileId = req.params.fileId;
    try {
      const file = await deps.renderer.resolve(fileId);
      if (!file) return sendError(res, new ArtifactNotFoundError(fileId), "GET /download/:fileId");
      res.download(file, `presentation-${fileId}.pptx`, (err) => {
        if (err && !res.headersSent) sendError(res, err, "GET /download/:fileId");
      });
    } catch (err) {
      sendError(res, err, "GET /download/:fileId");
    }
  });

  return router;
}
