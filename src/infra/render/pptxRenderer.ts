import crypto from "crypto";
import fs from "fs";
import path from "path";
import PptxGenJS from "pptxgenjs";
import type { Outline, SlideSpec } from "../../contracts/outline";
import { BackendUnavailableError } from "../../errors";

export type RenderedArtifact = { artifactId: string; filename: string };

export interface Renderer {
  render(outline: Outline, opts?: { signal?: AbortSignal }): Promise<RenderedArtifact>;
  /** Absolute path of a rendered deck, or null when the id is unknown. */
  resolve(artifactId: string): Promise<string | null>;
}

const THEME = {
  primary: "1E40AF",
  secondary: "3B82F6",
  textDark: "1F2937",
  textLight: "FFFFFF",
  accent: "06B6D4",
} as const;

const SLIDE_WIDTH = 13.333;
const ARTIFACT_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type Slide = ReturnType<PptxGenJS["addSlide"]>;

function addHeaderBar(slide: Slide, heading: string): void {
  slide.addShape("rect", {
    x: 0,
    y: 0,
    w: SLIDE_WIDTH,
    h: 1.2,
    fill: { color: THEME.primary },
    line: { color: THEME.primary, width: 0 },
  });
  slide.addText(heading, {
    x: 0.5,
    y: 0.3,
    w: 12.333,
    h: 0.7,
    fontSize: 32,
    bold: true,
    color: THEME.textLight,
    fit: "shrink",
  });
}

function addBullets(slide: Slide, bullets: string[], y: number, h: number, bulletColor: string): void {
  if (bullets.length === 0) return;
  slide.addText(
    bullets.map((text) => ({
      text,
      options: { bullet: { characterCode: "25CF" }, breakLine: true, paraSpaceBefore: 12, paraSpaceAfter: 6 },
    })),
    { x: 0.75, y, w: 11.833, h, fontSize: 22, color: bulletColor, valign: "top", fit: "shrink" }
  );
}

function addTitleSlide(pptx: PptxGenJS, spec: SlideSpec): void {
  const slide = pptx.addSlide();
  slide.addShape("rect", {
    x: 0,
    y: 0,
    w: SLIDE_WIDTH,
    h: 2.5,
    fill: { color: THEME.primary },
    line: { color: THEME.primary, width: 0 },
  });
  slide.addText(spec.heading, {
    x: 0.5,
    y: 0.8,
    w: 12.333,
    h: 1.2,
    fontSize: 44,
    bold: true,
    color: THEME.textLight,
    fit: "shrink",
  });
  if (spec.subheading) {
    slide.addText(spec.subheading, {
      x: 0.5,
      y: 2.0,
      w: 12.333,
      h: 0.5,
      fontSize: 24,
      color: THEME.textLight,
    });
  }
}

function addContentSlide(pptx: PptxGenJS, spec: SlideSpec): void {
  const slide = pptx.addSlide();
  addHeaderBar(slide, spec.heading);
  let bodyTop = 1.6;
  if (spec.subheading) {
    slide.addText(spec.subheading, {
      x: 0.75,
      y: 1.4,
      w: 11.833,
      h: 0.4,
      fontSize: 18,
      italic: true,
      color: THEME.secondary,
    });
    bodyTop = 1.9;
  }
  addBullets(slide, spec.bullets ?? [], bodyTop, 7.0 - bodyTop, THEME.textDark);
}

function addSummarySlide(pptx: PptxGenJS, spec: SlideSpec): void {
  const slide = pptx.addSlide();
  addHeaderBar(slide, spec.heading);
  slide.addShape("rect", {
    x: 0,
    y: 1.2,
    w: SLIDE_WIDTH,
    h: 0.06,
    fill: { color: THEME.accent },
    line: { color: THEME.accent, width: 0 },
  });
  addBullets(slide, spec.bullets ?? [], 1.6, 5.4, THEME.textDark);
}

export function buildDeck(outline: Outline): PptxGenJS {
  const pptx = new PptxGenJS();
  pptx.layout = "LAYOUT_WIDE";
  pptx.title = outline.title;
  pptx.subject = outline.title;

  for (const spec of outline.slides) {
    switch (spec.type) {
      case "title":
        addTitleSlide(pptx, spec);
        break;
      case "summary":
        addSummarySlide(pptx, spec);
        break;
      case "content":
        addContentSlide(pptx, spec);
        break;
    }
  }
  return pptx;
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(signal?.reason ?? new Error("Render aborted"));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new BackendUnavailableError("renderer", `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

/**
 * Writes each outline to `<outputDir>/<artifactId>.pptx`.
 */
export function createPptxRenderer(opts: { outputDir: string; timeoutMs: number }): Renderer {
  const fileFor = (artifactId: string) => path.join(opts.outputDir, `${artifactId}.pptx`);

  return {
    async render(outline, renderOpts) {
      const artifactId = crypto.randomUUID();
      const filename = `${artifactId}.pptx`;

      const data = await withTimeout(
        buildDeck(outline).write({ outputType: "nodebuffer" }),
        opts.timeoutMs,
        renderOpts?.signal
      );
      if (!(data instanceof Uint8Array)) {
        throw new Error("pptxgenjs did not return a binary buffer");
      }

      await fs.promises.mkdir(opts.outputDir, { recursive: true });
      await fs.promises.writeFile(fileFor(artifactId), data);
      return { artifactId, filename };
    },

    async resolve(artifactId) {
      if (!ARTIFACT_ID.test(artifactId)) return null;
      const file = fileFor(artifactId);
      try {
        const stat = await fs.promises.stat(file);
        return stat.isFile() ? file : null;
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
        throw err;
      }
    },
  };
}
