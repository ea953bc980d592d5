import { z } from "zod";

export const SlideTypeSchema = z.enum(["title", "content", "summary"]);
export type SlideType = z.infer<typeof SlideTypeSchema>;

// Same limits the renderer enforces; a draft outside them is rejected before
// it is ever stored on a session.
export const SlideSpecSchema = z.object({
  type: SlideTypeSchema,
  heading: z.string().trim().min(1).max(200),
  subheading: z.string().trim().max(300).optional(),
  bullets: z.array(z.string().trim().min(1).max(500)).max(10).optional(),
});
export type SlideSpec = z.infer<typeof SlideSpecSchema>;

export const OutlineSchema = z.object({
  title: z.string().trim().min(1).max(200),
  slides: z.array(SlideSpecSchema).min(1).max(20),
});
export type Outline = z.infer<typeof OutlineSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Models like to send `null` for optional fields and empty subheadings.
 * Drop those before validation so they do not fail the schema.
 */
export function normalizeOutlineCandidate(value: unknown): unknown {
  if (!isRecord(value)) return value;
  const slides = value.slides;
  if (!Array.isArray(slides)) return value;

  return {
    ...value,
    slides: slides.map((slide: unknown) => {
      if (!isRecord(slide)) return slide;
      const next: Record<string, unknown> = { ...slide };
      if (typeof next.type === "string") next.type = next.type.trim().toLowerCase();
      if (next.subheading === null || (typeof next.subheading === "string" && !next.subheading.trim())) {
        delete next.subheading;
      }
      if (next.bullets === null) delete next.bullets;
      if (Array.isArray(next.bullets)) {
        next.bullets = next.bullets.filter((b: unknown) => typeof b !== "string" || b.trim().length > 0);
      }
      return next;
    }),
  };
}
