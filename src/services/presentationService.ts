import type { Outline } from "../contracts/outline";
import { TemplateNotFoundError, ValidationError } from "../errors";
import type { TemplateCatalog } from "../templates/catalog";
import { trace } from "../utils/trace";
import type { DraftService } from "./draftService";

export type QuickGenerateInput = {
  topic: string;
  language?: string;
  slides?: number;
  template?: string;
};

export type QuickGenerateResult = { artifactId: string; filename: string; outline: Outline };

/**
 * One-shot generation: topic in, rendered deck out. No session involved.
 */
export async function generatePresentation(
  deps: { catalog: TemplateCatalog; drafts: DraftService; maxSlides: number; defaultSlides: number },
  input: QuickGenerateInput,
  opts?: { signal?: AbortSignal }
): Promise<QuickGenerateResult> {
  const defaults = deps.catalog.defaults();
  const topic = input.topic.trim();
  if (!topic) throw new ValidationError("topic must not be empty.");

  const slides = input.slides ?? deps.defaultSlides;
  if (slides < 1 || slides > deps.maxSlides) {
    throw new ValidationError(`slides must be between 1 and ${deps.maxSlides}.`);
  }

  const templateKey = input.template ?? defaults.template;
  const template = deps.catalog.get(templateKey);
  if (!template) throw new TemplateNotFoundError(templateKey);

  const language = input.language ?? defaults.language;
  const user = deps.catalog.presentationPrompt({ topic, language, slides, templateKey: template.key });

  trace("quick.start", { template: template.key, slides, language });
  const outline = await deps.drafts.buildOutlineFromTopic(
    { system: template.systemPrompt, user, temperature: defaults.temperature },
    opts
  );
  const artifact = await deps.drafts.buildArtifact(outline, opts);
  return { ...artifact, outline };
}
