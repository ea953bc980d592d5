import fs from "fs";
import {
  TemplatesFileSchema,
  type Template,
  type TemplateData,
  type TemplateDefaults,
  type TemplatesFile,
  type TemplateSummary,
} from "../contracts/templates";
import { TemplateNotFoundError, GuidedModeUnsupportedError } from "../errors";

export type TemplateCatalog = {
  defaults(): TemplateDefaults;
  list(): TemplateSummary[];
  get(key: string): Template | null;
  /** Template with guided mode enabled, or a typed error explaining why not. */
  requireGuided(key: string): Template & { guidedMode: NonNullable<Template["guidedMode"]> };
  presentationPrompt(args: { topic: string; language: string; slides: number; templateKey: string }): string;
};

function toTemplate(key: string, data: TemplateData): Template {
  return {
    key,
    name: data.name ?? key,
    description: data.description,
    systemPrompt: data.systemPrompt.trim(),
    presentationPrompt: data.presentationPrompt.trim(),
    guidedMode: data.guidedMode?.enabled
      ? {
          ...data.guidedMode,
          greeting: data.guidedMode.greeting.trim(),
          conversationSystemPrompt: data.guidedMode.conversationSystemPrompt.trim(),
        }
      : null,
  };
}

function fallbackPresentationPrompt(topic: string, language: string, slides: number): string {
  return `Generate a professional presentation outline in ${language} about: "${topic}"

Return ONLY valid JSON with exactly ${slides} slides:
{
  "title": "Presentation title",
  "slides": [
    {"type": "title|content|summary", "heading": "...", "subheading": "...", "bullets": ["..."]}
  ]
}

Slide 1: title slide
Slides 2-${Math.max(2, slides - 1)}: content slides
Slide ${slides}: summary slide`;
}

const PLACEHOLDER = /\{(topic|language|slides|slidesMinus1)\}/g;

export function createTemplateCatalog(file: TemplatesFile): TemplateCatalog {
  const templates = new Map<string, Template>();
  for (const [key, data] of Object.entries(file.templates)) {
    templates.set(key, toTemplate(key, data));
  }

  const get = (key: string): Template | null => templates.get(key) ?? null;

  return {
    defaults: () => ({ ...file.defaults }),

    list: () =>
      [...templates.values()].map((t) => ({
        key: t.key,
        name: t.name,
        description: t.description,
        guidedModeEnabled: t.guidedMode !== null,
      })),

    get,

    requireGuided(key) {
      const template = get(key);
      if (!template) throw new TemplateNotFoundError(key);
      const guidedMode = template.guidedMode;
      if (!guidedMode) throw new GuidedModeUnsupportedError(key);
      return { ...template, guidedMode };
    },

    presentationPrompt({ topic, language, slides, templateKey }) {
      const template = get(templateKey) ?? get(file.defaults.template);
      const raw = template?.presentationPrompt ?? "";
      if (!raw) return fallbackPresentationPrompt(topic, language, slides);

      const values: Record<string, string> = {
        topic,
        language,
        slides: String(slides),
        slidesMinus1: String(Math.max(1, slides - 1)),
      };
      return raw.replace(PLACEHOLDER, (_match, name: string) => values[name] ?? "");
    },
  };
}

export function loadTemplateCatalog(filePath: string): TemplateCatalog {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new Error(`Templates file not found: ${filePath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Templates file is not valid JSON: ${filePath}`, { cause: err });
  }

  const parsed = TemplatesFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid templates file ${filePath}: ${issue?.path.join(".")}: ${issue?.message ?? "invalid"}`);
  }
  return createTemplateCatalog(parsed.data);
}
