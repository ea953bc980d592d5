import { z } from "zod";

export const GuidedModeSchema = z.object({
  enabled: z.boolean().default(false),
  greeting: z.string().default(""),
  requiredInfo: z.array(z.string().trim().min(1)).default([]),
  conversationSystemPrompt: z.string().default(""),
});
export type GuidedMode = z.infer<typeof GuidedModeSchema>;

export const TemplateSchema = z.object({
  name: z.string().trim().min(1).optional(),
  description: z.string().default(""),
  systemPrompt: z.string().default(""),
  presentationPrompt: z.string().default(""),
  guidedMode: GuidedModeSchema.optional(),
});
export type TemplateData = z.infer<typeof TemplateSchema>;

export const TemplateDefaultsSchema = z.object({
  temperature: z.number().min(0).max(2).default(0.15),
  slides: z.number().int().min(1).max(20).default(5),
  language: z.string().min(1).max(10).default("en"),
  template: z.string().min(1).default("general"),
});
export type TemplateDefaults = z.infer<typeof TemplateDefaultsSchema>;

export const TemplatesFileSchema = z.object({
  defaults: TemplateDefaultsSchema.default({}),
  templates: z.record(z.string(), TemplateSchema).default({}),
});
export type TemplatesFile = z.infer<typeof TemplatesFileSchema>;

export type Template = {
  key: string;
  name: string;
  description: string;
  systemPrompt: string;
  presentationPrompt: string;
  guidedMode: GuidedMode | null;
};

export type TemplateSummary = {
  key: string;
  name: string;
  description: string;
  guidedModeEnabled: boolean;
};
