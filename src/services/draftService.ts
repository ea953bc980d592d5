import crypto from "crypto";
import { OutlineSchema, normalizeOutlineCandidate, type Outline } from "../contracts/outline";
import type { Turn } from "../contracts/session";
import type { Template } from "../contracts/templates";
import { BackendUnavailableError, DeckError, MalformedDraftError, RenderFailedError } from "../errors";
import type { ModelBackend } from "../infra/llm";
import type { RenderedArtifact, Renderer } from "../infra/render/pptxRenderer";
import { extractStructuredBlock } from "../utils/jsonParser";
import { trace, traceText, truncate } from "../utils/trace";

const DRAFT_TEMPERATURE = 0.15;

const OUTLINE_FORMAT = `Output JSON in this exact format:
{
  "title": "Presentation Title",
  "slides": [
    {"type": "title", "heading": "Main Title", "subheading": "Subtitle"},
    {"type": "content", "heading": "Section", "bullets": ["Point 1", "Point 2", "Point 3"]},
    {"type": "summary", "heading": "Conclusion", "bullets": ["Key takeaway 1", "Key takeaway 2"]}
  ]
}`;

export function buildDraftSystemPrompt(template: Pick<Template, "name" | "guidedMode">): string {
  const required = template.guidedMode?.requiredInfo ?? [];
  const requiredBlock = required.length
    ? `Information gathered during the conversation should cover:\n${required.map((r) => `- ${r}`).join("\n")}`
    : "";

  return [
    "You are creating a presentation draft based on a conversation.",
    "Use the information gathered to create a structured presentation outline.",
    "",
    `Template: ${template.name}`,
    requiredBlock,
    "",
    OUTLINE_FORMAT,
  ]
    .filter((line, i, lines) => line !== "" || lines[i - 1] !== "")
    .join("\n");
}

export function buildDraftUserPrompt(history: Turn[]): string {
  const transcript = history
    .map((turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.text}`)
    .join("\n");

  return `Based on this conversation, create a presentation draft:

${transcript}

Generate a professional presentation structure with 5-7 slides. Output valid JSON only.`;
}

function acceptOutline(value: unknown): Outline | null {
  const parsed = OutlineSchema.safeParse(normalizeOutlineCandidate(value));
  return parsed.success ? parsed.data : null;
}

/**
 * Turns raw model output into a validated outline. The raw text is only
 * ever written to the trace log; the error carries its hash.
 */
export function parseOutline(raw: string): Outline {
  const outline = extractStructuredBlock(raw, acceptOutline);
  if (outline) return outline;

  const llmOutputHash = crypto.createHash("sha256").update(raw).digest("hex");
  traceText("draft.malformed", raw, { extra: { llmOutputHash } });
  console.error(`Malformed outline from model (sha256=${llmOutputHash}): ${truncate(raw, 300)}`);
  throw new MalformedDraftError("No valid outline JSON block found in model output", { llmOutputHash });
}

export function toBackendError(err: unknown): DeckError {
  if (err instanceof DeckError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new BackendUnavailableError("model", detail, { cause: err });
}

export type DraftServiceDeps = {
  backend: ModelBackend;
  renderer: Renderer;
  timeoutMs: number;
};

export type DraftService = {
  buildDraft(history: Turn[], template: Template, opts?: { signal?: AbortSignal }): Promise<Outline>;
  buildArtifact(outline: Outline, opts?: { signal?: AbortSignal }): Promise<RenderedArtifact>;
  buildOutlineFromTopic(
    prompt: { system: string; user: string; temperature?: number },
    opts?: { signal?: AbortSignal }
  ): Promise<Outline>;
};

export function createDraftService(deps: DraftServiceDeps): DraftService {
  const signalFor = (signal?: AbortSignal) => {
    const timeout = AbortSignal.timeout(deps.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  };

  async function completeOutline(
    request: { system: string; user: string; temperature: number },
    signal?: AbortSignal
  ): Promise<Outline> {
    let raw: string;
    try {
      raw = await deps.backend.complete(
        {
          system: request.system,
          history: [{ role: "user", content: request.user }],
          temperature: request.temperature,
          json: true,
        },
        { signal: signalFor(signal) }
      );
    } catch (err) {
      throw toBackendError(err);
    }
    traceText("draft.llm.raw", raw);
    return parseOutline(raw);
  }

  return {
    async buildDraft(history, template, opts) {
      const outline = await completeOutline(
        {
          system: buildDraftSystemPrompt(template),
          user: buildDraftUserPrompt(history),
          temperature: DRAFT_TEMPERATURE,
        },
        opts?.signal
      );
      trace("draft.built", { slides: outline.slides.length, template: template.key });
      return outline;
    },

    async buildOutlineFromTopic(prompt, opts) {
      return completeOutline(
        { system: prompt.system, user: prompt.user, temperature: prompt.temperature ?? DRAFT_TEMPERATURE },
        opts?.signal
      );
    },

    async buildArtifact(outline, opts) {
      try {
        const artifact = await deps.renderer.render(outline, opts);
        trace("render.done", { artifactId: artifact.artifactId, slides: outline.slides.length });
        return artifact;
      } catch (err) {
        if (err instanceof DeckError) throw err;
        const reason = err instanceof Error ? err.message : String(err);
        console.error("Render failed:", reason);
        throw new RenderFailedError(reason, { cause: err });
      }
    },
  };
}
