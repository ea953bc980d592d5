import { TemplatesFileSchema } from "../contracts/templates";
import type { CallOptions, CompletionRequest, ModelBackend } from "../infra/llm";
import type { RenderedArtifact, Renderer } from "../infra/render/pptxRenderer";
import { createTemplateCatalog, type TemplateCatalog } from "../templates/catalog";

export const READY_MARKER = "[READY_FOR_DRAFT]";

export const OUTLINE = {
  title: "Team Tracker Kick-off",
  slides: [
    { type: "title", heading: "Team Tracker", subheading: "Project kick-off" },
    { type: "content", heading: "Goals", bullets: ["Ship the MVP", "Onboard two teams"] },
    { type: "summary", heading: "Next steps", bullets: ["Staff the team"] },
  ],
} as const;

// Prose and a fence around the JSON, the way chat models tend to answer.
export const OUTLINE_REPLY = `Here is the outline:\n\`\`\`json\n${JSON.stringify(OUTLINE, null, 2)}\n\`\`\`\nLet me know!`;

export function createTestCatalog(): TemplateCatalog {
  return createTemplateCatalog(
    TemplatesFileSchema.parse({
      defaults: { template: "general", slides: 3, language: "en", temperature: 0.2 },
      templates: {
        general: {
          name: "General",
          systemPrompt: "You design presentations.",
          presentationPrompt: "Outline about {topic} in {language} with {slides} slides.",
        },
        project_init: {
          name: "Project Kick-off",
          systemPrompt: "You are a project manager.",
          guidedMode: {
            enabled: true,
            greeting: "Hi there",
            requiredInfo: ["Project goal", "Timeline"],
            conversationSystemPrompt: "Ask one question at a time.",
          },
        },
      },
    })
  );
}

type Reply = string[] | Promise<string[]>;

/**
 * Scriptable model backend. `reply` decides the streamed parts per request;
 * `streamError` is thrown after the last part; `completion` answers
 * non-streamed calls.
 */
export class FakeBackend implements ModelBackend {
  readonly name = "fake";
  readonly streamRequests: CompletionRequest[] = [];
  readonly completeRequests: CompletionRequest[] = [];
  readonly signals: AbortSignal[] = [];

  reply: (request: CompletionRequest) => Reply = () => ["Tell me more."];
  streamError: Error | null = null;
  completion: (request: CompletionRequest) => Promise<string> = async () => OUTLINE_REPLY;

  async *streamComplete(request: CompletionRequest, opts?: CallOptions): AsyncIterable<string> {
    this.streamRequests.push(request);
    if (opts?.signal) this.signals.push(opts.signal);

    const parts = await this.reply(request);
    for (const part of parts) {
      await Promise.resolve();
      if (opts?.signal?.aborted) throw new Error("request aborted");
      yield part;
    }
    if (this.streamError) throw this.streamError;
  }

  async complete(request: CompletionRequest, opts?: CallOptions): Promise<string> {
    this.completeRequests.push(request);
    if (opts?.signal) this.signals.push(opts.signal);
    return this.completion(request);
  }
}

export class FakeRenderer implements Renderer {
  readonly rendered: unknown[] = [];
  failWith: Error | null = null;
  files = new Map<string, string>();
  private counter = 0;

  async render(outline: unknown): Promise<RenderedArtifact> {
    if (this.failWith) throw this.failWith;
    this.rendered.push(outline);
    this.counter += 1;
    const artifactId = `artifact-${this.counter}`;
    return { artifactId, filename: `${artifactId}.pptx` };
  }

  async resolve(artifactId: string): Promise<string | null> {
    return this.files.get(artifactId) ?? null;
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

// Lets every pending promise callback run.
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
