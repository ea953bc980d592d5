import crypto from "crypto";
import { describe, expect, it } from "vitest";
import type { Turn } from "../contracts/session";
import { BackendUnavailableError, MalformedDraftError, RenderFailedError } from "../errors";
import { FakeBackend, FakeRenderer, OUTLINE, createTestCatalog } from "../test-utils/fakes";
import { buildDraftSystemPrompt, buildDraftUserPrompt, createDraftService, parseOutline } from "./draftService";

const history: Turn[] = [
  { role: "assistant", text: "Hi there", timestamp: "2026-03-01T09:00:00.000Z" },
  { role: "user", text: "A tracker for field teams", timestamp: "2026-03-01T09:00:05.000Z" },
];

function template() {
  const t = createTestCatalog().get("project_init");
  if (!t) throw new Error("test template missing");
  return t;
}

describe("parseOutline", () => {
  it("extracts the outline from prose and code fences", () => {
    const raw = `Sure! {this is not json} Here you go:\n\`\`\`json\n${JSON.stringify(OUTLINE)}\n\`\`\`\nEnjoy.`;
    expect(parseOutline(raw)).toEqual(OUTLINE);
  });

  it("accepts lenient JSON and drops null optional fields", () => {
    const raw = `{
      title: 'Quarterly Review',
      slides: [
        {type: 'Title', heading: 'Q3', subheading: null, bullets: null,},
        {type: 'summary', heading: 'Wrap-up', bullets: ['Revenue up', '']},
      ],
    }`;
    expect(parseOutline(raw)).toEqual({
      title: "Quarterly Review",
      slides: [
        { type: "title", heading: "Q3" },
        { type: "summary", heading: "Wrap-up", bullets: ["Revenue up"] },
      ],
    });
  });

  it("rejects outlines outside the slide limits and reports a hash of the raw output", () => {
    const raw = JSON.stringify({
      title: "Too long",
      slides: Array.from({ length: 21 }, (_, i) => ({ type: "content", heading: `Slide ${i + 1}` })),
    });

    let caught: unknown;
    try {
      parseOutline(raw);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedDraftError);
    expect(caught).toMatchObject({
      code: "MALFORMED_DRAFT",
      status: 502,
      llmOutputHash: crypto.createHash("sha256").update(raw).digest("hex"),
    });
    expect(caught instanceof Error ? caught.message : "").not.toContain("Too long");
  });
});

describe("draft prompts", () => {
  it("lists the required information in the system prompt", () => {
    const system = buildDraftSystemPrompt(template());
    expect(system).toContain("Template: Project Kick-off");
    expect(system).toContain("- Project goal\n- Timeline");
    expect(system).toContain('"type": "summary"');
  });

  it("omits the required information block when there is none", () => {
    const system = buildDraftSystemPrompt({ name: "General", guidedMode: null });
    expect(system).not.toContain("should cover");
    expect(system).not.toContain("\n\n\n");
  });

  it("renders the conversation as a transcript", () => {
    expect(buildDraftUserPrompt(history)).toContain("Assistant: Hi there\nUser: A tracker for field teams");
  });
});

describe("createDraftService", () => {
  it("asks the backend for JSON and returns the parsed outline", async () => {
    const backend = new FakeBackend();
    const drafts = createDraftService({ backend, renderer: new FakeRenderer(), timeoutMs: 1_000 });

    await expect(drafts.buildDraft(history, template())).resolves.toEqual(OUTLINE);
    expect(backend.completeRequests).toHaveLength(1);
    expect(backend.completeRequests[0]).toMatchObject({ json: true, temperature: 0.15 });
    expect(backend.signals[0]?.aborted).toBe(false);
  });

  it("maps backend errors to BackendUnavailableError", async () => {
    const backend = new FakeBackend();
    const cause = new Error("ECONNREFUSED");
    backend.completion = async () => {
      throw cause;
    };
    const drafts = createDraftService({ backend, renderer: new FakeRenderer(), timeoutMs: 1_000 });

    const err = await drafts.buildDraft(history, template()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendUnavailableError);
    expect(err).toMatchObject({ message: "Language model backend is unavailable: ECONNREFUSED", cause });
  });

  it("wraps renderer failures and passes typed ones through", async () => {
    const renderer = new FakeRenderer();
    const drafts = createDraftService({ backend: new FakeBackend(), renderer, timeoutMs: 1_000 });
    const outline = parseOutline(JSON.stringify(OUTLINE));

    renderer.failWith = new Error("disk full");
    await expect(drafts.buildArtifact(outline)).rejects.toMatchObject({ code: "RENDER_FAILED", reason: "disk full" });

    renderer.failWith = new BackendUnavailableError("renderer", "timed out after 10ms");
    await expect(drafts.buildArtifact(outline)).rejects.toBeInstanceOf(BackendUnavailableError);

    renderer.failWith = null;
    await expect(drafts.buildArtifact(outline)).resolves.toEqual({
      artifactId: "artifact-1",
      filename: "artifact-1.pptx",
    });
  });

  it("builds quick-mode outlines from a prompt", async () => {
    const backend = new FakeBackend();
    const drafts = createDraftService({ backend, renderer: new FakeRenderer(), timeoutMs: 1_000 });

    const outline = await drafts.buildOutlineFromTopic({ system: "sys", user: "About cats", temperature: 0.4 });
    expect(outline.title).toBe(OUTLINE.title);
    expect(backend.completeRequests[0]).toEqual({
      system: "sys",
      history: [{ role: "user", content: "About cats" }],
      temperature: 0.4,
      json: true,
    });
  });
});

describe("RenderFailedError", () => {
  it("keeps the reason out of the user-facing message", () => {
    const err = new RenderFailedError("ENOSPC: /var/output");
    expect(err.message).toBe("Failed to generate the presentation file.");
    expect(err.reason).toBe("ENOSPC: /var/output");
  });
});
