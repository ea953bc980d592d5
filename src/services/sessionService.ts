import type { Outline } from "../contracts/outline";
import {
  DRAFT_STATES,
  MESSAGE_STATES,
  canTransition,
  type Session,
  type SessionState,
  type Turn,
  type TurnRole,
} from "../contracts/session";
import { DraftNotReadyError, InvalidStateError, NoDraftError, ValidationError } from "../errors";
import type { ModelBackend } from "../infra/llm";
import type { SessionStore } from "../sessions/sessionStore";
import { filterMarkerStream } from "../streaming/markerFilter";
import type { Template } from "../contracts/templates";
import type { TemplateCatalog } from "../templates/catalog";
import { logConversationMessage } from "../utils/devLogs";
import { trace, traceText } from "../utils/trace";
import { withTraceContext } from "../utils/traceContext";
import { toBackendError, type DraftService } from "./draftService";

const DEFAULT_GREETING = "Hello! I'll help you create a presentation. Tell me about your idea.";

export type SessionServiceDeps = {
  store: SessionStore;
  catalog: TemplateCatalog;
  backend: ModelBackend;
  drafts: DraftService;
  readyMarker: string;
  // Upper bound for one streamed reply.
  timeoutMs: number;
  now?: () => Date;
};

export type MessageEvent = {
  fragment: string;
  done: boolean;
  readyForDraft: boolean;
};

export type StartResult = { sessionId: string; greetingText: string };

export type GenerateResult = { artifactId: string; filename: string; outline: Outline };

export type SessionInfo = {
  sessionId: string;
  templateKey: string;
  state: SessionState;
  messageCount: number;
  isReadyForDraft: boolean;
  hasDraft: boolean;
  artifactId: string | null;
  createdAt: string;
  lastActivity: string;
};

export type GuidedSessionService = {
  start(templateKey: string): Promise<StartResult>;
  sendMessage(sessionId: string, text: string, opts?: { signal?: AbortSignal }): AsyncGenerator<MessageEvent, void, undefined>;
  createDraft(sessionId: string, opts?: { signal?: AbortSignal }): Promise<Outline>;
  generate(sessionId: string, opts?: { signal?: AbortSignal }): Promise<GenerateResult>;
  getSessionInfo(sessionId: string): SessionInfo;
  deleteSession(sessionId: string): Promise<boolean>;
};

function transitionOrThrow(from: SessionState, to: SessionState): SessionState {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(from, [to], `move to ${to}`);
  }
  return to;
}

/**
 * System prompt for one conversation turn: the template's own instructions,
 * the facts a draft needs, and the exact marker that signals readiness.
 */
export function buildConversationSystemPrompt(
  template: Template & { guidedMode: NonNullable<Template["guidedMode"]> },
  readyMarker: string
): string {
  const parts = [template.guidedMode.conversationSystemPrompt || template.systemPrompt];
  const required = template.guidedMode.requiredInfo;
  if (required.length > 0) {
    parts.push(`Information needed before drafting:\n${required.map((item) => `- ${item}`).join("\n")}`);
  }
  parts.push(
    `When you have gathered all necessary information, end your response with exactly this phrase on its own line:\n${readyMarker}`
  );
  return parts.filter(Boolean).join("\n\n");
}

function isReady(state: SessionState): boolean {
  return DRAFT_STATES.includes(state);
}

export function toSessionInfo(session: Session): SessionInfo {
  return {
    sessionId: session.id,
    templateKey: session.templateKey,
    state: session.state,
    messageCount: session.history.length,
    isReadyForDraft: isReady(session.state),
    hasDraft: session.draft !== null,
    artifactId: session.artifactId,
    createdAt: session.createdAt,
    lastActivity: session.lastActivity,
  };
}

export function createGuidedSessionService(deps: SessionServiceDeps): GuidedSessionService {
  const now = deps.now ?? (() => new Date());
  const turn = (role: TurnRole, text: string): Turn => ({ role, text, timestamp: now().toISOString() });

  async function start(templateKey: string): Promise<StartResult> {
    const template = deps.catalog.requireGuided(templateKey);
    const greetingText = template.guidedMode.greeting || DEFAULT_GREETING;

    const sessionId = deps.store.create(template.key);
    return withTraceContext({ sessionId, operation: "start" }, async () => {
      await deps.store.mutate(sessionId, (session) => ({
        session: { ...session, history: [...session.history, turn("assistant", greetingText)] },
        result: undefined,
      }));
      logConversationMessage({ sessionId, role: "assistant", content: greetingText });
      trace("chat.started", { template: template.key });
      return { sessionId, greetingText };
    });
  }

  /**
   * Streams the model's reply with the ready marker removed. The session
   * stays leased until the stream ends: the user and assistant turns are
   * committed together on success, only the user turn when the caller
   * cancels, and nothing at all when the backend fails.
   */
  async function* sendMessage(
    sessionId: string,
    text: string,
    opts?: { signal?: AbortSignal }
  ): AsyncGenerator<MessageEvent, void, undefined> {
    const message = text.trim();
    if (!message) throw new ValidationError("Message must not be empty.");

    const lease = await deps.store.lease(sessionId);
    const session = lease.session;
    const history = [...session.history, turn("user", message)];
    const controller = new AbortController();
    let streaming = false;
    let finished = false;

    try {
      if (!MESSAGE_STATES.includes(session.state)) {
        throw new InvalidStateError(session.state, MESSAGE_STATES, "send a message");
      }
      const template = deps.catalog.requireGuided(session.templateKey);
      logConversationMessage({ sessionId, role: "user", content: message });

      const signals = [controller.signal, AbortSignal.timeout(deps.timeoutMs)];
      if (opts?.signal) signals.push(opts.signal);
      const source = deps.backend.streamComplete(
        {
          system: buildConversationSystemPrompt(template, deps.readyMarker),
          history: history.map((t) => ({ role: t.role, content: t.text })),
        },
        { signal: AbortSignal.any(signals) }
      );

      const wasReady = isReady(session.state);
      streaming = true;
      for await (const event of filterMarkerStream(source, deps.readyMarker)) {
        if (event.type === "fragment") {
          yield { fragment: event.text, done: false, readyForDraft: wasReady };
          continue;
        }
        if (opts?.signal?.aborted) return;

        const reply = event.text.trim();
        const state =
          event.markerSeen && session.state === "COLLECTING"
            ? transitionOrThrow(session.state, "READY_FOR_DRAFT")
            : session.state;
        lease.commit({ ...session, state, history: [...history, turn("assistant", reply)] });
        finished = true;

        logConversationMessage({ sessionId, role: "assistant", content: reply });
        traceText("chat.reply", reply, {
          extra: { sessionId, operation: "sendMessage", markerSeen: event.markerSeen, state },
        });
        yield { fragment: event.tail, done: true, readyForDraft: isReady(state) };
      }
    } catch (err) {
      if (streaming && !finished && opts?.signal?.aborted) {
        // Caller went away; the finally block keeps the user turn.
        return;
      }
      if (streaming && !finished) {
        streaming = false;
        const mapped = toBackendError(err);
        console.error(`Model stream failed for session ${sessionId}:`, mapped.message);
        throw mapped;
      }
      throw err;
    } finally {
      controller.abort();
      if (streaming && !finished) {
        lease.commit({ ...session, history });
        trace("chat.cancelled", { sessionId, operation: "sendMessage" });
      }
      lease.release();
    }
  }

  async function createDraft(sessionId: string, opts?: { signal?: AbortSignal }): Promise<Outline> {
    return withTraceContext({ sessionId, operation: "createDraft" }, () =>
      deps.store.mutate(sessionId, async (session) => {
        if (session.state === "COLLECTING") throw new DraftNotReadyError();
        if (!DRAFT_STATES.includes(session.state)) {
          throw new InvalidStateError(session.state, DRAFT_STATES, "create a draft");
        }
        const template = deps.catalog.requireGuided(session.templateKey);

        const outline = await deps.drafts.buildDraft(session.history, template, opts);
        const state = transitionOrThrow(session.state, "DRAFT_CREATED");
        trace("chat.draft", { slides: outline.slides.length, regenerated: session.draft !== null });
        return { session: { ...session, state, draft: outline }, result: outline };
      })
    );
  }

  async function generate(sessionId: string, opts?: { signal?: AbortSignal }): Promise<GenerateResult> {
    return withTraceContext({ sessionId, operation: "generate" }, () =>
      deps.store.mutate(sessionId, async (session) => {
        const draft = session.draft;
        if (session.state !== "DRAFT_CREATED" || !draft) throw new NoDraftError();

        const artifact = await deps.drafts.buildArtifact(draft, opts);
        const state = transitionOrThrow(session.state, "COMPLETED");
        trace("chat.generated", { artifactId: artifact.artifactId });
        return {
          session: { ...session, state, artifactId: artifact.artifactId },
          result: { ...artifact, outline: draft },
        };
      })
    );
  }

  return {
    start,
    sendMessage,
    createDraft,
    generate,
    getSessionInfo: (sessionId) => toSessionInfo(deps.store.get(sessionId)),
    deleteSession: (sessionId) => deps.store.delete(sessionId),
  };
}
