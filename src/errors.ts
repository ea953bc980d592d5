export type DeckErrorCode =
  | "SESSION_NOT_FOUND"
  | "INVALID_STATE"
  | "DRAFT_NOT_READY"
  | "NO_DRAFT"
  | "MALFORMED_DRAFT"
  | "BACKEND_UNAVAILABLE"
  | "RENDER_FAILED"
  | "TEMPLATE_NOT_FOUND"
  | "ARTIFACT_NOT_FOUND"
  | "GUIDED_MODE_NOT_SUPPORTED"
  | "VALIDATION_ERROR";

/**
 * Base class for every error the service raises on purpose.
 * `status` is the HTTP status the routes answer with; `retryable` marks
 * transient failures the caller may simply repeat.
 */
export class DeckError extends Error {
  readonly code: DeckErrorCode;
  readonly status: number;
  readonly retryable: boolean;

  constructor(code: DeckErrorCode, status: number, message: string, opts?: { retryable?: boolean; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "DeckError";
    this.code = code;
    this.status = status;
    this.retryable = opts?.retryable ?? false;
  }
}

export class SessionNotFoundError extends DeckError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", 404, `Session '${sessionId}' not found or expired`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class InvalidStateError extends DeckError {
  readonly state: string;
  readonly expected: readonly string[];

  constructor(state: string, expected: readonly string[], action: string) {
    super("INVALID_STATE", 409, `Cannot ${action} when session state is ${state}. Expected ${expected.join(" or ")}.`);
    this.name = "InvalidStateError";
    this.state = state;
    this.expected = expected;
  }
}

export class DraftNotReadyError extends DeckError {
  constructor() {
    super("DRAFT_NOT_READY", 409, "Not enough information gathered yet. Keep the conversation going before creating a draft.");
    this.name = "DraftNotReadyError";
  }
}

export class NoDraftError extends DeckError {
  constructor() {
    super("NO_DRAFT", 409, "No draft available. Create a draft first.");
    this.name = "NoDraftError";
  }
}

export class MalformedDraftError extends DeckError {
  // Hash of the raw model output; the output itself only goes to the trace log.
  readonly llmOutputHash: string | undefined;
  readonly reason: string;

  constructor(reason: string, opts?: { llmOutputHash?: string }) {
    super("MALFORMED_DRAFT", 502, "The model did not return a usable presentation outline. Please try again.");
    this.name = "MalformedDraftError";
    this.reason = reason;
    this.llmOutputHash = opts?.llmOutputHash;
  }
}

export class BackendUnavailableError extends DeckError {
  readonly backend: "model" | "renderer";

  constructor(backend: "model" | "renderer", detail: string, opts?: { cause?: unknown }) {
    super(
      "BACKEND_UNAVAILABLE",
      503,
      backend === "model"
        ? `Language model backend is unavailable: ${detail}`
        : `Renderer is unavailable: ${detail}`,
      { retryable: true, cause: opts?.cause }
    );
    this.name = "BackendUnavailableError";
    this.backend = backend;
  }
}

export class RenderFailedError extends DeckError {
  readonly reason: string;

  constructor(reason: string, opts?: { cause?: unknown }) {
    super("RENDER_FAILED", 500, "Failed to generate the presentation file.", { cause: opts?.cause });
    this.name = "RenderFailedError";
    this.reason = reason;
  }
}

export class TemplateNotFoundError extends DeckError {
  constructor(templateKey: string) {
    super("TEMPLATE_NOT_FOUND", 404, `Template '${templateKey}' not found`);
    this.name = "TemplateNotFoundError";
  }
}

export class ArtifactNotFoundError extends DeckError {
  constructor(artifactId: string) {
    super("ARTIFACT_NOT_FOUND", 404, `Presentation '${artifactId}' not found`);
    this.name = "ArtifactNotFoundError";
  }
}

export class GuidedModeUnsupportedError extends DeckError {
  constructor(templateKey: string) {
    super("GUIDED_MODE_NOT_SUPPORTED", 400, `Template '${templateKey}' does not support guided mode`);
    this.name = "GuidedModeUnsupportedError";
  }
}

export class ValidationError extends DeckError {
  constructor(message: string) {
    super("VALIDATION_ERROR", 400, message);
    this.name = "ValidationError";
  }
}

export function isDeckError(err: unknown): err is DeckError {
  return err instanceof DeckError;
}
