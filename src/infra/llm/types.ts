import type { TurnRole } from "../../contracts/session";

export type ChatTurn = { role: TurnRole; content: string };

export type CompletionRequest = {
  system: string;
  history: ChatTurn[];
  temperature?: number;
  maxTokens?: number;
  // Ask the backend for a single JSON object where it supports that.
  json?: boolean;
};

export type CallOptions = { signal?: AbortSignal };

/**
 * What the service needs from a language model. Adapters hide the SDK;
 * errors are thrown as the SDK raises them and mapped by the caller.
 */
export interface ModelBackend {
  readonly name: string;
  streamComplete(request: CompletionRequest, opts?: CallOptions): AsyncIterable<string>;
  complete(request: CompletionRequest, opts?: CallOptions): Promise<string>;
}
