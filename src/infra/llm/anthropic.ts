import Anthropic from "@anthropic-ai/sdk";
import type { CallOptions, ChatTurn, CompletionRequest, ModelBackend } from "./types";

export type AnthropicBackendOptions = {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
};

/**
 * Messages must open with a user turn, so assistant turns before the first
 * user turn (the greeting) move into the system prompt.
 */
export function toAnthropicMessages(
  system: string,
  history: ChatTurn[]
): { system: string; messages: Anthropic.MessageParam[] } {
  const firstUser = history.findIndex((t) => t.role === "user");
  const leading = firstUser < 0 ? history : history.slice(0, firstUser);
  const rest = firstUser < 0 ? [] : history.slice(firstUser);

  const preamble = leading.map((t) => `You already said to the user: ${t.content}`).join("\n");
  return {
    system: preamble ? `${system}\n\n${preamble}` : system,
    messages: rest.map((t) => ({ role: t.role, content: t.content })),
  };
}

export function createAnthropicBackend(opts: AnthropicBackendOptions, client?: Anthropic): ModelBackend {
  if (!client && !opts.apiKey) {
    throw new Error("ANTHROPIC_API_KEY is not set in the environment.");
  }
  const anthropic =
    client ??
    new Anthropic({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs,
      maxRetries: opts.maxRetries,
    });

  const params = (request: CompletionRequest) => {
    const { system, messages } = toAnthropicMessages(request.system, request.history);
    return {
      model: opts.model,
      max_tokens: request.maxTokens ?? opts.maxTokens,
      temperature: request.temperature ?? opts.temperature,
      system,
      messages,
    };
  };

  return {
    name: `anthropic:${opts.model}`,

    async *streamComplete(request: CompletionRequest, callOpts?: CallOptions): AsyncIterable<string> {
      const stream = await anthropic.messages.create({ ...params(request), stream: true }, { signal: callOpts?.signal });
      for await (const event of stream) {
        if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
          yield event.delta.text;
        }
      }
    },

    async complete(request: CompletionRequest, callOpts?: CallOptions): Promise<string> {
      const message = await anthropic.messages.create(params(request), { signal: callOpts?.signal });
      return message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();
    },
  };
}
