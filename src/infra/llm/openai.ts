import OpenAI from "openai";
import type { CallOptions, ChatTurn, CompletionRequest, ModelBackend } from "./types";

export type OpenAIBackendOptions = {
  apiKey?: string;
  // Any OpenAI-compatible endpoint, e.g. a local Ollama at http://localhost:11434/v1.
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
};

export function toOpenAIMessages(system: string, history: ChatTurn[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [{ role: "system", content: system }];
  for (const turn of history) {
    messages.push(
      turn.role === "user" ? { role: "user", content: turn.content } : { role: "assistant", content: turn.content }
    );
  }
  return messages;
}

export function createOpenAIBackend(opts: OpenAIBackendOptions, client?: OpenAI): ModelBackend {
  if (!client && !opts.apiKey && !opts.baseURL) {
    throw new Error("OPENAI_API_KEY is not set in the environment.");
  }
  const openai =
    client ??
    new OpenAI({
      // Self-hosted compatible servers usually ignore the key but the SDK requires one.
      apiKey: opts.apiKey ?? "unused",
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs,
      maxRetries: opts.maxRetries,
    });

  const params = (request: CompletionRequest) => ({
    model: opts.model,
    temperature: request.temperature ?? opts.temperature,
    max_tokens: request.maxTokens ?? opts.maxTokens,
    messages: toOpenAIMessages(request.system, request.history),
  });

  return {
    name: `openai:${opts.model}`,

    async *streamComplete(request: CompletionRequest, callOpts?: CallOptions): AsyncIterable<string> {
      const stream = await openai.chat.completions.create(
        { ...params(request), stream: true },
        { signal: callOpts?.signal }
      );
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    },

    async complete(request: CompletionRequest, callOpts?: CallOptions): Promise<string> {
      const completion = await openai.chat.completions.create(
        {
          ...params(request),
          ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal: callOpts?.signal }
      );
      return completion.choices[0]?.message?.content ?? "";
    },
  };
}
