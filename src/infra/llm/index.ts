import type { AppConfig } from "../../config";
import { createAnthropicBackend } from "./anthropic";
import { createOpenAIBackend } from "./openai";
import type { ModelBackend } from "./types";

export type { CallOptions, ChatTurn, CompletionRequest, ModelBackend } from "./types";

export function createModelBackend(config: AppConfig["llm"]): ModelBackend {
  const shared = {
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  };

  switch (config.provider) {
    case "anthropic":
      return createAnthropicBackend({ ...shared, apiKey: config.anthropic.apiKey, model: config.anthropic.model });
    case "openai":
      return createOpenAIBackend({
        ...shared,
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
        model: config.openai.model,
      });
  }
}
