import {
  modelFor,
  type BeadchatConfig,
  type ProviderName,
} from "../../../runtime/src/config.js";
import { AnthropicBackend } from "./anthropic.js";
import { GoogleBackend } from "./google.js";
import { OllamaBackend } from "./ollama.js";
import { OpenAIBackend } from "./openai.js";
import type { BackendAdapter } from "./types.js";

export * from "./errors.js";
export * from "./types.js";
export { AnthropicBackend, GoogleBackend, OllamaBackend, OpenAIBackend };

/**
 * Build the adapter for `provider`, taking credentials from the resolved
 * config along with the sampling settings. `model` overrides the
 * provider's configured default.
 */
export function createBackend(
  provider: ProviderName,
  config: BeadchatConfig,
  model: string = modelFor(config, provider),
): BackendAdapter {
  const sampling = { temperature: config.temperature, maxTokens: config.maxTokens };
  switch (provider) {
    case "ollama":
      return new OllamaBackend({ model, baseUrl: config.ollamaBaseUrl, ...sampling });
    case "openai":
      return new OpenAIBackend({ model, apiKey: config.openaiApiKey, ...sampling });
    case "anthropic":
      return new AnthropicBackend({ model, apiKey: config.anthropicApiKey, ...sampling });
    case "google":
      return new GoogleBackend({ model, apiKey: config.googleApiKey, ...sampling });
  }
}
