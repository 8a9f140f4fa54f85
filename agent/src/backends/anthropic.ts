import Anthropic from "@anthropic-ai/sdk";
import { BackendError, toBackendError } from "./errors.js";
import type { BackendAdapter, BackendOptions, ChatMessage } from "./types.js";

const DEFAULT_MAX_TOKENS = 4096;

// The Messages API has no model listing in every SDK release.
const KNOWN_MODELS = [
  "claude-3-5-haiku-latest",
  "claude-3-5-sonnet-latest",
  "claude-3-7-sonnet-latest",
  "claude-3-opus-latest",
];

interface AnthropicRequest {
  system?: string;
  messages: Anthropic.MessageParam[];
}

function toAnthropicRequest(messages: readonly ChatMessage[]): AnthropicRequest {
  const system = messages
    .filter((m) => m.role === "system")
    .map((m) => m.text)
    .join("\n\n");
  const rest: Anthropic.MessageParam[] = [];
  for (const m of messages) {
    if (m.role === "user" || m.role === "assistant") {
      rest.push({ role: m.role, content: m.text });
    }
  }
  return { system: system || undefined, messages: rest };
}

export class AnthropicBackend implements BackendAdapter {
  readonly provider = "anthropic" as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly temperature?: number;
  private readonly maxTokens: number;

  constructor(options: BackendOptions) {
    if (!options.apiKey) {
      throw new BackendError("ANTHROPIC_API_KEY is not set", {
        kind: "auth",
        provider: "anthropic",
      });
    }
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || undefined,
    });
  }

  async send(messages: readonly ChatMessage[]): Promise<string> {
    const request = toAnthropicRequest(messages);
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        system: request.system,
        messages: request.messages,
      });

      let text = "";
      for (const block of response.content) {
        if (block.type === "text") text += block.text;
      }
      return text;
    } catch (error) {
      throw toBackendError(error, this.provider);
    }
  }

  async *stream(
    messages: readonly ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    const request = toAnthropicRequest(messages);
    try {
      const stream = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          system: request.system,
          messages: request.messages,
          stream: true,
        },
        { signal },
      );

      for await (const event of stream) {
        if (
          event.type === "content_block_delta" &&
          event.delta.type === "text_delta"
        ) {
          yield event.delta.text;
        }
      }
    } catch (error) {
      throw toBackendError(error, this.provider);
    }
  }

  async listModels(): Promise<string[]> {
    return [...KNOWN_MODELS];
  }
}
