import OpenAI from "openai";
import { BackendError, toBackendError } from "./errors.js";
import type { BackendAdapter, BackendOptions, ChatMessage } from "./types.js";

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;

function toOpenAIMessages(messages: readonly ChatMessage[]): OpenAIMessage[] {
  return messages.map((m): OpenAIMessage => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.text };
      case "assistant":
        return { role: "assistant", content: m.text };
      case "user":
        return { role: "user", content: m.text };
    }
  });
}

export class OpenAIBackend implements BackendAdapter {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature?: number;
  private readonly maxTokens?: number;

  constructor(options: BackendOptions) {
    if (!options.apiKey) {
      throw new BackendError("OPENAI_API_KEY is not set", {
        kind: "auth",
        provider: "openai",
      });
    }
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || undefined,
    });
  }

  async send(messages: readonly ChatMessage[]): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: toOpenAIMessages(messages),
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });
      return response.choices[0]?.message?.content || "";
    } catch (error) {
      throw toBackendError(error, this.provider);
    }
  }

  async *stream(
    messages: readonly ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: toOpenAIMessages(messages),
          temperature: this.temperature,
          max_tokens: this.maxTokens,
          stream: true,
        },
        { signal },
      );

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) yield text;
      }
    } catch (error) {
      throw toBackendError(error, this.provider);
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const ids: string[] = [];
      for await (const model of this.client.models.list()) {
        ids.push(model.id);
      }
      return ids.sort();
    } catch (error) {
      throw toBackendError(error, this.provider);
    }
  }
}
