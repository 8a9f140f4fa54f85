/**
 * Ollama backend for local models.
 *
 * Uses raw `fetch()` against the Ollama REST API. Streaming responses are
 * newline-delimited JSON, one object per line.
 */

import { z } from "zod";
import { BackendError } from "./errors.js";
import { readLines, requestJson } from "./http.js";
import type { BackendAdapter, BackendOptions, ChatMessage } from "./types.js";

export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

const chatChunkSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export class OllamaBackend implements BackendAdapter {
  readonly provider = "ollama" as const;
  readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;

  constructor(options: BackendOptions) {
    this.model = options.model;
    this.baseUrl = (options.baseUrl || DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, "");
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  async send(messages: readonly ChatMessage[]): Promise<string> {
    const response = await requestJson(this.provider, `${this.baseUrl}/api/chat`, {
      body: this.buildBody(messages, false),
    });
    const chunk = this.parseChunk(await response.text());
    return chunk.message?.content ?? "";
  }

  async *stream(
    messages: readonly ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    const response = await requestJson(this.provider, `${this.baseUrl}/api/chat`, {
      body: this.buildBody(messages, true),
      signal,
    });

    for await (const line of readLines(response, this.provider)) {
      if (!line.trim()) continue;
      const chunk = this.parseChunk(line);
      const text = chunk.message?.content;
      if (text) yield text;
      if (chunk.done) return;
    }
  }

  async listModels(): Promise<string[]> {
    const response = await requestJson(this.provider, `${this.baseUrl}/api/tags`);
    const parsed = tagsSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError("Unexpected model list from Ollama", {
        kind: "unavailable",
        provider: this.provider,
      });
    }
    return parsed.data.models.map((m) => m.name).sort();
  }

  private buildBody(
    messages: readonly ChatMessage[],
    stream: boolean,
  ): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: messages.map((m) => ({ role: m.role, content: m.text })),
      stream,
    };
    const sampling: Record<string, number> = {};
    if (this.temperature !== undefined) sampling.temperature = this.temperature;
    if (this.maxTokens !== undefined) sampling.num_predict = this.maxTokens;
    if (Object.keys(sampling).length > 0) body.options = sampling;
    return body;
  }

  private parseChunk(raw: string): z.infer<typeof chatChunkSchema> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new BackendError(`Malformed response from Ollama: ${raw.slice(0, 200)}`, {
        kind: "unavailable",
        provider: this.provider,
      });
    }

    const parsed = chatChunkSchema.safeParse(json);
    if (!parsed.success) {
      throw new BackendError("Unexpected response shape from Ollama", {
        kind: "unavailable",
        provider: this.provider,
      });
    }
    if (parsed.data.error) {
      throw new BackendError(`Ollama error: ${parsed.data.error}`, {
        kind: "unavailable",
        provider: this.provider,
      });
    }
    return parsed.data;
  }
}
