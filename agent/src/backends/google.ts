/**
 * Google Gemini backend.
 *
 * Uses raw `fetch()` against the Generative Language REST API; streaming is
 * `streamGenerateContent?alt=sse`, where every `data:` line carries a JSON
 * object with a `candidates` array.
 */

import { z } from "zod";
import { BackendError } from "./errors.js";
import { readLines, requestJson } from "./http.js";
import type { BackendAdapter, BackendOptions, ChatMessage } from "./types.js";

const API_BASE = "https://generativelanguage.googleapis.com/v1beta";

const generateSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      }),
    )
    .default([]),
});

const modelsSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        supportedGenerationMethods: z.array(z.string()).default([]),
      }),
    )
    .default([]),
});

interface GeminiContent {
  role: "user" | "model";
  parts: Array<{ text: string }>;
}

export class GoogleBackend implements BackendAdapter {
  readonly provider = "google" as const;
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;

  constructor(options: BackendOptions) {
    if (!options.apiKey) {
      throw new BackendError("GOOGLE_API_KEY is not set", {
        kind: "auth",
        provider: this.provider,
      });
    }
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || API_BASE).replace(/\/+$/, "");
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  async send(messages: readonly ChatMessage[]): Promise<string> {
    const response = await requestJson(
      this.provider,
      this.url(`models/${this.model}:generateContent`),
      { body: this.buildBody(messages) },
    );
    return this.extractText(await response.json());
  }

  async *stream(
    messages: readonly ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    const response = await requestJson(
      this.provider,
      this.url(`models/${this.model}:streamGenerateContent`, { alt: "sse" }),
      { body: this.buildBody(messages), signal },
    );

    for await (const line of readLines(response, this.provider)) {
      if (!line.startsWith("data:")) continue;
      const data = line.slice(5).trim();
      if (!data || data === "[DONE]") continue;

      let json: unknown;
      try {
        json = JSON.parse(data);
      } catch {
        throw new BackendError(`Malformed stream frame from Gemini: ${data.slice(0, 200)}`, {
          kind: "unavailable",
          provider: this.provider,
        });
      }

      const text = this.extractText(json);
      if (text) yield text;
    }
  }

  async listModels(): Promise<string[]> {
    const response = await requestJson(this.provider, this.url("models"));
    const parsed = modelsSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError("Unexpected model list from Gemini", {
        kind: "unavailable",
        provider: this.provider,
      });
    }
    return parsed.data.models
      .filter((m) => m.supportedGenerationMethods.includes("generateContent"))
      .map((m) => m.name.replace(/^models\//, ""))
      .sort();
  }

  private url(path: string, query: Record<string, string> = {}): string {
    const params = new URLSearchParams({ ...query, key: this.apiKey });
    return `${this.baseUrl}/${path}?${params.toString()}`;
  }

  private buildBody(messages: readonly ChatMessage[]): Record<string, unknown> {
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.text)
      .join("\n\n");
    const contents: GeminiContent[] = messages
      .filter((m) => m.role !== "system")
      .map((m): GeminiContent => ({
        role: m.role === "assistant" ? "model" : "user",
        parts: [{ text: m.text }],
      }));

    const body: Record<string, unknown> = { contents };
    if (system) {
      body.systemInstruction = { parts: [{ text: system }] };
    }

    const generationConfig: Record<string, number> = {};
    if (this.temperature !== undefined) generationConfig.temperature = this.temperature;
    if (this.maxTokens !== undefined) generationConfig.maxOutputTokens = this.maxTokens;
    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }
    return body;
  }

  private extractText(json: unknown): string {
    const parsed = generateSchema.safeParse(json);
    if (!parsed.success) {
      throw new BackendError("Unexpected response shape from Gemini", {
        kind: "unavailable",
        provider: this.provider,
      });
    }
    const candidate = parsed.data.candidates[0];
    return (candidate?.content?.parts ?? []).map((p) => p.text ?? "").join("");
  }
}
