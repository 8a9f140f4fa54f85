import type { ChatMessage } from "../../../runtime/src/history/types.js";
import type { ProviderName } from "../../../runtime/src/config.js";

export type { ChatMessage, ProviderName };

/**
 * One LLM provider bound to one model.
 *
 * `stream` yields text chunks lazily; the sequence is finite and cannot be
 * restarted. Failures surface as `BackendError`, either before the first
 * chunk or mid-stream.
 */
export interface BackendAdapter {
  readonly provider: ProviderName;
  readonly model: string;
  send(messages: readonly ChatMessage[]): Promise<string>;
  stream(
    messages: readonly ChatMessage[],
    signal?: AbortSignal,
  ): AsyncIterable<string>;
  listModels(): Promise<string[]>;
}

export interface BackendOptions {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
}
