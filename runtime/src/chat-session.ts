/**
 * chat-session.ts: Runs one conversation turn end to end.
 *
 * A turn is: assemble context → send or stream to the bound backend → on
 * success append the (expanded) user turn and the reply, then persist.
 * A failed or cancelled turn leaves the history untouched.
 */

import type { BackendAdapter } from "../../agent/src/backends/types.js";
import type { AgentPreset } from "./agent-store.js";
import type { ProviderName } from "./config.js";
import type {
  AssembledContext,
  ContextAssembler,
} from "./context/context-assembler.js";
import type { ConversationState } from "./conversation.js";
import { errorMessage } from "./errors.js";
import { compactHistory } from "./history/history-compactor.js";
import {
  HistorySummarizer,
  type SummarizeResult,
} from "./history/history-summarizer.js";
import { silentLogger, type Logger } from "./logger.js";

export type BackendFactory = (
  provider: ProviderName,
  model?: string,
) => BackendAdapter;

/** Where the conversation is written after every change. */
export interface ConversationSink {
  save(key: string, state: ConversationState): void;
}

export interface ChatSessionOptions {
  conversation: ConversationState;
  assembler: ContextAssembler;
  createBackend: BackendFactory;
  sink?: ConversationSink;
  sessionKey?: string;
  summaryKeepRecent?: number;
  logger?: Logger;
}

export interface TurnOptions {
  stream?: boolean;
  signal?: AbortSignal;
  onChunk?: (chunk: string) => void;
}

export type TurnResult =
  | { status: "completed"; reply: string; context: AssembledContext }
  | { status: "cancelled"; partial: string; context: AssembledContext };

export class ChatSession {
  readonly conversation: ConversationState;
  private readonly assembler: ContextAssembler;
  private readonly createBackend: BackendFactory;
  private readonly sink?: ConversationSink;
  private readonly sessionKey?: string;
  private readonly summaryKeepRecent?: number;
  private readonly logger: Logger;
  private backend: BackendAdapter;

  constructor(options: ChatSessionOptions) {
    this.conversation = options.conversation;
    this.assembler = options.assembler;
    this.createBackend = options.createBackend;
    this.sink = options.sink;
    this.sessionKey = options.sessionKey;
    this.summaryKeepRecent = options.summaryKeepRecent;
    this.logger = options.logger ?? silentLogger;
    this.backend = this.createBackend(
      this.conversation.provider,
      this.conversation.model,
    );
  }

  getBackend(): BackendAdapter {
    return this.backend;
  }

  /**
   * Rebind to another provider/model. The adapter is built first so a
   * missing API key leaves the current binding in place.
   */
  switchBackend(provider: ProviderName, model?: string): BackendAdapter {
    const backend = this.createBackend(provider, model);
    this.backend = backend;
    this.conversation.bind(backend.provider, backend.model);
    this.persist();
    this.logger.info(`Switched to ${backend.provider}/${backend.model}`);
    return backend;
  }

  /**
   * Apply a saved agent: its backend and its traits. Nothing changes when
   * the backend cannot be built.
   */
  useAgent(preset: AgentPreset): BackendAdapter {
    const backend = this.createBackend(preset.provider, preset.model);
    this.backend = backend;
    this.conversation.bind(backend.provider, backend.model);
    this.conversation.setTraits([...preset.traitIds]);
    this.persist();
    this.logger.info(`Using agent ${preset.name} (${backend.provider}/${backend.model})`);
    return backend;
  }

  async turn(input: string, options: TurnOptions = {}): Promise<TurnResult> {
    const context = await this.assembler.build(input, this.conversation);
    const { signal } = options;

    let reply = "";
    try {
      if (options.stream) {
        for await (const chunk of this.backend.stream(context.messages, signal)) {
          if (signal?.aborted) break;
          reply += chunk;
          options.onChunk?.(chunk);
        }
      } else {
        reply = await this.backend.send(context.messages);
      }
    } catch (error) {
      if (signal?.aborted) {
        return this.cancelled(reply, context);
      }
      this.logger.error(
        `Turn failed on ${this.backend.provider}/${this.backend.model}: ${errorMessage(error)}`,
      );
      throw error;
    }

    if (signal?.aborted) {
      return this.cancelled(reply, context);
    }

    const history = this.conversation.history;
    history.record("user", context.expandedInput);
    history.record("assistant", reply);
    this.persist();

    this.logger.info(
      `Turn completed on ${this.backend.provider}/${this.backend.model} (${context.messages.length} message(s) sent, ${reply.length} chars back)`,
    );
    return { status: "completed", reply, context };
  }

  /**
   * Permanently drop the turns the current strategy would leave out.
   * Returns how many turns were removed.
   */
  compact(): number {
    const history = this.conversation.history;
    const limit = this.assembler.getHistoryLimit();
    if (history.size() <= limit) return 0;

    const before = history.size();
    history.replace(
      compactHistory(history.snapshot(), limit, this.conversation.compactionStrategy),
    );
    this.persist();
    return before - history.size();
  }

  async summarize(): Promise<SummarizeResult> {
    const summarizer = new HistorySummarizer(this.backend, {
      keepRecent: this.summaryKeepRecent,
      logger: this.logger,
    });
    const result = await summarizer.summarize(this.conversation.history.snapshot());
    if (result.summarized > 0) {
      this.conversation.history.replace(result.turns);
      this.persist();
    }
    return result;
  }

  clear(): void {
    this.conversation.history.clear();
    this.persist();
  }

  persist(): void {
    if (this.sink && this.sessionKey) {
      this.sink.save(this.sessionKey, this.conversation);
    }
  }

  private cancelled(partial: string, context: AssembledContext): TurnResult {
    this.logger.info("Turn cancelled; nothing recorded");
    return { status: "cancelled", partial, context };
  }
}
