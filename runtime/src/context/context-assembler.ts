/**
 * context-assembler.ts: Builds the message list for one turn.
 *
 * Order of the result:
 *   1. system prompt: composed traits, then project instructions (omitted
 *      when both are empty)
 *   2. history, compacted when it is over the limit
 *   3. the new user input with @file references expanded
 *
 * Assembly only reads the conversation; appending the reply is the caller's
 * job.
 */

import type { ConversationState } from "../conversation.js";
import { silentLogger, type Logger } from "../logger.js";
import { compactHistory } from "../history/history-compactor.js";
import type { ChatMessage } from "../history/types.js";
import type { TraitComposer } from "../traits/trait-composer.js";
import { expandFileReferences, type FileExpander } from "./file-expander.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface AssembledContext {
  messages: ChatMessage[];
  systemPrompt: string;
  /** User input after @file expansion; this is what gets recorded. */
  expandedInput: string;
  files: string[];
  /** History turns dropped by compaction. */
  compactedAway: number;
  warnings: string[];
}

export interface ContextAssemblerOptions {
  composer: TraitComposer;
  fileExpander: FileExpander;
  historyLimit: number;
  /** Instructions from the project config, appended after the traits. */
  projectInstructions?: string;
  logger?: Logger;
}

// ── Assembler ───────────────────────────────────────────────────────────────

export class ContextAssembler {
  private readonly composer: TraitComposer;
  private readonly fileExpander: FileExpander;
  private readonly logger: Logger;
  private readonly projectInstructions: string;
  private historyLimit: number;

  constructor(options: ContextAssemblerOptions) {
    this.composer = options.composer;
    this.fileExpander = options.fileExpander;
    this.historyLimit = options.historyLimit;
    this.projectInstructions = options.projectInstructions?.trim() ?? "";
    this.logger = options.logger ?? silentLogger;
  }

  getHistoryLimit(): number {
    return this.historyLimit;
  }

  setHistoryLimit(limit: number): void {
    this.historyLimit = limit;
  }

  async assemble(
    userInput: string,
    conversation: ConversationState,
  ): Promise<ChatMessage[]> {
    return (await this.build(userInput, conversation)).messages;
  }

  async build(
    userInput: string,
    conversation: ConversationState,
  ): Promise<AssembledContext> {
    const warnings: string[] = [];

    // 1. Expand @file references
    const expansion = await expandFileReferences(userInput, this.fileExpander);
    warnings.push(...expansion.warnings);

    // 2. History, compacted when over the limit
    const history = this.historyMessages(conversation);

    // 3. System prompt from the selected traits and the project
    const system = this.systemPrompt(conversation);
    warnings.push(...system.warnings);

    // 4. Final sequence
    const messages: ChatMessage[] = [];
    if (system.prompt) {
      messages.push({ role: "system", text: system.prompt });
    }
    messages.push(...history.messages);
    messages.push({ role: "user", text: expansion.text });

    for (const warning of expansion.warnings) {
      this.logger.warn(warning);
    }
    this.logger.debug(
      `Assembled ${messages.length} message(s) (${history.compactedAway} compacted away, ${expansion.files.length} file(s))`,
    );

    return {
      messages,
      systemPrompt: system.prompt,
      expandedInput: expansion.text,
      files: expansion.files,
      compactedAway: history.compactedAway,
      warnings,
    };
  }

  systemPrompt(conversation: ConversationState): {
    prompt: string;
    warnings: string[];
  } {
    const composition = this.composer.composeDetailed(conversation.traitIds);
    const prompt = [composition.prompt, this.projectInstructions]
      .filter(Boolean)
      .join("\n\n");
    return { prompt, warnings: composition.warnings };
  }

  /**
   * The history portion only, as it would be sent right now.
   */
  historyMessages(conversation: ConversationState): {
    messages: ChatMessage[];
    compactedAway: number;
  } {
    const turns = conversation.history.snapshot();
    const kept =
      conversation.history.size() > this.historyLimit
        ? compactHistory(
            turns,
            this.historyLimit,
            conversation.compactionStrategy,
          )
        : turns;

    return {
      messages: kept.map((t) => ({ role: t.role, text: t.text })),
      compactedAway: turns.length - kept.length,
    };
  }
}
