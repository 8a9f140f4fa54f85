/**
 * history-summarizer.ts: Folds older turns into a single summary turn.
 *
 * The most recent `keepRecent` turns stay verbatim; everything before them is
 * sent to the bound backend with a summary prompt and replaced by one system
 * turn carrying the answer.
 */

import type { BackendAdapter } from "../../../agent/src/backends/types.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { bySequence } from "./history-store.js";
import type { Turn } from "./types.js";

export const SUMMARY_PREFIX = "Summary of the earlier conversation:";

export interface SummarizeResult {
  turns: Turn[];
  summarized: number;
  summary?: string;
  warning?: string;
}

export class HistorySummarizer {
  private readonly keepRecent: number;
  private readonly logger: Logger;

  constructor(
    private readonly backend: Pick<BackendAdapter, "send">,
    options: { keepRecent?: number; logger?: Logger } = {},
  ) {
    this.keepRecent = options.keepRecent ?? 20;
    this.logger = options.logger ?? silentLogger;
  }

  buildSummaryPrompt(turns: readonly Turn[]): string {
    const conversation = turns
      .map((t) => `${t.role.toUpperCase()}: ${t.text}`)
      .join("\n\n");

    return [
      "Please summarize the following conversation concisely, preserving key information, decisions, and context. Focus on:",
      "- Main topics discussed",
      "- Important facts or data mentioned",
      "- Decisions or conclusions reached",
      "- Open questions or action items",
      "",
      "CONVERSATION:",
      conversation,
      "",
      "SUMMARY:",
    ].join("\n");
  }

  async summarize(turns: readonly Turn[]): Promise<SummarizeResult> {
    const ordered = [...turns].sort(bySequence);
    const splitPoint = ordered.length - this.keepRecent;
    if (splitPoint <= 0) {
      return { turns: ordered, summarized: 0 };
    }

    const older = ordered.slice(0, splitPoint);
    const recent = ordered.slice(splitPoint);

    let summary: string;
    try {
      summary = (
        await this.backend.send([
          { role: "user", text: this.buildSummaryPrompt(older) },
        ])
      ).trim();
    } catch (error) {
      const warning = `Failed to create summary: ${errorMessage(error)}`;
      this.logger.warn(warning);
      return { turns: ordered, summarized: 0, warning };
    }

    if (!summary) {
      const warning = "Failed to create summary: backend returned no text";
      this.logger.warn(warning);
      return { turns: ordered, summarized: 0, warning };
    }

    const lastOlder = older[older.length - 1];
    const summaryTurn: Turn = {
      role: "system",
      text: `${SUMMARY_PREFIX}\n${summary}`,
      sequenceNumber: lastOlder.sequenceNumber,
      createdAt: Date.now(),
    };

    this.logger.info(`Summarized ${older.length} turn(s) into one`);
    return {
      turns: [summaryTurn, ...recent],
      summarized: older.length,
      summary,
    };
  }
}
