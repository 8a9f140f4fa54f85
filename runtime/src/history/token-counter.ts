import type { ChatMessage } from "./types.js";

// Rough estimate for English text; providers tokenize differently.
const CHARS_PER_TOKEN = 4;
const MESSAGE_OVERHEAD_TOKENS = 4;

export type ContextStatus = "ok" | "warning" | "critical";

export interface ContextUsage {
  tokenCount: number;
  maxTokens: number;
  percentage: number;
  status: ContextStatus;
  messageCount: number;
}

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.max(1, Math.floor(text.length / CHARS_PER_TOKEN));
}

export function estimateMessagesTokens(messages: readonly ChatMessage[]): number {
  return messages.reduce(
    (total, m) => total + estimateTokens(m.text) + MESSAGE_OVERHEAD_TOKENS,
    0,
  );
}

export function getContextUsage(
  messages: readonly ChatMessage[],
  maxTokens: number,
): ContextUsage {
  const tokenCount = estimateMessagesTokens(messages);
  const percentage = maxTokens > 0 ? (tokenCount / maxTokens) * 100 : 0;
  const status: ContextStatus =
    percentage >= 90 ? "critical" : percentage >= 75 ? "warning" : "ok";

  return {
    tokenCount,
    maxTokens,
    percentage,
    status,
    messageCount: messages.length,
  };
}

/**
 * "1.2K", "3.4M", or the plain number.
 */
export function formatTokenCount(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}K`;
  return String(count);
}
