/**
 * history-compactor.ts: Reduces a turn sequence to a size limit before it is
 * sent to a backend.
 *
 * Strategies:
 *   recent: keep the last `limit` turns
 *   first:  keep the opening ceil(limit/2) and the closing floor(limit/2)
 *   middle: sample at stride ceil(total/limit), always keeping the last turn
 *
 * The input is never mutated and the output is always ordered by
 * sequence number.
 */

import { ConfigurationError } from "../errors.js";
import { bySequence } from "./history-store.js";
import type { Turn } from "./types.js";

export const COMPACTION_STRATEGIES = ["recent", "first", "middle"] as const;
export type CompactionStrategy = (typeof COMPACTION_STRATEGIES)[number];

export function isCompactionStrategy(value: string): value is CompactionStrategy {
  return COMPACTION_STRATEGIES.some((s) => s === value);
}

export function compactHistory(
  turns: readonly Turn[],
  limit: number,
  strategy: CompactionStrategy = "recent",
): Turn[] {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(
      `History limit must be a positive integer, got ${limit}`,
      "historyLimit",
    );
  }

  const ordered = [...turns].sort(bySequence);
  if (ordered.length <= limit) {
    return ordered;
  }

  switch (strategy) {
    case "recent":
      return ordered.slice(-limit);
    case "first":
      return keepBookends(ordered, limit);
    case "middle":
      return sampleEvenly(ordered, limit);
  }
}

function keepBookends(ordered: Turn[], limit: number): Turn[] {
  const head = Math.ceil(limit / 2);
  const tail = Math.floor(limit / 2);
  const kept = ordered.slice(0, head);
  if (tail > 0) {
    kept.push(...ordered.slice(-tail));
  }
  return kept;
}

function sampleEvenly(ordered: Turn[], limit: number): Turn[] {
  const stride = Math.ceil(ordered.length / limit);
  const lastIndex = ordered.length - 1;
  const indices: number[] = [];

  for (let i = 0; i < ordered.length; i += stride) {
    indices.push(i);
  }

  if (indices[indices.length - 1] !== lastIndex) {
    if (indices.length >= limit) {
      // Full sample: the final slot goes to the most recent turn.
      indices[indices.length - 1] = lastIndex;
    } else {
      indices.push(lastIndex);
    }
  }

  return indices.map((i) => ordered[i]);
}
