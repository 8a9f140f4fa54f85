import type { AgentPreset } from "../../../runtime/src/agent-store.js";
import type { Turn } from "../../../runtime/src/history/types.js";
import type { Trait } from "../../../runtime/src/traits/trait-builder.js";

export const HISTORY_PREVIEW_LENGTH = 150;

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Plain-text overview of the most recent turns, one line each.
 */
export function formatHistorySummary(
  turns: readonly Turn[],
  count = 10,
): string[] {
  if (turns.length === 0) return ["No conversation history."];

  const shown = turns.slice(-count);
  const lines = [`Showing ${shown.length} of ${turns.length} message(s):`];
  for (const turn of shown) {
    const text = truncate(turn.text.replace(/\s+/g, " ").trim(), HISTORY_PREVIEW_LENGTH);
    lines.push(`  #${turn.sequenceNumber} ${turn.role}: ${text}`);
  }
  return lines;
}

export function formatTraitLine(trait: Trait): string {
  const tags = trait.tags.length > 0 ? ` [${trait.tags.join(", ")}]` : "";
  return `${trait.id} (${trait.category}, priority ${trait.priority}, ${trait.override})${tags}`;
}

export function formatAgentLine(agent: AgentPreset): string {
  const traits = agent.traitIds.length > 0 ? ` [${agent.traitIds.join(", ")}]` : "";
  const about = agent.description ? ` - ${agent.description}` : "";
  return `${agent.name}: ${agent.provider}/${agent.model}${traits}${about}`;
}
