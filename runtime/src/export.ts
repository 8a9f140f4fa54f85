import { resolve } from "path";
import { homedir } from "os";
import { writeFileAtomic } from "./file-store.js";
import type { Turn } from "./history/types.js";

export type ExportFormat = "markdown" | "json";

export interface ExportMetadata {
  provider: string;
  model: string;
  traitIds: readonly string[];
  exportedAt?: string;
}

export function detectExportFormat(filename: string): ExportFormat {
  return filename.toLowerCase().endsWith(".json") ? "json" : "markdown";
}

export function renderMarkdownExport(
  turns: readonly Turn[],
  metadata: ExportMetadata,
): string {
  const lines = [
    "# beadchat Conversation Export",
    "",
    "## Metadata",
    "",
    `- **Provider**: ${metadata.provider}`,
    `- **Model**: ${metadata.model}`,
    `- **Traits**: ${metadata.traitIds.length > 0 ? metadata.traitIds.join(", ") : "none"}`,
    `- **Exported**: ${metadata.exportedAt ?? new Date().toISOString()}`,
    `- **Messages**: ${turns.length}`,
    "",
    "---",
    "",
    "## Conversation",
    "",
  ];

  for (const turn of turns) {
    lines.push(`### ${capitalize(turn.role)}`, "", turn.text, "");
  }

  return lines.join("\n");
}

export function renderJsonExport(
  turns: readonly Turn[],
  metadata: ExportMetadata,
): string {
  const exportedAt = metadata.exportedAt ?? new Date().toISOString();
  return (
    JSON.stringify(
      {
        metadata: { ...metadata, exportedAt, messageCount: turns.length },
        messages: turns,
      },
      null,
      2,
    ) + "\n"
  );
}

/**
 * Write the conversation to `filename` (Markdown unless it ends in .json).
 * Returns the absolute path written.
 */
export function exportConversation(
  filename: string,
  turns: readonly Turn[],
  metadata: ExportMetadata,
): string {
  const outputPath = resolve(expandHome(filename));
  const content =
    detectExportFormat(outputPath) === "json"
      ? renderJsonExport(turns, metadata)
      : renderMarkdownExport(turns, metadata);
  writeFileAtomic(outputPath, content);
  return outputPath;
}

function expandHome(filename: string): string {
  return filename.startsWith("~/") ? homedir() + filename.slice(1) : filename;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
