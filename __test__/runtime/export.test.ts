import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  detectExportFormat,
  exportConversation,
  renderJsonExport,
  renderMarkdownExport,
} from "../../runtime/src/export.js";
import { makeTurns } from "../helpers.js";

const metadata = {
  provider: "ollama",
  model: "llama3.2",
  traitIds: ["helpful", "concise"],
  exportedAt: "2024-01-01T00:00:00.000Z",
};

describe("export", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "beadchat-test-export-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("picks the format from the extension", () => {
    expect(detectExportFormat("chat.JSON")).toBe("json");
    expect(detectExportFormat("chat.md")).toBe("markdown");
    expect(detectExportFormat("chat")).toBe("markdown");
  });

  it("renders Markdown with metadata and one section per turn", () => {
    expect(renderMarkdownExport(makeTurns(2), metadata)).toBe(
      [
        "# beadchat Conversation Export",
        "",
        "## Metadata",
        "",
        "- **Provider**: ollama",
        "- **Model**: llama3.2",
        "- **Traits**: helpful, concise",
        "- **Exported**: 2024-01-01T00:00:00.000Z",
        "- **Messages**: 2",
        "",
        "---",
        "",
        "## Conversation",
        "",
        "### User",
        "",
        "t1",
        "",
        "### Assistant",
        "",
        "t2",
        "",
      ].join("\n"),
    );
  });

  it("says none when no traits are active", () => {
    expect(renderMarkdownExport([], { ...metadata, traitIds: [] })).toContain("- **Traits**: none\n");
  });

  it("renders JSON with a message count", () => {
    expect(JSON.parse(renderJsonExport(makeTurns(2), metadata))).toEqual({
      metadata: { ...metadata, messageCount: 2 },
      messages: makeTurns(2),
    });
  });

  it("writes the file and returns its absolute path", () => {
    const target = join(tmpDir, "nested", "chat.json");
    const written = exportConversation(target, makeTurns(1), metadata);

    expect(written).toBe(target);
    expect(JSON.parse(readFileSync(target, "utf-8")).metadata.messageCount).toBe(1);
  });
});
