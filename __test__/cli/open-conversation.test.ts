import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { openConversation } from "../../cli/src/commands/chat.js";
import { createCliContext } from "../../cli/src/utils/context.js";

const KEY = "test-terminal";

describe("openConversation", () => {
  let homeDir: string;
  let projectDir: string;

  beforeEach(() => {
    homeDir = mkdtempSync(join(tmpdir(), "beadchat-test-home-"));
    projectDir = mkdtempSync(join(tmpdir(), "beadchat-test-project-"));
    vi.stubEnv("BEADCHAT_PROVIDER", "ollama");
    vi.stubEnv("BEADCHAT_OLLAMA_MODEL", "llama-test");
  });

  afterEach(() => {
    rmSync(homeDir, { recursive: true, force: true });
    rmSync(projectDir, { recursive: true, force: true });
  });

  it("starts from the user config when there is no project file", () => {
    const ctx = createCliContext(homeDir, projectDir);
    const conversation = openConversation(ctx, { new: true }, KEY);

    expect(conversation.provider).toBe("ollama");
    expect(conversation.model).toBe("llama-test");
    expect(conversation.traitIds).toEqual([]);
  });

  it("starts a new conversation from the project config", () => {
    writeFileSync(
      join(projectDir, ".agent.yml"),
      "provider: anthropic\nmodel: claude-test\ntraits: concise\ninstructions: Use metric units.\n",
    );
    const ctx = createCliContext(homeDir, projectDir);

    const conversation = openConversation(ctx, { new: true }, KEY);

    expect(conversation.provider).toBe("anthropic");
    expect(conversation.model).toBe("claude-test");
    expect(conversation.traitIds).toEqual(["concise"]);
    expect(ctx.assembler.systemPrompt(conversation).prompt.endsWith("\n\nUse metric units.")).toBe(true);
  });

  it("applies an agent and lets flags win over it", () => {
    const ctx = createCliContext(homeDir, projectDir);
    ctx.agents.save({
      name: "reviewer",
      provider: "openai",
      model: "gpt-test",
      traitIds: ["concise"],
      description: "",
    });

    const fromAgent = openConversation(ctx, { new: true, agent: "reviewer" }, KEY);
    expect([fromAgent.provider, fromAgent.model]).toEqual(["openai", "gpt-test"]);
    expect(fromAgent.traitIds).toEqual(["concise"]);

    const overridden = openConversation(
      ctx,
      { new: true, agent: "reviewer", model: "gpt-other", traits: "friendly" },
      KEY,
    );
    expect([overridden.provider, overridden.model]).toEqual(["openai", "gpt-other"]);
    expect(overridden.traitIds).toEqual(["friendly"]);
  });

  it("refuses an unknown agent", () => {
    const ctx = createCliContext(homeDir, projectDir);
    expect(() => openConversation(ctx, { agent: "ghost" }, KEY)).toThrow("Unknown agent 'ghost'");
  });
});
