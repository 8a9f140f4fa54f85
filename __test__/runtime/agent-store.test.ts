import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { AgentStore } from "../../runtime/src/agent-store.js";
import { ConfigurationError } from "../../runtime/src/errors.js";
import type { Logger } from "../../runtime/src/logger.js";

describe("AgentStore", () => {
  let homeDir: string;
  let warnings: string[];
  let store: AgentStore;

  beforeEach(() => {
    homeDir = mkdtempSync(join(tmpdir(), "beadchat-test-agents-"));
    warnings = [];
    const logger: Logger = {
      debug: () => {},
      info: () => {},
      warn: (message) => warnings.push(message),
      error: () => {},
    };
    store = new AgentStore(homeDir, { logger });
  });

  afterEach(() => {
    rmSync(homeDir, { recursive: true, force: true });
  });

  it("saves presets to agents.json and lists them by name", () => {
    store.save({ name: "writer", provider: "openai", model: "gpt-test", traitIds: ["friendly"], description: "" });
    store.save({ name: "coder", provider: "ollama", model: "llama3.2", traitIds: [], description: "local" });

    expect(store.list().map((a) => a.name)).toEqual(["coder", "writer"]);
    expect(JSON.parse(readFileSync(join(homeDir, "agents.json"), "utf-8"))).toEqual({
      writer: { provider: "openai", model: "gpt-test", traitIds: ["friendly"], description: "" },
      coder: { provider: "ollama", model: "llama3.2", traitIds: [], description: "local" },
    });
  });

  it("replaces a preset saved under the same name", () => {
    store.save({ name: "coder", provider: "ollama", model: "llama3.2", traitIds: [], description: "" });
    store.save({ name: "coder", provider: "anthropic", model: "claude-test", traitIds: ["concise"], description: "" });

    expect(store.get("coder")).toEqual({
      name: "coder",
      provider: "anthropic",
      model: "claude-test",
      traitIds: ["concise"],
      description: "",
    });
    expect(store.list()).toHaveLength(1);
  });

  it("rejects names outside the allowed pattern", () => {
    expect(() =>
      store.save({ name: "My Agent", provider: "ollama", model: "m", traitIds: [], description: "" }),
    ).toThrow(ConfigurationError);
    expect(store.has("My Agent")).toBe(false);
  });

  it("rejects an empty model", () => {
    expect(() =>
      store.save({ name: "blank", provider: "ollama", model: "  ", traitIds: [], description: "" }),
    ).toThrow("Invalid agent model");
  });

  it("removes presets", () => {
    store.save({ name: "coder", provider: "ollama", model: "llama3.2", traitIds: [], description: "" });
    expect(store.remove("coder")).toBe(true);
    expect(store.remove("coder")).toBe(false);
    expect(store.get("coder")).toBeUndefined();
  });

  it("fills defaults for hand-written entries and skips broken ones", () => {
    writeFileSync(
      join(homeDir, "agents.json"),
      JSON.stringify({
        quick: { provider: "ollama", model: "llama3.2" },
        broken: { provider: "nowhere", model: "x" },
      }),
    );

    expect(store.list()).toEqual([
      { name: "quick", provider: "ollama", model: "llama3.2", traitIds: [], description: "" },
    ]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Ignoring unreadable agent broken: /);
  });

  it("starts fresh when agents.json is not JSON", () => {
    writeFileSync(join(homeDir, "agents.json"), "{ nope");

    expect(store.list()).toEqual([]);
    expect(warnings[0]).toMatch(/^Could not parse .*agents\.json, starting fresh: /);
  });
});
