import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ContextAssembler } from "../../runtime/src/context/context-assembler.js";
import { ConversationState } from "../../runtime/src/conversation.js";
import { HistoryStore } from "../../runtime/src/history/history-store.js";
import { TraitComposer } from "../../runtime/src/traits/trait-composer.js";
import { TraitLibrary } from "../../runtime/src/traits/trait-library.js";
import { fakeExpander, makeTrait, makeTurns, PADDING, writeTrait } from "../helpers.js";

const HELPFUL = `Be helpful.${PADDING}`;

describe("ContextAssembler", () => {
  let tmpDir: string;
  let composer: TraitComposer;

  const conversation = (turns = 0, traitIds: string[] = []) =>
    new ConversationState({
      provider: "ollama",
      model: "test-model",
      traitIds,
      history: new HistoryStore(makeTurns(turns)),
    });

  const assembler = (files: Record<string, string> = {}, historyLimit = 4) =>
    new ContextAssembler({ composer, fileExpander: fakeExpander(files), historyLimit });

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "beadchat-test-assembler-"));
    writeTrait(tmpDir, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: HELPFUL }));
    const library = new TraitLibrary();
    library.load([tmpDir]);
    composer = new TraitComposer(library);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("sends only the user turn when there is nothing else", async () => {
    expect(await assembler().assemble("hi", conversation())).toEqual([
      { role: "user", text: "hi" },
    ]);
  });

  it("puts the composed system prompt first", async () => {
    const messages = await assembler().assemble("hi", conversation(2, ["helpful"]));
    expect(messages).toEqual([
      { role: "system", text: HELPFUL },
      { role: "user", text: "t1" },
      { role: "assistant", text: "t2" },
      { role: "user", text: "hi" },
    ]);
  });

  it("appends project instructions after the traits", async () => {
    const withProject = new ContextAssembler({
      composer,
      fileExpander: fakeExpander({}),
      historyLimit: 4,
      projectInstructions: "  Answer with British spelling.\n",
    });

    const context = await withProject.build("hi", conversation(0, ["helpful"]));

    expect(context.systemPrompt).toBe(`${HELPFUL}\n\nAnswer with British spelling.`);
    expect(context.messages[0]).toEqual({ role: "system", text: context.systemPrompt });
    expect(withProject.systemPrompt(conversation()).prompt).toBe("Answer with British spelling.");
  });

  it("compacts history over the limit with the conversation's strategy", async () => {
    const conv = conversation(6, ["helpful"]);
    const context = await assembler().build("next", conv);

    expect(context.messages.map((m) => m.text)).toEqual([HELPFUL, "t3", "t4", "t5", "t6", "next"]);
    expect(context.compactedAway).toBe(2);

    conv.compactionStrategy = "first";
    const firstLast = await assembler().assemble("next", conv);
    expect(firstLast.map((m) => m.text)).toEqual([HELPFUL, "t1", "t2", "t5", "t6", "next"]);
  });

  it("does not modify the conversation", async () => {
    const conv = conversation(6, ["helpful"]);
    await assembler().assemble("next", conv);
    expect(conv.history.size()).toBe(6);
    expect(conv.traitIds).toEqual(["helpful"]);
  });

  it("notes unreadable files instead of failing", async () => {
    const context = await assembler().build("explain @missing.py", conversation());

    expect(context.messages).toEqual([
      {
        role: "user",
        text: "explain @missing.py\n\n[Note: Could not read 'missing.py': file not found]",
      },
    ]);
    expect(context.warnings).toEqual(["Could not read 'missing.py': file not found"]);
  });

  it("expands readable files into the user turn", async () => {
    const context = await assembler({ "a.ts": "const x = 1;" }).build("explain @a.ts", conversation());

    expect(context.expandedInput).toBe("File: a.ts\nconst x = 1;\n\nUser request: explain [File: a.ts]");
    expect(context.files).toEqual(["a.ts"]);
  });

  it("omits the system message when no trait resolves", async () => {
    const context = await assembler().build("hi", conversation(0, ["ghost"]));

    expect(context.messages).toEqual([{ role: "user", text: "hi" }]);
    expect(context.systemPrompt).toBe("");
    expect(context.warnings).toEqual(["Unknown trait 'ghost' skipped"]);
  });

  it("never sends more history turns than the limit", async () => {
    for (let turns = 0; turns <= 12; turns++) {
      const messages = await assembler({}, 5).assemble("q", conversation(turns));
      expect(messages.length - 1).toBe(Math.min(turns, 5));
    }
  });
});
