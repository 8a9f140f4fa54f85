import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { TraitComposer } from "../../runtime/src/traits/trait-composer.js";
import { TraitLibrary } from "../../runtime/src/traits/trait-library.js";
import { makeTrait, PADDING, writeTrait } from "../helpers.js";

const HELPFUL = `Be helpful.${PADDING}`;
const CONCISE = `Be brief.${PADDING}`;
const FRIENDLY = `Be friendly.${PADDING}`;
const EXPERT = `You are a database expert.${PADDING}`;
const STEPS = `Work step by step.${PADDING}`;
const SAFETY = `Warn before destructive commands.${PADDING}`;

describe("TraitComposer", () => {
  let tmpDir: string;
  let library: TraitLibrary;
  let composer: TraitComposer;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "beadchat-test-composer-"));
    writeTrait(tmpDir, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: HELPFUL }));
    writeTrait(
      tmpDir,
      makeTrait({ id: "concise", name: "Concise", category: "response-modifier", body: CONCISE }),
    );
    writeTrait(
      tmpDir,
      makeTrait({ id: "friendly", name: "Friendly", category: "communication-style", body: FRIENDLY }),
    );
    writeTrait(
      tmpDir,
      makeTrait({
        id: "db-expert",
        name: "DB Expert",
        category: "domain-expertise",
        override: "replace",
        body: EXPERT,
      }),
    );
    writeTrait(
      tmpDir,
      makeTrait({ id: "steps", name: "Steps", category: "behavior-pattern", body: STEPS }),
    );
    writeTrait(
      tmpDir,
      makeTrait({
        id: "safety",
        name: "Safety",
        category: "response-modifier",
        override: "prepend",
        body: SAFETY,
      }),
    );

    library = new TraitLibrary();
    library.load([tmpDir]);
    composer = new TraitComposer(library);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("orders by priority regardless of input order", () => {
    expect(composer.compose(["concise", "helpful"])).toBe(`${HELPFUL}\n\n${CONCISE}`);
    expect(composer.compose(["helpful", "concise"])).toBe(`${HELPFUL}\n\n${CONCISE}`);
  });

  it("returns an empty prompt for no traits", () => {
    expect(composer.compose([])).toBe("");
  });

  it("is idempotent for the same ids", () => {
    const first = composer.compose(["friendly", "helpful", "concise"]);
    const second = composer.compose(["friendly", "helpful", "concise"]);
    expect(second).toBe(first);
    expect(first).toBe(`${HELPFUL}\n\n${FRIENDLY}\n\n${CONCISE}`);
  });

  it("discards everything folded before a replace trait", () => {
    expect(composer.compose(["friendly", "db-expert", "steps"])).toBe(
      `${EXPERT}\n\n${STEPS}`,
    );
  });

  it("puts prepend traits in front of the accumulated prompt", () => {
    expect(composer.compose(["safety", "helpful"])).toBe(`${SAFETY}\n\n${HELPFUL}`);
  });

  it("applies prepend against whatever was folded before it", () => {
    expect(composer.compose(["concise", "safety"])).toBe(`${SAFETY}\n\n${CONCISE}`);
    expect(composer.compose(["safety", "concise"])).toBe(`${SAFETY}\n\n${CONCISE}`);
  });

  it("keeps input order between equal priorities", () => {
    const terse = `Use as few words as possible.${PADDING}`;
    writeTrait(
      tmpDir,
      makeTrait({ id: "terse", name: "Terse", category: "response-modifier", body: terse }),
    );
    library.reload();

    expect(composer.compose(["terse", "concise"])).toBe(`${terse}\n\n${CONCISE}`);
    expect(composer.compose(["concise", "terse"])).toBe(`${CONCISE}\n\n${terse}`);
  });

  it("skips unknown ids with a warning", () => {
    expect(composer.compose(["helpful", "nonexistent-id"])).toBe(composer.compose(["helpful"]));

    const detailed = composer.composeDetailed(["nonexistent-id", "helpful"]);
    expect(detailed.missing).toEqual(["nonexistent-id"]);
    expect(detailed.warnings).toEqual(["Unknown trait 'nonexistent-id' skipped"]);
    expect(detailed.applied.map((t) => t.id)).toEqual(["helpful"]);
  });

  it("recomposes after the library generation changes", () => {
    expect(composer.compose(["helpful"])).toBe(HELPFUL);

    const updated = `Be extremely helpful.${PADDING}`;
    writeTrait(tmpDir, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: updated }));
    expect(composer.compose(["helpful"])).toBe(HELPFUL);

    library.reload();
    expect(composer.compose(["helpful"])).toBe(updated);
  });

  it("hands out copies of cached results", () => {
    const first = composer.composeDetailed(["helpful"]);
    first.warnings.push("mutated");
    expect(composer.composeDetailed(["helpful"]).warnings).toEqual([]);
  });
});
