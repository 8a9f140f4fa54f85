import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  getBundledTraitsDir,
  getUserTraitsDir,
  TraitLibrary,
} from "../../runtime/src/traits/trait-library.js";
import { makeTrait, PADDING, writeTrait } from "../helpers.js";

describe("TraitLibrary", () => {
  let tmpDir: string;
  let bundled: string;
  let user: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "beadchat-test-library-"));
    bundled = join(tmpDir, "bundled");
    user = join(tmpDir, "user");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads traits from nested directories", () => {
    writeTrait(join(bundled, "base"), makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Help.${PADDING}` }));
    writeTrait(
      join(bundled, "response-modifier"),
      makeTrait({ id: "concise", name: "Concise", category: "response-modifier", body: `Short.${PADDING}` }),
    );

    const library = new TraitLibrary();
    const loaded = library.load([bundled]);

    expect(loaded.map((t) => t.id)).toEqual(["concise", "helpful"]);
    expect(library.get("helpful")?.priority).toBe(0);
    expect(library.get("concise")?.priority).toBe(100);
    expect(library.get("helpful")?.source).toBe(join(bundled, "base", "helpful.md"));
    expect(library.getWarnings()).toEqual([]);
  });

  it("lets later directories override earlier ones", () => {
    writeTrait(bundled, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Bundled.${PADDING}` }));
    writeTrait(user, makeTrait({ id: "helpful", name: "My Helpful", category: "base", body: `Mine.${PADDING}` }));

    const library = new TraitLibrary();
    library.load([bundled, user]);

    expect(library.count()).toBe(1);
    expect(library.get("helpful")?.name).toBe("My Helpful");
    expect(library.get("helpful")?.body).toBe(`Mine.${PADDING}`);
  });

  it("skips missing directories", () => {
    writeTrait(user, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Help.${PADDING}` }));

    const library = new TraitLibrary();
    library.load([join(tmpDir, "does-not-exist"), user]);

    expect(library.count()).toBe(1);
    expect(library.getWarnings()).toEqual([]);
  });

  it("skips malformed definitions with a warning", () => {
    writeTrait(user, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Help.${PADDING}` }));
    const badPath = join(user, "bad.md");
    writeFileSync(
      badPath,
      `---\nid: bad\nname: Bad\ncategory: nonsense\n---\nThis body is long enough to pass the length check on its own.\n`,
    );

    const library = new TraitLibrary();
    library.load([user]);

    expect(library.list().map((t) => t.id)).toEqual(["helpful"]);
    expect(library.getWarnings()).toEqual([
      `Skipped trait file ${badPath}: Invalid trait category: must be one of base, communication-style, domain-expertise, behavior-pattern, response-modifier`,
    ]);
  });

  it("skips a dangling symlink with a warning", () => {
    writeTrait(user, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Help.${PADDING}` }));
    const brokenPath = join(user, "broken.md");
    symlinkSync(join(tmpDir, "nowhere.md"), brokenPath);

    const library = new TraitLibrary();
    const loaded = library.load([user]);

    expect(loaded.map((t) => t.id)).toEqual(["helpful"]);
    expect(library.getWarnings()).toHaveLength(1);
    expect(library.getWarnings()[0].startsWith(`Skipped trait file ${brokenPath}: ENOENT`)).toBe(true);
  });

  it("rejects bodies that are too short", () => {
    const shortPath = join(user, "short.md");
    writeTrait(user, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Help.${PADDING}` }));
    writeFileSync(shortPath, `---\nid: short\nname: Short\ncategory: base\n---\nBe helpful.\n`);

    const library = new TraitLibrary();
    library.load([user]);

    expect(library.has("short")).toBe(false);
    expect(library.getWarnings()).toEqual([
      `Skipped trait file ${shortPath}: Invalid trait body: must be at least 50 characters`,
    ]);
  });

  it("filters by category and sorts by id", () => {
    writeTrait(user, makeTrait({ id: "zeta", name: "Zeta", category: "base", body: `Z.${PADDING}` }));
    writeTrait(user, makeTrait({ id: "alpha", name: "Alpha", category: "base", body: `A.${PADDING}` }));
    writeTrait(user, makeTrait({ id: "mid", name: "Mid", category: "behavior-pattern", body: `M.${PADDING}` }));

    const library = new TraitLibrary();
    library.load([user]);

    expect(library.list().map((t) => t.id)).toEqual(["alpha", "mid", "zeta"]);
    expect(library.list("base").map((t) => t.id)).toEqual(["alpha", "zeta"]);
    expect(library.list("response-modifier")).toEqual([]);
  });

  describe("search", () => {
    let library: TraitLibrary;

    beforeEach(() => {
      writeTrait(
        user,
        makeTrait({ id: "python", name: "Python", category: "domain-expertise", tags: ["lang"], body: `P.${PADDING}` }),
      );
      writeTrait(
        user,
        makeTrait({ id: "snake-helper", name: "Snake", category: "base", tags: ["python"], body: `S.${PADDING}` }),
      );
      writeTrait(
        user,
        makeTrait({ id: "py-tutor", name: "Python Tutor", category: "behavior-pattern", tags: ["teaching"], body: `T.${PADDING}` }),
      );
      writeTrait(
        user,
        makeTrait({ id: "domain-x", name: "Other", category: "domain-expertise", body: `O.${PADDING}` }),
      );
      library = new TraitLibrary();
      library.load([user]);
    });

    it("ranks exact id, then tag, then name", () => {
      expect(library.search("python").map((t) => t.id)).toEqual([
        "python",
        "snake-helper",
        "py-tutor",
      ]);
    });

    it("is case-insensitive", () => {
      expect(library.search("PYTHON").map((t) => t.id)).toEqual([
        "python",
        "snake-helper",
        "py-tutor",
      ]);
    });

    it("breaks ties by id", () => {
      expect(library.search("domain").map((t) => t.id)).toEqual(["domain-x", "python"]);
    });

    it("returns nothing for an empty query", () => {
      expect(library.search("   ")).toEqual([]);
    });
  });

  it("bumps the generation on every load", () => {
    const library = new TraitLibrary();
    expect(library.getGeneration()).toBe(0);
    library.load([user]);
    expect(library.getGeneration()).toBe(1);
    library.reload();
    expect(library.getGeneration()).toBe(2);
  });

  it("reloads lazily after invalidate", () => {
    const library = new TraitLibrary();
    library.load([user]);
    expect(library.has("helpful")).toBe(false);

    writeTrait(user, makeTrait({ id: "helpful", name: "Helpful", category: "base", body: `Help.${PADDING}` }));
    expect(library.has("helpful")).toBe(false);

    library.invalidate();
    expect(library.has("helpful")).toBe(true);
    expect(library.getGeneration()).toBe(2);
  });

  it("finds the bundled traits", () => {
    const dir = getBundledTraitsDir();
    expect(dir).toBeDefined();

    const library = new TraitLibrary();
    library.load(TraitLibrary.getDefaultSearchPaths(tmpDir));

    expect(library.getSearchPaths()).toEqual([dir, getUserTraitsDir(tmpDir)]);
    expect(library.get("helpful")?.category).toBe("base");
    expect(library.get("concise")?.category).toBe("communication-style");
    expect(library.getWarnings()).toEqual([]);
  });
});
