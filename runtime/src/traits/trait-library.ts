/**
 * trait-library.ts: Layered discovery of personality traits ("beads").
 *
 * Trait files are Markdown with YAML front matter:
 *
 * ---
 * id: concise
 * name: Concise
 * category: response-modifier
 * override: append
 * tags: brevity, short
 * ---
 * Keep answers short...
 *
 * Directories are loaded in order; a trait in a later directory replaces one
 * with the same id from an earlier directory (bundled defaults, then the
 * user's own traits).
 */

import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import matter from "gray-matter";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { buildTrait, type Trait, type TraitCategory } from "./trait-builder.js";

const TRAIT_FILE_EXTENSION = ".md";

// ── Library ─────────────────────────────────────────────────────────────────

export class TraitLibrary {
  private traits: Map<string, Trait> = new Map();
  private searchPaths: string[] = [];
  private warnings: string[] = [];
  private generation = 0;
  private stale = false;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Scan each directory recursively for trait files. Later directories win
   * on id collisions; malformed files are skipped with a warning.
   */
  load(searchPaths: string[]): Trait[] {
    this.searchPaths = [...searchPaths];
    this.traits = new Map();
    this.warnings = [];

    for (const dir of this.searchPaths) {
      if (!existsSync(dir)) continue;

      for (const file of listTraitFiles(dir, (message) => this.warn(message))) {
        const trait = this.parseTraitFile(file);
        if (trait) {
          this.traits.set(trait.id, trait);
        }
      }
    }

    this.generation += 1;
    this.stale = false;
    this.logger.debug(
      `Loaded ${this.traits.size} trait(s) from ${this.searchPaths.length} path(s)`,
    );
    return this.list();
  }

  /**
   * Re-read the same search paths.
   */
  reload(): Trait[] {
    return this.load(this.searchPaths);
  }

  /**
   * Mark the library stale; the next lookup reloads from disk.
   */
  invalidate(): void {
    this.stale = true;
  }

  /**
   * Bumped on every (re)load. Composition caches key on it.
   */
  getGeneration(): number {
    this.ensureFresh();
    return this.generation;
  }

  get(id: string): Trait | undefined {
    this.ensureFresh();
    return this.traits.get(id);
  }

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  /**
   * All traits, optionally limited to a category, ordered by id.
   */
  list(category?: TraitCategory): Trait[] {
    this.ensureFresh();
    return [...this.traits.values()]
      .filter((t) => !category || t.category === category)
      .sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Case-insensitive substring search over tags, name and category.
   *
   * Ranking: exact id, then tag match, then name match, then category
   * match; ties broken by id.
   */
  search(query: string): Trait[] {
    this.ensureFresh();
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    return [...this.traits.values()]
      .map((trait) => ({ trait, rank: rankMatch(trait, needle) }))
      .filter(
        (entry): entry is { trait: Trait; rank: number } => entry.rank !== null,
      )
      .sort((a, b) => a.rank - b.rank || compareIds(a.trait.id, b.trait.id))
      .map((entry) => entry.trait);
  }

  count(): number {
    this.ensureFresh();
    return this.traits.size;
  }

  getWarnings(): string[] {
    return [...this.warnings];
  }

  getSearchPaths(): string[] {
    return [...this.searchPaths];
  }

  private ensureFresh(): void {
    if (this.stale) {
      this.reload();
    }
  }

  private parseTraitFile(filePath: string): Trait | null {
    let fields: Record<string, unknown>;
    try {
      const { data, content } = matter(readFileSync(filePath, "utf-8"));
      fields = { ...data, body: content, source: filePath };
    } catch (error) {
      this.warn(`Skipped trait file ${filePath}: ${errorMessage(error)}`);
      return null;
    }

    const result = buildTrait(fields);
    if (!result.ok) {
      this.warn(`Skipped trait file ${filePath}: ${result.error.message}`);
      return null;
    }
    return result.trait;
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(message);
  }

  // ── Paths ─────────────────────────────────────────────────────────────────

  /**
   * Bundled traits first, then the user's own under <home>/traits.
   */
  static getDefaultSearchPaths(homeDir: string): string[] {
    const dirs: string[] = [];
    const bundled = getBundledTraitsDir();
    if (bundled) dirs.push(bundled);
    dirs.push(getUserTraitsDir(homeDir));
    return dirs;
  }
}

export function getUserTraitsDir(homeDir: string): string {
  return join(homeDir, "traits");
}

/**
 * Locate runtime/traits both from the sources and from the compiled
 * dist/runtime/src/traits directory.
 */
export function getBundledTraitsDir(): string | undefined {
  const candidates = ["../../traits/", "../../../../runtime/traits/"].map((rel) =>
    fileURLToPath(new URL(rel, import.meta.url)),
  );
  return candidates.find((dir) => existsSync(dir));
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Every trait file under `dir`, sorted. Entries that cannot be read or
 * stat'ed (dangling symlinks, permission errors) are reported and skipped.
 */
function listTraitFiles(dir: string, warn: (message: string) => void): string[] {
  const files: string[] = [];

  const walk = (current: string) => {
    let entries: string[];
    try {
      entries = readdirSync(current).sort();
    } catch (error) {
      warn(`Skipped trait directory ${current}: ${errorMessage(error)}`);
      return;
    }

    for (const entry of entries) {
      const entryPath = join(current, entry);
      let isDirectory: boolean;
      try {
        isDirectory = statSync(entryPath).isDirectory();
      } catch (error) {
        warn(`Skipped trait file ${entryPath}: ${errorMessage(error)}`);
        continue;
      }
      if (isDirectory) {
        walk(entryPath);
      } else if (entry.endsWith(TRAIT_FILE_EXTENSION)) {
        files.push(entryPath);
      }
    }
  };

  walk(dir);
  return files.sort();
}

function rankMatch(trait: Trait, needle: string): number | null {
  if (trait.id === needle) return 0;
  if (trait.tags.some((tag) => tag.toLowerCase().includes(needle))) return 1;
  if (trait.name.toLowerCase().includes(needle)) return 2;
  if (trait.category.includes(needle)) return 3;
  return null;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
