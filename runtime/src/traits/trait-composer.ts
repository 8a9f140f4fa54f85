import { silentLogger, type Logger } from "../logger.js";
import type { Trait } from "./trait-builder.js";
import type { TraitLibrary } from "./trait-library.js";

const SEPARATOR = "\n\n";

export interface Composition {
  prompt: string;
  /** Traits in the order they were folded. */
  applied: Trait[];
  /** Ids that did not resolve. */
  missing: string[];
  warnings: string[];
}

/**
 * Folds an ordered list of trait ids into one system prompt.
 *
 * Traits are stable-sorted by priority (input order breaks ties) and applied
 * left to right: append adds after the accumulated text, prepend adds before
 * it, replace discards it. Unknown ids are skipped, never fatal.
 */
export class TraitComposer {
  private cache: Map<string, Composition> = new Map();
  private cacheGeneration = -1;
  private readonly logger: Logger;

  constructor(
    private readonly library: TraitLibrary,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  compose(traitIds: readonly string[]): string {
    return this.composeDetailed(traitIds).prompt;
  }

  composeDetailed(traitIds: readonly string[]): Composition {
    const generation = this.library.getGeneration();
    if (generation !== this.cacheGeneration) {
      this.cache.clear();
      this.cacheGeneration = generation;
    }

    const key = JSON.stringify(traitIds);
    const cached = this.cache.get(key);
    if (cached) {
      return copyComposition(cached);
    }

    const composition = this.fold(traitIds);
    this.cache.set(key, composition);
    return copyComposition(composition);
  }

  private fold(traitIds: readonly string[]): Composition {
    const resolved: Trait[] = [];
    const missing: string[] = [];
    const warnings: string[] = [];

    for (const id of traitIds) {
      const trait = this.library.get(id);
      if (trait) {
        resolved.push(trait);
      } else {
        missing.push(id);
        const warning = `Unknown trait '${id}' skipped`;
        warnings.push(warning);
        this.logger.warn(warning);
      }
    }

    // Array.prototype.sort is stable, so equal priorities keep input order.
    const ordered = [...resolved].sort((a, b) => a.priority - b.priority);

    let acc = "";
    for (const trait of ordered) {
      const body = trait.body;
      switch (trait.override) {
        case "append":
          acc = acc ? acc + SEPARATOR + body : body;
          break;
        case "prepend":
          acc = acc ? body + SEPARATOR + acc : body;
          break;
        case "replace":
          acc = body;
          break;
      }
    }

    return { prompt: acc.trim(), applied: ordered, missing, warnings };
  }
}

function copyComposition(composition: Composition): Composition {
  return {
    prompt: composition.prompt,
    applied: [...composition.applied],
    missing: [...composition.missing],
    warnings: [...composition.warnings],
  };
}
