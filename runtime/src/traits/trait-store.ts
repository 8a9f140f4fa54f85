import { join } from "path";
import matter from "gray-matter";
import { writeFileAtomic } from "../file-store.js";
import { silentLogger, type Logger } from "../logger.js";
import { buildTrait, type Trait } from "./trait-builder.js";
import { getUserTraitsDir, type TraitLibrary } from "./trait-library.js";

/**
 * Persists user-authored traits to <home>/traits/<id>.md and tells the
 * library to reload on its next lookup.
 */
export class TraitStore {
  private readonly userDir: string;
  private readonly logger: Logger;

  constructor(
    homeDir: string,
    private readonly library?: TraitLibrary,
    options: { logger?: Logger } = {},
  ) {
    this.userDir = getUserTraitsDir(homeDir);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate and write a trait. Throws `TraitValidationError` when a field
   * is invalid. Returns the written path.
   */
  save(trait: Trait): string {
    const result = buildTrait({
      ...trait,
      tags: [...trait.tags],
      source: undefined,
    });
    if (!result.ok) {
      throw result.error;
    }

    const filePath = this.pathFor(result.trait.id);
    writeFileAtomic(filePath, serializeTrait(result.trait));
    this.library?.invalidate();
    this.logger.info(`Saved trait ${result.trait.id} to ${filePath}`);
    return filePath;
  }

  pathFor(id: string): string {
    return join(this.userDir, `${id}.md`);
  }
}

export function serializeTrait(trait: Trait): string {
  const data: Record<string, unknown> = {
    id: trait.id,
    name: trait.name,
    category: trait.category,
    priority: trait.priority,
    override: trait.override,
    tags: [...trait.tags],
    version: trait.version,
  };
  if (trait.description) data.description = trait.description;
  if (trait.author) data.author = trait.author;

  return matter.stringify(`${trait.body}\n`, data);
}
