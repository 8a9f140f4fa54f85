import inquirer from "inquirer";
import chalk from "chalk";
import { errorMessage } from "../../../runtime/src/errors.js";
import {
  buildTrait,
  CATEGORY_PRIORITY,
  isTraitCategory,
  MAX_BODY_LENGTH,
  MIN_BODY_LENGTH,
  OVERRIDE_RULES,
  TRAIT_CATEGORIES,
  TRAIT_ID_PATTERN,
  type Trait,
  type TraitCategory,
} from "../../../runtime/src/traits/trait-builder.js";
import { createCliContext, printWarnings, type CliContext } from "../utils/context.js";
import { formatTraitLine } from "../utils/format.js";

/**
 * beadchat trait <action> [args...]
 *
 * Actions:
 *   list [category]     All loaded traits, sorted by id
 *   show <id>           Metadata and body of one trait
 *   search <query>      Ranked search over id, tags, name and category
 *   compose <ids...>    Print the system prompt the ids produce
 *   create              Interactive wizard; saves to ~/.beadchat/traits
 *   path                Directories traits are loaded from
 */
export async function traitCommand(action?: string, args: string[] = []): Promise<void> {
  const ctx = createCliContext();

  switch (action) {
    case "list":
      listTraits(ctx, args[0]);
      break;
    case "show":
      showTrait(ctx, args[0]);
      break;
    case "search":
      searchTraits(ctx, args.join(" "));
      break;
    case "compose":
      composeTraits(ctx, args);
      break;
    case "create":
      await createTrait(ctx);
      break;
    case "path":
      for (const dir of ctx.library.getSearchPaths()) {
        console.log(dir);
      }
      break;
    default:
      showHelp();
  }
}

function listTraits(ctx: CliContext, category?: string): void {
  if (category && !isTraitCategory(category)) {
    console.log(chalk.red(`\n❌ Unknown category '${category}'`));
    console.log(chalk.gray(`Categories: ${TRAIT_CATEGORIES.join(", ")}\n`));
    process.exitCode = 1;
    return;
  }
  printWarnings(ctx.library.getWarnings());

  const traits = category && isTraitCategory(category)
    ? ctx.library.list(category)
    : ctx.library.list();
  if (traits.length === 0) {
    console.log(chalk.yellow("No traits found."));
    console.log(chalk.dim(`Searched directories: ${ctx.library.getSearchPaths().join(", ")}`));
    return;
  }

  console.log(chalk.cyan(`\n🧩 ${traits.length} trait(s):\n`));
  printTraitGroups(traits);
}

function printTraitGroups(traits: readonly Trait[]): void {
  const byCategory = new Map<TraitCategory, Trait[]>();
  for (const trait of traits) {
    const group = byCategory.get(trait.category) ?? [];
    group.push(trait);
    byCategory.set(trait.category, group);
  }

  for (const category of TRAIT_CATEGORIES) {
    const group = byCategory.get(category);
    if (!group) continue;
    console.log(chalk.bold.white(`  ${category}`));
    for (const trait of group) {
      console.log(`    ${chalk.green(trait.id)} ${chalk.dim(trait.name)}`);
      if (trait.description) console.log(chalk.dim(`      ${trait.description}`));
    }
    console.log();
  }
}

function showTrait(ctx: CliContext, id?: string): void {
  if (!id) {
    console.log(chalk.red("\n❌ Usage: beadchat trait show <id>\n"));
    return;
  }
  const trait = ctx.library.get(id);
  if (!trait) {
    console.log(chalk.red(`\n❌ Trait '${id}' not found\n`));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.cyan.bold(`\n${trait.name}`) + chalk.gray(` (${trait.id})\n`));
  console.log(`Category:  ${trait.category}`);
  console.log(`Priority:  ${trait.priority}`);
  console.log(`Override:  ${trait.override}`);
  console.log(`Version:   ${trait.version}`);
  if (trait.author) console.log(`Author:    ${trait.author}`);
  if (trait.tags.length > 0) console.log(`Tags:      ${trait.tags.join(", ")}`);
  if (trait.description) console.log(`About:     ${trait.description}`);
  if (trait.source) console.log(chalk.dim(`Source:    ${trait.source}`));
  console.log(`\n${trait.body}\n`);
}

function searchTraits(ctx: CliContext, query: string): void {
  const results = ctx.library.search(query);
  if (results.length === 0) {
    console.log(chalk.yellow(`No traits match '${query}'.`));
    return;
  }
  for (const trait of results) {
    console.log(`  ${formatTraitLine(trait)}`);
  }
}

function composeTraits(ctx: CliContext, ids: string[]): void {
  const composition = ctx.composer.composeDetailed(ids);
  printWarnings(composition.warnings);
  if (!composition.prompt) {
    console.log(chalk.gray("(empty system prompt)"));
    return;
  }
  console.log(chalk.dim(`Applied: ${composition.applied.map((t) => t.id).join(" → ")}\n`));
  console.log(composition.prompt);
}

type TraitAnswers = {
  name: string;
  category: TraitCategory;
  override: string;
  priority: string;
  tags: string;
  description: string;
  body: string;
};

export async function createTrait(ctx: CliContext): Promise<void> {
  console.log(chalk.cyan.bold("\n🧩 Create a trait\n"));

  const { id } = await inquirer.prompt<{ id: string }>([
    {
      type: "input",
      name: "id",
      message: "Trait id (lowercase, hyphens):",
      validate: (input: string) =>
        TRAIT_ID_PATTERN.test(input) ||
        "Must start with a lowercase letter and use only a-z, 0-9 and '-'",
    },
  ]);

  // Saving under an existing id puts a copy in the user layer, which wins
  const existing = ctx.library.get(id);
  if (existing) {
    const where = existing.source === ctx.traitStore.pathFor(id)
      ? "your traits; it will be replaced"
      : existing.source ?? "another trait directory";
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: "confirm",
        name: "confirmed",
        message: `Trait '${id}' already exists (${where}). Save your own version over it?`,
        default: false,
      },
    ]);
    if (!confirmed) {
      console.log(chalk.gray("Cancelled."));
      return;
    }
  }

  const answers = await inquirer.prompt<TraitAnswers>([
    {
      type: "input",
      name: "name",
      message: "Display name:",
      default: existing?.name,
      validate: (input: string) => input.trim().length > 0 || "Name required",
    },
    {
      type: "list",
      name: "category",
      message: "Category:",
      choices: [...TRAIT_CATEGORIES],
      default: existing?.category,
    },
    {
      type: "list",
      name: "override",
      message: "How should it combine with earlier traits?",
      choices: [...OVERRIDE_RULES],
      default: existing?.override ?? "append",
    },
    {
      type: "input",
      name: "priority",
      message: "Priority (blank for the category default):",
      default: existing ? String(existing.priority) : undefined,
      validate: (input: string) =>
        input.trim() === "" || /^-?\d+$/.test(input.trim()) || "Must be an integer",
    },
    {
      type: "input",
      name: "tags",
      message: "Tags (comma separated):",
      default: existing?.tags.join(", "),
    },
    {
      type: "input",
      name: "description",
      message: "Short description:",
      default: existing?.description,
    },
    {
      type: "editor",
      name: "body",
      message: `Prompt text (${MIN_BODY_LENGTH}-${MAX_BODY_LENGTH} characters):`,
      default: existing?.body,
      validate: (input: string) => {
        const length = input.trim().length;
        if (length < MIN_BODY_LENGTH) return `Too short (${length}/${MIN_BODY_LENGTH})`;
        if (length > MAX_BODY_LENGTH) return `Too long (${length}/${MAX_BODY_LENGTH})`;
        return true;
      },
    },
  ]);

  const result = buildTrait({
    id,
    name: answers.name,
    category: answers.category,
    override: answers.override,
    priority:
      answers.priority.trim() === ""
        ? CATEGORY_PRIORITY[answers.category]
        : Number.parseInt(answers.priority, 10),
    tags: answers.tags,
    description: answers.description,
    body: answers.body,
  });
  if (!result.ok) {
    console.log(chalk.red(`\n❌ ${result.error.message}\n`));
    process.exitCode = 1;
    return;
  }

  try {
    const path = ctx.traitStore.save(result.trait);
    console.log(chalk.green(`\n✅ Saved trait '${result.trait.id}' to ${path}\n`));
  } catch (error) {
    console.log(chalk.red(`\n❌ Failed to save trait: ${errorMessage(error)}\n`));
    process.exitCode = 1;
  }
}

function showHelp(): void {
  console.log(chalk.cyan("beadchat traits — Manage prompt traits\n"));
  console.log("Usage: beadchat trait <action>\n");
  console.log("Actions:");
  console.log("  list [category]   — Show all loaded traits");
  console.log("  show <id>         — Show one trait");
  console.log("  search <query>    — Search by id, tag, name or category");
  console.log("  compose <ids...>  — Print the composed system prompt");
  console.log("  create            — Create a trait interactively");
  console.log("  path              — Show trait directories");
}
