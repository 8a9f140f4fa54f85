/**
 * project-config.ts: Per-project defaults, found by walking up from the
 * working directory to the filesystem root.
 *
 * Files recognised, first match per directory wins:
 *   .agent.yml / .agent.yaml   YAML with provider, model, traits, instructions
 *   claude.md, gemini.md,      Markdown whose body becomes the project
 *   gpt.md, ollama.md          instructions; the file name picks the provider
 *                              unless front matter names one
 */

import { readFileSync, statSync } from "fs";
import { basename, dirname, join, resolve } from "path";
import matter from "gray-matter";
import { z } from "zod";
import { parseList, PROVIDERS, type ProviderName } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";

const PROJECT_CONFIG_FILES = [
  ".agent.yml",
  ".agent.yaml",
  "claude.md",
  "gemini.md",
  "gpt.md",
  "ollama.md",
] as const;

const PROVIDER_BY_FILE: Record<string, ProviderName> = {
  "claude.md": "anthropic",
  "gemini.md": "google",
  "gpt.md": "openai",
  "ollama.md": "ollama",
};

// "default" means "whatever the user config says"
const modelSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => (value === "default" ? undefined : value));

const projectFieldsSchema = z.object({
  provider: z.enum(PROVIDERS).optional(),
  model: modelSchema.optional(),
  traits: z.preprocess(parseList, z.array(z.string())).optional(),
  instructions: z.string().optional(),
  system_prompt: z.string().optional(),
});

export interface ProjectConfig {
  path: string;
  provider?: ProviderName;
  model?: string;
  traitIds?: string[];
  instructions: string;
}

export interface ProjectConfigResult {
  config?: ProjectConfig;
  warnings: string[];
}

/**
 * Nearest project config at or above `startDir`. The walk ends at the root,
 * or after `stopDir` has been checked.
 */
export function findProjectConfig(
  startDir: string,
  stopDir?: string,
): string | undefined {
  const stop = stopDir === undefined ? undefined : resolve(stopDir);
  let current = resolve(startDir);

  while (true) {
    for (const name of PROJECT_CONFIG_FILES) {
      const candidate = join(current, name);
      if (statSync(candidate, { throwIfNoEntry: false })?.isFile()) {
        return candidate;
      }
    }
    const parent = dirname(current);
    if (parent === current || current === stop) return undefined;
    current = parent;
  }
}

/**
 * Parse one project config file. Throws `ConfigurationError` when a field
 * is invalid.
 */
export function parseProjectConfig(path: string, content: string): ProjectConfig {
  const name = basename(path).toLowerCase();
  const isMarkdown = name.endsWith(".md");
  const parsed = isMarkdown ? matter(content) : matter(`---\n${content}\n---\n`);

  const result = projectFieldsSchema.safeParse(parsed.data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`${issue.path.join(".") || "config"}: ${issue.message}`);
  }
  const fields = result.data;

  const body = isMarkdown ? parsed.content.trim() : "";
  const instructions = body || (fields.instructions ?? fields.system_prompt ?? "").trim();

  return {
    path,
    provider: fields.provider ?? PROVIDER_BY_FILE[name],
    model: fields.model,
    traitIds: fields.traits,
    instructions,
  };
}

/**
 * Find and read the project config. A file that cannot be read or parsed
 * is reported as a warning and ignored.
 */
export function loadProjectConfig(
  startDir = process.cwd(),
  options: { stopDir?: string } = {},
): ProjectConfigResult {
  const path = findProjectConfig(startDir, options.stopDir);
  if (path === undefined) return { warnings: [] };

  try {
    return { config: parseProjectConfig(path, readFileSync(path, "utf-8")), warnings: [] };
  } catch (error) {
    return { warnings: [`Ignoring project config ${path}: ${errorMessage(error)}`] };
  }
}
