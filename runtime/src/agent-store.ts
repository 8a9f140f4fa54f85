/**
 * agent-store.ts: Named presets that bind a backend, a model and a trait
 * list so a setup can be recalled with one command.
 *
 * Files managed:
 *   ~/.beadchat/agents.json: { "<name>": { provider, model, traitIds, description } }
 */

import { join } from "path";
import { z } from "zod";
import { PROVIDERS } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { readJsonFile, writeJsonFile } from "./file-store.js";
import { silentLogger, type Logger } from "./logger.js";

export const AGENT_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

const agentFieldsSchema = z.object({
  provider: z.enum(PROVIDERS),
  model: z.string().trim().min(1),
  traitIds: z.array(z.string()).default([]),
  description: z.string().default(""),
});

type AgentFields = z.infer<typeof agentFieldsSchema>;

export interface AgentPreset extends AgentFields {
  name: string;
}

export class AgentStore {
  private readonly agentsPath: string;
  private readonly logger: Logger;

  constructor(homeDir: string, options: { logger?: Logger } = {}) {
    this.agentsPath = join(homeDir, "agents.json");
    this.logger = options.logger ?? silentLogger;
  }

  /** Readable presets sorted by name; unreadable entries are skipped. */
  list(): AgentPreset[] {
    const presets: AgentPreset[] = [];
    for (const [name, raw] of Object.entries(this.readAll())) {
      const preset = this.parse(name, raw);
      if (preset) presets.push(preset);
    }
    return presets.sort((a, b) => a.name.localeCompare(b.name));
  }

  get(name: string): AgentPreset | undefined {
    const raw = this.readAll()[name];
    return raw === undefined ? undefined : this.parse(name, raw);
  }

  has(name: string): boolean {
    return name in this.readAll();
  }

  /**
   * Create or replace a preset. Throws `ConfigurationError` for a bad name
   * or field.
   */
  save(preset: AgentPreset): void {
    if (!AGENT_NAME_PATTERN.test(preset.name)) {
      throw new ConfigurationError(
        `Invalid agent name '${preset.name}': use lowercase letters, digits, '-' or '_'`,
      );
    }
    const result = agentFieldsSchema.safeParse(preset);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigurationError(
        `Invalid agent ${issue.path.join(".")}: ${issue.message}`,
      );
    }

    const agents = this.readAll();
    agents[preset.name] = result.data;
    writeJsonFile(this.agentsPath, agents);
    this.logger.info(`Saved agent ${preset.name}`);
  }

  remove(name: string): boolean {
    const agents = this.readAll();
    if (!(name in agents)) return false;
    delete agents[name];
    writeJsonFile(this.agentsPath, agents);
    this.logger.info(`Deleted agent ${name}`);
    return true;
  }

  private parse(name: string, raw: unknown): AgentPreset | undefined {
    const result = agentFieldsSchema.safeParse(raw);
    if (!result.success) {
      this.logger.warn(
        `Ignoring unreadable agent ${name}: ${result.error.issues[0].message}`,
      );
      return undefined;
    }
    return { name, ...result.data };
  }

  private readAll(): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = readJsonFile(this.agentsPath);
    } catch (error) {
      this.logger.warn(
        `Could not parse ${this.agentsPath}, starting fresh: ${errorMessage(error)}`,
      );
      return {};
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return {};
    }
    return Object.fromEntries(Object.entries(parsed));
  }
}
