/**
 * slash-commands.ts: In-chat commands such as /trait and /model.
 *
 * Handlers only talk to the session and to an output sink, so the chat loop
 * decides how things are coloured and tests can capture plain text.
 */

import { getContextUsage, formatTokenCount } from "../../runtime/src/history/token-counter.js";
import type { AgentStore } from "../../runtime/src/agent-store.js";
import type { ChatSession } from "../../runtime/src/chat-session.js";
import { isProviderName, PROVIDERS } from "../../runtime/src/config.js";
import type { ContextAssembler } from "../../runtime/src/context/context-assembler.js";
import { errorMessage } from "../../runtime/src/errors.js";
import { exportConversation } from "../../runtime/src/export.js";
import {
  COMPACTION_STRATEGIES,
  isCompactionStrategy,
} from "../../runtime/src/history/history-compactor.js";
import type { TraitComposer } from "../../runtime/src/traits/trait-composer.js";
import type { TraitLibrary } from "../../runtime/src/traits/trait-library.js";
import { formatAgentLine, formatHistorySummary, formatTraitLine } from "./utils/format.js";

export interface SlashOutput {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface SlashContext {
  session: ChatSession;
  library: TraitLibrary;
  composer: TraitComposer;
  assembler: ContextAssembler;
  agents: AgentStore;
  out: SlashOutput;
  /** Mutable chat settings the loop reads before every turn. */
  settings: { stream: boolean };
}

export interface SlashResult {
  exit?: boolean;
}

interface SlashCommand {
  usage: string;
  description: string;
  run(args: string[], ctx: SlashContext): Promise<SlashResult | void> | SlashResult | void;
}

// Rough context window per provider, for the /history usage line.
const CONTEXT_WINDOWS: Record<string, number> = {
  ollama: 8_192,
  openai: 128_000,
  anthropic: 200_000,
  google: 1_000_000,
};

const COMMANDS: Record<string, SlashCommand> = {
  help: {
    usage: "/help",
    description: "Show available commands",
    run: (_args, { out }) => {
      out.info("Commands:");
      for (const command of Object.values(COMMANDS)) {
        out.info(`  ${command.usage.padEnd(34)} ${command.description}`);
      }
    },
  },

  trait: {
    usage: "/trait list|add|remove|clear|show",
    description: "Manage the active traits",
    run: runTrait,
  },

  model: {
    usage: "/model [provider] [model]",
    description: "Show or switch the backend",
    run: (args, { session, out }) => {
      const [provider, model] = args;
      if (!provider) {
        const backend = session.getBackend();
        out.info(`Current backend: ${backend.provider}/${backend.model}`);
        return;
      }
      if (!isProviderName(provider)) {
        out.error(`Unknown provider '${provider}'. Choose from: ${PROVIDERS.join(", ")}`);
        return;
      }
      try {
        const backend = session.switchBackend(provider, model);
        out.success(`Switched to ${backend.provider}/${backend.model}`);
      } catch (error) {
        out.error(errorMessage(error));
      }
    },
  },

  agent: {
    usage: "/agent list|show|create|use|delete",
    description: "Save or switch to a backend and trait preset",
    run: runAgent,
  },

  strategy: {
    usage: "/strategy [recent|first|middle]",
    description: "Show or set the compaction strategy",
    run: (args, { session, out }) => {
      const [name] = args;
      if (!name) {
        out.info(`Compaction strategy: ${session.conversation.compactionStrategy}`);
        return;
      }
      if (!isCompactionStrategy(name)) {
        out.error(
          `Unknown strategy '${name}'. Choose from: ${COMPACTION_STRATEGIES.join(", ")}`,
        );
        return;
      }
      session.conversation.compactionStrategy = name;
      session.persist();
      out.success(`Compaction strategy set to ${name}`);
    },
  },

  history: {
    usage: "/history [count]",
    description: "Show recent messages and context usage",
    run: (args, { session, assembler, out }) => {
      const count = args[0] ? Number.parseInt(args[0], 10) : 10;
      const turns = session.conversation.history.snapshot();
      for (const line of formatHistorySummary(turns, count > 0 ? count : 10)) {
        out.info(line);
      }

      const system = assembler.systemPrompt(session.conversation).prompt;
      const sent = assembler.historyMessages(session.conversation);
      const messages = system
        ? [{ role: "system" as const, text: system }, ...sent.messages]
        : sent.messages;
      const usage = getContextUsage(
        messages,
        CONTEXT_WINDOWS[session.conversation.provider] ?? 8_192,
      );
      out.info(
        `Context: ~${formatTokenCount(usage.tokenCount)} tokens (${usage.percentage.toFixed(1)}%, ${usage.status})`,
      );
      if (sent.compactedAway > 0) {
        out.info(
          `${sent.compactedAway} message(s) are left out by the '${session.conversation.compactionStrategy}' strategy`,
        );
      }
    },
  },

  compact: {
    usage: "/compact",
    description: "Drop messages the strategy would leave out",
    run: (_args, { session, out }) => {
      const removed = session.compact();
      if (removed === 0) {
        out.info("History is within the limit; nothing to compact.");
      } else {
        out.success(`Removed ${removed} message(s) from history`);
      }
    },
  },

  summarize: {
    usage: "/summarize",
    description: "Replace older messages with a summary",
    run: async (_args, { session, out }) => {
      const result = await session.summarize();
      if (result.warning) {
        out.warn(result.warning);
      } else if (result.summarized === 0) {
        out.info("Not enough history to summarize.");
      } else {
        out.success(`Summarized ${result.summarized} message(s)`);
      }
    },
  },

  clear: {
    usage: "/clear",
    description: "Clear the conversation history",
    run: (_args, { session, out }) => {
      session.clear();
      out.success("Conversation history cleared");
    },
  },

  export: {
    usage: "/export <file>",
    description: "Write the history to Markdown or JSON",
    run: (args, { session, out }) => {
      const [filename] = args;
      if (!filename) {
        out.error("Usage: /export <file>");
        return;
      }
      const conversation = session.conversation;
      try {
        const path = exportConversation(filename, conversation.history.snapshot(), {
          provider: conversation.provider,
          model: conversation.model,
          traitIds: conversation.traitIds,
        });
        out.success(`Exported ${conversation.history.size()} message(s) to ${path}`);
      } catch (error) {
        out.error(`Export failed: ${errorMessage(error)}`);
      }
    },
  },

  stream: {
    usage: "/stream [on|off]",
    description: "Toggle streaming replies",
    run: (args, { settings, out }) => {
      const [value] = args;
      if (value === "on" || value === "off") {
        settings.stream = value === "on";
      } else if (value) {
        out.error("Usage: /stream on|off");
        return;
      }
      out.info(`Streaming is ${settings.stream ? "on" : "off"}`);
    },
  },

  exit: {
    usage: "/exit",
    description: "Leave the chat",
    run: () => ({ exit: true }),
  },
};

const ALIASES: Record<string, string> = { quit: "exit", q: "exit", "?": "help" };

export function isSlashCommand(input: string): boolean {
  return input.trim().startsWith("/");
}

/**
 * Run one slash command line. Unknown commands are reported, not thrown.
 */
export async function runSlashCommand(
  input: string,
  ctx: SlashContext,
): Promise<SlashResult> {
  const [head = "", ...args] = input.trim().slice(1).split(/\s+/).filter(Boolean);
  const name = ALIASES[head.toLowerCase()] ?? head.toLowerCase();
  const command = COMMANDS[name];
  if (!command) {
    ctx.out.error(`Unknown command: /${head}. Type /help for the list.`);
    return {};
  }
  const result = await command.run(args, ctx);
  return typeof result === "object" ? result : {};
}

// ── /trait ──────────────────────────────────────────────────────────────────

function runTrait(args: string[], ctx: SlashContext): void {
  const { session, library, composer, out } = ctx;
  const conversation = session.conversation;
  const [action = "list", ...ids] = args;

  switch (action) {
    case "list": {
      const active = new Set(conversation.traitIds);
      const traits = library.list();
      if (traits.length === 0) {
        out.info("No traits available.");
        return;
      }
      for (const trait of traits) {
        out.info(`${active.has(trait.id) ? "*" : " "} ${formatTraitLine(trait)}`);
      }
      return;
    }

    case "add": {
      if (ids.length === 0) {
        out.error("Usage: /trait add <id> [id...]");
        return;
      }
      for (const id of ids) {
        if (!library.has(id)) {
          out.warn(`Unknown trait '${id}'`);
        } else if (conversation.addTrait(id)) {
          out.success(`Added trait ${id}`);
        } else {
          out.info(`Trait ${id} is already active`);
        }
      }
      session.persist();
      return;
    }

    case "remove": {
      if (ids.length === 0) {
        out.error("Usage: /trait remove <id> [id...]");
        return;
      }
      for (const id of ids) {
        if (conversation.removeTrait(id)) {
          out.success(`Removed trait ${id}`);
        } else {
          out.warn(`Trait ${id} is not active`);
        }
      }
      session.persist();
      return;
    }

    case "clear":
      conversation.clearTraits();
      session.persist();
      out.success("All traits removed");
      return;

    case "show": {
      const composition = composer.composeDetailed(conversation.traitIds);
      for (const warning of composition.warnings) out.warn(warning);
      if (!composition.prompt) {
        out.info("No system prompt (no active traits).");
        return;
      }
      out.info(`Active: ${composition.applied.map((t) => t.id).join(", ")}`);
      out.info(composition.prompt);
      return;
    }

    default:
      out.error(`Unknown trait action '${action}'. Use list, add, remove, clear or show.`);
  }
}

// ── /agent ──────────────────────────────────────────────────────────────────

function runAgent(args: string[], ctx: SlashContext): void {
  const { session, library, agents, out } = ctx;
  const [action = "list", name, ...rest] = args;

  if (action !== "list" && !name) {
    out.error(`Usage: /agent ${action} <name>`);
    return;
  }

  switch (action) {
    case "list": {
      const presets = agents.list();
      if (presets.length === 0) {
        out.info("No agents saved. Use /agent create <name> to save the current setup.");
        return;
      }
      for (const preset of presets) out.info(formatAgentLine(preset));
      return;
    }

    case "show": {
      const preset = agents.get(name);
      if (!preset) {
        out.error(`Agent '${name}' not found`);
        return;
      }
      out.info(`Agent: ${preset.name}`);
      out.info(`Backend: ${preset.provider}/${preset.model}`);
      out.info(`Traits: ${preset.traitIds.length > 0 ? preset.traitIds.join(", ") : "none"}`);
      if (preset.description) out.info(`About: ${preset.description}`);
      return;
    }

    case "create": {
      const conversation = session.conversation;
      const existed = agents.has(name);
      try {
        agents.save({
          name,
          provider: conversation.provider,
          model: conversation.model,
          traitIds: [...conversation.traitIds],
          description: rest.join(" "),
        });
      } catch (error) {
        out.error(errorMessage(error));
        return;
      }
      out.success(
        `${existed ? "Updated" : "Saved"} agent ${name} (${conversation.provider}/${conversation.model})`,
      );
      return;
    }

    case "use": {
      const preset = agents.get(name);
      if (!preset) {
        out.error(`Agent '${name}' not found`);
        return;
      }
      try {
        const backend = session.useAgent(preset);
        out.success(`Switched to agent ${preset.name} (${backend.provider}/${backend.model})`);
      } catch (error) {
        out.error(errorMessage(error));
        return;
      }
      for (const id of preset.traitIds) {
        if (!library.has(id)) out.warn(`Unknown trait '${id}'`);
      }
      return;
    }

    case "delete":
      if (agents.remove(name)) {
        out.success(`Deleted agent ${name}`);
      } else {
        out.error(`Agent '${name}' not found`);
      }
      return;

    default:
      out.error(`Unknown agent action '${action}'. Use list, show, create, use or delete.`);
  }
}
