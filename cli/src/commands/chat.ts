import inquirer from "inquirer";
import chalk from "chalk";
import ora from "ora";
import { ChatSession } from "../../../runtime/src/chat-session.js";
import {
  isProviderName,
  modelFor,
  type ProviderName,
} from "../../../runtime/src/config.js";
import { ConversationState } from "../../../runtime/src/conversation.js";
import { errorMessage } from "../../../runtime/src/errors.js";
import {
  isCompactionStrategy,
  type CompactionStrategy,
} from "../../../runtime/src/history/history-compactor.js";
import { getTerminalSessionKey } from "../../../runtime/src/session-store.js";
import { isSlashCommand, runSlashCommand, type SlashOutput } from "../slash-commands.js";
import { createCliContext, printWarnings, type CliContext } from "../utils/context.js";

export interface ChatOptions {
  provider?: string;
  model?: string;
  traits?: string;
  strategy?: string;
  stream?: boolean;
  new?: boolean;
  agent?: string;
}

const consoleOutput: SlashOutput = {
  info: (message) => console.log(message),
  success: (message) => console.log(chalk.green(`✅ ${message}`)),
  warn: (message) => console.log(chalk.yellow(`⚠️  ${message}`)),
  error: (message) => console.log(chalk.red(`❌ ${message}`)),
};

export function parseTraitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Resume this terminal's conversation or start one from the project config
 * and user config. A named agent is applied on top, and flags given on the
 * command line win over everything else.
 */
export function openConversation(
  ctx: CliContext,
  options: ChatOptions,
  sessionKey: string,
): ConversationState {
  let provider: ProviderName | undefined;
  if (options.provider) {
    if (!isProviderName(options.provider)) {
      throw new Error(`Unknown provider '${options.provider}'`);
    }
    provider = options.provider;
  }
  let strategy: CompactionStrategy | undefined;
  if (options.strategy) {
    if (!isCompactionStrategy(options.strategy)) {
      throw new Error(`Unknown compaction strategy '${options.strategy}'`);
    }
    strategy = options.strategy;
  }
  const preset = options.agent ? ctx.agents.get(options.agent) : undefined;
  if (options.agent && !preset) {
    throw new Error(`Unknown agent '${options.agent}'`);
  }

  const stored = options.new ? undefined : ctx.sessions.load(sessionKey);
  const conversation = stored ?? startConversation(ctx);

  if (preset) {
    conversation.bind(preset.provider, preset.model);
    conversation.setTraits([...preset.traitIds]);
  }
  if (provider) {
    conversation.bind(provider, options.model ?? modelFor(ctx.config, provider));
  } else if (options.model) {
    conversation.bind(conversation.provider, options.model);
  }
  if (strategy) conversation.compactionStrategy = strategy;
  if (options.traits !== undefined) {
    conversation.setTraits(parseTraitList(options.traits));
  }
  return conversation;
}

function startConversation(ctx: CliContext): ConversationState {
  const project = ctx.project.config;
  const provider = project?.provider ?? ctx.config.defaultProvider;
  return new ConversationState({
    provider,
    model: project?.model ?? modelFor(ctx.config, provider),
    traitIds: project?.traitIds ?? ctx.config.defaultTraits,
    compactionStrategy: ctx.config.compactionStrategy,
  });
}

function startSession(options: ChatOptions): { ctx: CliContext; session: ChatSession } {
  const ctx = createCliContext();
  const sessionKey = getTerminalSessionKey();
  const session = new ChatSession({
    conversation: openConversation(ctx, options, sessionKey),
    assembler: ctx.assembler,
    createBackend: ctx.createBackend,
    sink: ctx.sessions,
    sessionKey,
    logger: ctx.logger,
  });
  return { ctx, session };
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  console.log(chalk.cyan.bold("\n💬 beadchat\n"));

  let setup: { ctx: CliContext; session: ChatSession };
  try {
    setup = startSession(options);
  } catch (error) {
    console.error(chalk.red(`❌ ${errorMessage(error)}\n`));
    process.exitCode = 1;
    return;
  }
  const { ctx, session } = setup;

  printWarnings(ctx.library.getWarnings());
  printWarnings(ctx.project.warnings);
  if (ctx.project.config) {
    console.log(chalk.gray(`Project: ${ctx.project.config.path}`));
  }

  const conversation = session.conversation;
  const backend = session.getBackend();
  console.log(chalk.gray(`Backend: ${backend.provider}/${backend.model}`));
  console.log(
    chalk.gray(
      `Traits: ${conversation.traitIds.length > 0 ? conversation.traitIds.join(", ") : "none"}`,
    ),
  );
  if (conversation.history.size() > 0) {
    console.log(
      chalk.gray(`Resumed ${conversation.history.size()} message(s) from this terminal`),
    );
  }
  console.log(chalk.gray('Type /help for commands, /exit to leave\n'));

  const settings = { stream: options.stream ?? ctx.config.stream };

  while (true) {
    const { message } = await inquirer.prompt<{ message: string }>([
      {
        type: "input",
        name: "message",
        message: chalk.blue(`${ctx.config.promptName}:`),
        prefix: "",
      },
    ]);

    const input = message.trim();
    if (!input) continue;
    if (input === "exit" || input === "quit") break;

    if (isSlashCommand(input)) {
      try {
        const result = await runSlashCommand(input, {
          session,
          library: ctx.library,
          composer: ctx.composer,
          assembler: ctx.assembler,
          agents: ctx.agents,
          out: consoleOutput,
          settings,
        });
        if (result.exit) break;
      } catch (error) {
        consoleOutput.error(errorMessage(error));
      }
      continue;
    }

    await runTurn(session, input, settings.stream);
  }

  console.log(chalk.cyan("\n👋 Goodbye!\n"));
}

async function runTurn(
  session: ChatSession,
  input: string,
  stream: boolean,
): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const thinking = ora("Thinking...").start();
  let started = false;

  try {
    const result = await session.turn(input, {
      stream,
      signal: controller.signal,
      onChunk: (chunk) => {
        if (!started) {
          thinking.stop();
          process.stdout.write(chalk.green("\nAssistant: "));
          started = true;
        }
        process.stdout.write(chunk);
      },
    });

    if (!started) thinking.stop();
    printWarnings(result.context.warnings);

    if (result.status === "cancelled") {
      console.log(chalk.yellow("\n⚠️  Cancelled; nothing was added to history\n"));
      return;
    }
    if (stream) {
      process.stdout.write("\n\n");
    } else {
      console.log(chalk.green("\nAssistant:"), result.reply + "\n");
    }
  } catch (error) {
    thinking.fail("Request failed");
    console.error(chalk.red(errorMessage(error) + "\n"));
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
