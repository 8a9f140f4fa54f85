#!/usr/bin/env node
import { program } from "commander";
import chalk from "chalk";

import { chatCommand } from "./commands/chat.js";
import { askCommand } from "./commands/ask.js";

program
  .name("beadchat")
  .description(chalk.cyan("💬 Chat with local and cloud LLMs, composed from prompt traits"))
  .version("0.1.0");

// Conversation
program
  .command("chat", { isDefault: true })
  .description("Start an interactive chat")
  .option("-p, --provider <provider>", "Backend (ollama|openai|anthropic|google)")
  .option("-m, --model <model>", "Model name for the backend")
  .option("-t, --traits <ids>", "Comma-separated trait ids")
  .option("-s, --strategy <strategy>", "Compaction strategy (recent|first|middle)")
  .option("--no-stream", "Wait for the whole reply instead of streaming")
  .option("-n, --new", "Ignore this terminal's saved conversation")
  .option("-a, --agent <name>", "Start from a saved agent preset")
  .action(chatCommand);

program
  .command("ask <prompt>")
  .description("Ask a single question")
  .option("-p, --provider <provider>", "Backend (ollama|openai|anthropic|google)")
  .option("-m, --model <model>", "Model name for the backend")
  .option("-t, --traits <ids>", "Comma-separated trait ids")
  .option("-s, --strategy <strategy>", "Compaction strategy (recent|first|middle)")
  .option("--stream", "Stream the reply as it arrives")
  .option("-n, --new", "Do not read or update this terminal's conversation")
  .option("-a, --agent <name>", "Use a saved agent preset")
  .action(askCommand);

program
  .command("models [provider]")
  .description("List the models each backend offers")
  .action(async (provider?: string) => {
    const { modelsCommand } = await import("./commands/models.js");
    return modelsCommand(provider);
  });

// Management commands
program
  .command("trait [action] [args...]")
  .description("Manage traits (list|show|search|compose|create|path)")
  .action(async (action?: string, args?: string[]) => {
    const { traitCommand } = await import("./commands/trait.js");
    return traitCommand(action, args ?? []);
  });

program
  .command("agent [action] [name]")
  .description("Manage agent presets (list|show|create|delete)")
  .action(async (action?: string, name?: string) => {
    const { agentCommand } = await import("./commands/agent.js");
    return agentCommand(action, name);
  });

program
  .command("session [action] [file]")
  .description("Manage this terminal's conversation (show|clear|export)")
  .option("-c, --count <n>", "Messages to show with 'show'")
  .action(async (action?: string, file?: string, options?: { count?: string }) => {
    const { sessionCommand } = await import("./commands/session.js");
    return sessionCommand(action, file, options);
  });

program
  .command("config [action] [key] [value]")
  .description("Manage configuration (show|get|set|env-set|path)")
  .action(async (action?: string, key?: string, value?: string) => {
    const { configCommand } = await import("./commands/config.js");
    return configCommand(action, key, value);
  });

await program.parseAsync();
