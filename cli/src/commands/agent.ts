import inquirer from "inquirer";
import chalk from "chalk";
import { AGENT_NAME_PATTERN } from "../../../runtime/src/agent-store.js";
import { modelFor, PROVIDERS, type ProviderName } from "../../../runtime/src/config.js";
import { errorMessage } from "../../../runtime/src/errors.js";
import { createCliContext, type CliContext } from "../utils/context.js";
import { formatAgentLine } from "../utils/format.js";

/**
 * beadchat agent <list|show|create|delete> [name]
 *
 * Agents are saved presets of backend, model and traits. Start a chat from
 * one with `beadchat chat --agent <name>`, or switch inside a chat with
 * `/agent use <name>`.
 */
export async function agentCommand(action?: string, name?: string): Promise<void> {
  const ctx = createCliContext();

  try {
    switch (action) {
      case "list":
      case undefined: {
        const presets = ctx.agents.list();
        if (presets.length === 0) {
          console.log(chalk.yellow("No agents saved yet. Create one with: beadchat agent create"));
          return;
        }
        console.log(chalk.cyan(`\n🤖 ${presets.length} agent(s):\n`));
        for (const preset of presets) console.log(`  ${formatAgentLine(preset)}`);
        console.log();
        break;
      }

      case "show": {
        const preset = name ? ctx.agents.get(name) : undefined;
        if (!preset) {
          console.log(chalk.red(`\n❌ Agent '${name ?? ""}' not found\n`));
          process.exitCode = 1;
          return;
        }
        console.log(chalk.cyan.bold(`\n${preset.name}\n`));
        console.log(`Backend:  ${preset.provider}/${preset.model}`);
        console.log(
          `Traits:   ${preset.traitIds.length > 0 ? preset.traitIds.join(", ") : "none"}`,
        );
        if (preset.description) console.log(`About:    ${preset.description}`);
        console.log();
        break;
      }

      case "create":
        await createAgent(ctx, name);
        break;

      case "delete":
        if (name && ctx.agents.remove(name)) {
          console.log(chalk.green(`✓ Deleted agent ${name}`));
        } else {
          console.log(chalk.red(`\n❌ Agent '${name ?? ""}' not found\n`));
          process.exitCode = 1;
        }
        break;

      default:
        console.log(chalk.cyan("beadchat agent: Manage agent presets\n"));
        console.log("Usage: beadchat agent <action> [name]\n");
        console.log("Actions:");
        console.log("  list            Show saved agents");
        console.log("  show <name>     Show one agent");
        console.log("  create [name]   Save a new agent interactively");
        console.log("  delete <name>   Remove an agent");
    }
  } catch (error) {
    console.error(chalk.red(`❌ ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

type AgentAnswers = {
  name: string;
  provider: ProviderName;
  model: string;
  traitIds: string[];
  description: string;
};

async function createAgent(ctx: CliContext, name?: string): Promise<void> {
  console.log(chalk.cyan.bold("\n🤖 Create an agent\n"));

  const answers = await inquirer.prompt<AgentAnswers>([
    {
      type: "input",
      name: "name",
      message: "Agent name:",
      default: name,
      validate: (input: string) =>
        AGENT_NAME_PATTERN.test(input) ||
        "Use lowercase letters, digits, '-' or '_'",
    },
    {
      type: "list",
      name: "provider",
      message: "Backend:",
      choices: [...PROVIDERS],
      default: ctx.config.defaultProvider,
    },
    {
      type: "input",
      name: "model",
      message: "Model:",
      default: (partial: { provider: ProviderName }) => modelFor(ctx.config, partial.provider),
      validate: (input: string) => input.trim().length > 0 || "Model required",
    },
    {
      type: "checkbox",
      name: "traitIds",
      message: "Traits:",
      choices: ctx.library.list().map((trait) => ({
        name: `${trait.id} (${trait.category})`,
        value: trait.id,
      })),
    },
    {
      type: "input",
      name: "description",
      message: "Short description:",
    },
  ]);

  const existed = ctx.agents.has(answers.name);
  ctx.agents.save({ ...answers, model: answers.model.trim() });
  console.log(
    chalk.green(
      `\n✅ ${existed ? "Updated" : "Saved"} agent '${answers.name}' (${answers.provider}/${answers.model.trim()})\n`,
    ),
  );
  console.log(chalk.gray(`Start it with: beadchat chat --agent ${answers.name}\n`));
}
