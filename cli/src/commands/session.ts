import chalk from "chalk";
import { errorMessage } from "../../../runtime/src/errors.js";
import { exportConversation } from "../../../runtime/src/export.js";
import { getTerminalSessionKey } from "../../../runtime/src/session-store.js";
import { createCliContext } from "../utils/context.js";
import { formatHistorySummary } from "../utils/format.js";

/**
 * beadchat session <show|clear|export> [file]
 *
 * Operates on the conversation stored for the current terminal.
 */
export async function sessionCommand(
  action?: string,
  file?: string,
  options: { count?: string } = {},
): Promise<void> {
  const ctx = createCliContext();
  const key = getTerminalSessionKey();

  try {
    switch (action) {
      case "show": {
        const conversation = ctx.sessions.load(key);
        if (!conversation) {
          console.log(chalk.yellow("No session for this terminal yet."));
          return;
        }
        console.log(chalk.cyan.bold(`\n🗂  Session ${key}\n`));
        console.log(`Backend:  ${conversation.provider}/${conversation.model}`);
        console.log(
          `Traits:   ${conversation.traitIds.length > 0 ? conversation.traitIds.join(", ") : "none"}`,
        );
        console.log(`Strategy: ${conversation.compactionStrategy}\n`);
        const count = options.count ? Number.parseInt(options.count, 10) : 10;
        for (const line of formatHistorySummary(
          conversation.history.snapshot(),
          count > 0 ? count : 10,
        )) {
          console.log(line);
        }
        console.log();
        break;
      }

      case "clear":
        if (ctx.sessions.remove(key)) {
          console.log(chalk.green("✓ Session cleared"));
        } else {
          console.log(chalk.gray("Nothing to clear."));
        }
        break;

      case "export": {
        if (!file) {
          console.log(chalk.red("\n❌ Usage: beadchat session export <file>\n"));
          return;
        }
        const conversation = ctx.sessions.load(key);
        if (!conversation || conversation.history.size() === 0) {
          console.log(chalk.yellow("No conversation history to export."));
          return;
        }
        const path = exportConversation(file, conversation.history.snapshot(), {
          provider: conversation.provider,
          model: conversation.model,
          traitIds: conversation.traitIds,
        });
        console.log(
          chalk.green(`✓ Exported ${conversation.history.size()} message(s) to ${path}`),
        );
        break;
      }

      default:
        console.log(chalk.cyan("beadchat sessions — one conversation per terminal\n"));
        console.log("Usage: beadchat session <action>\n");
        console.log("Actions:");
        console.log("  show            — Show this terminal's conversation");
        console.log("  clear           — Forget it");
        console.log("  export <file>   — Write it to Markdown, or JSON for *.json");
    }
  } catch (error) {
    console.log(chalk.red(`\n❌ ${errorMessage(error)}\n`));
    process.exitCode = 1;
  }
}
