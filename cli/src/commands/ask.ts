import chalk from "chalk";
import ora from "ora";
import { ChatSession } from "../../../runtime/src/chat-session.js";
import { errorMessage } from "../../../runtime/src/errors.js";
import { getTerminalSessionKey } from "../../../runtime/src/session-store.js";
import { createCliContext, printWarnings } from "../utils/context.js";
import { openConversation, type ChatOptions } from "./chat.js";

/**
 * beadchat ask "<prompt>"
 *
 * One-shot question against the terminal's conversation. With --new the
 * stored session is neither read nor updated.
 */
export async function askCommand(prompt: string, options: ChatOptions): Promise<void> {
  const spinner = ora("Thinking...");
  try {
    const ctx = createCliContext();
    printWarnings(ctx.project.warnings);
    const sessionKey = getTerminalSessionKey();
    const session = new ChatSession({
      conversation: openConversation(ctx, options, sessionKey),
      assembler: ctx.assembler,
      createBackend: ctx.createBackend,
      sink: ctx.sessions,
      sessionKey: options.new ? undefined : sessionKey,
      logger: ctx.logger,
    });

    const stream = options.stream ?? false;
    if (!stream) spinner.start();

    const result = await session.turn(prompt, {
      stream,
      onChunk: (chunk) => process.stdout.write(chunk),
    });
    spinner.stop();
    printWarnings(result.context.warnings);

    if (stream) {
      process.stdout.write("\n");
    } else if (result.status === "completed") {
      console.log(result.reply);
    }
  } catch (error) {
    spinner.fail("Request failed");
    console.error(chalk.red(errorMessage(error)));
    process.exitCode = 1;
  }
}
