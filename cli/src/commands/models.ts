import chalk from "chalk";
import ora from "ora";
import {
  isProviderName,
  modelFor,
  PROVIDERS,
  type ProviderName,
} from "../../../runtime/src/config.js";
import { errorMessage } from "../../../runtime/src/errors.js";
import { createCliContext } from "../utils/context.js";

/**
 * beadchat models [provider]
 *
 * Lists what each provider reports; the configured default is marked.
 */
export async function modelsCommand(provider?: string): Promise<void> {
  let providers: readonly ProviderName[] = PROVIDERS;
  if (provider) {
    if (!isProviderName(provider)) {
      console.log(
        chalk.red(`\n❌ Unknown provider '${provider}'. Choose from: ${PROVIDERS.join(", ")}\n`),
      );
      process.exitCode = 1;
      return;
    }
    providers = [provider];
  }

  const ctx = createCliContext();

  for (const name of providers) {
    const spinner = ora(`Fetching ${name} models...`).start();
    try {
      const models = await ctx.createBackend(name).listModels();
      spinner.stop();
      const current = modelFor(ctx.config, name);
      console.log(chalk.cyan.bold(`\n${name}`) + chalk.gray(` (${models.length})`));
      for (const model of models) {
        const marker = model === current ? chalk.green(" ← default") : "";
        console.log(`  ${model}${marker}`);
      }
    } catch (error) {
      spinner.fail(`${name}: ${errorMessage(error)}`);
    }
  }
  console.log();
}
