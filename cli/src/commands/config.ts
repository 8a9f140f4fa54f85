import chalk from "chalk";
import {
  CONFIG_ENV_VARS,
  CONFIG_KEYS,
  formatConfigValue,
  getConfigPath,
  getEnvPath,
  getHomeDir,
  isConfigKey,
  loadConfig,
  setConfigValue,
  setEnvValue,
  type BeadchatConfig,
} from "../../../runtime/src/config.js";
import { errorMessage } from "../../../runtime/src/errors.js";

export async function configCommand(
  action?: string,
  key?: string,
  value?: string,
): Promise<void> {
  if (!action) {
    showHelp();
    return;
  }

  try {
    switch (action) {
      case "show":
        showConfig(loadConfig());
        break;
      case "get":
        if (!key) {
          console.log(chalk.red("\n❌ Usage: beadchat config get <key>\n"));
          return;
        }
        getConfig(key);
        break;
      case "set":
        if (!key || value === undefined) {
          console.log(chalk.red("\n❌ Usage: beadchat config set <key> <value>\n"));
          console.log(chalk.gray("Example: beadchat config set historyLimit 30\n"));
          return;
        }
        setConfig(key, value);
        break;
      case "env-set":
        if (!key || value === undefined) {
          console.log(chalk.red("\n❌ Usage: beadchat config env-set <KEY> <value>\n"));
          return;
        }
        setEnvValue(key, value);
        console.log(chalk.green("\n✓ Environment file updated\n"));
        console.log(`${chalk.bold(key)} = ${chalk.green(maskEnv(key, value))}\n`);
        break;
      case "path":
        console.log(`Home:   ${getHomeDir()}`);
        console.log(`Config: ${getConfigPath()}`);
        console.log(`Env:    ${getEnvPath()}`);
        break;
      default:
        showHelp();
    }
  } catch (error) {
    console.log(chalk.red(`\n❌ ${errorMessage(error)}\n`));
    process.exitCode = 1;
  }
}

function showConfig(config: BeadchatConfig): void {
  console.log(chalk.cyan.bold("\n⚙️  beadchat configuration\n"));
  console.log(chalk.gray(`Config file: ${getConfigPath()}`));
  console.log(chalk.gray(`Env file:    ${getEnvPath()}\n`));

  const width = Math.max(...CONFIG_KEYS.map((k) => k.length));
  for (const key of CONFIG_KEYS) {
    console.log(
      `  ${chalk.bold(key.padEnd(width))}  ${formatConfigValue(key, config[key])}` +
        chalk.dim(`  (${CONFIG_ENV_VARS[key]})`),
    );
  }
  console.log();
}

function getConfig(key: string): void {
  if (!isConfigKey(key)) {
    console.log(chalk.yellow(`\n⚠️  Unknown key "${key}"\n`));
    console.log(chalk.gray(`Keys: ${CONFIG_KEYS.join(", ")}\n`));
    process.exitCode = 1;
    return;
  }
  const config = loadConfig();
  console.log(chalk.cyan(`\n${key}:`), formatConfigValue(key, config[key]), "\n");
}

function setConfig(key: string, value: string): void {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown key "${key}"\n`));
    console.log(chalk.gray(`Keys: ${CONFIG_KEYS.join(", ")}\n`));
    process.exitCode = 1;
    return;
  }

  const oldValue = formatConfigValue(key, loadConfig()[key]);
  const newValue = formatConfigValue(key, setConfigValue(key, value));

  console.log(chalk.green("\n✓ Configuration updated\n"));
  console.log(`${chalk.bold(key)}: ${chalk.gray(oldValue)} → ${chalk.green(newValue)}\n`);
}

function maskEnv(name: string, value: string): string {
  return /KEY|PASS|SECRET|TOKEN/.test(name) ? "*".repeat(8) : value;
}

function showHelp(): void {
  console.log(chalk.cyan.bold("\n⚙️  Configuration Management\n"));
  console.log("Usage: beadchat config <action> [options]\n");
  console.log("Actions:");
  console.log("  " + chalk.bold("show") + "                   Show the resolved configuration");
  console.log("  " + chalk.bold("get <key>") + "              Get a config value");
  console.log("  " + chalk.bold("set <key> <value>") + "      Set a value in config.json");
  console.log("  " + chalk.bold("env-set <KEY> <value>") + "  Set a variable in the .env file");
  console.log("  " + chalk.bold("path") + "                   Show where configuration lives\n");
  console.log("Examples:");
  console.log(chalk.gray("  beadchat config set defaultProvider anthropic"));
  console.log(chalk.gray("  beadchat config set defaultTraits helpful,concise"));
  console.log(chalk.gray("  beadchat config env-set OPENAI_API_KEY <your key>\n"));
  console.log("Config keys:");
  console.log(chalk.gray(`  ${CONFIG_KEYS.join(", ")}\n`));
}
