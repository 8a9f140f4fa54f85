import { parse as parseDotenv } from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import {
  readJsonFile,
  readTextFile,
  writeFileAtomic,
  writeJsonFile,
} from "./file-store.js";
import { COMPACTION_STRATEGIES } from "./history/history-compactor.js";

export const PROVIDERS = ["ollama", "openai", "anthropic", "google"] as const;
export type ProviderName = (typeof PROVIDERS)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value);
}

function parseBoolean(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}

export function parseList(value: unknown): unknown {
  if (typeof value !== "string") return value;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const configSchema = z.object({
  defaultProvider: z.enum(PROVIDERS),
  ollamaModel: z.string().min(1),
  openaiModel: z.string().min(1),
  anthropicModel: z.string().min(1),
  googleModel: z.string().min(1),
  ollamaBaseUrl: z.string().url(),
  openaiApiKey: z.string(),
  anthropicApiKey: z.string(),
  googleApiKey: z.string(),
  historyLimit: z.coerce.number().int().positive(),
  compactionStrategy: z.enum(COMPACTION_STRATEGIES),
  maxFileBytes: z.coerce.number().int().positive(),
  temperature: z.coerce.number().min(0).max(2),
  maxTokens: z.coerce.number().int().positive(),
  stream: z.preprocess(parseBoolean, z.boolean()),
  promptName: z.string().min(1),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
  defaultTraits: z.preprocess(parseList, z.array(z.string())),
});

export type BeadchatConfig = z.infer<typeof configSchema>;
export type ConfigKey = keyof BeadchatConfig;

export const DEFAULT_CONFIG: BeadchatConfig = {
  defaultProvider: "ollama",
  ollamaModel: "llama3.2",
  openaiModel: "gpt-4o-mini",
  anthropicModel: "claude-3-5-haiku-latest",
  googleModel: "gemini-1.5-flash",
  ollamaBaseUrl: "http://localhost:11434",
  openaiApiKey: "",
  anthropicApiKey: "",
  googleApiKey: "",
  historyLimit: 50,
  compactionStrategy: "recent",
  maxFileBytes: 256 * 1024,
  temperature: 0.7,
  maxTokens: 2048,
  stream: true,
  promptName: "You",
  logLevel: "info",
  defaultTraits: [],
};

/** Environment variable consulted for each key. */
export const CONFIG_ENV_VARS: Record<ConfigKey, string> = {
  defaultProvider: "BEADCHAT_PROVIDER",
  ollamaModel: "BEADCHAT_OLLAMA_MODEL",
  openaiModel: "BEADCHAT_OPENAI_MODEL",
  anthropicModel: "BEADCHAT_ANTHROPIC_MODEL",
  googleModel: "BEADCHAT_GOOGLE_MODEL",
  ollamaBaseUrl: "OLLAMA_BASE_URL",
  openaiApiKey: "OPENAI_API_KEY",
  anthropicApiKey: "ANTHROPIC_API_KEY",
  googleApiKey: "GOOGLE_API_KEY",
  historyLimit: "BEADCHAT_MESSAGE_LIMIT",
  compactionStrategy: "BEADCHAT_COMPACTION_STRATEGY",
  maxFileBytes: "BEADCHAT_MAX_FILE_BYTES",
  temperature: "BEADCHAT_TEMPERATURE",
  maxTokens: "BEADCHAT_MAX_TOKENS",
  stream: "BEADCHAT_STREAM",
  promptName: "BEADCHAT_PROMPT_NAME",
  logLevel: "BEADCHAT_LOG_LEVEL",
  defaultTraits: "BEADCHAT_TRAITS",
};

const SECRET_KEYS: ReadonlySet<ConfigKey> = new Set([
  "openaiApiKey",
  "anthropicApiKey",
  "googleApiKey",
]);

export const CONFIG_KEYS: readonly ConfigKey[] = configSchema.keyof().options;

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((k) => k === value);
}

export function isSecretKey(key: ConfigKey): boolean {
  return SECRET_KEYS.has(key);
}

// ── Paths ───────────────────────────────────────────────────────────────────

/**
 * Root of all beadchat state. `BEADCHAT_HOME` overrides ~/.beadchat.
 */
export function getHomeDir(): string {
  return process.env.BEADCHAT_HOME || join(homedir(), ".beadchat");
}

export function getConfigPath(homeDir = getHomeDir()): string {
  return join(homeDir, "config.json");
}

export function getEnvPath(homeDir = getHomeDir()): string {
  return join(homeDir, ".env");
}

// ── Resolution ──────────────────────────────────────────────────────────────

export interface ConfigSources {
  env: Record<string, string | undefined>;
  file: Record<string, unknown>;
  dotenv: Record<string, string>;
}

/**
 * Merge the configuration layers. Priority, highest first:
 * process environment, config.json, the .env file, defaults.
 */
export function resolveConfig(sources: ConfigSources): BeadchatConfig {
  const raw: Record<string, unknown> = {};

  for (const key of CONFIG_KEYS) {
    const envVar = CONFIG_ENV_VARS[key];
    const fromEnv = sources.env[envVar];
    if (fromEnv !== undefined && fromEnv !== "") {
      raw[key] = fromEnv;
    } else if (sources.file[key] !== undefined) {
      raw[key] = sources.file[key];
    } else if (sources.dotenv[envVar] !== undefined) {
      raw[key] = sources.dotenv[envVar];
    } else {
      raw[key] = DEFAULT_CONFIG[key];
    }
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = String(issue.path[0] ?? "config");
    throw new ConfigurationError(
      `Invalid configuration value for ${key}: ${issue.message}`,
      key,
    );
  }
  return result.data;
}

/**
 * Load ~/.beadchat/config.json and ~/.beadchat/.env and merge them with the
 * process environment.
 */
export function loadConfig(homeDir = getHomeDir()): BeadchatConfig {
  return resolveConfig({
    env: process.env,
    file: readConfigFile(homeDir),
    dotenv: parseDotenv(readTextFile(getEnvPath(homeDir))),
  });
}

export function readConfigFile(homeDir = getHomeDir()): Record<string, unknown> {
  const configPath = getConfigPath(homeDir);
  let parsed: unknown;
  try {
    parsed = readJsonFile(configPath);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${configPath}: ${error}`);
  }
  if (parsed === undefined) return {};
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${configPath} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * Validate a single value and persist it to config.json.
 */
export function setConfigValue(
  key: ConfigKey,
  value: string,
  homeDir = getHomeDir(),
): BeadchatConfig[ConfigKey] {
  const result = configSchema.shape[key].safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid value for ${key}: ${result.error.issues[0].message}`,
      key,
    );
  }

  const file = readConfigFile(homeDir);
  file[key] = result.data;
  writeJsonFile(getConfigPath(homeDir), file);
  return result.data;
}

const ENV_NAME_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

/**
 * Set `name=value` in ~/.beadchat/.env, replacing an existing line for the
 * same name. Other lines are kept as they are.
 */
export function setEnvValue(
  name: string,
  value: string,
  homeDir = getHomeDir(),
): void {
  if (!ENV_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`Invalid environment variable name: ${name}`, name);
  }
  if (/[\r\n]/.test(value)) {
    throw new ConfigurationError(`Value for ${name} must be a single line`, name);
  }

  const envPath = getEnvPath(homeDir);
  const lines = readTextFile(envPath).split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  let found = false;
  const updated = lines.map((line) => {
    if (line.startsWith(`${name}=`)) {
      found = true;
      return `${name}=${value}`;
    }
    return line;
  });
  if (!found) updated.push(`${name}=${value}`);
  writeFileAtomic(envPath, updated.join("\n") + "\n");
}

export function formatConfigValue(key: ConfigKey, value: unknown): string {
  if (isSecretKey(key)) {
    return typeof value === "string" && value ? "*".repeat(8) : "(not set)";
  }
  if (Array.isArray(value)) return value.join(", ");
  return String(value);
}

export function modelFor(config: BeadchatConfig, provider: ProviderName): string {
  switch (provider) {
    case "ollama":
      return config.ollamaModel;
    case "openai":
      return config.openaiModel;
    case "anthropic":
      return config.anthropicModel;
    case "google":
      return config.googleModel;
  }
}
