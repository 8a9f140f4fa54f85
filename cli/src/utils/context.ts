import chalk from "chalk";
import { createBackend } from "../../../agent/src/backends/index.js";
import { AgentStore } from "../../../runtime/src/agent-store.js";
import type { BackendFactory } from "../../../runtime/src/chat-session.js";
import {
  getHomeDir,
  loadConfig,
  type BeadchatConfig,
} from "../../../runtime/src/config.js";
import { ContextAssembler } from "../../../runtime/src/context/context-assembler.js";
import { DiskFileExpander } from "../../../runtime/src/context/file-expander.js";
import { FileLogger } from "../../../runtime/src/logger.js";
import {
  loadProjectConfig,
  type ProjectConfigResult,
} from "../../../runtime/src/project-config.js";
import { SessionStore } from "../../../runtime/src/session-store.js";
import { TraitComposer } from "../../../runtime/src/traits/trait-composer.js";
import { TraitLibrary } from "../../../runtime/src/traits/trait-library.js";
import { TraitStore } from "../../../runtime/src/traits/trait-store.js";

/**
 * Everything a command needs, wired once per process.
 */
export interface CliContext {
  homeDir: string;
  config: BeadchatConfig;
  logger: FileLogger;
  library: TraitLibrary;
  composer: TraitComposer;
  traitStore: TraitStore;
  assembler: ContextAssembler;
  sessions: SessionStore;
  agents: AgentStore;
  /** Nearest project config above the working directory, if any. */
  project: ProjectConfigResult;
  createBackend: BackendFactory;
}

export function createCliContext(
  homeDir = getHomeDir(),
  cwd = process.cwd(),
): CliContext {
  const config = loadConfig(homeDir);
  const logger = new FileLogger(homeDir, config.logLevel);

  const project = loadProjectConfig(cwd);
  for (const warning of project.warnings) logger.warn(warning);
  if (project.config) logger.debug(`Using project config ${project.config.path}`);

  const library = new TraitLibrary({ logger });
  library.load(TraitLibrary.getDefaultSearchPaths(homeDir));

  const composer = new TraitComposer(library, { logger });
  const assembler = new ContextAssembler({
    composer,
    fileExpander: new DiskFileExpander(config.maxFileBytes),
    historyLimit: config.historyLimit,
    projectInstructions: project.config?.instructions,
    logger,
  });

  return {
    homeDir,
    config,
    logger,
    library,
    composer,
    traitStore: new TraitStore(homeDir, library, { logger }),
    assembler,
    sessions: new SessionStore(homeDir, { logger }),
    agents: new AgentStore(homeDir, { logger }),
    project,
    createBackend: (provider, model) => createBackend(provider, config, model),
  };
}

export function printWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    console.log(chalk.yellow(`⚠️  ${warning}`));
  }
}
