import { appendFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import { errorMessage } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_ICONS: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "🔍",
  info: "ℹ️ ",
  warn: "⚠️ ",
  error: "❌",
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * File logger: appends timestamped lines to a log file.
 * Default location: ~/.beadchat/beadchat.log
 */
export class FileLogger implements Logger {
  private readonly logPath: string;
  private readonly threshold: number;
  private writeFailed = false;

  constructor(logDir: string, level: LogLevel = "info") {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    this.logPath = join(logDir, "beadchat.log");
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const timestamp = new Date().toISOString();
    this.write(
      `[${timestamp}] ${LEVEL_ICONS[level]} ${level.toUpperCase()} | ${message}`,
    );
  }

  private write(content: string): void {
    try {
      appendFileSync(this.logPath, content + "\n", "utf-8");
    } catch (error) {
      // The log file is best effort; report once on stderr and keep going.
      if (!this.writeFailed) {
        this.writeFailed = true;
        process.stderr.write(`Cannot write ${this.logPath}: ${errorMessage(error)}\n`);
      }
    }
  }
}
