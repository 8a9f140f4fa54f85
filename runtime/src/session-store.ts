/**
 * session-store.ts: Remembers each terminal's conversation.
 *
 * Files managed:
 *   ~/.beadchat/sessions.json: { "<session key>": ConversationSnapshot }
 *
 * Keys are `session_<ppid>` (the shell that launched us). Entries whose
 * process is gone are pruned whenever the file is read.
 */

import { join } from "path";
import {
  ConversationState,
  conversationSnapshotSchema,
  type ConversationSnapshot,
} from "./conversation.js";
import { errorMessage } from "./errors.js";
import { readJsonFile, writeJsonFile } from "./file-store.js";
import { silentLogger, type Logger } from "./logger.js";

const SESSION_KEY_PATTERN = /^(?:session|fallback)_(\d+)$/;

export function getTerminalSessionKey(): string {
  return process.ppid ? `session_${process.ppid}` : `fallback_${process.pid}`;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      error.code === "EPERM"
    );
  }
}

export class SessionStore {
  private readonly sessionsPath: string;
  private readonly isAlive: (pid: number) => boolean;
  private readonly logger: Logger;

  constructor(
    homeDir: string,
    options: { isAlive?: (pid: number) => boolean; logger?: Logger } = {},
  ) {
    this.sessionsPath = join(homeDir, "sessions.json");
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.logger = options.logger ?? silentLogger;
  }

  load(key: string): ConversationState | undefined {
    const raw = this.readAll()[key];
    if (raw === undefined) return undefined;

    const result = conversationSnapshotSchema.safeParse(raw);
    if (!result.success) {
      this.logger.warn(
        `Ignoring unreadable session ${key}: ${result.error.issues[0].message}`,
      );
      return undefined;
    }
    return ConversationState.fromSnapshot(result.data);
  }

  save(key: string, state: ConversationState): void {
    const sessions = this.readAll();
    sessions[key] = state.toSnapshot();
    writeJsonFile(this.sessionsPath, sessions);
  }

  remove(key: string): boolean {
    const sessions = this.readAll();
    if (!(key in sessions)) return false;
    delete sessions[key];
    writeJsonFile(this.sessionsPath, sessions);
    return true;
  }

  keys(): string[] {
    return Object.keys(this.readAll()).sort();
  }

  private readAll(): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = readJsonFile(this.sessionsPath);
    } catch (error) {
      this.logger.warn(
        `Could not parse ${this.sessionsPath}, starting fresh: ${errorMessage(error)}`,
      );
      return {};
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return {};
    }

    const sessions: Record<string, unknown> = {};
    let pruned = 0;
    for (const [key, value] of Object.entries(parsed)) {
      const match = SESSION_KEY_PATTERN.exec(key);
      if (match && !this.isAlive(Number(match[1]))) {
        pruned += 1;
        continue;
      }
      sessions[key] = value;
    }

    if (pruned > 0) {
      writeJsonFile(this.sessionsPath, sessions);
      this.logger.debug(`Pruned ${pruned} stale session(s)`);
    }
    return sessions;
  }
}

export type { ConversationSnapshot };
