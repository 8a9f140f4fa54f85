/**
 * file-store.ts: Small read/write helpers shared by the config, session and
 * trait stores.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  writeFileSync,
  renameSync,
} from "fs";
import { dirname } from "path";

/**
 * Read a text file, returning empty string if it doesn't exist.
 */
export function readTextFile(filePath: string): string {
  if (!existsSync(filePath)) return "";
  return readFileSync(filePath, "utf-8");
}

/**
 * Write content to a file atomically (temp file + rename).
 * Creates parent directories if needed.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  ensureDir(dirname(filePath));

  const tmpPath = `${filePath}.tmp.${Date.now()}`;
  writeFileSync(tmpPath, content, "utf-8");
  renameSync(tmpPath, filePath);
}

/**
 * Read and parse a JSON file. Missing or empty files yield `undefined`;
 * unparseable content throws.
 */
export function readJsonFile(filePath: string): unknown {
  const content = readTextFile(filePath);
  if (!content.trim()) return undefined;
  return JSON.parse(content);
}

export function writeJsonFile(filePath: string, value: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(value, null, 2) + "\n");
}

export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}
