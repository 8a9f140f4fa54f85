/**
 * file-expander.ts: `@path` references in user input.
 *
 *   explain @src/app.ts      → reads src/app.ts
 *   compare @"my notes.md"   → quoted paths may contain spaces
 *
 * An `@` only starts a reference at the beginning of the input or after
 * whitespace, so e-mail addresses are left alone.
 */

import { readFile, stat } from "fs/promises";
import { isAbsolute, resolve } from "path";
import { FileExpansionError, errorMessage } from "../errors.js";

/** Reads one referenced file; fails with `FileExpansionError`. */
export interface FileExpander {
  read(path: string): Promise<string>;
}

export interface FileReference {
  raw: string;
  path: string;
  /** Offset of `raw` in the input. */
  index: number;
}

export interface FileExpansion {
  text: string;
  files: string[];
  warnings: string[];
}

const REFERENCE_PATTERN = /(?<=^|\s)@(?:"([^"]+)"|(\S+))/g;

export function findFileReferences(input: string): FileReference[] {
  const refs: FileReference[] = [];
  for (const match of input.matchAll(REFERENCE_PATTERN)) {
    const path = match[1] ?? match[2];
    if (path && match.index !== undefined) {
      refs.push({ raw: match[0], path, index: match.index });
    }
  }
  return refs;
}

/**
 * Inline the content of every readable reference ahead of the request and
 * note the ones that could not be read. Never throws for a bad reference.
 */
export async function expandFileReferences(
  input: string,
  expander: FileExpander,
): Promise<FileExpansion> {
  const refs = findFileReferences(input);
  if (refs.length === 0) {
    return { text: input, files: [], warnings: [] };
  }

  const blocks: string[] = [];
  const files: string[] = [];
  const warnings: string[] = [];
  const expanded: FileReference[] = [];

  for (const ref of refs) {
    try {
      const content = await expander.read(ref.path);
      blocks.push(`File: ${ref.path}\n${content}`);
      files.push(ref.path);
      expanded.push(ref);
    } catch (error) {
      warnings.push(`Could not read '${ref.path}': ${describeReadError(error)}`);
    }
  }

  const request = replaceReferences(input, expanded);
  const notes = warnings.map((w) => `[Note: ${w}]`);
  const parts =
    blocks.length > 0 ? [...blocks, `User request: ${request}`] : [request];

  return {
    text: [...parts, ...notes].join("\n\n"),
    files,
    warnings,
  };
}

/**
 * Swap each expanded reference for a `[File: path]` marker, splicing at the
 * recorded offsets so text elsewhere in the input is never touched.
 */
function replaceReferences(input: string, refs: readonly FileReference[]): string {
  let result = "";
  let cursor = 0;
  for (const ref of refs) {
    result += input.slice(cursor, ref.index) + `[File: ${ref.path}]`;
    cursor = ref.index + ref.raw.length;
  }
  return result + input.slice(cursor);
}

function describeReadError(error: unknown): string {
  if (error instanceof FileExpansionError) return error.message;
  return errorMessage(error);
}

// ── Disk expander ───────────────────────────────────────────────────────────

/**
 * Reads files relative to a base directory (the working directory by
 * default), refusing anything above `maxBytes`.
 */
export class DiskFileExpander implements FileExpander {
  constructor(
    private readonly maxBytes: number,
    private readonly baseDir: string = process.cwd(),
  ) {}

  async read(path: string): Promise<string> {
    const fullPath = isAbsolute(path) ? path : resolve(this.baseDir, path);

    let size: number;
    try {
      const info = await stat(fullPath);
      if (!info.isFile()) {
        throw new FileExpansionError("not-found", path, "not a regular file");
      }
      size = info.size;
    } catch (error) {
      throw toExpansionError(error, path);
    }

    if (size > this.maxBytes) {
      throw new FileExpansionError(
        "too-large",
        path,
        `file too large (${size} bytes, limit ${this.maxBytes})`,
      );
    }

    try {
      return await readFile(fullPath, "utf-8");
    } catch (error) {
      throw toExpansionError(error, path);
    }
  }
}

function toExpansionError(error: unknown, path: string): FileExpansionError {
  if (error instanceof FileExpansionError) return error;
  const code =
    typeof error === "object" && error !== null && "code" in error
      ? String(error.code)
      : "";
  if (code === "EACCES" || code === "EPERM") {
    return new FileExpansionError("permission-denied", path);
  }
  if (code === "ENOENT" || code === "ENOTDIR") {
    return new FileExpansionError("not-found", path);
  }
  return new FileExpansionError("not-found", path, errorMessage(error));
}
