import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type {
  BackendAdapter,
  ChatMessage,
  ProviderName,
} from "../agent/src/backends/types.js";
import { FileExpansionError } from "../runtime/src/errors.js";
import type { FileExpander } from "../runtime/src/context/file-expander.js";
import type { Turn } from "../runtime/src/history/types.js";
import { buildTrait, type Trait } from "../runtime/src/traits/trait-builder.js";
import { serializeTrait } from "../runtime/src/traits/trait-store.js";

export const PADDING = " This sentence pads the fragment past the minimum length.";

export function makeTrait(fields: Record<string, unknown>): Trait {
  const result = buildTrait(fields);
  if (!result.ok) throw result.error;
  return result.trait;
}

export function writeTrait(dir: string, trait: Trait, fileName = `${trait.id}.md`): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, serializeTrait(trait), "utf-8");
  return path;
}

export function makeTurns(count: number, start = 1): Turn[] {
  return Array.from({ length: count }, (_, i): Turn => {
    const n = start + i;
    return {
      role: n % 2 === 1 ? "user" : "assistant",
      text: `t${n}`,
      sequenceNumber: n,
      createdAt: 1_700_000_000_000 + n,
    };
  });
}

export function fakeExpander(files: Record<string, string>): FileExpander & {
  requested: string[];
} {
  const requested: string[] = [];
  return {
    requested,
    async read(path: string) {
      requested.push(path);
      const content = files[path];
      if (content === undefined) {
        throw new FileExpansionError("not-found", path);
      }
      return content;
    },
  };
}

export class FakeBackend implements BackendAdapter {
  readonly provider: ProviderName;
  readonly model: string;
  readonly calls: ChatMessage[][] = [];
  reply: string;
  chunks: string[];
  error?: Error;

  constructor(
    options: {
      provider?: ProviderName;
      model?: string;
      reply?: string;
      chunks?: string[];
      error?: Error;
    } = {},
  ) {
    this.provider = options.provider ?? "ollama";
    this.model = options.model ?? "test-model";
    this.reply = options.reply ?? "ok";
    this.chunks = options.chunks ?? [];
    this.error = options.error;
  }

  async send(messages: readonly ChatMessage[]): Promise<string> {
    this.calls.push([...messages]);
    if (this.error) throw this.error;
    return this.reply;
  }

  async *stream(messages: readonly ChatMessage[]): AsyncGenerator<string> {
    this.calls.push([...messages]);
    for (const chunk of this.chunks) {
      yield chunk;
    }
    if (this.error) throw this.error;
  }

  async listModels(): Promise<string[]> {
    return [this.model];
  }
}

/** A fetch Response whose body arrives in the given pieces. */
export function chunkedResponse(parts: string[], init?: ResponseInit): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part));
      controller.close();
    },
  });
  return new Response(body, init);
}

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}
