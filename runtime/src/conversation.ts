import { z } from "zod";
import { PROVIDERS, type ProviderName } from "./config.js";
import {
  COMPACTION_STRATEGIES,
  type CompactionStrategy,
} from "./history/history-compactor.js";
import { HistoryStore } from "./history/history-store.js";

// ── Snapshot schema ─────────────────────────────────────────────────────────

const turnSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  text: z.string(),
  sequenceNumber: z.number().int().nonnegative(),
  createdAt: z.number(),
});

export const conversationSnapshotSchema = z.object({
  provider: z.enum(PROVIDERS),
  model: z.string().min(1),
  traitIds: z.array(z.string()),
  compactionStrategy: z.enum(COMPACTION_STRATEGIES),
  turns: z.array(turnSchema).superRefine((turns, ctx) => {
    for (let i = 1; i < turns.length; i++) {
      if (turns[i].sequenceNumber <= turns[i - 1].sequenceNumber) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "sequenceNumber"],
          message: `Turn sequence ${turns[i].sequenceNumber} is not after ${turns[i - 1].sequenceNumber}`,
        });
        return;
      }
    }
  }),
  nextSequence: z.number().int().positive(),
  updatedAt: z.number(),
});

export type ConversationSnapshot = z.infer<typeof conversationSnapshotSchema>;

// ── State ───────────────────────────────────────────────────────────────────

/**
 * Everything that survives between turns: the active history, the bound
 * provider/model, the selected trait ids and the compaction strategy.
 */
export class ConversationState {
  readonly history: HistoryStore;
  provider: ProviderName;
  model: string;
  compactionStrategy: CompactionStrategy;
  private traits: string[];

  constructor(input: {
    provider: ProviderName;
    model: string;
    traitIds?: string[];
    compactionStrategy?: CompactionStrategy;
    history?: HistoryStore;
  }) {
    this.provider = input.provider;
    this.model = input.model;
    this.traits = [...new Set(input.traitIds ?? [])];
    this.compactionStrategy = input.compactionStrategy ?? "recent";
    this.history = input.history ?? new HistoryStore();
  }

  get traitIds(): readonly string[] {
    return [...this.traits];
  }

  /**
   * Add a trait id at the end of the selection. Returns false when it was
   * already selected.
   */
  addTrait(id: string): boolean {
    if (this.traits.includes(id)) return false;
    this.traits.push(id);
    return true;
  }

  removeTrait(id: string): boolean {
    const idx = this.traits.indexOf(id);
    if (idx === -1) return false;
    this.traits.splice(idx, 1);
    return true;
  }

  clearTraits(): void {
    this.traits = [];
  }

  setTraits(ids: string[]): void {
    this.traits = [...new Set(ids)];
  }

  bind(provider: ProviderName, model: string): void {
    this.provider = provider;
    this.model = model;
  }

  toSnapshot(): ConversationSnapshot {
    return {
      provider: this.provider,
      model: this.model,
      traitIds: [...this.traits],
      compactionStrategy: this.compactionStrategy,
      turns: this.history.snapshot(),
      nextSequence: this.history.peekNextSequence(),
      updatedAt: Date.now(),
    };
  }

  static fromSnapshot(snapshot: ConversationSnapshot): ConversationState {
    return new ConversationState({
      provider: snapshot.provider,
      model: snapshot.model,
      traitIds: snapshot.traitIds,
      compactionStrategy: snapshot.compactionStrategy,
      history: new HistoryStore(snapshot.turns, snapshot.nextSequence),
    });
  }
}
