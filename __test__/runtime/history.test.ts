import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../runtime/src/errors.js";
import { compactHistory } from "../../runtime/src/history/history-compactor.js";
import { HistoryStore } from "../../runtime/src/history/history-store.js";
import { makeTurns } from "../helpers.js";

const seqs = (turns: { sequenceNumber: number }[]) => turns.map((t) => t.sequenceNumber);
const range = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe("HistoryStore", () => {
  it("assigns increasing sequence numbers", () => {
    const store = new HistoryStore();
    const first = store.record("user", "hello", 1);
    const second = store.record("assistant", "hi", 2);

    expect(first.sequenceNumber).toBe(1);
    expect(second.sequenceNumber).toBe(2);
    expect(store.size()).toBe(2);
    expect(store.snapshot()).toEqual([
      { role: "user", text: "hello", sequenceNumber: 1, createdAt: 1 },
      { role: "assistant", text: "hi", sequenceNumber: 2, createdAt: 2 },
    ]);
  });

  it("keeps counting after clear", () => {
    const store = new HistoryStore();
    store.record("user", "a");
    store.record("assistant", "b");
    store.clear();

    expect(store.size()).toBe(0);
    expect(store.record("user", "c").sequenceNumber).toBe(3);
  });

  it("rejects out-of-order appends", () => {
    const store = new HistoryStore(makeTurns(3));
    expect(() => store.append({ role: "user", text: "late", sequenceNumber: 2, createdAt: 0 })).toThrow(
      "Turn sequence 2 is not after 3",
    );
  });

  it("hands out copies", () => {
    const store = new HistoryStore(makeTurns(2));
    const snapshot = store.snapshot();
    snapshot[0].text = "changed";
    snapshot.pop();

    expect(store.size()).toBe(2);
    expect(store.snapshot()[0].text).toBe("t1");
  });

  it("restores the next sequence number", () => {
    const store = new HistoryStore(makeTurns(2), 10);
    expect(store.peekNextSequence()).toBe(10);
    expect(store.record("user", "x").sequenceNumber).toBe(10);
  });

  it("replaces turns in sequence order", () => {
    const store = new HistoryStore(makeTurns(5));
    store.replace([...makeTurns(2, 4)].reverse());
    expect(seqs(store.snapshot())).toEqual([4, 5]);
    expect(store.peekNextSequence()).toBe(6);
  });
});

describe("compactHistory", () => {
  const turns = makeTurns(25);

  it("keeps the last turns with the recent strategy", () => {
    expect(seqs(compactHistory(turns, 10, "recent"))).toEqual(range(16, 25));
  });

  it("keeps both ends with the first strategy", () => {
    expect(seqs(compactHistory(turns, 10, "first"))).toEqual([...range(1, 5), ...range(21, 25)]);
  });

  it("puts the extra turn at the start for odd limits", () => {
    expect(seqs(compactHistory(turns, 5, "first"))).toEqual([1, 2, 3, 24, 25]);
    expect(seqs(compactHistory(turns, 1, "first"))).toEqual([1]);
  });

  it("samples at a fixed stride with the middle strategy", () => {
    // stride ceil(25/10) = 3 → indices 0,3,...,24 (9 turns, last included)
    expect(seqs(compactHistory(turns, 10, "middle"))).toEqual([1, 4, 7, 10, 13, 16, 19, 22, 25]);
  });

  it("adds the last turn when the stride misses it", () => {
    // stride ceil(12/5) = 3 → indices 0,3,6,9 then the last (11)
    expect(seqs(compactHistory(makeTurns(12), 5, "middle"))).toEqual([1, 4, 7, 10, 12]);
    // stride ceil(11/5) = 3 → indices 0,3,6,9 then the last (10)
    expect(seqs(compactHistory(makeTurns(11), 5, "middle"))).toEqual([1, 4, 7, 10, 11]);
  });

  it("swaps the final sample for the last turn when the sample is full", () => {
    // stride ceil(8/3) = 3 → indices 0,3,6 fill the limit; 6 becomes 7
    expect(seqs(compactHistory(makeTurns(8), 3, "middle"))).toEqual([1, 4, 8]);
    // stride ceil(9/2) = 5 → indices 0,5; 5 becomes 8
    expect(seqs(compactHistory(makeTurns(9), 2, "middle"))).toEqual([1, 9]);
  });

  it.each(["recent", "first", "middle"] as const)(
    "stays within the limit, in order, ending on the last turn (%s)",
    (strategy) => {
      for (let total = 1; total <= 40; total++) {
        for (let limit = 1; limit <= 12; limit++) {
          const result = compactHistory(makeTurns(total), limit, strategy);
          if (strategy === "middle") {
            expect(result.length).toBeLessThanOrEqual(limit);
            if (total <= limit) expect(result.length).toBe(total);
          } else {
            expect(result.length).toBe(Math.min(total, limit));
          }
          const s = seqs(result);
          expect(s).toEqual([...s].sort((a, b) => a - b));
          if (strategy !== "first" || limit > 1) {
            expect(s[s.length - 1]).toBe(total);
          }
        }
      }
    },
  );

  it("returns the turns unchanged when within the limit", () => {
    const few = makeTurns(4);
    expect(compactHistory(few, 4, "middle")).toEqual(few);
    expect(compactHistory(few, 10, "first")).toEqual(few);
  });

  it("sorts by sequence number without touching the input", () => {
    const shuffled = [...makeTurns(6)].reverse();
    const before = seqs(shuffled);
    expect(seqs(compactHistory(shuffled, 3, "recent"))).toEqual([4, 5, 6]);
    expect(seqs(shuffled)).toEqual(before);
  });

  it.each([0, -1, 2.5, Number.NaN])("rejects a limit of %s", (limit) => {
    expect(() => compactHistory(turns, limit, "recent")).toThrow(ConfigurationError);
  });
});
