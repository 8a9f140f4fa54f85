import { describe, it, expect } from "vitest";
import {
  estimateMessagesTokens,
  estimateTokens,
  formatTokenCount,
  getContextUsage,
} from "../../runtime/src/history/token-counter.js";

describe("token estimates", () => {
  it("counts about four characters per token", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abc")).toBe(1);
    expect(estimateTokens("abcdefgh")).toBe(2);
  });

  it("adds a per-message overhead", () => {
    expect(
      estimateMessagesTokens([
        { role: "user", text: "abcdefgh" },
        { role: "assistant", text: "" },
      ]),
    ).toBe(10);
  });

  it("classifies context usage", () => {
    const messages = [{ role: "user" as const, text: "abcdefgh" }, { role: "assistant" as const, text: "" }];

    expect(getContextUsage(messages, 100).status).toBe("ok");
    expect(getContextUsage(messages, 12).status).toBe("warning");
    expect(getContextUsage(messages, 10)).toEqual({
      tokenCount: 10,
      maxTokens: 10,
      percentage: 100,
      status: "critical",
      messageCount: 2,
    });
  });

  it("formats large counts", () => {
    expect(formatTokenCount(999)).toBe("999");
    expect(formatTokenCount(1500)).toBe("1.5K");
    expect(formatTokenCount(2_500_000)).toBe("2.5M");
  });
});
