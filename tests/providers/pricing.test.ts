import { describe, it, expect } from "vitest";
import {
  ANTHROPIC_PRICING,
  GOOGLE_PRICING,
  OPENAI_PRICING,
  estimateFromTable,
  lookupPrice,
  priceForTokens
} from "../../src/providers/pricing.js";

describe("pricing", () => {
  it("should price a million gpt-4o-mini prompt tokens at 0.15", () => {
    expect(estimateFromTable(OPENAI_PRICING, "gpt-4o-mini", 1_000_000, 0)).toBe(0.15);
  });

  it("should return 0 for models without a matching prefix", () => {
    expect(estimateFromTable(OPENAI_PRICING, "llama3", 5000, 5000)).toBe(0);
    expect(estimateFromTable([], "gpt-4o", 5000, 5000)).toBe(0);
  });

  it("should prefer the longest matching prefix", () => {
    expect(lookupPrice(OPENAI_PRICING, "gpt-4-turbo-preview")).toEqual({ inputPerMillion: 10, outputPerMillion: 30 });
    expect(lookupPrice(OPENAI_PRICING, "gpt-4-0613")).toEqual({ inputPerMillion: 30, outputPerMillion: 60 });
    expect(lookupPrice(ANTHROPIC_PRICING, "claude-3-5-sonnet-20241022")).toEqual({ inputPerMillion: 3, outputPerMillion: 15 });
    expect(lookupPrice(GOOGLE_PRICING, "gemini-pro-vision")).toEqual({ inputPerMillion: 0.5, outputPerMillion: 1.5 });
  });

  it("should keep declaration order between prefixes of equal length", () => {
    const first = { inputPerMillion: 1, outputPerMillion: 1 };
    const second = { inputPerMillion: 2, outputPerMillion: 2 };
    expect(lookupPrice([["abc", first], ["abc", second]], "abcdef")).toBe(first);
  });

  it("should combine input and output prices", () => {
    expect(estimateFromTable(OPENAI_PRICING, "gpt-4-turbo", 1000, 1000)).toBe(0.04);
    expect(estimateFromTable(ANTHROPIC_PRICING, "claude-3-haiku-20240307", 1_000_000, 1_000_000)).toBe(1.5);
  });

  it("should never decrease when token counts grow", () => {
    const tables = [
      [OPENAI_PRICING, "gpt-4o"],
      [ANTHROPIC_PRICING, "claude-3-opus-20240229"],
      [GOOGLE_PRICING, "gemini-1.5-pro"]
    ] as const;
    for (const [table, model] of tables) {
      let previous = 0;
      for (const tokens of [0, 1, 10, 999, 50_000, 2_000_000]) {
        const cost = estimateFromTable(table, model, tokens, tokens);
        expect(cost).toBeGreaterThanOrEqual(previous);
        expect(estimateFromTable(table, model, tokens + 1000, tokens)).toBeGreaterThanOrEqual(cost);
        expect(estimateFromTable(table, model, tokens, tokens + 1000)).toBeGreaterThanOrEqual(cost);
        previous = cost;
      }
    }
  });

  it("should treat negative counts as zero", () => {
    expect(priceForTokens({ inputPerMillion: 5, outputPerMillion: 15 }, -10, -10)).toBe(0);
    expect(priceForTokens(undefined, 1000, 1000)).toBe(0);
  });
});
