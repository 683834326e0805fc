import type { ModelPrice } from "../types.js";

/** Model-name prefix to USD price per million tokens. */
export type PricingTable = ReadonlyArray<readonly [prefix: string, price: ModelPrice]>;

const price = (inputPerMillion: number, outputPerMillion: number): ModelPrice => ({
  inputPerMillion,
  outputPerMillion
});

export const OPENAI_PRICING: PricingTable = [
  ["gpt-4", price(30, 60)],
  ["gpt-4-turbo", price(10, 30)],
  ["gpt-4o", price(5, 15)],
  ["gpt-4o-mini", price(0.15, 0.6)],
  ["gpt-3.5-turbo", price(0.5, 1.5)]
];

export const ANTHROPIC_PRICING: PricingTable = [
  ["claude-3-opus", price(15, 75)],
  ["claude-3-sonnet", price(3, 15)],
  ["claude-3-haiku", price(0.25, 1.25)],
  ["claude-3-5-sonnet", price(3, 15)]
];

export const GOOGLE_PRICING: PricingTable = [
  ["gemini-pro", price(0.5, 1.5)],
  ["gemini-pro-vision", price(0.5, 1.5)],
  ["gemini-1.5-pro", price(3.5, 10.5)],
  ["gemini-1.5-flash", price(0.35, 1.05)]
];

/** Longest matching prefix wins; equal lengths keep declaration order. */
export function lookupPrice(table: PricingTable, model: string): ModelPrice | undefined {
  let best: ModelPrice | undefined;
  let bestLength = -1;
  for (const [prefix, entry] of table) {
    if (model.startsWith(prefix) && prefix.length > bestLength) {
      best = entry;
      bestLength = prefix.length;
    }
  }
  return best;
}

export function priceForTokens(
  pricing: ModelPrice | undefined,
  promptTokens: number,
  completionTokens: number
): number {
  if (!pricing) return 0;
  const inUSD = (Math.max(0, promptTokens) / 1_000_000) * pricing.inputPerMillion;
  const outUSD = (Math.max(0, completionTokens) / 1_000_000) * pricing.outputPerMillion;
  return +(inUSD + outUSD).toFixed(6);
}

export function estimateFromTable(
  table: PricingTable,
  model: string,
  promptTokens: number,
  completionTokens: number
): number {
  return priceForTokens(lookupPrice(table, model), promptTokens, completionTokens);
}
