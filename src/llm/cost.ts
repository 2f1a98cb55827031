import type { LanguageModelV2Usage } from "@ai-sdk/provider";
import type { TokenPrices } from "../config/types.ts";

export interface CostCalculator {
  calcCosts(usage: LanguageModelV2Usage): number;
  sumUsages(vals: LanguageModelV2Usage[]): LanguageModelV2Usage;
}

const PER_TOKENS = 1_000_000;

export function createCostCalculator(tokenPrices: TokenPrices): CostCalculator {
  const price = (tokens: number | undefined, perMillion: number | undefined): number =>
    tokens && perMillion ? (tokens / PER_TOKENS) * perMillion : 0;

  return {
    calcCosts(usage: LanguageModelV2Usage): number {
      return price(usage.inputTokens, tokenPrices.inputTokens) +
        price(usage.outputTokens, tokenPrices.outputTokens) +
        price(usage.totalTokens, tokenPrices.totalTokens) +
        price(usage.reasoningTokens, tokenPrices.reasoningTokens) +
        price(usage.cachedInputTokens, tokenPrices.cachedInputTokens);
    },
    sumUsages(vals: LanguageModelV2Usage[]): LanguageModelV2Usage {
      const zero: LanguageModelV2Usage = {
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        reasoningTokens: 0,
        cachedInputTokens: 0,
      };
      return vals.reduce(
        (acc, val) => ({
          inputTokens: (acc.inputTokens ?? 0) + (val.inputTokens ?? 0),
          outputTokens: (acc.outputTokens ?? 0) + (val.outputTokens ?? 0),
          totalTokens: (acc.totalTokens ?? 0) + (val.totalTokens ?? 0),
          reasoningTokens: (acc.reasoningTokens ?? 0) + (val.reasoningTokens ?? 0),
          cachedInputTokens: (acc.cachedInputTokens ?? 0) + (val.cachedInputTokens ?? 0),
        }),
        zero,
      );
    },
  };
}
