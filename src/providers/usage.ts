export interface ModelPricing {
  /** Unit price of prompt tokens */
  input: number;
  /** Unit price of completion tokens */
  output: number;
  /** Multiplier applied to tokens × unit price, e.g. 0.001 for prices quoted per 1K tokens */
  unit: number;
  currency: string;
}

export type PricingLookup = (model: string) => ModelPricing | undefined;

export interface Usage {
  promptTokens: number;
  promptUnitPrice: number;
  promptPriceUnit: number;
  promptPrice: number;
  completionTokens: number;
  completionUnitPrice: number;
  completionPriceUnit: number;
  completionPrice: number;
  totalTokens: number;
  totalPrice: number;
  currency: string;
  /** Seconds since the invocation started */
  latency: number;
}

export const DEFAULT_CURRENCY = "USD";

const PRICE_DECIMALS = 7;

export function calculateUsage(params: {
  model: string;
  promptTokens: number;
  completionTokens: number;
  pricing?: PricingLookup;
  startedAt?: number;
}): Usage {
  const { model, promptTokens, completionTokens, pricing, startedAt } = params;
  const price = pricing?.(model);

  const promptUnitPrice = price?.input ?? 0;
  const completionUnitPrice = price?.output ?? 0;
  const priceUnit = price?.unit ?? 0;

  const promptPrice = roundPrice(promptTokens * promptUnitPrice * priceUnit);
  const completionPrice = roundPrice(completionTokens * completionUnitPrice * priceUnit);

  return {
    promptTokens,
    promptUnitPrice,
    promptPriceUnit: priceUnit,
    promptPrice,
    completionTokens,
    completionUnitPrice,
    completionPriceUnit: priceUnit,
    completionPrice,
    totalTokens: promptTokens + completionTokens,
    totalPrice: roundPrice(promptPrice + completionPrice),
    currency: price?.currency ?? DEFAULT_CURRENCY,
    latency: startedAt === undefined ? 0 : Math.max(0, (performance.now() - startedAt) / 1000),
  };
}

function roundPrice(value: number): number {
  const factor = 10 ** PRICE_DECIMALS;
  return Math.round(value * factor) / factor;
}
