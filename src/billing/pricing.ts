/** USD per 1M tokens: `[input, output]`. */
export type PricingTable = Readonly<Record<string, readonly [number, number]>>;

const PER_MILLION = 1_000_000;

/** USD cost of a model call. Models missing from the table cost nothing. */
export function calcCost(pricing: PricingTable, model: string, inputTokens: number, outputTokens = 0): number {
  const [inputRate, outputRate] = pricing[model] ?? [0, 0];
  return (inputTokens / PER_MILLION) * inputRate + (outputTokens / PER_MILLION) * outputRate;
}
