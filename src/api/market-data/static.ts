/**
 * Fixed price feed for dry runs: no network, same prices every time.
 */

import fs from "fs";
import type { PriceFeed } from "../../types/market.js";
import { PriceMapSchema } from "../../utils/validation.js";

export class StaticPriceFeed implements PriceFeed {
  readonly name = "static";
  private readonly prices: ReadonlyMap<string, number>;

  constructor(prices: ReadonlyMap<string, number>) {
    this.prices = new Map(prices);
  }

  async fetchPrices(symbols: readonly string[]): Promise<Map<string, number>> {
    const out = new Map<string, number>();
    for (const s of symbols) {
      const price = this.prices.get(s);
      if (price !== undefined) out.set(s, price);
    }
    return out;
  }
}

/** Read a { "SYMBOL": price } JSON file */
export function loadMockPrices(file: string): Map<string, number> {
  const parsed = PriceMapSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
  return new Map(Object.entries(parsed));
}
