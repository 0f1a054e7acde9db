/**
 * Market data type definitions.
 */

/** Symbol → last price; a missing key means the price is unavailable */
export type PriceMap = ReadonlyMap<string, number>;

/** Explicit per-symbol price state threaded through valuation */
export type PriceQuote =
  | { status: "present"; price: number }
  | { status: "unavailable" };

/** Source of current prices */
export interface PriceFeed {
  readonly name: string;
  /** Resolves only after every symbol has either a price or none */
  fetchPrices(symbols: readonly string[]): Promise<Map<string, number>>;
}
