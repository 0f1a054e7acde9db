/**
 * Yahoo Finance Price Feed
 *
 * Uses Yahoo Finance's public chart API to fetch the last regular-market
 * price for every holding. No API key required.
 *
 * Every symbol is fetched concurrently and every request settles (price,
 * HTTP error, bad payload or timeout) before the map is returned, so the
 * valuation never sees a partial view. Failures leave the key absent.
 */

import { z } from "zod";
import type { PriceFeed } from "../../types/market.js";
import { componentLogger } from "../../utils/logger.js";
import { errorMessage } from "../../utils/errors.js";

const log = componentLogger("yahoo");

export const YAHOO_BASE = "https://query1.finance.yahoo.com/v8/finance/chart";

export type FetchFn = (input: string, init?: { headers?: Record<string, string>; signal?: AbortSignal }) => Promise<Response>;

export interface YahooPriceFeedOptions {
  /** Exchange suffix, e.g. ".NS" for NSE listings */
  symbolSuffix?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            regularMarketPrice: z.number().nullable().optional(),
          }),
        })
      )
      .nullable()
      .optional(),
  }),
});

export class YahooPriceFeed implements PriceFeed {
  readonly name = "yahoo";
  private readonly suffix: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: YahooPriceFeedOptions = {}) {
    this.suffix = options.symbolSuffix ?? "";
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  quoteUrl(symbol: string): string {
    return `${YAHOO_BASE}/${encodeURIComponent(symbol + this.suffix)}?interval=1d&range=1d`;
  }

  /**
   * Fetch one price; null on any failure. Never rejects.
   */
  async fetchPrice(symbol: string): Promise<number | null> {
    try {
      const res = await this.fetchFn(this.quoteUrl(symbol), {
        headers: { "User-Agent": "Mozilla/5.0" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        log.warn(`Yahoo quote failed for ${symbol}: HTTP ${res.status}`);
        return null;
      }

      const parsed = ChartResponseSchema.safeParse(await res.json());
      const price = parsed.success ? parsed.data.chart.result?.[0]?.meta.regularMarketPrice : undefined;

      if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
        log.warn(`${symbol}: price not available`);
        return null;
      }

      log.info(`${symbol}: ${price.toFixed(2)}`);
      return price;
    } catch (err) {
      log.error(`Yahoo quote fetch failed for ${symbol}`, { error: errorMessage(err) });
      return null;
    }
  }

  async fetchPrices(symbols: readonly string[]): Promise<Map<string, number>> {
    log.info(`Fetching prices for ${symbols.length} symbols...`);

    const results = await Promise.all(
      symbols.map(async (symbol) => [symbol, await this.fetchPrice(symbol)] as const)
    );

    const prices = new Map<string, number>();
    for (const [symbol, price] of results) {
      if (price !== null) prices.set(symbol, price);
    }

    log.info(`Fetched prices for ${prices.size}/${symbols.length} symbols`);
    return prices;
  }
}
