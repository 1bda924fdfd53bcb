/**
 * Yahoo Finance Market Data
 *
 * Uses Yahoo Finance's public options API to fetch:
 *   - Listed expiration dates for an underlying
 *   - The call chain (strike, ask) for one expiration
 *   - The underlying's current price, from the same payload
 *
 * No API key required. Payloads are validated with zod; anything
 * missing surfaces as a MarketDataError.
 */

import { z } from "zod";
import { componentLogger } from "../../utils/logger.js";
import { MarketDataError } from "../../utils/errors.js";
import { formatIsoDate, parseIsoDate } from "../../quant/expiration.js";
import type { CallChain, MarketDataProvider } from "../../types/market.js";
import type { OptionQuote } from "../../types/options.js";

const log = componentLogger("yahoo");

const SECONDS_PER_DAY = 86_400;

// ── Response schema (fields we read) ───────────────────────

const YahooContractSchema = z.object({
  strike: z.number(),
  ask: z.number().nullish(),
});

const YahooOptionResultSchema = z.object({
  underlyingSymbol: z.string().optional(),
  expirationDates: z.array(z.number()).default([]),
  quote: z
    .object({
      regularMarketPrice: z.number().nullish(),
      currentPrice: z.number().nullish(),
    })
    .optional(),
  options: z
    .array(
      z.object({
        expirationDate: z.number(),
        calls: z.array(YahooContractSchema).default([]),
      })
    )
    .default([]),
});

const YahooOptionsResponseSchema = z.object({
  optionChain: z.object({
    result: z.array(YahooOptionResultSchema).nullish(),
    error: z.unknown().nullish(),
  }),
});

type YahooOptionResult = z.infer<typeof YahooOptionResultSchema>;

export interface YahooMarketDataOptions {
  baseUrl: string;
  cacheTtlMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export class YahooMarketData implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly cacheTtlMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  // ── In-memory cache to avoid hammering Yahoo ────────────────
  private readonly cache: Map<string, { data: YahooOptionResult; expiry: number }> =
    new Map();

  constructor(options: YahooMarketDataOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.cacheTtlMs = options.cacheTtlMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async getExpirations(symbol: string): Promise<string[]> {
    const result = await this.load(symbol);
    const dates = [
      ...new Set(
        result.expirationDates.map((s) => formatIsoDate(Math.floor(s / SECONDS_PER_DAY)))
      ),
    ].sort();

    if (dates.length === 0) {
      throw new MarketDataError(symbol, `No option expirations listed for ${symbol}`);
    }
    return dates;
  }

  async getCallChain(symbol: string, expiration: string): Promise<CallChain> {
    const seconds = parseIsoDate(expiration) * SECONDS_PER_DAY;
    const result = await this.load(symbol, seconds);

    const currentPrice =
      result.quote?.regularMarketPrice ?? result.quote?.currentPrice ?? null;
    if (currentPrice === null || !(currentPrice > 0)) {
      throw new MarketDataError(symbol, `No current price for ${symbol}`);
    }

    const block = result.options.find(
      (o) => formatIsoDate(Math.floor(o.expirationDate / SECONDS_PER_DAY)) === expiration
    );
    if (!block) {
      throw new MarketDataError(symbol, `No ${expiration} chain for ${symbol}`);
    }

    const badStrike = block.calls.find((c) => !Number.isFinite(c.strike) || c.strike <= 0);
    if (badStrike) {
      log.warn(`Yahoo chain for ${symbol} ${expiration} has strike ${badStrike.strike}`);
      throw new MarketDataError(symbol, `Invalid strike in ${expiration} chain for ${symbol}`);
    }

    const quotes: OptionQuote[] = block.calls.map((c) => ({
      strike: c.strike,
      ask: c.ask != null && Number.isFinite(c.ask) && c.ask > 0 ? c.ask : 0,
    }));

    log.info(
      `Yahoo chain for ${symbol} ${expiration}: ${quotes.length} calls, ` +
      `price $${currentPrice.toFixed(2)}`
    );
    return { symbol, expiration, currentPrice, quotes };
  }

  private async load(symbol: string, dateSeconds?: number): Promise<YahooOptionResult> {
    const key = dateSeconds === undefined ? symbol : `${symbol}@${dateSeconds}`;
    const cached = this.cache.get(key);
    if (cached && this.now() < cached.expiry) return cached.data;

    const query = dateSeconds === undefined ? "" : `?date=${dateSeconds}`;
    const url = `${this.baseUrl}/${encodeURIComponent(symbol)}${query}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { "User-Agent": "Mozilla/5.0" },
      });
    } catch (err) {
      log.error(`Yahoo options fetch failed for ${symbol}`, { error: String(err) });
      throw new MarketDataError(symbol, `Could not reach market data for ${symbol}`);
    }

    if (!res.ok) {
      log.warn(`Yahoo options failed for ${symbol}: HTTP ${res.status}`);
      throw new MarketDataError(symbol, `Market data request failed with HTTP ${res.status}`);
    }

    const parsed = YahooOptionsResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      log.warn(`Unexpected Yahoo payload for ${symbol}`, { issues: parsed.error.issues.length });
      throw new MarketDataError(symbol, `Unexpected market data payload for ${symbol}`);
    }

    const result = parsed.data.optionChain.result?.[0];
    if (!result) {
      log.warn(`Yahoo returned no data for ${symbol}`);
      throw new MarketDataError(symbol, `Unknown symbol ${symbol}`);
    }

    this.cache.set(key, { data: result, expiry: this.now() + this.cacheTtlMs });
    return result;
  }
}
