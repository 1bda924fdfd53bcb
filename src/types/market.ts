/**
 * Market data type definitions.
 * Covers call chain snapshots and the data provider interface.
 */

import type { OptionQuote } from "./options.js";

/** Calls for one symbol and expiration, with the underlying's price */
export interface CallChain {
  symbol: string;
  expiration: string; // YYYY-MM-DD
  currentPrice: number;
  quotes: OptionQuote[];
}

/**
 * Source of expirations and call chains.
 * Missing data rejects with a MarketDataError rather than resolving empty.
 */
export interface MarketDataProvider {
  /** Available expirations, ascending, as YYYY-MM-DD */
  getExpirations(symbol: string): Promise<string[]>;
  getCallChain(symbol: string, expiration: string): Promise<CallChain>;
}
