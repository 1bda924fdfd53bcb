/**
 * Leverage Analyst
 *
 * Answers one leverage request end to end:
 *   - Resolves the expiration (default: nearest to one year out)
 *   - Pulls the call chain and underlying price from the provider
 *   - Computes leverage for every strike, then narrows to the strike band
 *   - Builds chart series and the scenario summary
 *
 * Holds no state between requests beyond its provider and defaults.
 */

import { componentLogger } from "../utils/logger.js";
import { InvalidInputError } from "../utils/errors.js";
import { sanitizeSymbol, TickerSchema } from "../utils/validation.js";
import {
  computeLeverage,
  filterByStrikeRange,
  selectDefaultExpiration,
} from "../quant/index.js";
import {
  buildLeverageChart,
  describeScenario,
  type LeverageChartData,
} from "../xai/leverage-chart.js";
import type { MarketDataProvider } from "../types/market.js";
import type { LeverageResult } from "../types/options.js";

const log = componentLogger("analyst");

export interface AnalystDefaults {
  targetPct: number;
  strikeLowPct: number;
  strikeHighPct: number;
  showAdjusted: boolean;
}

export interface LeverageRequest {
  symbol: string;
  expiration?: string;
  targetPct?: number;
  lowPct?: number;
  highPct?: number;
  showAdjusted?: boolean;
}

export interface ExpirationListing {
  symbol: string;
  expirations: string[];
  defaultExpiration: string;
}

export interface LeverageReport {
  symbol: string;
  expiration: string;
  strikeRange: { lowPct: number; highPct: number; minStrike: number; maxStrike: number };
  showAdjusted: boolean;
  summary: string[];
  /** Rows inside the strike band, in chain order */
  result: LeverageResult;
  /** Row count before the strike band was applied */
  totalStrikes: number;
  chart: LeverageChartData;
}

export class LeverageAnalyst {
  constructor(
    private readonly provider: MarketDataProvider,
    private readonly defaults: AnalystDefaults
  ) {}

  async listExpirations(
    rawSymbol: string,
    referenceDate: Date = new Date()
  ): Promise<ExpirationListing> {
    const symbol = normalizeSymbol(rawSymbol);
    const expirations = await this.provider.getExpirations(symbol);
    const defaultExpiration = selectDefaultExpiration(expirations, referenceDate);

    log.debug(`${symbol}: ${expirations.length} expirations, default ${defaultExpiration}`);
    return { symbol, expirations, defaultExpiration };
  }

  async analyze(
    request: LeverageRequest,
    referenceDate: Date = new Date()
  ): Promise<LeverageReport> {
    const listing = await this.listExpirations(request.symbol, referenceDate);
    const { symbol } = listing;

    const expiration = request.expiration ?? listing.defaultExpiration;
    if (!listing.expirations.includes(expiration)) {
      throw new InvalidInputError(`${symbol} has no ${expiration} expiration`);
    }

    const targetPct = request.targetPct ?? this.defaults.targetPct;
    const lowPct = request.lowPct ?? this.defaults.strikeLowPct;
    const highPct = request.highPct ?? this.defaults.strikeHighPct;
    const showAdjusted = request.showAdjusted ?? this.defaults.showAdjusted;

    const chain = await this.provider.getCallChain(symbol, expiration);
    const full = computeLeverage(chain.quotes, chain.currentPrice, targetPct);
    const result = filterByStrikeRange(full, chain.currentPrice, lowPct, highPct);

    if (result.rows.length === 0) {
      log.warn(
        `${symbol} ${expiration}: no strikes in ${lowPct}%..${highPct}% band ` +
        `(${full.rows.length} in chain)`
      );
    } else {
      log.info(
        `${symbol} ${expiration}: ${result.rows.length}/${full.rows.length} strikes, ` +
        `target ${targetPct}% → $${full.scenario.targetPrice.toFixed(2)}`
      );
    }

    return {
      symbol,
      expiration,
      strikeRange: {
        lowPct,
        highPct,
        minStrike: chain.currentPrice * (1 + lowPct / 100),
        maxStrike: chain.currentPrice * (1 + highPct / 100),
      },
      showAdjusted,
      summary: describeScenario(full.scenario),
      result,
      totalStrikes: full.rows.length,
      chart: buildLeverageChart(result, { showAdjusted }),
    };
  }
}

function normalizeSymbol(raw: string): string {
  const parsed = TickerSchema.safeParse(sanitizeSymbol(raw));
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid ticker symbol "${raw}"`);
  }
  return parsed.data;
}
