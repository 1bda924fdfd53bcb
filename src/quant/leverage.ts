/**
 * Call Leverage Calculator
 *
 * Compares buying a call at each strike against holding the stock.
 *
 * Leverage ratio:          L  = S / C
 * Adjusted leverage ratio: La = ((max(S·(1+m) − K, 0) − C) / C) / m
 *
 * Where:
 *   S = Current underlying (stock) price
 *   K = Strike
 *   C = Option premium (ask)
 *   m = Target move as a fraction (20% → 0.2)
 *
 * L says how many times cheaper the option is than the share. La is the
 * option's return on premium at expiry per unit of stock return, so it
 * nets out both the premium paid and the size of the move.
 */

import type {
  LeverageResult,
  LeverageRow,
  OptionQuote,
  Ratio,
  ResolvedScenario,
} from "../types/options.js";
import {
  EmptyInputError,
  InvalidInputError,
  InvalidScenarioError,
} from "../utils/errors.js";

export function defined(value: number): Ratio {
  return { kind: "defined", value };
}

export function isDefined(
  ratio: Ratio
): ratio is { kind: "defined"; value: number } {
  return ratio.kind === "defined";
}

/** Numeric value of a ratio, or null when it has none */
export function ratioValue(ratio: Ratio): number | null {
  return isDefined(ratio) ? ratio.value : null;
}

export function targetPriceFor(currentPrice: number, targetPct: number): number {
  return currentPrice * (1 + targetPct / 100);
}

/**
 * Compute leverage figures for every quote in a chain.
 * Rows come back in input order, one per quote.
 *
 * @param targetPct - Target move in percent; may be negative
 * @throws EmptyInputError when quotes is empty
 * @throws InvalidScenarioError when currentPrice is not positive or targetPct is not finite
 * @throws InvalidInputError when a quote has a bad strike or ask
 */
export function computeLeverage(
  quotes: readonly OptionQuote[],
  currentPrice: number,
  targetPct: number
): LeverageResult {
  assertPrice(currentPrice);
  if (!Number.isFinite(targetPct)) {
    throw new InvalidScenarioError(`Target move must be finite, got ${targetPct}`);
  }
  if (quotes.length === 0) {
    throw new EmptyInputError("No option quotes to compute leverage from");
  }

  const scenario: ResolvedScenario = {
    currentPrice,
    targetPct,
    targetPrice: targetPriceFor(currentPrice, targetPct),
  };

  const rows = quotes.map((quote, i) => {
    assertQuote(quote, i);
    return leverageRow(quote, scenario);
  });

  return { scenario, rows };
}

function leverageRow(quote: OptionQuote, scenario: ResolvedScenario): LeverageRow {
  const { strike, ask: premium } = quote;
  const { currentPrice, targetPct, targetPrice } = scenario;

  const intrinsicGain = Math.max(targetPrice - strike, 0);
  const premiumGain = intrinsicGain - premium;

  let leverageRatio: Ratio;
  let adjustedLeverageRatio: Ratio;

  if (premium === 0) {
    leverageRatio = { kind: "undefined", reason: "zero_premium" };
    adjustedLeverageRatio = { kind: "undefined", reason: "zero_premium" };
  } else {
    leverageRatio = finiteRatio(currentPrice / premium);
    adjustedLeverageRatio =
      targetPct === 0
        ? { kind: "undefined", reason: "zero_move" }
        : finiteRatio(premiumGain / premium / (targetPct / 100));
  }

  return {
    strike,
    premium,
    breakEven: strike + premium,
    intrinsicGain,
    premiumGain,
    leverageRatio,
    adjustedLeverageRatio,
  };
}

function finiteRatio(value: number): Ratio {
  return Number.isFinite(value) ? defined(value) : { kind: "undefined", reason: "non_finite" };
}

/**
 * Keep rows whose strike lies within [lowPct, highPct] percent of the
 * current price, both ends inclusive. lowPct > highPct selects nothing.
 */
export function filterByStrikeRange(
  result: LeverageResult,
  currentPrice: number,
  lowPct: number,
  highPct: number
): LeverageResult {
  assertPrice(currentPrice);

  const minStrike = currentPrice * (1 + lowPct / 100);
  const maxStrike = currentPrice * (1 + highPct / 100);

  return {
    scenario: result.scenario,
    rows: result.rows.filter((r) => r.strike >= minStrike && r.strike <= maxStrike),
  };
}

// ── Boundary checks ─────────────────────────────────────────

function assertPrice(currentPrice: number): void {
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
    throw new InvalidScenarioError(
      `Current price must be a positive number, got ${currentPrice}`
    );
  }
}

function assertQuote(quote: OptionQuote, index: number): void {
  if (!Number.isFinite(quote.strike) || quote.strike <= 0) {
    throw new InvalidInputError(`Quote #${index} has invalid strike ${quote.strike}`);
  }
  if (!Number.isFinite(quote.ask) || quote.ask < 0) {
    throw new InvalidInputError(`Quote #${index} has invalid ask ${quote.ask}`);
  }
}
