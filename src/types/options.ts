/**
 * Option chain and leverage type definitions.
 * Covers chain rows, price scenarios, and per-strike leverage results.
 */

/** One row of a call chain for a single expiration */
export interface OptionQuote {
  strike: number;
  ask: number; // 0 = no ask quoted
}

/** User-chosen price move applied to the underlying */
export interface Scenario {
  currentPrice: number;
  targetPct: number; // percent, 20 = +20%
}

export interface ResolvedScenario extends Scenario {
  targetPrice: number;
}

export type UndefinedReason =
  | "zero_premium" // ratio divides by a zero ask
  | "zero_move"    // adjusted ratio normalises by a 0% move
  | "non_finite";  // quotient overflows, e.g. a subnormal ask

/**
 * A ratio that may have no value for a row.
 * A defined ratio always carries a finite number.
 */
export type Ratio =
  | { kind: "defined"; value: number }
  | { kind: "undefined"; reason: UndefinedReason };

/** Leverage figures for one strike */
export interface LeverageRow {
  strike: number;
  premium: number;
  breakEven: number;     // strike + premium
  intrinsicGain: number; // max(targetPrice - strike, 0)
  premiumGain: number;   // intrinsicGain - premium
  leverageRatio: Ratio;
  adjustedLeverageRatio: Ratio;
}

/** Rows are index-aligned with the quotes they were computed from */
export interface LeverageResult {
  scenario: ResolvedScenario;
  rows: LeverageRow[];
}
