/**
 * Typed errors raised at the engine and provider boundaries.
 * Per-row indeterminacy is not an error: see Ratio in types/options.ts.
 */

export type LeverageErrorCode =
  | "EMPTY_INPUT"
  | "INVALID_SCENARIO"
  | "INVALID_INPUT"
  | "MARKET_DATA";

export abstract class LeverageError extends Error {
  abstract readonly code: LeverageErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No expirations, or no quotes where at least one row is required */
export class EmptyInputError extends LeverageError {
  readonly code = "EMPTY_INPUT";
}

export class InvalidScenarioError extends LeverageError {
  readonly code = "INVALID_SCENARIO";
}

/** Malformed quote row or calendar date */
export class InvalidInputError extends LeverageError {
  readonly code = "INVALID_INPUT";
}

export class MarketDataError extends LeverageError {
  readonly code = "MARKET_DATA";

  constructor(
    readonly symbol: string,
    message: string
  ) {
    super(message);
  }
}
