/**
 * Error taxonomy for the tracker.
 *
 * Only holdings problems are fatal to a reporting cycle; everything the
 * pipeline can degrade around is reported through its outcome instead.
 */

export type PortfolioErrorCode =
  | "INVALID_POSITION"
  | "EMPTY_PORTFOLIO"
  | "HOLDINGS_LOAD_FAILED";

export class PortfolioError extends Error {
  readonly code: PortfolioErrorCode;

  constructor(code: PortfolioErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A holding whose numbers would make the percentage math undefined */
export class InvalidPositionError extends PortfolioError {
  readonly symbol: string;

  constructor(symbol: string, reason: string) {
    super("INVALID_POSITION", `Invalid position ${symbol}: ${reason}`);
    this.symbol = symbol;
  }
}

export class EmptyPortfolioError extends PortfolioError {
  constructor() {
    super("EMPTY_PORTFOLIO", "Portfolio has no positions");
  }
}

export class HoldingsLoadError extends PortfolioError {
  constructor(message: string, cause?: unknown) {
    super("HOLDINGS_LOAD_FAILED", message, { cause });
  }
}

/** True for the errors that must abort a cycle with a non-zero exit */
export function isFatalHoldingsError(err: unknown): err is PortfolioError {
  return err instanceof PortfolioError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
