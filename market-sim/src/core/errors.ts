export type MarketErrorKind =
  | "NotFound"
  | "DivisionByZero"
  | "InvalidSegment"
  | "InvalidState";

/**
 * Domain error raised by the simulation core. Never retried: every kind is
 * either bad input data or an out-of-order call.
 */
export class MarketError extends Error {
  readonly kind: MarketErrorKind;

  constructor(kind: MarketErrorKind, message: string) {
    super(message);
    this.name = "MarketError";
    this.kind = kind;
  }

  static notFound(message: string): MarketError {
    return new MarketError("NotFound", message);
  }

  static divisionByZero(message: string): MarketError {
    return new MarketError("DivisionByZero", message);
  }

  static invalidSegment(segment: unknown): MarketError {
    return new MarketError(
      "InvalidSegment",
      `Invalid segment: ${String(segment)}. Choose from FANCY, OPTIMIZER or AVERAGE`
    );
  }

  static invalidState(message: string): MarketError {
    return new MarketError("InvalidState", message);
  }
}

export function isMarketError(error: unknown): error is MarketError {
  return error instanceof MarketError;
}
