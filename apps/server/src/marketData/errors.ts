export class MarketDataError extends Error {
  constructor(message: string, readonly ticker: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MarketDataError";
  }
}

export class InsufficientHistoryError extends Error {
  constructor(readonly observations: number) {
    super(`Need at least 2 usable returns to estimate volatility, got ${observations}`);
    this.name = "InsufficientHistoryError";
  }
}
