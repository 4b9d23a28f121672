export type PricingErrorCode = "INVALID_VARIANT" | "DEGENERATE_INPUT" | "INVALID_GRID";

export class PricingError extends Error {
  constructor(readonly code: PricingErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Variant outside {call, put}. Fatal to the single call; never retried. */
export class InvalidVariantError extends PricingError {
  constructor(readonly received: unknown) {
    super("INVALID_VARIANT", `Invalid option variant ${JSON.stringify(received)}; expected "call" or "put"`);
  }
}

/** Input that would divide by zero or take the log of a non-positive number. */
export class DegenerateInputError extends PricingError {
  constructor(readonly field: string, readonly value: number, message?: string) {
    super("DEGENERATE_INPUT", message ?? `Degenerate input ${field}=${value}`);
  }
}

export class InvalidGridError extends PricingError {
  constructor(message: string) {
    super("INVALID_GRID", message);
  }
}

export function isPricingError(err: unknown): err is PricingError {
  return err instanceof PricingError;
}
