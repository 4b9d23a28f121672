import { DegenerateInputError } from "./errors";

export function assertFinite(x: number, tag: string): void {
  if (!Number.isFinite(x)) {
    throw new DegenerateInputError(tag, x, `Non-finite value at ${tag}: ${x}`);
  }
}

export function assertPositive(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x <= 0) {
    throw new DegenerateInputError(tag, x, `Non-positive value at ${tag}: ${x}`);
  }
}

/** Round half to even, as the dashboard does for default purchase prices. */
export function roundHalfEven(x: number, decimals = 0): number {
  const f = Math.pow(10, decimals);
  const v = x * f;
  const fl = Math.floor(v);
  const diff = v - fl;
  let r: number;
  // exact ties only, on the binary value
  if (diff === 0.5) {
    r = fl % 2 === 0 ? fl : fl + 1;
  } else {
    r = Math.round(v);
  }
  return r / f;
}
