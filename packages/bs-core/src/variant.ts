import type { OptionVariant } from "@greeks-surface/core-types";
import { InvalidVariantError } from "./errors";

export type ParseResult<T, E> = { ok: true; value: T } | { ok: false; error: E };

const ALIASES = new Map<string, OptionVariant>([
  ["call", "call"],
  ["c", "call"],
  ["put", "put"],
  ["p", "put"],
]);

/**
 * Boundary parser for variants arriving as free text ("Call", "P", ...).
 * Returns a typed error instead of throwing so callers can report it.
 */
export function parseVariant(raw: unknown): ParseResult<OptionVariant, InvalidVariantError> {
  if (typeof raw === "string") {
    const v = ALIASES.get(raw.trim().toLowerCase());
    if (v) return { ok: true, value: v };
  }
  return { ok: false, error: new InvalidVariantError(raw) };
}

export function isOptionVariant(x: unknown): x is OptionVariant {
  return x === "call" || x === "put";
}
