// Standard normal density and distribution, double precision.

import { SQRT_2PI } from "./constants";

/** Standard normal density φ(x). */
export function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / SQRT_2PI;
}

/**
 * Standard normal CDF Φ(x).
 *
 * Hart (1968) rational approximation as restated by West (2005), "Better
 * approximations to cumulative normal functions". Absolute error stays below
 * 1e-14 across the real line. The tail mass is computed on |x| and mirrored,
 * so Φ(x) + Φ(-x) = 1 holds to rounding.
 */
export function normCdf(x: number): number {
  const ax = Math.abs(x);
  let tail: number;

  if (ax > 37) {
    tail = 0;
  } else {
    const e = Math.exp(-0.5 * ax * ax);
    if (ax < 7.07106781186547) {
      let num = 3.52624965998911e-2 * ax + 0.700383064443688;
      num = num * ax + 6.37396220353165;
      num = num * ax + 33.912866078383;
      num = num * ax + 112.079291497871;
      num = num * ax + 221.213596169931;
      num = num * ax + 220.206867912376;

      let den = 8.83883476483184e-2 * ax + 1.75566716318264;
      den = den * ax + 16.064177579207;
      den = den * ax + 86.7807322029461;
      den = den * ax + 296.564248779674;
      den = den * ax + 637.333633378831;
      den = den * ax + 793.826512519948;
      den = den * ax + 440.413735824752;

      tail = (e * num) / den;
    } else {
      // continued fraction for the far tail
      let b = ax + 0.65;
      b = ax + 4 / b;
      b = ax + 3 / b;
      b = ax + 2 / b;
      b = ax + 1 / b;
      tail = e / b / 2.506628274631;
    }
  }

  return x > 0 ? 1 - tail : tail;
}
