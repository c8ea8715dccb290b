// Standard normal CDF / PDF with a double-precision erf (no reliance on Math.erf)
import type { Field } from './numeric';

const SQRT_2PI = Math.sqrt(2 * Math.PI);

/** Chebyshev coefficients of erfc on t = 2/(2+z), z ≥ 0 (Press et al., 3rd ed. §6.2) */
const ERFC_COF = [
  -1.3026537197817094, 6.4196979235649026e-1, 1.9476473204185836e-2,
  -9.561514786808631e-3, -9.46595344482036e-4, 3.66839497852761e-4,
  4.2523324806907e-5, -2.0278578112534e-5, -1.624290004647e-6,
  1.30365583558e-6, 1.5626441722e-8, -8.5238095915e-8, 6.529054439e-9,
  5.059343495e-9, -9.91364156e-10, -2.27365122e-10, 9.6467911e-11,
  2.394038e-12, -6.886027e-12, 8.94487e-13, 3.13092e-13, -1.12708e-13,
  3.81e-16, 7.106e-15, -1.523e-15, -9.4e-17, 1.21e-16, -2.8e-17,
] as const;

function erfcCheb(z: number): number {
  const t = 2 / (2 + z);
  const ty = 4 * t - 2;
  let d = 0;
  let dd = 0;
  for (let j = ERFC_COF.length - 1; j > 0; j--) {
    const tmp = d;
    d = ty * d - dd + ERFC_COF[j];
    dd = tmp;
  }
  return t * Math.exp(-z * z + 0.5 * (ERFC_COF[0] + ty * d) - dd);
}

/** Complementary error function, accurate in both tails. */
export function erfc(x: number): number {
  return x >= 0 ? erfcCheb(x) : 2 - erfcCheb(-x);
}

export function erf(x: number): number {
  return x >= 0 ? 1 - erfcCheb(x) : erfcCheb(-x) - 1;
}

export function normCdf(x: number): number {
  return 0.5 * erfc(-x / Math.SQRT2);
}

export function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / SQRT_2PI;
}

/** N(x) written through a field so derivatives propagate: ½·erfc(−x/√2). */
export function normCdfIn<T>(F: Field<T>, x: T): T {
  return F.mul(F.of(0.5), F.erfc(F.div(F.neg(x), F.of(Math.SQRT2))));
}

export function normPdfIn<T>(F: Field<T>, x: T): T {
  const e = F.exp(F.mul(F.of(-0.5), F.mul(x, x)));
  return F.div(e, F.of(SQRT_2PI));
}
