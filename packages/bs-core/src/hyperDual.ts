/**
 * Hyper-dual numbers a + b·ε₁ + c·ε₂ + d·ε₁ε₂ with ε₁² = ε₂² = 0.
 *
 * Seeding x = x₀ + ε₁ + ε₂ and evaluating f gives
 *   f(x₀) + f'(x₀)·ε₁ + f'(x₀)·ε₂ + f''(x₀)·ε₁ε₂
 * so first and second derivatives come out exact (no step size).
 */
import type { Field } from './numeric';
import { erf, erfc } from './normal';

export interface HyperDual {
  readonly a: number; // value
  readonly b: number; // ∂/∂ε₁
  readonly c: number; // ∂/∂ε₂
  readonly d: number; // ∂²/∂ε₁∂ε₂
}

const TWO_OVER_SQRT_PI = 2 / Math.sqrt(Math.PI);

export function constant(x: number): HyperDual {
  return { a: x, b: 0, c: 0, d: 0 };
}

/** Independent variable seeded in both directions. */
export function variable(x: number): HyperDual {
  return { a: x, b: 1, c: 1, d: 0 };
}

// Chain rule for a scalar function with value f0, first derivative f1, second f2 at x.a
function lift(x: HyperDual, f0: number, f1: number, f2: number): HyperDual {
  return {
    a: f0,
    b: f1 * x.b,
    c: f1 * x.c,
    d: f1 * x.d + f2 * x.b * x.c,
  };
}

function mul(x: HyperDual, y: HyperDual): HyperDual {
  return {
    a: x.a * y.a,
    b: x.a * y.b + x.b * y.a,
    c: x.a * y.c + x.c * y.a,
    d: x.a * y.d + x.b * y.c + x.c * y.b + x.d * y.a,
  };
}

function recip(x: HyperDual): HyperDual {
  const inv = 1 / x.a;
  return lift(x, inv, -inv * inv, 2 * inv * inv * inv);
}

export const hyperDualField: Field<HyperDual> = {
  of: constant,
  add: (x, y) => ({ a: x.a + y.a, b: x.b + y.b, c: x.c + y.c, d: x.d + y.d }),
  sub: (x, y) => ({ a: x.a - y.a, b: x.b - y.b, c: x.c - y.c, d: x.d - y.d }),
  mul,
  div: (x, y) => mul(x, recip(y)),
  neg: (x) => ({ a: -x.a, b: -x.b, c: -x.c, d: -x.d }),
  exp: (x) => {
    const e = Math.exp(x.a);
    return lift(x, e, e, e);
  },
  log: (x) => lift(x, Math.log(x.a), 1 / x.a, -1 / (x.a * x.a)),
  sqrt: (x) => {
    const s = Math.sqrt(x.a);
    return lift(x, s, 0.5 / s, -0.25 / (s * x.a));
  },
  erf: (x) => {
    const g = TWO_OVER_SQRT_PI * Math.exp(-x.a * x.a);
    return lift(x, erf(x.a), g, -2 * x.a * g);
  },
  erfc: (x) => {
    const g = TWO_OVER_SQRT_PI * Math.exp(-x.a * x.a);
    return lift(x, erfc(x.a), -g, 2 * x.a * g);
  },
  primal: (x) => x.a,
};
