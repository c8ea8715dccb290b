import { erf, erfc } from './normal';

/**
 * Arithmetic the pricing and payoff formulas need from a numeric type.
 * Plain numbers use `numberField`; a dual/tracing type supplies its own field
 * and gets derivatives through every formula written against this interface.
 *
 * Branches (domain checks, degenerate inputs, payoff kinks) read `primal` only.
 */
export interface Field<T> {
  of(x: number): T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
  neg(a: T): T;
  exp(a: T): T;
  log(a: T): T;
  sqrt(a: T): T;
  erf(a: T): T;
  erfc(a: T): T;
  primal(a: T): number;
}

export const numberField: Field<number> = {
  of: (x) => x,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  neg: (a) => -a,
  exp: Math.exp,
  log: Math.log,
  sqrt: Math.sqrt,
  erf,
  erfc,
  primal: (a) => a,
};

// Kink: pick one operand by primal value so derivatives follow the active branch.
export function maxIn<T>(F: Field<T>, a: T, b: T): T {
  return F.primal(a) >= F.primal(b) ? a : b;
}
