// Greeks by forward-mode AD: push hyper-dual numbers through the generic pricer
import type { BSGreeks, MarketParameters, OptionKind, OptionPosition } from "@core-types";
import { type HyperDual, hyperDualField as H, constant, variable } from "./hyperDual";
import { priceIn, PER_POINT } from "./blackScholes";

type DualMarket = { [P in keyof MarketParameters]: HyperDual };
type Valuation = (m: DualMarket) => HyperDual;

function lifted(m: MarketParameters, seed?: keyof MarketParameters): DualMarket {
  const at = (p: keyof MarketParameters) => (p === seed ? variable(m[p]) : constant(m[p]));
  return { S: at("S"), K: at("K"), r: at("r"), q: at("q"), sigma: at("sigma"), T: at("T") };
}

function greeksOf(value: Valuation, m: MarketParameters): BSGreeks {
  const spot = value(lifted(m, "S"));
  return Object.freeze({
    delta: spot.b,
    gamma: spot.d,
    vega: value(lifted(m, "sigma")).b * PER_POINT,
    theta: -value(lifted(m, "T")).b,
    rho: value(lifted(m, "r")).b * PER_POINT,
  });
}

function optionValue(kind: OptionKind): Valuation {
  return (m) => priceIn(H, kind, m.S, m.K, m.r, m.q, m.sigma, m.T);
}

export function adGreeks(
  kind: OptionKind,
  S: number,
  K: number,
  r: number,
  q: number,
  sigma: number,
  T: number
): BSGreeks {
  return greeksOf(optionValue(kind), { S, K, r, q, sigma, T });
}

/**
 * Aggregate Greeks for options sharing one underlying, strike and tenor.
 * Differentiates the whole book's value once per parameter.
 */
export function portfolioGreeks(positions: readonly OptionPosition[], market: MarketParameters): BSGreeks {
  const book: Valuation = (m) =>
    positions.reduce<HyperDual>(
      (acc, p) => H.add(acc, H.mul(constant(p.quantity), optionValue(p.kind)(m))),
      constant(0)
    );
  return greeksOf(book, market);
}
