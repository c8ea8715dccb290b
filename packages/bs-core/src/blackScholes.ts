/**
 * Black-Scholes-Merton pricing with continuous dividend yield.
 *
 *   C = S·e^(−qT)·N(d1) − K·e^(−rT)·N(d2)
 *   P = K·e^(−rT)·N(−d2) − S·e^(−qT)·N(−d1)
 *   d1 = [ln(S/K) + (r − q + σ²/2)T] / (σ√T),  d2 = d1 − σ√T
 *
 * Conventions (see BSGreeks):
 *  - Vega: per 1 vol point
 *  - Theta: per year, negative for decaying time value
 *  - Rho: per 1% rate move
 *
 * Every price is written against a Field so a dual/tracing number type can be
 * pushed through it; the plain-number API wraps `numberField`.
 */
import type { BSGreeks, OptionKind } from "@core-types";
import { type Field, numberField, maxIn } from "./numeric";
import { normCdf, normPdf, normCdfIn } from "./normal";
import { assertMarketInputs } from "./utils";

export const PER_POINT = 0.01;

function checkInputs<V>(F: Field<V>, S: V, K: V, r: V, q: V, sigma: V, T: V): void {
  assertMarketInputs(F.primal(S), F.primal(K), F.primal(r), F.primal(q), F.primal(sigma), F.primal(T));
}

/** At expiry (or zero vol) the option is worth its discounted intrinsic on the forward. */
function isDegenerate<V>(F: Field<V>, sigma: V, T: V): boolean {
  return F.primal(T) === 0 || F.primal(sigma) === 0;
}

/** S·e^(−qT) − K·e^(−rT): discounted forward minus discounted strike. */
function forwardIntrinsicIn<V>(F: Field<V>, S: V, K: V, r: V, q: V, T: V): V {
  const sDisc = F.mul(S, F.exp(F.neg(F.mul(q, T))));
  const kDisc = F.mul(K, F.exp(F.neg(F.mul(r, T))));
  return F.sub(sDisc, kDisc);
}

function d1d2In<V>(F: Field<V>, S: V, K: V, r: V, q: V, sigma: V, T: V): [V, V] {
  const volT = F.mul(sigma, F.sqrt(T));
  const drift = F.add(F.sub(r, q), F.mul(F.of(0.5), F.mul(sigma, sigma)));
  const d1 = F.div(F.add(F.log(F.div(S, K)), F.mul(drift, T)), volT);
  return [d1, F.sub(d1, volT)];
}

export function callPriceIn<V>(F: Field<V>, S: V, K: V, r: V, q: V, sigma: V, T: V): V {
  checkInputs(F, S, K, r, q, sigma, T);
  if (isDegenerate(F, sigma, T)) {
    return maxIn(F, forwardIntrinsicIn(F, S, K, r, q, T), F.of(0));
  }
  const [d1, d2] = d1d2In(F, S, K, r, q, sigma, T);
  const sDisc = F.mul(S, F.exp(F.neg(F.mul(q, T))));
  const kDisc = F.mul(K, F.exp(F.neg(F.mul(r, T))));
  return F.sub(F.mul(sDisc, normCdfIn(F, d1)), F.mul(kDisc, normCdfIn(F, d2)));
}

export function putPriceIn<V>(F: Field<V>, S: V, K: V, r: V, q: V, sigma: V, T: V): V {
  checkInputs(F, S, K, r, q, sigma, T);
  if (isDegenerate(F, sigma, T)) {
    return maxIn(F, F.neg(forwardIntrinsicIn(F, S, K, r, q, T)), F.of(0));
  }
  const [d1, d2] = d1d2In(F, S, K, r, q, sigma, T);
  const sDisc = F.mul(S, F.exp(F.neg(F.mul(q, T))));
  const kDisc = F.mul(K, F.exp(F.neg(F.mul(r, T))));
  return F.sub(F.mul(kDisc, normCdfIn(F, F.neg(d2))), F.mul(sDisc, normCdfIn(F, F.neg(d1))));
}

export function priceIn<V>(F: Field<V>, kind: OptionKind, S: V, K: V, r: V, q: V, sigma: V, T: V): V {
  return kind === "call"
    ? callPriceIn(F, S, K, r, q, sigma, T)
    : putPriceIn(F, S, K, r, q, sigma, T);
}

export function priceCall(S: number, K: number, r: number, q: number, sigma: number, T: number): number {
  return callPriceIn(numberField, S, K, r, q, sigma, T);
}

export function pricePut(S: number, K: number, r: number, q: number, sigma: number, T: number): number {
  return putPriceIn(numberField, S, K, r, q, sigma, T);
}

export function price(kind: OptionKind, S: number, K: number, r: number, q: number, sigma: number, T: number): number {
  return priceIn(numberField, kind, S, K, r, q, sigma, T);
}

// Limiting Greeks of max(±(S·e^(−qT) − K·e^(−rT)), 0)
function degenerateGreeks(S: number, K: number, r: number, q: number, T: number, kind: OptionKind): BSGreeks {
  const dq = Math.exp(-q * T);
  const dr = Math.exp(-r * T);
  const fwd = S * dq - K * dr;
  const sign = kind === "call" ? 1 : -1;
  if (sign * fwd <= 0) {
    return Object.freeze({ delta: 0, gamma: 0, vega: 0, theta: 0, rho: 0 });
  }
  return Object.freeze({
    delta: sign * dq,
    gamma: 0,
    vega: 0,
    theta: sign * (q * S * dq - r * K * dr),
    rho: (sign * K * T * dr) * PER_POINT,
  });
}

/** Closed-form Greeks (call by default). */
export function greeks(
  S: number,
  K: number,
  r: number,
  q: number,
  sigma: number,
  T: number,
  kind: OptionKind = "call"
): BSGreeks {
  assertMarketInputs(S, K, r, q, sigma, T);
  if (T === 0 || sigma === 0) return degenerateGreeks(S, K, r, q, T, kind);

  const sqrtT = Math.sqrt(T);
  const [d1, d2] = d1d2In(numberField, S, K, r, q, sigma, T);
  const dq = Math.exp(-q * T);
  const dr = Math.exp(-r * T);
  const nd1 = normPdf(d1);

  // Gamma and vega are the same for calls and puts
  const gamma = (dq * nd1) / (S * sigma * sqrtT);
  const vega = S * dq * nd1 * sqrtT * PER_POINT;
  const decay = -(S * sigma * dq * nd1) / (2 * sqrtT);

  if (kind === "call") {
    const Nd1 = normCdf(d1);
    const Nd2 = normCdf(d2);
    return Object.freeze({
      delta: dq * Nd1,
      gamma,
      vega,
      theta: decay - r * K * dr * Nd2 + q * S * dq * Nd1,
      rho: K * T * dr * Nd2 * PER_POINT,
    });
  }

  const Nmd1 = normCdf(-d1);
  const Nmd2 = normCdf(-d2);
  return Object.freeze({
    delta: -dq * Nmd1,
    gamma,
    vega,
    theta: decay + r * K * dr * Nmd2 - q * S * dq * Nmd1,
    rho: -K * T * dr * Nmd2 * PER_POINT,
  });
}
