import { DomainError } from "@core-types";

export function assertFinite(x: number, tag: string): void {
  if (!Number.isFinite(x)) {
    throw new DomainError(tag, x, "must be finite");
  }
}

export function assertPositive(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x <= 0) {
    throw new DomainError(tag, x, "must be > 0");
  }
}

export function assertNonNegative(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x < 0) {
    throw new DomainError(tag, x, "must be ≥ 0");
  }
}

/** Preconditions shared by every Black-Scholes entry point. */
export function assertMarketInputs(S: number, K: number, r: number, q: number, sigma: number, T: number): void {
  assertPositive(S, "S");
  assertPositive(K, "K");
  assertFinite(r, "r");
  assertFinite(q, "q");
  assertNonNegative(sigma, "sigma");
  assertNonNegative(T, "T");
}
