import type { CheckName, ToleranceBand, ValidationOutcome, ValidationStatus } from "@core-types";

/**
 * Three-level verdict on how far a value sits outside its bound:
 *   deviation ≤ passTolerance           → PASS
 *   passTolerance < deviation ≤ halt    → WARN (rounding-sized, surfaced not blocking)
 *   deviation > haltTolerance or NaN    → HALT
 */
export function classify(deviation: number, band: ToleranceBand): ValidationStatus {
  if (!(deviation <= band.haltTolerance)) return "HALT";
  if (deviation > band.passTolerance) return "WARN";
  return "PASS";
}

/** Amount by which `value` lies outside [lower, upper]; 0 inside. */
export function excess(value: number, lower: number, upper: number): number {
  if (value > upper) return value - upper;
  if (value < lower) return lower - value;
  return 0;
}

export function outcome(
  status: ValidationStatus,
  check: CheckName,
  message: string,
  measuredValue: number,
  bound: number
): ValidationOutcome {
  return Object.freeze({ status, check, message, measuredValue, bound });
}

export const fmt = (x: number): string => (Number.isFinite(x) ? x.toFixed(4) : String(x));
export const fmtExp = (x: number): string => (Number.isFinite(x) ? x.toExponential(2) : String(x));
