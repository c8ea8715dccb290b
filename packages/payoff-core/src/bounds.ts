import type { CreditBounds } from "@core-types";
import type { PayoffSpec } from "./types";

const upper = (capRate: number | null): number => capRate ?? Number.POSITIVE_INFINITY;

/**
 * Declared limits of the credited return for index returns in [−1, ∞).
 * A result outside these bounds means the formula or its inputs are wrong.
 */
export function creditBounds(spec: PayoffSpec): CreditBounds {
  switch (spec.kind) {
    case "cappedCall":
      return Object.freeze({ lower: spec.floorRate, upper: spec.capRate });
    case "participation":
    case "spread":
    case "floor":
      return Object.freeze({ lower: spec.floorRate, upper: upper(spec.capRate) });
    case "trigger":
      return Object.freeze({ lower: spec.floorRate, upper: spec.triggerRate });
    case "buffer":
      return Object.freeze({ lower: spec.bufferRate - 1, upper: upper(spec.capRate) });
    case "bufferWithFloor":
      return Object.freeze({
        lower: Math.max(spec.floorRate, spec.bufferRate - 1),
        upper: upper(spec.capRate),
      });
    case "stepRateBuffer":
      return Object.freeze({
        lower: spec.tier1Buffer + spec.tier2Buffer * spec.tier2Protection - 1,
        upper: upper(spec.capRate),
      });
  }
}
