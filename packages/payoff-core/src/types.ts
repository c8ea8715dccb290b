// Closed set of crediting formulas. Adding a variant is a schema change:
// extend PayoffSpec, the constructors, calculate(), creditBounds() and the truth table.

/** FIA: credited = clamp(x, floor, cap) */
export interface CappedCallSpec {
  readonly kind: "cappedCall";
  readonly capRate: number;
  readonly floorRate: number;
}

/** FIA: credited = clamp(participation·x, floor, cap ?? +∞) */
export interface ParticipationSpec {
  readonly kind: "participation";
  readonly participationRate: number;
  readonly capRate: number | null;
  readonly floorRate: number;
}

/** FIA: credited = clamp(x − spread, floor, cap ?? +∞) */
export interface SpreadSpec {
  readonly kind: "spread";
  readonly spreadRate: number;
  readonly capRate: number | null;
  readonly floorRate: number;
}

/** FIA: credited = triggerRate when x ≥ threshold, else floor */
export interface TriggerSpec {
  readonly kind: "trigger";
  readonly triggerRate: number;
  readonly threshold: number;
  readonly floorRate: number;
}

/** RILA: first `bufferRate` of loss absorbed, the rest passed through */
export interface BufferSpec {
  readonly kind: "buffer";
  readonly bufferRate: number;
  readonly capRate: number | null;
}

/** RILA: loss limited to `floorRate` (negative) */
export interface FloorSpec {
  readonly kind: "floor";
  readonly floorRate: number;
  readonly capRate: number | null;
}

/** RILA: buffer first, then the remaining loss floored */
export interface BufferWithFloorSpec {
  readonly kind: "bufferWithFloor";
  readonly bufferRate: number;
  readonly floorRate: number;
  readonly capRate: number | null;
}

/**
 * RILA step-rate buffer: the first `tier1Buffer` of loss is absorbed fully,
 * the next `tier2Buffer` is absorbed at `tier2Protection`, anything beyond
 * passes through.
 */
export interface StepRateBufferSpec {
  readonly kind: "stepRateBuffer";
  readonly tier1Buffer: number;
  readonly tier2Buffer: number;
  readonly tier2Protection: number;
  readonly capRate: number | null;
}

export type FiaPayoffSpec = CappedCallSpec | ParticipationSpec | SpreadSpec | TriggerSpec;
export type RilaPayoffSpec = BufferSpec | FloorSpec | BufferWithFloorSpec | StepRateBufferSpec;
export type PayoffSpec = FiaPayoffSpec | RilaPayoffSpec;
export type PayoffKind = PayoffSpec["kind"];

export const PAYOFF_KINDS: readonly PayoffKind[] = [
  "cappedCall",
  "participation",
  "spread",
  "trigger",
  "buffer",
  "floor",
  "bufferWithFloor",
  "stepRateBuffer",
];
