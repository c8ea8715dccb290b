import type { GateConfig } from "@core-types";

// Mirrors config/default.yaml; pure checks use these when no config is passed.
// Price checks are in currency units, payoff checks in return units.
export const DEFAULT_GATE_CONFIG: GateConfig = Object.freeze({
  noArbitrage: Object.freeze({ passTolerance: 1e-10, haltTolerance: 1e-6 }),
  putCallParity: Object.freeze({ passTolerance: 1e-10, haltTolerance: 1e-4 }),
  optionBounds: Object.freeze({ passTolerance: 1e-10, haltTolerance: 1e-6 }),
  payoffBounds: Object.freeze({ passTolerance: 1e-12, haltTolerance: 1e-9 }),
  productLimits: Object.freeze({
    maxCapRate: 0.3,
    maxParticipationRate: 3.0,
    maxBufferRate: 0.3,
    maxSpreadRate: 0.1,
  }),
});
