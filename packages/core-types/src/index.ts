export type OptionKind = 'call' | 'put';

/**
 * Sensitivities of one option price, all taken from a single parameter set.
 * Conventions:
 *  - Vega: per 1 vol point (raw ∂V/∂σ / 100)
 *  - Theta: per year, negative for decaying time value (−∂V/∂T)
 *  - Rho: per 1% rate move (raw ∂V/∂r / 100)
 */
export interface BSGreeks {
  readonly delta: number;
  readonly gamma: number;
  readonly vega: number;
  readonly theta: number;
  readonly rho: number;
}

export interface MarketParameters {
  S: number;     // spot
  K: number;     // strike
  r: number;     // risk-free rate (continuous, decimal)
  q: number;     // dividend yield (continuous, decimal)
  sigma: number; // annualized volatility (decimal)
  T: number;     // time to expiry in years
}

export interface OptionPosition {
  kind: OptionKind;
  quantity: number;
}

export type PayoffFlag =
  | 'capped'
  | 'floored'
  | 'buffer_applied'
  | 'buffer_exhausted'
  | 'trigger_met'
  | 'tier2_applied';

export interface PayoffResult<T = number> {
  readonly creditedReturn: T;
  readonly diagnostics: ReadonlySet<PayoffFlag>;
}

/** Declared economic limits of a crediting formula (upper may be +Infinity). */
export interface CreditBounds {
  readonly lower: number;
  readonly upper: number;
}

export type ValidationStatus = 'HALT' | 'WARN' | 'PASS';

export type CheckName =
  | 'no_arbitrage'
  | 'put_call_parity'
  | 'option_bounds'
  | 'payoff_bounds'
  | 'product_parameters';

export interface ValidationOutcome {
  readonly status: ValidationStatus;
  readonly check: CheckName;
  readonly message: string;
  readonly measuredValue: number;
  readonly bound: number;
}

export interface ValidationReport {
  readonly status: ValidationStatus;
  readonly outcomes: readonly ValidationOutcome[];
}

// Config types
export interface ToleranceBand {
  passTolerance: number;
  haltTolerance: number;
}

export interface ProductLimits {
  maxCapRate: number;
  maxParticipationRate: number;
  maxBufferRate: number;
  maxSpreadRate: number;
}

export interface GateConfig {
  noArbitrage: ToleranceBand;
  putCallParity: ToleranceBand;
  optionBounds: ToleranceBand;
  payoffBounds: ToleranceBand;
  productLimits: ProductLimits;
}

export {
  ConstructionError,
  DomainError,
  ValidationHaltError,
  ConfigError,
} from './errors';
