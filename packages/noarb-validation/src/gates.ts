/**
 * No-arbitrage validation gates.
 *
 * Each check inspects values it is handed and returns a frozen
 * ValidationOutcome; none throws and none mutates its inputs. A caller that
 * receives HALT must not price anything on that number; WARN is informational.
 *
 * measuredValue/bound: the inspected value and the bound it was held to
 * (parity: the absolute deviation and the tolerance it was compared with).
 */
import type {
  GateConfig,
  OptionKind,
  PayoffResult,
  ProductLimits,
  ToleranceBand,
  ValidationOutcome,
} from "@core-types";
import { type PayoffSpec, creditBounds } from "@payoff-core/index";
import { DEFAULT_GATE_CONFIG } from "./config/defaults";
import { classify, excess, fmt, fmtExp, outcome } from "./outcome";

function nonFinite(check: ValidationOutcome["check"], values: Record<string, number>): ValidationOutcome | null {
  for (const [name, v] of Object.entries(values)) {
    if (!Number.isFinite(v)) {
      return outcome("HALT", check, `Non-finite ${name}: ${v}`, v, Number.NaN);
    }
  }
  return null;
}

/** Model-free bound 0 ≤ price ≤ spot for a call or put quote. */
export function validateNoArbitrage(
  optionPrice: number,
  spot: number,
  band: ToleranceBand = DEFAULT_GATE_CONFIG.noArbitrage
): ValidationOutcome {
  const bad = nonFinite("no_arbitrage", { optionPrice, spot });
  if (bad) return bad;

  const deviation = excess(optionPrice, 0, spot);
  const status = classify(deviation, band);
  if (optionPrice < 0) {
    return outcome(status, "no_arbitrage", `Option price ${fmt(optionPrice)} is negative`, optionPrice, 0);
  }
  if (deviation > 0) {
    return outcome(
      status,
      "no_arbitrage",
      `Option price ${fmt(optionPrice)} exceeds spot ${fmt(spot)} by ${fmtExp(deviation)}`,
      optionPrice,
      spot
    );
  }
  return outcome(status, "no_arbitrage", `Option price ${fmt(optionPrice)} within [0, ${fmt(spot)}]`, optionPrice, spot);
}

/** C − P = S·e^(−qT) − K·e^(−rT) */
export function validatePutCallParity(
  call: number,
  put: number,
  S: number,
  K: number,
  r: number,
  q: number,
  T: number,
  band: ToleranceBand = DEFAULT_GATE_CONFIG.putCallParity
): ValidationOutcome {
  const bad = nonFinite("put_call_parity", { call, put, S, K, r, q, T });
  if (bad) return bad;

  const lhs = call - put;
  const rhs = S * Math.exp(-q * T) - K * Math.exp(-r * T);
  const deviation = Math.abs(lhs - rhs);
  const status = classify(deviation, band);
  const bound = status === "HALT" ? band.haltTolerance : band.passTolerance;
  const verdict = status === "PASS" ? "holds" : "violated";
  return outcome(
    status,
    "put_call_parity",
    `Put-call parity ${verdict}: C−P=${fmt(lhs)}, S·e^(−qT)−K·e^(−rT)=${fmt(rhs)}, deviation ${fmtExp(deviation)}`,
    deviation,
    bound
  );
}

/**
 * Merton bounds with dividend yield:
 *   call: max(S·e^(−qT) − K·e^(−rT), 0) ≤ C ≤ S·e^(−qT)
 *   put:  max(K·e^(−rT) − S·e^(−qT), 0) ≤ P ≤ K·e^(−rT)
 */
export function validateOptionBounds(
  kind: OptionKind,
  optionPrice: number,
  S: number,
  K: number,
  r: number,
  q: number,
  T: number,
  band: ToleranceBand = DEFAULT_GATE_CONFIG.optionBounds
): ValidationOutcome {
  const bad = nonFinite("option_bounds", { optionPrice, S, K, r, q, T });
  if (bad) return bad;

  const sDisc = S * Math.exp(-q * T);
  const kDisc = K * Math.exp(-r * T);
  const lower = Math.max(kind === "call" ? sDisc - kDisc : kDisc - sDisc, 0);
  const upper = kind === "call" ? sDisc : kDisc;
  const deviation = excess(optionPrice, lower, upper);
  const status = classify(deviation, band);

  if (optionPrice < lower) {
    return outcome(
      status,
      "option_bounds",
      `${kind} price ${fmt(optionPrice)} below lower bound ${fmt(lower)} by ${fmtExp(deviation)}`,
      optionPrice,
      lower
    );
  }
  if (optionPrice > upper) {
    return outcome(
      status,
      "option_bounds",
      `${kind} price ${fmt(optionPrice)} above upper bound ${fmt(upper)} by ${fmtExp(deviation)}`,
      optionPrice,
      upper
    );
  }
  return outcome(status, "option_bounds", `${kind} price ${fmt(optionPrice)} within [${fmt(lower)}, ${fmt(upper)}]`, optionPrice, upper);
}

/** Credited return inside the variant's declared bounds. */
export function validatePayoffBounds(
  spec: PayoffSpec,
  result: PayoffResult,
  band: ToleranceBand = DEFAULT_GATE_CONFIG.payoffBounds
): ValidationOutcome {
  const credited = result.creditedReturn;
  const bad = nonFinite("payoff_bounds", { creditedReturn: credited });
  if (bad) return bad;

  const { lower, upper } = creditBounds(spec);
  const deviation = excess(credited, lower, upper);
  const status = classify(deviation, band);
  if (credited < lower) {
    return outcome(status, "payoff_bounds", `${spec.kind} credited ${fmt(credited)} below floor ${fmt(lower)}`, credited, lower);
  }
  if (credited > upper) {
    return outcome(status, "payoff_bounds", `${spec.kind} credited ${fmt(credited)} above cap ${fmt(upper)}`, credited, upper);
  }
  return outcome(status, "payoff_bounds", `${spec.kind} credited ${fmt(credited)} within bounds`, credited, upper);
}

function productRates(spec: PayoffSpec, limits: ProductLimits): Array<[string, number, number]> {
  const rates: Array<[string, number, number]> = [];
  if ("capRate" in spec && spec.capRate !== null) rates.push(["capRate", spec.capRate, limits.maxCapRate]);
  switch (spec.kind) {
    case "participation":
      rates.push(["participationRate", spec.participationRate, limits.maxParticipationRate]);
      break;
    case "spread":
      rates.push(["spreadRate", spec.spreadRate, limits.maxSpreadRate]);
      break;
    case "buffer":
    case "bufferWithFloor":
      rates.push(["bufferRate", spec.bufferRate, limits.maxBufferRate]);
      break;
    case "stepRateBuffer":
      rates.push(["bufferRate", spec.tier1Buffer + spec.tier2Buffer, limits.maxBufferRate]);
      break;
    default:
      break;
  }
  return rates;
}

/**
 * Catches misentered products: rates that construct fine but lie outside what
 * is ever sold. measuredValue is the largest rate/limit ratio; HALT above 1.
 */
export function validateProductParameters(
  spec: PayoffSpec,
  limits: ProductLimits = DEFAULT_GATE_CONFIG.productLimits
): ValidationOutcome {
  const rates = productRates(spec, limits);
  const issues = rates
    .filter(([, value, limit]) => value > limit)
    .map(([name, value, limit]) => `${name} ${fmt(value)} exceeds maximum ${fmt(limit)}`);
  const worst = rates.reduce((m, [, value, limit]) => Math.max(m, value / limit), 0);

  if (issues.length > 0) {
    return outcome("HALT", "product_parameters", `Parameter sanity check failed: ${issues.join("; ")}`, worst, 1);
  }
  return outcome("PASS", "product_parameters", `${spec.kind} parameters within sanity bounds`, worst, 1);
}

export interface Gate {
  readonly config: GateConfig;
  noArbitrage(optionPrice: number, spot: number): ValidationOutcome;
  putCallParity(call: number, put: number, S: number, K: number, r: number, q: number, T: number): ValidationOutcome;
  optionBounds(kind: OptionKind, optionPrice: number, S: number, K: number, r: number, q: number, T: number): ValidationOutcome;
  payoffBounds(spec: PayoffSpec, result: PayoffResult): ValidationOutcome;
  productParameters(spec: PayoffSpec): ValidationOutcome;
}

/** Binds every check to one configuration (e.g. the result of loadGateConfig). */
export function createGate(config: GateConfig = DEFAULT_GATE_CONFIG): Gate {
  const gate: Gate = {
    config,
    noArbitrage: (price, spot) => validateNoArbitrage(price, spot, config.noArbitrage),
    putCallParity: (call, put, S, K, r, q, T) =>
      validatePutCallParity(call, put, S, K, r, q, T, config.putCallParity),
    optionBounds: (kind, price, S, K, r, q, T) =>
      validateOptionBounds(kind, price, S, K, r, q, T, config.optionBounds),
    payoffBounds: (spec, result) => validatePayoffBounds(spec, result, config.payoffBounds),
    productParameters: (spec) => validateProductParameters(spec, config.productLimits),
  };
  return Object.freeze(gate);
}
