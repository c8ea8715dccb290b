import { describe, it, expect } from "vitest";
import type { GateConfig, PayoffFlag } from "@core-types";
import { priceCall, pricePut } from "@bs-core/index";
import {
  bufferPayoff,
  calculate,
  cappedCallPayoff,
  participationPayoff,
  spreadPayoff,
  stepRateBufferPayoff,
  triggerPayoff,
} from "@payoff-core/index";
import {
  DEFAULT_GATE_CONFIG,
  classify,
  createGate,
  validateNoArbitrage,
  validateOptionBounds,
  validatePayoffBounds,
  validateProductParameters,
  validatePutCallParity,
} from "@noarb-validation/index";

describe("classify", () => {
  const band = { passTolerance: 1e-10, haltTolerance: 1e-6 };

  it("bounds are inclusive", () => {
    expect(classify(0, band)).toBe("PASS");
    expect(classify(1e-10, band)).toBe("PASS");
    expect(classify(2e-10, band)).toBe("WARN");
    expect(classify(1e-6, band)).toBe("WARN");
    expect(classify(1.1e-6, band)).toBe("HALT");
  });

  it("NaN halts", () => {
    expect(classify(Number.NaN, band)).toBe("HALT");
  });
});

describe("validateNoArbitrage", () => {
  it("passes a price inside [0, S]", () => {
    const o = validateNoArbitrage(5, 100);
    expect(o.status).toBe("PASS");
    expect(o.check).toBe("no_arbitrage");
    expect(o.message).toBe("Option price 5.0000 within [0, 100.0000]");
    expect(o.measuredValue).toBe(5);
    expect(o.bound).toBe(100);
    expect(Object.isFrozen(o)).toBe(true);
  });

  it("warns on a rounding-sized negative price", () => {
    const o = validateNoArbitrage(-5e-8, 100);
    expect(o.status).toBe("WARN");
    expect(o.bound).toBe(0);
  });

  it("halts on a material negative price", () => {
    const o = validateNoArbitrage(-0.01, 100);
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("Option price -0.0100 is negative");
  });

  it("halts on a price above spot", () => {
    const o = validateNoArbitrage(100.5, 100);
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("Option price 100.5000 exceeds spot 100.0000 by 5.00e-1");
    expect(o.bound).toBe(100);
  });

  it("halts on non-finite input", () => {
    const o = validateNoArbitrage(Number.NaN, 100);
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("Non-finite optionPrice: NaN");
  });
});

describe("validatePutCallParity", () => {
  const [S, K, r, q, T] = [100, 95, 0.05, 0.02, 1];
  const call = priceCall(S, K, r, q, 0.25, T);
  const put = pricePut(S, K, r, q, 0.25, T);

  it("passes model prices", () => {
    const o = validatePutCallParity(call, put, S, K, r, q, T);
    expect(o.status).toBe("PASS");
    expect(o.message).toContain("Put-call parity holds");
    expect(o.measuredValue).toBeLessThan(1e-12);
    expect(o.bound).toBe(1e-10);
  });

  it("warns on a small deviation", () => {
    const o = validatePutCallParity(call, put + 1e-6, S, K, r, q, T);
    expect(o.status).toBe("WARN");
    expect(o.message).toContain("violated");
    expect(o.measuredValue).toBeCloseTo(1e-6, 12);
    expect(o.bound).toBe(1e-10);
  });

  it("halts on a material deviation", () => {
    const o = validatePutCallParity(call + 0.01, put, S, K, r, q, T);
    expect(o.status).toBe("HALT");
    expect(o.bound).toBe(1e-4);
  });

  it("halts on an economically wrong pair", () => {
    const o = validatePutCallParity(call + 1, put, S, K, r, q, T);
    expect(o.status).toBe("HALT");
    expect(o.measuredValue).toBeCloseTo(1, 12);
  });
});

describe("validateOptionBounds", () => {
  const [S, K, r, q, T] = [100, 90, 0.05, 0, 1];

  it("passes model prices for both kinds", () => {
    expect(validateOptionBounds("call", priceCall(S, K, r, q, 0.2, T), S, K, r, q, T).status).toBe("PASS");
    expect(validateOptionBounds("put", pricePut(S, K, r, q, 0.2, T), S, K, r, q, T).status).toBe("PASS");
  });

  it("halts a call below its discounted intrinsic", () => {
    const o = validateOptionBounds("call", 10, S, K, r, q, T);
    expect(o.status).toBe("HALT");
    expect(o.message).toMatch(/^call price 10\.0000 below lower bound 14\.3894 by /);
    expect(o.bound).toBeCloseTo(100 - 90 * Math.exp(-0.05), 12);
  });

  it("halts a put above the discounted strike", () => {
    const o = validateOptionBounds("put", 90, S, K, r, q, T);
    expect(o.status).toBe("HALT");
    expect(o.message).toMatch(/^put price 90\.0000 above upper bound 85\.6106 by /);
  });
});

describe("validatePayoffBounds", () => {
  const spec = cappedCallPayoff(0.1);

  it("passes calculated results", () => {
    for (const x of [-0.5, 0, 0.05, 0.3]) {
      expect(validatePayoffBounds(spec, calculate(spec, x)).status).toBe("PASS");
    }
  });

  it("warns on a rounding-sized overshoot", () => {
    const o = validatePayoffBounds(spec, { creditedReturn: 0.1 + 5e-10, diagnostics: new Set<PayoffFlag>() });
    expect(o.status).toBe("WARN");
  });

  it("halts when the credited return breaks the cap", () => {
    const o = validatePayoffBounds(spec, { creditedReturn: 0.12, diagnostics: new Set<PayoffFlag>() });
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("cappedCall credited 0.1200 above cap 0.1000");
    expect(o.measuredValue).toBe(0.12);
    expect(o.bound).toBe(0.1);
  });

  it("halts when the credited return breaks the floor", () => {
    const o = validatePayoffBounds(bufferPayoff(0.1), { creditedReturn: -0.95, diagnostics: new Set<PayoffFlag>() });
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("buffer credited -0.9500 below floor -0.9000");
  });
});

describe("validateProductParameters", () => {
  it("passes typical products", () => {
    const o = validateProductParameters(bufferPayoff(0.1, 0.12));
    expect(o.status).toBe("PASS");
    expect(o.message).toBe("buffer parameters within sanity bounds");
    expect(o.measuredValue).toBeCloseTo(0.4, 12);
    expect(o.bound).toBe(1);
  });

  it("passes a trigger with nothing to check", () => {
    const o = validateProductParameters(triggerPayoff(0.05));
    expect(o.status).toBe("PASS");
    expect(o.measuredValue).toBe(0);
  });

  it("halts an implausible participation rate", () => {
    const o = validateProductParameters(participationPayoff(3.5));
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("Parameter sanity check failed: participationRate 3.5000 exceeds maximum 3.0000");
    expect(o.measuredValue).toBeCloseTo(3.5 / 3, 12);
  });

  it("lists every offending rate", () => {
    const o = validateProductParameters(spreadPayoff(0.15, { capRate: 0.5 }));
    expect(o.message).toBe(
      "Parameter sanity check failed: capRate 0.5000 exceeds maximum 0.3000; spreadRate 0.1500 exceeds maximum 0.1000"
    );
    expect(o.measuredValue).toBeCloseTo(0.5 / 0.3, 12);
  });

  it("checks the combined step-rate buffer", () => {
    const o = validateProductParameters(stepRateBufferPayoff(0.2, 0.2, 0.5));
    expect(o.status).toBe("HALT");
    expect(o.message).toBe("Parameter sanity check failed: bufferRate 0.4000 exceeds maximum 0.3000");
  });
});

describe("createGate", () => {
  const strict: GateConfig = {
    ...DEFAULT_GATE_CONFIG,
    noArbitrage: { passTolerance: 0, haltTolerance: 1e-12 },
    productLimits: { ...DEFAULT_GATE_CONFIG.productLimits, maxParticipationRate: 1 },
  };

  it("binds every check to its config", () => {
    const gate = createGate(strict);
    expect(gate.noArbitrage(-5e-8, 100).status).toBe("HALT");
    expect(validateNoArbitrage(-5e-8, 100).status).toBe("WARN");
    expect(gate.productParameters(participationPayoff(1.2)).status).toBe("HALT");
    expect(gate.config).toBe(strict);
    expect(Object.isFrozen(gate)).toBe(true);
  });

  it("defaults to the built-in tolerances", () => {
    const gate = createGate();
    const spec = cappedCallPayoff(0.1);
    expect(gate.config).toBe(DEFAULT_GATE_CONFIG);
    expect(gate.payoffBounds(spec, calculate(spec, 0.2)).status).toBe("PASS");
    expect(gate.optionBounds("call", 4, 100, 100, 0.05, 0, 1).status).toBe("HALT");
    expect(gate.putCallParity(10, 5, 100, 100, 0, 0, 1).status).toBe("HALT");
  });
});
