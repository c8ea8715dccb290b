import { describe, it, expect } from "vitest";
import {
  bufferPayoff,
  bufferWithFloorPayoff,
  calculate,
  floorPayoff,
  stepRateBufferPayoff,
} from "@payoff-core/index";

describe("buffer", () => {
  const spec = bufferPayoff(0.1, 0.12);

  it("absorbs losses up to the buffer", () => {
    const r = calculate(spec, -0.08);
    expect(r.creditedReturn).toBe(0);
    expect([...r.diagnostics]).toEqual(["buffer_applied"]);
  });

  it("passes through losses beyond the buffer", () => {
    const r = calculate(spec, -0.3);
    expect(r.creditedReturn).toBeCloseTo(-0.2, 15);
    expect([...r.diagnostics]).toEqual(["buffer_applied", "buffer_exhausted"]);
  });

  it("caps gains", () => {
    expect(calculate(spec, 0.2).creditedReturn).toBe(0.12);
    expect(calculate(bufferPayoff(0.1), 0.2).creditedReturn).toBe(0.2);
  });

  it("a 100% buffer never loses", () => {
    const full = bufferPayoff(1, 0.25);
    expect(calculate(full, -1).creditedReturn).toBe(0);
    expect(calculate(full, -0.6).creditedReturn).toBe(0);
  });

  it("a zero buffer passes every loss through", () => {
    const r = calculate(bufferPayoff(0), -0.2);
    expect(r.creditedReturn).toBe(-0.2);
    expect([...r.diagnostics]).toEqual(["buffer_applied", "buffer_exhausted"]);
  });
});

describe("floor", () => {
  const spec = floorPayoff(-0.1);

  it("limits losses to the floor", () => {
    expect(calculate(spec, -0.04).creditedReturn).toBe(-0.04);
    expect(calculate(spec, -0.5).creditedReturn).toBe(-0.1);
    expect([...calculate(spec, -0.5).diagnostics]).toEqual(["floored"]);
  });

  it("a zero floor behaves like principal protection", () => {
    expect(calculate(floorPayoff(0), -0.3).creditedReturn).toBe(0);
  });
});

describe("buffer with floor", () => {
  const spec = bufferWithFloorPayoff(0.1, -0.1);

  it("buffers first, then floors the remainder", () => {
    expect(calculate(spec, -0.1).creditedReturn).toBe(0);
    expect(calculate(spec, -0.15).creditedReturn).toBeCloseTo(-0.05, 15);
    expect(calculate(spec, -0.6).creditedReturn).toBe(-0.1);
  });

  it("floor never binds when it sits below buffer − 1", () => {
    const loose = bufferWithFloorPayoff(0.2, -1);
    const r = calculate(loose, -1);
    expect(r.creditedReturn).toBeCloseTo(-0.8, 15);
    expect(r.diagnostics.has("floored")).toBe(false);
  });
});

describe("step-rate buffer", () => {
  const spec = stepRateBufferPayoff(0.1, 0.1, 0.5);

  it("tier 1 absorbs fully", () => {
    expect(calculate(spec, -0.1).creditedReturn).toBe(0);
    expect([...calculate(spec, -0.1).diagnostics]).toEqual(["buffer_applied"]);
  });

  it("tier 2 shares the loss at the protection rate", () => {
    expect(calculate(spec, -0.15).creditedReturn).toBeCloseTo(-0.025, 15);
    expect(calculate(spec, -0.2).creditedReturn).toBeCloseTo(-0.05, 15);
  });

  it("is continuous where tier 2 ends", () => {
    const inside = calculate(spec, -0.2).creditedReturn;
    const past = calculate(spec, -0.2000001).creditedReturn;
    expect(past).toBeCloseTo(inside, 6);
    expect([...calculate(spec, -0.2000001).diagnostics]).toEqual([
      "buffer_applied",
      "tier2_applied",
      "buffer_exhausted",
    ]);
  });

  it("full protection in tier 2 is a plain buffer of tier1 + tier2", () => {
    const stepped = stepRateBufferPayoff(0.05, 0.1, 1);
    const plain = bufferPayoff(0.15);
    for (const x of [-0.02, -0.1, -0.15, -0.4, -1]) {
      expect(calculate(stepped, x).creditedReturn).toBeCloseTo(calculate(plain, x).creditedReturn, 14);
    }
  });

  it("no tier 2 never raises tier2_applied", () => {
    const r = calculate(stepRateBufferPayoff(0.1, 0, 0.5), -0.3);
    expect(r.creditedReturn).toBeCloseTo(-0.2, 15);
    expect([...r.diagnostics]).toEqual(["buffer_applied", "buffer_exhausted"]);
  });
});
