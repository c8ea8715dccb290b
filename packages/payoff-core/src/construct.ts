/**
 * Payoff constructors. Every parameter range is checked here so that
 * calculate() never has to reject a spec; the returned specs are frozen.
 */
import { ConstructionError } from "@core-types";
import type {
  BufferSpec,
  BufferWithFloorSpec,
  CappedCallSpec,
  FloorSpec,
  ParticipationSpec,
  SpreadSpec,
  StepRateBufferSpec,
  TriggerSpec,
} from "./types";

function finite(value: number, name: string): void {
  if (!Number.isFinite(value)) throw new ConstructionError(name, value, "must be finite");
}

function inRange(value: number, name: string, lo: number, hi: number): void {
  finite(value, name);
  if (value < lo || value > hi) {
    throw new ConstructionError(name, value, `must lie in [${lo}, ${hi}]`);
  }
}

function atLeast(value: number, name: string, lo: number): void {
  finite(value, name);
  if (value < lo) throw new ConstructionError(name, value, `must be ≥ ${lo}`);
}

function optionalCap(capRate: number | null, floorRate = 0): void {
  if (capRate === null) return;
  atLeast(capRate, "capRate", 0);
  if (capRate < floorRate) {
    throw new ConstructionError("capRate", capRate, `must be ≥ floorRate (${floorRate})`);
  }
}

export interface CapFloorOptions {
  capRate?: number | null;
  floorRate?: number;
}

export interface TriggerOptions {
  threshold?: number;
  floorRate?: number;
}

export function cappedCallPayoff(capRate: number, floorRate = 0): CappedCallSpec {
  atLeast(floorRate, "floorRate", -1);
  optionalCap(capRate, floorRate);
  return Object.freeze({ kind: "cappedCall", capRate, floorRate });
}

export function participationPayoff(
  participationRate: number,
  { capRate = null, floorRate = 0 }: CapFloorOptions = {}
): ParticipationSpec {
  atLeast(participationRate, "participationRate", 0);
  atLeast(floorRate, "floorRate", -1);
  optionalCap(capRate, floorRate);
  return Object.freeze({ kind: "participation", participationRate, capRate, floorRate });
}

export function spreadPayoff(
  spreadRate: number,
  { capRate = null, floorRate = 0 }: CapFloorOptions = {}
): SpreadSpec {
  inRange(spreadRate, "spreadRate", 0, 1);
  atLeast(floorRate, "floorRate", -1);
  optionalCap(capRate, floorRate);
  return Object.freeze({ kind: "spread", spreadRate, capRate, floorRate });
}

export function triggerPayoff(
  triggerRate: number,
  { threshold = 0, floorRate = 0 }: TriggerOptions = {}
): TriggerSpec {
  atLeast(floorRate, "floorRate", -1);
  atLeast(triggerRate, "triggerRate", floorRate);
  atLeast(threshold, "threshold", -1);
  return Object.freeze({ kind: "trigger", triggerRate, threshold, floorRate });
}

export function bufferPayoff(bufferRate: number, capRate: number | null = null): BufferSpec {
  inRange(bufferRate, "bufferRate", 0, 1);
  optionalCap(capRate);
  return Object.freeze({ kind: "buffer", bufferRate, capRate });
}

export function floorPayoff(floorRate: number, capRate: number | null = null): FloorSpec {
  inRange(floorRate, "floorRate", -1, 0);
  optionalCap(capRate);
  return Object.freeze({ kind: "floor", floorRate, capRate });
}

export function bufferWithFloorPayoff(
  bufferRate: number,
  floorRate: number,
  capRate: number | null = null
): BufferWithFloorSpec {
  inRange(bufferRate, "bufferRate", 0, 1);
  inRange(floorRate, "floorRate", -1, 0);
  optionalCap(capRate);
  return Object.freeze({ kind: "bufferWithFloor", bufferRate, floorRate, capRate });
}

export function stepRateBufferPayoff(
  tier1Buffer: number,
  tier2Buffer: number,
  tier2Protection: number,
  capRate: number | null = null
): StepRateBufferSpec {
  inRange(tier1Buffer, "tier1Buffer", 0, 1);
  inRange(tier2Buffer, "tier2Buffer", 0, 1);
  inRange(tier2Protection, "tier2Protection", 0, 1);
  if (tier1Buffer + tier2Buffer > 1) {
    throw new ConstructionError("tier2Buffer", tier2Buffer, `tier1Buffer + tier2Buffer must be ≤ 1`);
  }
  optionalCap(capRate);
  return Object.freeze({ kind: "stepRateBuffer", tier1Buffer, tier2Buffer, tier2Protection, capRate });
}
