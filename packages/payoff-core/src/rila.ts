/**
 * RILA crediting. Upside is capped the same way for every variant; they
 * differ in how a loss is shared:
 *  - buffer: insurer absorbs the first `bufferRate` of loss
 *  - floor: holder never loses more than |floorRate|
 *  - bufferWithFloor: buffer first, then the remaining loss is floored
 *  - stepRateBuffer: full absorption in tier 1, partial in tier 2
 */
import type { PayoffResult } from "@core-types";
import type { Field } from "@bs-core/numeric";
import type { BufferSpec, BufferWithFloorSpec, FloorSpec, StepRateBufferSpec } from "./types";
import { type Credit, applyCap, applyFloor, finish, start } from "./credit";

function upside<V>(F: Field<V>, x: V, capRate: number | null): PayoffResult<V> {
  return finish(applyCap(F, start(x), capRate));
}

// Loss after the buffer: 0 inside it, x + buffer past it
function buffered<V>(F: Field<V>, x: V, bufferRate: number): Credit<V> {
  const c = start(F.of(0));
  c.flags.add("buffer_applied");
  if (F.primal(x) < -bufferRate) {
    c.value = F.add(x, F.of(bufferRate));
    c.flags.add("buffer_exhausted");
  }
  return c;
}

export function creditBuffer<V>(F: Field<V>, p: BufferSpec, x: V): PayoffResult<V> {
  if (F.primal(x) >= 0) return upside(F, x, p.capRate);
  return finish(buffered(F, x, p.bufferRate));
}

export function creditFloor<V>(F: Field<V>, p: FloorSpec, x: V): PayoffResult<V> {
  return finish(applyCap(F, applyFloor(F, start(x), p.floorRate), p.capRate));
}

export function creditBufferWithFloor<V>(F: Field<V>, p: BufferWithFloorSpec, x: V): PayoffResult<V> {
  if (F.primal(x) >= 0) return upside(F, x, p.capRate);
  return finish(applyFloor(F, buffered(F, x, p.bufferRate), p.floorRate));
}

export function creditStepRateBuffer<V>(F: Field<V>, p: StepRateBufferSpec, x: V): PayoffResult<V> {
  if (F.primal(x) >= 0) return upside(F, x, p.capRate);

  const c = start(F.of(0));
  c.flags.add("buffer_applied");
  const loss = -F.primal(x);
  if (loss <= p.tier1Buffer) return finish(c);

  if (p.tier2Buffer > 0) c.flags.add("tier2_applied");
  if (loss <= p.tier1Buffer + p.tier2Buffer) {
    // holder bears (1 − protection) of the loss inside tier 2
    c.value = F.mul(F.add(x, F.of(p.tier1Buffer)), F.of(1 - p.tier2Protection));
    return finish(c);
  }

  const absorbed = p.tier1Buffer + p.tier2Buffer * p.tier2Protection;
  c.value = F.add(x, F.of(absorbed));
  c.flags.add("buffer_exhausted");
  return finish(c);
}
