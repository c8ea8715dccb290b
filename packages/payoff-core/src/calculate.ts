import { DomainError, type PayoffResult } from "@core-types";
import { type Field, numberField } from "@bs-core/numeric";
import type { PayoffSpec } from "./types";
import { creditCappedCall, creditParticipation, creditSpread, creditTrigger } from "./fia";
import { creditBuffer, creditBufferWithFloor, creditFloor, creditStepRateBuffer } from "./rila";

function assertIndexReturn(x: number): void {
  if (!Number.isFinite(x)) {
    throw new DomainError("indexReturn", x, "must be finite");
  }
  if (x < -1) {
    throw new DomainError("indexReturn", x, "an index cannot lose more than 100%");
  }
}

function unreachable(spec: never): never {
  throw new Error(`Unknown payoff kind: ${JSON.stringify(spec)}`);
}

/** Credited return for one crediting period, over any numeric field. */
export function calculateIn<V>(F: Field<V>, spec: PayoffSpec, indexReturn: V): PayoffResult<V> {
  assertIndexReturn(F.primal(indexReturn));
  switch (spec.kind) {
    case "cappedCall":
      return creditCappedCall(F, spec, indexReturn);
    case "participation":
      return creditParticipation(F, spec, indexReturn);
    case "spread":
      return creditSpread(F, spec, indexReturn);
    case "trigger":
      return creditTrigger(F, spec, indexReturn);
    case "buffer":
      return creditBuffer(F, spec, indexReturn);
    case "floor":
      return creditFloor(F, spec, indexReturn);
    case "bufferWithFloor":
      return creditBufferWithFloor(F, spec, indexReturn);
    case "stepRateBuffer":
      return creditStepRateBuffer(F, spec, indexReturn);
    default:
      return unreachable(spec);
  }
}

export function calculate(spec: PayoffSpec, indexReturn: number): PayoffResult {
  return calculateIn(numberField, spec, indexReturn);
}
