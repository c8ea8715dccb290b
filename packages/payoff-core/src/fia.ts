// FIA crediting: cap / participation / spread / trigger, each floored
import type { PayoffResult } from "@core-types";
import type { Field } from "@bs-core/numeric";
import type { CappedCallSpec, ParticipationSpec, SpreadSpec, TriggerSpec } from "./types";
import { applyCap, applyFloor, finish, start } from "./credit";

export function creditCappedCall<V>(F: Field<V>, p: CappedCallSpec, x: V): PayoffResult<V> {
  return finish(applyFloor(F, applyCap(F, start(x), p.capRate), p.floorRate));
}

export function creditParticipation<V>(F: Field<V>, p: ParticipationSpec, x: V): PayoffResult<V> {
  const c = start(F.mul(F.of(p.participationRate), x));
  return finish(applyFloor(F, applyCap(F, c, p.capRate), p.floorRate));
}

/** Spread comes off before cap and floor. */
export function creditSpread<V>(F: Field<V>, p: SpreadSpec, x: V): PayoffResult<V> {
  const c = start(F.sub(x, F.of(p.spreadRate)));
  return finish(applyFloor(F, applyCap(F, c, p.capRate), p.floorRate));
}

/** Fixed payout once x reaches the threshold (inclusive), whatever the size of x. */
export function creditTrigger<V>(F: Field<V>, p: TriggerSpec, x: V): PayoffResult<V> {
  const c = start(F.of(p.floorRate));
  if (F.primal(x) >= p.threshold) {
    c.value = F.of(p.triggerRate);
    c.flags.add("trigger_met");
  } else {
    c.flags.add("floored");
  }
  return finish(c);
}
