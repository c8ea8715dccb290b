import type { PayoffFlag, PayoffResult } from "@core-types";
import type { Field } from "@bs-core/numeric";

/** Mutable scratch while a formula runs; frozen into a PayoffResult at the end. */
export interface Credit<V> {
  value: V;
  flags: Set<PayoffFlag>;
}

export function start<V>(value: V): Credit<V> {
  return { value, flags: new Set<PayoffFlag>() };
}

export function finish<V>(c: Credit<V>): PayoffResult<V> {
  return Object.freeze({ creditedReturn: c.value, diagnostics: c.flags });
}

// Bounds are inclusive: hitting the cap or floor exactly is not flagged.
export function applyCap<V>(F: Field<V>, c: Credit<V>, capRate: number | null): Credit<V> {
  if (capRate !== null && F.primal(c.value) > capRate) {
    c.value = F.of(capRate);
    c.flags.add("capped");
  }
  return c;
}

export function applyFloor<V>(F: Field<V>, c: Credit<V>, floorRate: number): Credit<V> {
  if (F.primal(c.value) < floorRate) {
    c.value = F.of(floorRate);
    c.flags.add("floored");
  }
  return c;
}
