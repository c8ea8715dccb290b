import { z } from "zod";

export const ToleranceBandSchema = z
  .object({
    passTolerance: z.number().nonnegative(),
    haltTolerance: z.number().positive(),
  })
  .refine((b) => b.haltTolerance >= b.passTolerance, {
    message: "haltTolerance must be ≥ passTolerance",
    path: ["haltTolerance"],
  });

export const ProductLimitsSchema = z.object({
  maxCapRate: z.number().positive(),
  maxParticipationRate: z.number().positive(),
  maxBufferRate: z.number().positive().max(1),
  maxSpreadRate: z.number().positive().max(1),
});

export const GateConfigSchema = z.object({
  noArbitrage: ToleranceBandSchema,
  putCallParity: ToleranceBandSchema,
  optionBounds: ToleranceBandSchema,
  payoffBounds: ToleranceBandSchema,
  productLimits: ProductLimitsSchema,
});

export const ConfigFileSchema = z.object({
  gate: GateConfigSchema,
});

export type GateConfigFile = z.infer<typeof ConfigFileSchema>;
