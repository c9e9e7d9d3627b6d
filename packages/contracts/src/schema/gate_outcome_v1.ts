import { z } from "zod";
import { StateVectorV1Z } from "./state_vector_v1";

export const GateOutcomeV1Z = z
  .object({
    type: z.literal("rotation_gate_outcome_v1"), // discriminator (frozen)
    gain: z.number().finite(), // raw gain, may be negative (observability)
    theta: z.number().finite().nonnegative(), // vetoed angle, never negative
    vetoed: z.boolean(), // true iff gain <= 0
    state: StateVectorV1Z // rotated (or untouched) state
  })
  .strict()
  .refine((v) => v.vetoed === (v.gain <= 0), {
    message: "vetoed must be true exactly when gain <= 0"
  })
  .refine((v) => !v.vetoed || v.theta === 0, {
    message: "a vetoed outcome must carry theta = 0"
  });

export type GateOutcomeV1 = z.infer<typeof GateOutcomeV1Z>;

export function parseGateOutcomeV1(input: unknown): GateOutcomeV1 {
  return GateOutcomeV1Z.parse(input);
}
