import { z } from "zod"; // zod: runtime schema validation for values crossing package boundaries

export const ComplexV1Z = z
  .object({
    re: z.number().finite(), // real part
    im: z.number().finite() // imaginary part
  })
  .strict(); // no extra fields (polar forms etc. are not accepted)

export type ComplexV1 = z.infer<typeof ComplexV1Z>;

/**
 * Two-component complex state. Conventionally unit-norm; the norm is NOT enforced here.
 */
export const StateVectorV1Z = z.tuple([ComplexV1Z, ComplexV1Z]).readonly();

export type StateVectorV1 = z.infer<typeof StateVectorV1Z>;

export function parseStateVectorV1(input: unknown): StateVectorV1 {
  return StateVectorV1Z.parse(input); // throws ZodError on malformed input
}
