import { z } from "zod";

// Non-positive readings are a defined kernel path (gain fallback), so the schema
// only requires finite numbers and leaves the range to the kernel.
export const EntropyReadingV1Z = z
  .object({
    before: z.number().finite(), // entropy measured before the event (t-)
    after: z.number().finite() // entropy measured after the event (t+)
  })
  .strict();

export type EntropyReadingV1 = z.infer<typeof EntropyReadingV1Z>;

export function parseEntropyReadingV1(input: unknown): EntropyReadingV1 {
  return EntropyReadingV1Z.parse(input);
}
