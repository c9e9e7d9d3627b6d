import { z } from "zod"; // zod: admission control for gate configuration

/**
 * Certified kappa range, inclusive on both ends.
 */
export const KAPPA_MIN_V1 = 0.1;
export const KAPPA_MAX_V1 = 0.3;

/**
 * Kappa used when the caller does not provide one.
 */
export const KAPPA_DEFAULT_V1 = 0.2;

export const KappaV1Z = z
  .number()
  .finite() // NaN / Infinity rejected
  .min(KAPPA_MIN_V1) // inclusive lower bound
  .max(KAPPA_MAX_V1); // inclusive upper bound

export const GateConfigV1Z = z
  .object({
    kappa: KappaV1Z // the only configuration value
  })
  .strict();

export type GateConfigV1 = z.infer<typeof GateConfigV1Z>;

export function parseGateConfigV1(input: unknown): GateConfigV1 {
  return GateConfigV1Z.parse(input);
}
