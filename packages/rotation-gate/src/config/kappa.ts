// Rotation Gate - Kappa admission
//
// Kappa is fixed per gate instance and must lie in the certified range
// [KAPPA_MIN_V1, KAPPA_MAX_V1] (both ends inclusive).

import { KAPPA_MAX_V1, KAPPA_MIN_V1, KappaV1Z } from "@antifragile/contracts";

export class InvalidConfigurationError extends Error {
  readonly code = "INVALID_CONFIGURATION";

  constructor(message: string) {
    super(`INVALID_CONFIGURATION: ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

/**
 * Returns kappa unchanged if it is admissible; throws InvalidConfigurationError otherwise.
 *
 * @param context - Human-friendly location string to aid debugging.
 */
export function assertValidKappa(kappa: number, context: string): number {
  const parsed = KappaV1Z.safeParse(kappa);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      `kappa=${String(kappa)} outside [${KAPPA_MIN_V1}, ${KAPPA_MAX_V1}] @ ${context}`
    );
  }
  return parsed.data;
}
