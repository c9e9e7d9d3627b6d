// Rotation Gate - Veto and angle
//
// theta = kappa * max(0, gain)
//
// Any gain that is not strictly positive (including NaN) yields theta = 0,
// so a loss is never reinforced.

/**
 * True when the gain does not earn a rotation.
 */
export function isVetoed(gain: number): boolean {
  return !(gain > 0);
}

/**
 * Scales the veto-clamped gain into a rotation angle in radians.
 *
 * @param kappa - Scaling factor. Not validated here; see RotationGate for the certified range.
 * @param gain - Raw gain, any sign.
 * @returns Angle >= 0.
 */
export function rotationAngle(kappa: number, gain: number): number {
  if (isVetoed(gain)) {
    return 0;
  }
  return kappa * gain;
}
