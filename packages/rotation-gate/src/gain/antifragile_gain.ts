// Rotation Gate - Antifragile gain
//
// gain = ln(before / after) = ln(before) - ln(after)
//
// before: entropy measured before the event (t-)
// after:  entropy measured after the event (t+)
//
// A positive gain means entropy went down (improvement). Non-positive readings
// have no logarithm; they yield exactly 0, which the veto turns into "no rotation".

/**
 * Returned when either reading is non-positive.
 */
export const GAIN_FALLBACK = 0.0;

/**
 * Returns true when both readings are strictly positive (log is defined).
 */
export function hasDefinedGain(before: number, after: number): boolean {
  return before > 0 && after > 0;
}

/**
 * Computes the natural-log gain of two entropy readings.
 *
 * Never throws: non-positive input is policy, not an error.
 */
export function computeGain(before: number, after: number): number {
  if (!hasDefinedGain(before, after)) {
    return GAIN_FALLBACK;
  }
  // Difference of logs: the ratio itself can overflow or underflow for finite readings.
  return Math.log(before) - Math.log(after);
}
