// Rotation Gate - Explicit gain window
//
// theta_t = kappa * max(0, gain(t-1))
//
// The angle of window t depends on the gain measured in window t-1. Instead of
// caching that gain on the gate, the caller carries it forward in a frozen
// GateWindowV1 record and hands it back on the next step.

import { computeGain } from "../gain/antifragile_gain";

export interface GateWindowV1 {
  // Gain recorded by the most recent step (0 before any step).
  readonly last_gain: number;

  // Number of steps recorded so far.
  readonly window_index: number;
}

export function openGateWindow(): GateWindowV1 {
  return Object.freeze({ last_gain: 0, window_index: 0 });
}

/**
 * Records the gain of a new pair of readings and returns the next window.
 *
 * The recorded gain is always the value computeGain returned, including the
 * 0 fallback for non-positive readings. The input window is left untouched.
 */
export function recordGainWindow(
  window: GateWindowV1,
  before: number,
  after: number
): { window: GateWindowV1; gain: number } {
  const gain = computeGain(before, after);
  const next: GateWindowV1 = Object.freeze({
    last_gain: gain,
    window_index: window.window_index + 1
  });
  return { window: next, gain };
}
