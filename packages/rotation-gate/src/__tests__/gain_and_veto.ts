// Gain and veto properties.

import assert from "node:assert";

import { computeGain, GAIN_FALLBACK } from "../gain/antifragile_gain";
import { isVetoed, rotationAngle } from "../veto/rotation_angle";
import { assertClose } from "./assert_close";

const positivePairs: ReadonlyArray<[number, number]> = [
  [0.55, 0.5],
  [0.4, 0.45],
  [1, 1],
  [5, 2],
  [1e-6, 3],
  [12.5, 0.25]
];

// gain == ln(before / after) for strictly positive readings.
for (const [before, after] of positivePairs) {
  assertClose(computeGain(before, after), Math.log(before / after), 1e-12, `gain(${before}, ${after})`);
}

// Readings whose ratio leaves the double range still give the finite log gain.
assertClose(computeGain(1e-200, 1e200), -400 * Math.LN10, 1e-9, "gain(1e-200, 1e200)");
assertClose(computeGain(1e200, 1e-200), 400 * Math.LN10, 1e-9, "gain(1e200, 1e-200)");
assert.ok(Number.isFinite(computeGain(Number.MIN_VALUE, Number.MAX_VALUE)));
assert.equal(computeGain(1, 1), 0);

// Non-positive readings fall back to exactly 0 (no throw, no NaN).
const nonPositivePairs: ReadonlyArray<[number, number]> = [
  [0, 0.5],
  [0.5, 0],
  [-0.2, 0.5],
  [0.5, -0.2],
  [-1, -1],
  [0, 0]
];
for (const [before, after] of nonPositivePairs) {
  const gain = computeGain(before, after);
  assert.equal(gain, GAIN_FALLBACK, `fallback gain(${before}, ${after})`);
  assert.ok(Object.is(gain, 0), "fallback must be +0");
}

// Veto: non-positive gain -> theta = 0.
for (const gain of [0, -0, -0.1178, -5, Number.NEGATIVE_INFINITY, Number.NaN]) {
  assert.ok(isVetoed(gain), `isVetoed(${gain})`);
  assert.equal(rotationAngle(0.2, gain), 0, `rotationAngle(0.2, ${gain})`);
}

// Positive gain -> theta = kappa * gain.
for (const gain of [1e-9, 0.0953, 0.5, 2]) {
  assert.ok(!isVetoed(gain));
  assert.equal(rotationAngle(0.2, gain), 0.2 * gain, `rotationAngle(0.2, ${gain})`);
  assert.equal(rotationAngle(0.3, gain), 0.3 * gain, `rotationAngle(0.3, ${gain})`);
}

// theta >= 0 for every sign combination of the readings.
for (const before of [-1, 0, 0.3, 2]) {
  for (const after of [-1, 0, 0.3, 2]) {
    const theta = rotationAngle(0.25, computeGain(before, after));
    assert.ok(theta >= 0, `theta >= 0 for (${before}, ${after}), got ${theta}`);
  }
}

// Free functions take any kappa; only RotationGate admits the certified range.
assertClose(rotationAngle(0.5, computeGain(5, 2)), 0.4581, 1e-4, "unchecked kappa=0.5");

console.log("rotation-gate gain/veto ok");
