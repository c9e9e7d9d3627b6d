// Negative acceptance: the gate must not keep a per-call gain cache.
//
// The previous-window gain travels in GateWindowV1; neither the package exports
// nor a gate instance may carry a mutable "last gain".

import assert from "node:assert";

import * as pkg from "../index";
import { RotationGate } from "../gate";
import { groundState } from "../rotation/rx_gate";

const forbiddenNamePatterns: RegExp[] = [/last.*gain/i, /gain.*cache/i, /cached/i, /set.*kappa/i];

for (const k of Object.keys(pkg)) {
  for (const re of forbiddenNamePatterns) {
    assert.ok(!re.test(k), `forbidden export found in @antifragile/rotation-gate: ${k}`);
  }
}

const gate = new RotationGate({ kappa: 0.25 });
const keysBefore = Object.keys(gate).sort();
gate.verifyAndRotate(groundState(), 0.55, 0.5);
gate.computeGain(2, 1);
assert.deepStrictEqual(Object.keys(gate).sort(), keysBefore);
assert.ok(Object.isFrozen(gate));

// Kappa cannot be changed after construction.
assert.equal(Reflect.set(gate, "kappa", 0.1), false);
assert.equal(gate.kappa, 0.25);

console.log("rotation-gate negative acceptance ok: no hidden gain state");
