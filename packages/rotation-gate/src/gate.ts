// Rotation Gate - Gate entrypoint
//
// A RotationGate binds one validated kappa and composes:
// 1) computeGain(before, after)
// 2) rotationAngle(kappa, gain)   (veto: non-positive gain -> 0)
// 3) applyRotation(state, theta)  (Rx(theta))
//
// The gate holds no per-call state. The gain is returned to the caller, and the
// previous-window form reads it from an explicit GateWindowV1.

import type { Logger } from "pino";
import { KAPPA_DEFAULT_V1, type EntropyReadingV1, type GateOutcomeV1 } from "@antifragile/contracts";

import { assertValidKappa } from "./config/kappa";
import { computeGain, hasDefinedGain } from "./gain/antifragile_gain";
import { isVetoed, rotationAngle } from "./veto/rotation_angle";
import { applyRotation, type StateVector } from "./rotation/rx_gate";
import type { GateWindowV1 } from "./window/gate_window";

export interface RotationGateOptions {
  // Scaling factor; defaults to KAPPA_DEFAULT_V1.
  kappa?: number;

  // Optional pino logger; fallback and veto events are logged at debug.
  logger?: Logger;
}

export class RotationGate {
  readonly kappa: number;

  private readonly logger?: Logger;

  /**
   * @throws InvalidConfigurationError when kappa is outside [0.1, 0.3] or not finite.
   */
  constructor(options: RotationGateOptions = {}) {
    this.kappa = assertValidKappa(options.kappa ?? KAPPA_DEFAULT_V1, "RotationGate.kappa"); // throws outside [0.1, 0.3]
    this.logger = options.logger; // silent when absent

    // Kappa is fixed for the lifetime of the instance.
    Object.freeze(this);
  }

  computeGain(before: number, after: number): number {
    if (!hasDefinedGain(before, after)) {
      this.logger?.debug({ before, after }, "non-positive entropy reading");
    }
    return computeGain(before, after);
  }

  rotationAngle(gain: number): number {
    if (isVetoed(gain)) {
      this.logger?.debug({ gain, kappa: this.kappa }, "gain vetoed");
    }
    return rotationAngle(this.kappa, gain);
  }

  /**
   * Angle for window t, computed from the gain recorded in window t-1.
   */
  rotationAngleForWindow(window: GateWindowV1): number {
    return this.rotationAngle(window.last_gain);
  }

  applyRotation(state: StateVector, theta: number): StateVector {
    return applyRotation(state, theta);
  }

  /**
   * Computes the gain, vetoes it into an angle and rotates the state.
   *
   * The raw gain is returned even when vetoed (it may be negative).
   */
  verifyAndRotate(state: StateVector, before: number, after: number): { state: StateVector; gain: number } {
    const gain = this.computeGain(before, after); // 0 for non-positive readings
    const theta = this.rotationAngle(gain); // veto: 0 unless gain > 0
    return { state: this.applyRotation(state, theta), gain }; // raw gain, not the clamped one
  }

  /**
   * Same composition as verifyAndRotate, reported as a GateOutcomeV1.
   */
  evaluate(state: StateVector, reading: EntropyReadingV1): GateOutcomeV1 {
    const gain = this.computeGain(reading.before, reading.after);
    const theta = this.rotationAngle(gain);
    return {
      type: "rotation_gate_outcome_v1",
      gain,
      theta,
      vetoed: isVetoed(gain), // same predicate the angle used
      state: this.applyRotation(state, theta)
    };
  }
}
