import type { ComplexV1, GateOutcomeV1, GateScenarioSetV1 } from "@antifragile/contracts";
import { groundState, type RotationGate, type StateVector } from "@antifragile/rotation-gate";

export function formatComplex(z: ComplexV1): string {
  const sign = z.im >= 0 ? "+" : "-";
  return `${z.re.toFixed(4)}${sign}${Math.abs(z.im).toFixed(4)}i`;
}

export function formatState(v: StateVector): string {
  return `[${formatComplex(v[0])}, ${formatComplex(v[1])}]`;
}

/**
 * Evaluates every scenario of the set with the given gate, in file order.
 *
 * Scenarios without a state start from |0>.
 */
export function runScenarioSet(
  set: GateScenarioSetV1,
  gate: RotationGate
): { lines: string[]; outcomes: GateOutcomeV1[] } {
  const lines: string[] = [];
  const outcomes: GateOutcomeV1[] = [];

  set.scenarios.forEach((s, i) => {
    const outcome = gate.evaluate(s.state ?? groundState(), { before: s.before, after: s.after });
    outcomes.push(outcome);

    lines.push(`--- CASE ${i + 1}: ${s.name} ---`);
    lines.push(`Calculated gain (t-1): ${outcome.gain.toFixed(4)}`);
    lines.push(`Rotation angle (theta_t): ${outcome.theta.toFixed(4)}${outcome.vetoed ? " (vetoed)" : ""}`);
    lines.push(`State: ${formatState(outcome.state)}`);
    lines.push("-".repeat(30));
  });

  return { lines, outcomes };
}
