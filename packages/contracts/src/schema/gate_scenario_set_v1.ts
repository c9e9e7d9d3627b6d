import { z } from "zod"; // zod: scenario files are untrusted JSON
import { KappaV1Z } from "./gate_config_v1";
import { StateVectorV1Z } from "./state_vector_v1";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // SemVer only, no free-text versions

export const GateScenarioV1Z = z
  .object({
    name: z.string().min(1), // stable scenario identifier
    before: z.number().finite(), // entropy before the event
    after: z.number().finite(), // entropy after the event
    state: StateVectorV1Z.optional() // defaults to |0> = [1, 0] when omitted
  })
  .strict();

export const GateScenarioSetV1Z = z
  .object({
    type: z.literal("gate_scenario_set_v1"),
    schema_version: SemVerZ,
    kappa: KappaV1Z,
    scenarios: z.array(GateScenarioV1Z).min(1)
  })
  .strict()
  .refine((v) => new Set(v.scenarios.map((s) => s.name)).size === v.scenarios.length, {
    message: "scenario names must be unique"
  });

export type GateScenarioV1 = z.infer<typeof GateScenarioV1Z>;
export type GateScenarioSetV1 = z.infer<typeof GateScenarioSetV1Z>;

export function parseGateScenarioSetV1(input: unknown): GateScenarioSetV1 {
  return GateScenarioSetV1Z.parse(input);
}
