import fs from "node:fs";
import { GateScenarioSetV1Z, type GateScenarioSetV1 } from "@antifragile/contracts";

/**
 * Reads and admits a scenario set file. Any parse or schema failure is
 * reported as SCENARIO_FILE_INVALID with the file path.
 */
export function loadScenarioSet(file: string): GateScenarioSetV1 {
  const raw = fs.readFileSync(file, "utf8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`SCENARIO_FILE_INVALID: ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = GateScenarioSetV1Z.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.length ? i.path.join(".") : "<root>"} ${i.message}`)
      .join("; ");
    throw new Error(`SCENARIO_FILE_INVALID: ${file}: ${issues}`);
  }
  return parsed.data;
}
