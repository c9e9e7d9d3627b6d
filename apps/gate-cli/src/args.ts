import path from "node:path";

export type Args = { // CLI arguments after flag/env/default resolution.
  file: string; // Scenario set JSON file.
  kappa?: number; // Overrides the scenario file's kappa when present.
  logLevel: string; // pino level for the CLI logger.
};

export const DEFAULT_SCENARIO_FILE = path.resolve(__dirname, "..", "scenarios", "default.json");

export function parseArgs(argv: ReadonlyArray<string>, env: NodeJS.ProcessEnv): Args {
  const get = (k: string): string | undefined => { // Read --k value from argv.
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined; // Missing value.
    return v;
  };

  const file = path.resolve(get("file") ?? env.ROTATION_GATE_SCENARIOS ?? DEFAULT_SCENARIO_FILE);
  const logLevel = get("log-level") ?? env.LOG_LEVEL ?? "info";

  const kappaRaw = get("kappa") ?? env.ROTATION_GATE_KAPPA;
  if (kappaRaw === undefined) {
    return { file, logLevel };
  }

  const kappa = Number(kappaRaw);
  if (kappaRaw.trim() === "" || !Number.isFinite(kappa)) {
    throw new Error(`INVALID_ARGUMENT: kappa must be a finite number, got "${kappaRaw}"`);
  }
  return { file, kappa, logLevel };
}
