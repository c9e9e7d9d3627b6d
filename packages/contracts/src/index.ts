// @antifragile/contracts
// Schemas and inferred types shared by the gate kernel and its callers.

export * from "./schema/state_vector_v1";
export * from "./schema/entropy_reading_v1";
export * from "./schema/gate_config_v1";
export * from "./schema/gate_outcome_v1";
export * from "./schema/gate_scenario_set_v1";
