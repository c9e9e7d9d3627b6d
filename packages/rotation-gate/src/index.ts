// @antifragile/rotation-gate
// Entry point exports for the gain-gated Rx rotation kernel.

export * from "./gate";
export * from "./config/kappa";
export * from "./gain/antifragile_gain";
export * from "./veto/rotation_angle";
export * from "./rotation/rx_gate";
export * from "./complex/complex";
export * from "./window/gate_window";
