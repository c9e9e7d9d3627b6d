// Test runner for @antifragile/rotation-gate.
//
// Plain scripts executed with tsx; each module throws on the first failed assertion.

import "./gain_and_veto";
import "./rx_rotation";
import "./gate_scenarios";
import "./gate_window";
import "./gate_logging";
import "./no_hidden_state";

console.log("rotation-gate tests ok");
