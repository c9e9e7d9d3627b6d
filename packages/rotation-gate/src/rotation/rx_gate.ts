// Rotation Gate - Rx(theta)
//
//   Rx(theta) = | cos(theta/2)      -i sin(theta/2) |
//               | -i sin(theta/2)   cos(theta/2)    |
//
// Applied as a matrix-vector product. The input is trusted: no normalization
// is checked on the way in or restored on the way out.

import type { StateVectorV1 } from "@antifragile/contracts";
import { cAbs2, cAdd, cImag, cMul, cReal, type Complex } from "../complex/complex";

/**
 * Row-major 2x2 complex matrix.
 */
export type Matrix2 = readonly [readonly [Complex, Complex], readonly [Complex, Complex]];

export type StateVector = StateVectorV1;

export function rxMatrix(theta: number): Matrix2 {
  const c = cReal(Math.cos(theta / 2)); // diagonal
  const s = cImag(-Math.sin(theta / 2)); // off-diagonal, -i sin(theta/2)
  return [
    [c, s],
    [s, c]
  ];
}

export function applyMatrix2(m: Matrix2, v: StateVector): StateVector {
  const [a, b] = v; // v is read, never written
  return [cAdd(cMul(m[0][0], a), cMul(m[0][1], b)), cAdd(cMul(m[1][0], a), cMul(m[1][1], b))];
}

/**
 * Rotates the state about the X axis by theta radians. Returns a new vector.
 */
export function applyRotation(v: StateVector, theta: number): StateVector {
  return applyMatrix2(rxMatrix(theta), v);
}

/**
 * Euclidean norm sqrt(|a|^2 + |b|^2).
 */
export function stateNorm(v: StateVector): number {
  return Math.sqrt(cAbs2(v[0]) + cAbs2(v[1]));
}

/**
 * The |0> basis state [1, 0].
 */
export function groundState(): StateVector {
  return [cReal(1), cReal(0)];
}
