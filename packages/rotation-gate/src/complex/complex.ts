// Rotation Gate - Complex arithmetic
//
// Plain {re, im} records; every operation returns a new value.

import type { ComplexV1 } from "@antifragile/contracts";

export type Complex = ComplexV1;

export function cReal(x: number): Complex {
  return { re: x, im: 0 };
}

export function cImag(y: number): Complex {
  return { re: 0, im: y };
}

export function cAdd(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function cMul(a: Complex, b: Complex): Complex {
  return {
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re
  };
}

/**
 * Squared modulus |z|^2.
 */
export function cAbs2(a: Complex): number {
  return a.re * a.re + a.im * a.im;
}
