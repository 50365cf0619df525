/**
 * Row-major 3x3 matrices applied to color triples.
 */

import type { Triple } from './ColorTypes';

export type Matrix3x3 = readonly [
  number, number, number,
  number, number, number,
  number, number, number,
];

/** m * v, with v treated as a column vector. */
export function multiplyMatrixVector(m: Matrix3x3, v: Triple): [number, number, number] {
  const [x, y, z] = v;
  return [
    m[0] * x + m[1] * y + m[2] * z,
    m[3] * x + m[4] * y + m[5] * z,
    m[6] * x + m[7] * y + m[8] * z,
  ];
}
