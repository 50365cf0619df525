/**
 * Color-space tagged values.
 *
 * Every color carries the space it is expressed in. The tag is a string
 * literal type, so an encoded color cannot be passed where a linear one is
 * expected; `assertSpace` repeats the check at run time for values that
 * arrive untyped.
 */

import { ColorSpaceMismatchError } from '../core/errors';

/**
 * - `srgb`: gamma-encoded sRGB, channels in [0, 1]
 * - `linear`: linear-light RGB, nominally [0, 1]
 * - `lms`: cone responses (long, medium, short)
 */
export type ColorSpace = 'srgb' | 'linear' | 'lms';

export type Triple = readonly [number, number, number];

export interface Color<S extends ColorSpace> {
  readonly space: S;
  readonly value: Triple;
}

export type EncodedColor = Color<'srgb'>;
export type LinearColor = Color<'linear'>;
export type LmsColor = Color<'lms'>;

export function encodedColor(r: number, g: number, b: number): EncodedColor {
  return { space: 'srgb', value: [r, g, b] };
}

export function linearColor(r: number, g: number, b: number): LinearColor {
  return { space: 'linear', value: [r, g, b] };
}

export function lmsColor(l: number, m: number, s: number): LmsColor {
  return { space: 'lms', value: [l, m, s] };
}

/**
 * Throw a ColorSpaceMismatchError unless `color` is tagged with `space`.
 */
export function assertSpace<S extends ColorSpace>(
  color: Color<ColorSpace>,
  space: S
): asserts color is Color<S> {
  if (color.space !== space) {
    throw new ColorSpaceMismatchError(space, String(color.space));
  }
}
