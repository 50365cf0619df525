/**
 * ColorSpaceConverter - sRGB <-> linear RGB <-> LMS
 *
 * Channel-level transfer functions plus tagged-color wrappers. The decode
 * direction rejects values outside [0, 1]; the encode direction clamps the
 * base of its power segment so it never produces NaN for finite input.
 */

import {
  ENCODE_POWER_FLOOR,
  LMS_TO_RGB,
  RGB_TO_LMS,
  SRGB_DECODE_THRESHOLD,
  SRGB_ENCODE_THRESHOLD,
  SRGB_GAMMA,
  SRGB_LINEAR_SLOPE,
  SRGB_OFFSET,
  SRGB_SCALE,
} from '../config/ColorConfig';
import { DomainError } from '../core/errors';
import { clamp } from '../utils/math';
import {
  assertSpace,
  type EncodedColor,
  type LinearColor,
  type LmsColor,
} from './ColorTypes';
import { multiplyMatrixVector } from './Matrix3';

// =============================================================================
// Channel transfer functions
// =============================================================================

/**
 * sRGB EOTF - encoded channel in [0, 1] to linear light.
 * @throws DomainError for values outside [0, 1] or non-finite values
 */
export function srgbToLinearChannel(encoded: number): number {
  if (!Number.isFinite(encoded) || encoded < 0 || encoded > 1) {
    throw new DomainError('toLinear', `encoded channel ${encoded} is outside [0, 1]`);
  }
  if (encoded <= SRGB_DECODE_THRESHOLD) {
    return encoded / SRGB_LINEAR_SLOPE;
  }
  return Math.pow((encoded + SRGB_OFFSET) / SRGB_SCALE, SRGB_GAMMA);
}

/**
 * sRGB OETF - linear channel to encoded.
 *
 * The power segment works on the input clamped to [0.0001, 1]; the linear
 * segment uses the raw value. The result is not clamped.
 * @throws DomainError for non-finite values
 */
export function linearToSrgbChannel(linear: number): number {
  if (!Number.isFinite(linear)) {
    throw new DomainError('toEncoded', `linear channel ${linear} is not finite`);
  }
  if (linear <= SRGB_ENCODE_THRESHOLD) {
    return linear * SRGB_LINEAR_SLOPE;
  }
  const base = clamp(linear, ENCODE_POWER_FLOOR, 1);
  return SRGB_SCALE * Math.pow(base, 1 / SRGB_GAMMA) - SRGB_OFFSET;
}

// =============================================================================
// Tagged color conversions
// =============================================================================

export function toLinear(color: EncodedColor): LinearColor {
  assertSpace(color, 'srgb');
  const [r, g, b] = color.value;
  return {
    space: 'linear',
    value: [srgbToLinearChannel(r), srgbToLinearChannel(g), srgbToLinearChannel(b)],
  };
}

export function toEncoded(color: LinearColor): EncodedColor {
  assertSpace(color, 'linear');
  const [r, g, b] = color.value;
  return {
    space: 'srgb',
    value: [linearToSrgbChannel(r), linearToSrgbChannel(g), linearToSrgbChannel(b)],
  };
}

/** Linear RGB to cone responses. No clamping. */
export function rgbToLms(color: LinearColor): LmsColor {
  assertSpace(color, 'linear');
  return { space: 'lms', value: multiplyMatrixVector(RGB_TO_LMS, color.value) };
}

/** Cone responses to linear RGB. No clamping. */
export function lmsToRgb(color: LmsColor): LinearColor {
  assertSpace(color, 'lms');
  return { space: 'linear', value: multiplyMatrixVector(LMS_TO_RGB, color.value) };
}
