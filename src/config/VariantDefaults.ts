/**
 * Default parameter values for every simulation and correction variant.
 */

import type {
  BlendParams,
  DualDetectionParams,
  MaskedShiftParams,
  ThresholdRednessParams,
} from '../color/TransformSpec';

/** Blend simulation: interpolation weight of M into L */
export const BLEND_DEFAULTS: Readonly<BlendParams> = {
  strength: 1.0,
};

/** V1 correction: threshold-redness */
export const THRESHOLD_REDNESS_DEFAULTS: Readonly<ThresholdRednessParams> = {
  rednessThreshold: 0.0,
  blueStrength: 0.8,
};

/** V2 correction: dual red/green detection */
export const DUAL_DETECTION_DEFAULTS: Readonly<DualDetectionParams> = {
  redBlueAdd: 0.8,
  greenBlueAdd: 0.3,
  greenRedSub: 0.2,
};

/** V3 correction: masked red/green shifts */
export const MASKED_SHIFT_DEFAULTS: Readonly<MaskedShiftParams> = {
  redToBlue: 1.0,
  redToGreen: 0.0,
  greenToBlue: 0.5,
  saturationBoost: 1.0,
};

// ---------------------------------------------------------------------------
// Mask thresholds (V2/V3)
// ---------------------------------------------------------------------------

/** Share of red a green channel must exceed to count as greenish */
export const GREEN_OVER_RED_RATIO = 0.8;

/** Factor by which red must exceed blue to count as reddish (V3) */
export const RED_OVER_BLUE_RATIO = 1.5;
