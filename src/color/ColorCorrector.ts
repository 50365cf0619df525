/**
 * ColorCorrector - additive compensation for protan-type deficiency
 *
 * Each variant computes a per-channel delta from the pixel's own channels,
 * adds it to the input and clamps the sum to [0, 1]. The deltas move
 * red/green contrast into the blue channel, which the simulated deficiency
 * leaves intact.
 *
 *   v1  threshold-redness   blue += k * (R - G) where R - G > threshold
 *   v2  dual detection      reds -> magenta, greens -> cyan, greens lose red
 *   v3  masked shifts       boolean red/green masks gate each shift
 */

import {
  DUAL_DETECTION_DEFAULTS,
  GREEN_OVER_RED_RATIO,
  MASKED_SHIFT_DEFAULTS,
  RED_OVER_BLUE_RATIO,
  THRESHOLD_REDNESS_DEFAULTS,
} from '../config/VariantDefaults';
import { clamp01 } from '../utils/math';
import { assertSpace, linearColor, type LinearColor } from './ColorTypes';
import { mapImage, type LinearImage } from './ColorImage';
import {
  resolveCorrection,
  withDefaults,
  type CorrectionSpec,
  type DualDetectionParams,
  type MaskedShiftParams,
  type ParameterMap,
  type ThresholdRednessParams,
} from './TransformSpec';

type Delta = readonly [number, number, number];

function applyDelta(color: LinearColor, [dr, dg, db]: Delta): LinearColor {
  const [r, g, b] = color.value;
  return linearColor(clamp01(r + dr), clamp01(g + dg), clamp01(b + db));
}

/**
 * V1: redness = R - G. Where redness exceeds the threshold, add
 * `blueStrength * redness` to blue.
 */
export function correctThresholdRedness(
  color: LinearColor,
  params: Partial<ThresholdRednessParams> = {}
): LinearColor {
  assertSpace(color, 'linear');
  const { rednessThreshold, blueStrength } = withDefaults('v1', THRESHOLD_REDNESS_DEFAULTS, params);
  const [r, g] = color.value;
  const redness = r - g;
  const blue = redness > rednessThreshold ? blueStrength * redness : 0;
  return applyDelta(color, [0, 0, blue]);
}

/**
 * V2: redness = max(0, R - G), greenness = max(0, G - max(0.8R, B)).
 *
 * Greenness is suppressed when the pixel leans blue, so blue-green colors
 * are not treated as green.
 */
export function correctDualDetection(
  color: LinearColor,
  params: Partial<DualDetectionParams> = {}
): LinearColor {
  assertSpace(color, 'linear');
  const { redBlueAdd, greenBlueAdd, greenRedSub } = withDefaults('v2', DUAL_DETECTION_DEFAULTS, params);
  const [r, g, b] = color.value;
  const redness = Math.max(0, r - g);
  const greenness = Math.max(0, g - Math.max(r * GREEN_OVER_RED_RATIO, b));
  return applyDelta(color, [
    -greenRedSub * greenness,
    0,
    redBlueAdd * redness + greenBlueAdd * greenness,
  ]);
}

/**
 * V3: reddish iff R > G and R > 1.5B; greenish iff G > 0.8R and G > B.
 *
 * redness = R - G inside the reddish mask, greenness = G - max(R, B) inside
 * the greenish mask, zero elsewhere. A pixel in neither mask is returned
 * unchanged.
 *
 * `saturationBoost` is validated but has no effect.
 */
export function correctMaskedShift(
  color: LinearColor,
  params: Partial<MaskedShiftParams> = {}
): LinearColor {
  assertSpace(color, 'linear');
  const { redToBlue, redToGreen, greenToBlue } = withDefaults('v3', MASKED_SHIFT_DEFAULTS, params);
  const [r, g, b] = color.value;

  const isReddish = r > g && r > b * RED_OVER_BLUE_RATIO;
  const isGreenish = g > r * GREEN_OVER_RED_RATIO && g > b;
  const redness = isReddish ? r - g : 0;
  const greenness = isGreenish ? g - Math.max(r, b) : 0;

  return applyDelta(color, [
    0,
    redToGreen * redness,
    redToBlue * redness + greenToBlue * greenness,
  ]);
}

/**
 * Dispatch a single color through the correction a spec names.
 */
export function correctColor(color: LinearColor, spec: CorrectionSpec): LinearColor {
  switch (spec.variant) {
    case 'v1':
      return correctThresholdRedness(color, spec.params);
    case 'v2':
      return correctDualDetection(color, spec.params);
    case 'v3':
      return correctMaskedShift(color, spec.params);
  }
}

/**
 * Correct every pixel of a linear image. Output channels lie in [0, 1].
 */
export function correctImage(image: LinearImage, spec: CorrectionSpec): LinearImage {
  return mapImage(image, 'linear', (color) => correctColor(color, spec));
}

/**
 * Boundary form: variant by name plus a parameter map.
 * @throws UnsupportedVariantError for unknown variant names
 */
export function correct(image: LinearImage, variant: string, params?: ParameterMap): LinearImage {
  return correctImage(image, resolveCorrection(variant, params));
}
