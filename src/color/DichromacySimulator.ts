/**
 * DichromacySimulator - protan-type dichromacy simulation
 *
 * Three interchangeable strategies, all Linear RGB -> Linear RGB:
 *
 * - strict:  in LMS, replace L with min(L, M)
 * - blend:   in LMS, replace L with min(L, lerp(L, M, strength))
 * - machado: a single empirically fit matrix on linear RGB
 *
 * Outputs may fall outside [0, 1]; clamping belongs to the caller.
 */

import { MACHADO_PROTAN } from '../config/ColorConfig';
import { BLEND_DEFAULTS } from '../config/VariantDefaults';
import { lmsToRgb, rgbToLms } from './ColorSpaceConverter';
import { assertSpace, lmsColor, type LinearColor } from './ColorTypes';
import { mapImage, type LinearImage } from './ColorImage';
import { multiplyMatrixVector } from './Matrix3';
import {
  assertBlendStrength,
  resolveSimulation,
  withDefaults,
  type BlendParams,
  type ParameterMap,
  type SimulationSpec,
} from './TransformSpec';

/**
 * Strict projection: L' = min(L, M), M and S unchanged.
 * The simulated long-wavelength response never exceeds the true one.
 */
export function simulateStrict(color: LinearColor): LinearColor {
  const [l, m, s] = rgbToLms(color).value;
  return lmsToRgb(lmsColor(Math.min(l, m), m, s));
}

/**
 * Blend projection: L'' = L * (1 - strength) + M * strength, L' = min(L, L'').
 *
 * For a fixed color, L' is non-increasing in `strength` and never exceeds L.
 * strength = 1 coincides with the strict model.
 */
export function simulateBlend(color: LinearColor, params: Partial<BlendParams> = {}): LinearColor {
  const { strength } = withDefaults('blend', BLEND_DEFAULTS, params);
  assertBlendStrength(strength);
  const [l, m, s] = rgbToLms(color).value;
  const blended = l * (1 - strength) + m * strength;
  return lmsToRgb(lmsColor(Math.min(l, blended), m, s));
}

/**
 * Machado et al. protanopia matrix applied directly to linear RGB.
 */
export function simulateMachado(color: LinearColor): LinearColor {
  assertSpace(color, 'linear');
  return { space: 'linear', value: multiplyMatrixVector(MACHADO_PROTAN, color.value) };
}

/**
 * Dispatch a single color through the strategy a spec names.
 */
export function simulateColor(color: LinearColor, spec: SimulationSpec): LinearColor {
  switch (spec.variant) {
    case 'strict':
      return simulateStrict(color);
    case 'blend':
      return simulateBlend(color, spec.params);
    case 'machado':
      return simulateMachado(color);
  }
}

/**
 * Simulate every pixel of a linear image. The result is not clamped.
 */
export function simulateImage(image: LinearImage, spec: SimulationSpec): LinearImage {
  return mapImage(image, 'linear', (color) => simulateColor(color, spec));
}

/**
 * Boundary form: variant by name plus a parameter map.
 * @throws UnsupportedVariantError for unknown variant names
 */
export function simulate(image: LinearImage, variant: string, params?: ParameterMap): LinearImage {
  return simulateImage(image, resolveSimulation(variant, params));
}
