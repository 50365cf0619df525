/**
 * CorrectionPresets - named parameter sets for evaluating corrections
 *
 * The masked-shift (v3) presets sweep red->blue strength, then add
 * green->cyan and red->green shifts. The simulation presets cover the
 * strategies side by side.
 */

import { MASKED_SHIFT_DEFAULTS } from '../config/VariantDefaults';
import type { CorrectionSpec, SimulationSpec } from './TransformSpec';

export interface CorrectionPreset {
  id: string;
  redToBlue: number;
  redToGreen: number;
  greenToBlue: number;
}

export const CORRECTION_PRESETS: readonly CorrectionPreset[] = [
  { id: 'weak_red_shift', redToBlue: 0.5, redToGreen: 0.0, greenToBlue: 0.0 },
  { id: 'medium_red_shift', redToBlue: 0.8, redToGreen: 0.0, greenToBlue: 0.0 },
  { id: 'strong_red_shift', redToBlue: 1.0, redToGreen: 0.0, greenToBlue: 0.0 },
  { id: 'very_strong_red_shift', redToBlue: 1.2, redToGreen: 0.0, greenToBlue: 0.0 },
  { id: 'extreme_red_shift', redToBlue: 1.5, redToGreen: 0.0, greenToBlue: 0.0 },
  { id: 'red_shift_with_green_cyan', redToBlue: 0.8, redToGreen: 0.0, greenToBlue: 0.3 },
  { id: 'strong_red_green_cyan', redToBlue: 1.0, redToGreen: 0.0, greenToBlue: 0.5 },
  { id: 'very_strong_both', redToBlue: 1.2, redToGreen: 0.0, greenToBlue: 0.5 },
  { id: 'red_to_magenta', redToBlue: 0.8, redToGreen: 0.2, greenToBlue: 0.0 },
  { id: 'strong_red_to_magenta', redToBlue: 1.0, redToGreen: 0.3, greenToBlue: 0.0 },
  { id: 'balanced_correction', redToBlue: 1.0, redToGreen: 0.2, greenToBlue: 0.3 },
  { id: 'strong_balanced', redToBlue: 1.2, redToGreen: 0.2, greenToBlue: 0.4 },
  { id: 'maximum_correction', redToBlue: 1.5, redToGreen: 0.3, greenToBlue: 0.5 },
];

export interface SimulationPreset {
  id: string;
  spec: SimulationSpec;
}

export const SIMULATION_PRESETS: readonly SimulationPreset[] = [
  { id: 'min_L_M', spec: { variant: 'strict' } },
  { id: 'machado', spec: { variant: 'machado' } },
  { id: 'blend_50', spec: { variant: 'blend', params: { strength: 0.5 } } },
  { id: 'blend_70', spec: { variant: 'blend', params: { strength: 0.7 } } },
  { id: 'blend_100', spec: { variant: 'blend', params: { strength: 1.0 } } },
];

export function getCorrectionPreset(id: string): CorrectionPreset | null {
  return CORRECTION_PRESETS.find((p) => p.id === id) ?? null;
}

export function getSimulationPreset(id: string): SimulationPreset | null {
  return SIMULATION_PRESETS.find((p) => p.id === id) ?? null;
}

/**
 * Turn a preset into a v3 correction spec. `saturationBoost` keeps its default.
 */
export function presetToCorrectionSpec(preset: CorrectionPreset): CorrectionSpec {
  return {
    variant: 'v3',
    params: {
      ...MASKED_SHIFT_DEFAULTS,
      redToBlue: preset.redToBlue,
      redToGreen: preset.redToGreen,
      greenToBlue: preset.greenToBlue,
    },
  };
}
