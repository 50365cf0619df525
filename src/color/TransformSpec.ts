/**
 * TransformSpec - simulation and correction variants as closed unions
 *
 * A spec pairs a variant name with its fully-resolved parameter record.
 * `resolveSimulation` / `resolveCorrection` build specs from the loose
 * `name + Record<string, number>` form used at the library boundary:
 * unknown names throw, missing keys take the defaults, and unknown keys are
 * logged and ignored.
 */

import {
  BLEND_DEFAULTS,
  DUAL_DETECTION_DEFAULTS,
  MASKED_SHIFT_DEFAULTS,
  THRESHOLD_REDNESS_DEFAULTS,
} from '../config/VariantDefaults';
import { UnsupportedVariantError, ValidationError } from '../core/errors';
import { Logger } from '../utils/Logger';

const log = new Logger('TransformSpec');

/** Named numeric knobs as passed by callers */
export type ParameterMap = Readonly<Record<string, number>>;

// =============================================================================
// Parameter records
// =============================================================================

export type BlendParams = {
  /** Weight of M blended into L, in [0, 1] */
  strength: number;
};

export type ThresholdRednessParams = {
  rednessThreshold: number;
  blueStrength: number;
};

export type DualDetectionParams = {
  redBlueAdd: number;
  greenBlueAdd: number;
  greenRedSub: number;
};

export type MaskedShiftParams = {
  redToBlue: number;
  redToGreen: number;
  greenToBlue: number;
  /** Accepted and validated, but has no effect on the output. */
  saturationBoost: number;
};

// =============================================================================
// Specs
// =============================================================================

export const SIMULATION_VARIANTS = ['strict', 'blend', 'machado'] as const;
export type SimulationVariant = (typeof SIMULATION_VARIANTS)[number];

export const CORRECTION_VARIANTS = ['v1', 'v2', 'v3'] as const;
export type CorrectionVariant = (typeof CORRECTION_VARIANTS)[number];

export type SimulationSpec =
  | { readonly variant: 'strict' }
  | { readonly variant: 'blend'; readonly params: Readonly<BlendParams> }
  | { readonly variant: 'machado' };

export type CorrectionSpec =
  | { readonly variant: 'v1'; readonly params: Readonly<ThresholdRednessParams> }
  | { readonly variant: 'v2'; readonly params: Readonly<DualDetectionParams> }
  | { readonly variant: 'v3'; readonly params: Readonly<MaskedShiftParams> };

/** Alternate names accepted for simulation variants */
const SIMULATION_ALIASES: Readonly<Record<string, SimulationVariant>> = {
  min_lm: 'strict',
  projection: 'strict',
};

// =============================================================================
// Boundary key tables (snake_case key -> record field)
// =============================================================================

const BLEND_KEYS: Readonly<Record<string, keyof BlendParams>> = {
  strength: 'strength',
};

const THRESHOLD_REDNESS_KEYS: Readonly<Record<string, keyof ThresholdRednessParams>> = {
  redness_threshold: 'rednessThreshold',
  blue_strength: 'blueStrength',
};

const DUAL_DETECTION_KEYS: Readonly<Record<string, keyof DualDetectionParams>> = {
  red_blue_add: 'redBlueAdd',
  green_blue_add: 'greenBlueAdd',
  green_red_sub: 'greenRedSub',
};

const MASKED_SHIFT_KEYS: Readonly<Record<string, keyof MaskedShiftParams>> = {
  red_to_blue: 'redToBlue',
  red_to_green: 'redToGreen',
  green_to_blue: 'greenToBlue',
  saturation_boost: 'saturationBoost',
};

function hasField<K extends string>(record: Readonly<Record<K, number>>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Overlay a parameter map onto a defaults record.
 *
 * Keys may be given in their boundary (snake_case) form or as the record
 * field name. Every value must be a finite number.
 */
export function resolveParams<K extends string>(
  variant: string,
  defaults: Readonly<Record<K, number>>,
  keys: Readonly<Record<string, K>>,
  params: ParameterMap = {}
): Record<K, number> {
  const resolved: Record<K, number> = { ...defaults };
  for (const [name, value] of Object.entries(params)) {
    const field = keys[name] ?? (hasField(defaults, name) ? name : undefined);
    if (field === undefined) {
      log.warn(`Ignoring unknown parameter "${name}" for variant ${variant}`);
      continue;
    }
    resolved[field] = requireFinite(variant, name, value);
  }
  return resolved;
}

function requireFinite(variant: string, name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Parameter "${name}" of ${variant} must be a finite number, got ${String(value)}`);
  }
  return value;
}

/**
 * Overlay typed, possibly partial parameters onto a defaults record.
 *
 * Keys whose value is `undefined` keep their default; every other value
 * must be a finite number.
 * @throws ValidationError for non-finite values
 */
export function withDefaults<K extends string>(
  variant: string,
  defaults: Readonly<Record<K, number>>,
  params: Partial<Readonly<Record<K, number>>> = {}
): Record<K, number> {
  const resolved: Record<K, number> = { ...defaults };
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined || !hasField(defaults, name)) continue;
    resolved[name] = requireFinite(variant, name, value);
  }
  return resolved;
}

/**
 * @throws ValidationError unless 0 <= strength <= 1
 */
export function assertBlendStrength(strength: number): void {
  if (!(strength >= 0 && strength <= 1)) {
    throw new ValidationError(`Blend strength must be within [0, 1], got ${strength}`);
  }
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export function isSimulationVariant(name: string): name is SimulationVariant {
  return SIMULATION_VARIANTS.some((variant) => variant === name);
}

export function isCorrectionVariant(name: string): name is CorrectionVariant {
  return CORRECTION_VARIANTS.some((variant) => variant === name);
}

/**
 * Build a simulation spec from a variant name and optional parameter map.
 * @throws UnsupportedVariantError for unknown names
 * @throws ValidationError for invalid parameter values
 */
export function resolveSimulation(name: string, params?: ParameterMap): SimulationSpec {
  const key = normalizeName(name);
  const variant = isSimulationVariant(key) ? key : SIMULATION_ALIASES[key];
  if (variant === undefined) {
    throw new UnsupportedVariantError('simulation', name);
  }

  switch (variant) {
    case 'strict':
    case 'machado':
      if (params && Object.keys(params).length > 0) {
        log.warn(`Variant ${variant} takes no parameters; ignoring ${Object.keys(params).join(', ')}`);
      }
      return { variant };
    case 'blend': {
      const resolved = resolveParams(variant, BLEND_DEFAULTS, BLEND_KEYS, params);
      assertBlendStrength(resolved.strength);
      return { variant, params: resolved };
    }
  }
}

/**
 * Build a correction spec from a variant name and optional parameter map.
 * @throws UnsupportedVariantError for unknown names
 * @throws ValidationError for invalid parameter values
 */
export function resolveCorrection(name: string, params?: ParameterMap): CorrectionSpec {
  const variant = normalizeName(name);
  if (!isCorrectionVariant(variant)) {
    throw new UnsupportedVariantError('correction', name);
  }

  switch (variant) {
    case 'v1':
      return {
        variant,
        params: resolveParams(variant, THRESHOLD_REDNESS_DEFAULTS, THRESHOLD_REDNESS_KEYS, params),
      };
    case 'v2':
      return {
        variant,
        params: resolveParams(variant, DUAL_DETECTION_DEFAULTS, DUAL_DETECTION_KEYS, params),
      };
    case 'v3':
      return {
        variant,
        params: resolveParams(variant, MASKED_SHIFT_DEFAULTS, MASKED_SHIFT_KEYS, params),
      };
  }
}
