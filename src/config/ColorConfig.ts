/**
 * Centralized color-math constants.
 *
 * Transfer-function breakpoints, cone-space matrices and storage ranges used
 * by the converter, simulator and pipeline. Matrices are row-major.
 */

import type { Matrix3x3 } from '../color/Matrix3';

// ---------------------------------------------------------------------------
// sRGB transfer function (IEC 61966-2-1)
// ---------------------------------------------------------------------------

/** Encoded value at or below which the decode curve is linear */
export const SRGB_DECODE_THRESHOLD = 0.04045;

/** Linear value at or below which the encode curve is linear */
export const SRGB_ENCODE_THRESHOLD = 0.0031308;

/** Slope of the linear segment */
export const SRGB_LINEAR_SLOPE = 12.92;

/** Offset of the power segment */
export const SRGB_OFFSET = 0.055;

/** Scale of the power segment (1 + offset) */
export const SRGB_SCALE = 1.055;

/** Exponent of the power segment */
export const SRGB_GAMMA = 2.4;

/**
 * Lower bound applied to the base of the encode power segment.
 * Keeps Math.pow away from zero and negative bases.
 */
export const ENCODE_POWER_FLOOR = 0.0001;

// ---------------------------------------------------------------------------
// Cone space (Smith & Pokorny)
// ---------------------------------------------------------------------------

/** Linear RGB -> LMS */
export const RGB_TO_LMS: Matrix3x3 = [
  0.31399022, 0.63951294, 0.04649755,
  0.15537241, 0.75789446, 0.08670142,
  0.01775239, 0.10944209, 0.87256922,
];

/** LMS -> linear RGB (numerical inverse of RGB_TO_LMS) */
export const LMS_TO_RGB: Matrix3x3 = [
  5.47221206, -4.6419601, 0.16963708,
  -1.1252419, 2.29317094, -0.1678952,
  0.02980165, -0.19318073, 1.16364789,
];

/** Machado et al. (2009) protanopia, severity 1.0, applied to linear RGB */
export const MACHADO_PROTAN: Matrix3x3 = [
  0.152286, 1.052583, -0.204868,
  0.114503, 0.786281, 0.099216,
  -0.003882, -0.048116, 1.051998,
];

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

/** Maximum 8-bit storage value */
export const STORAGE_MAX = 255;

/** How float channels are brought back to integers */
export type QuantizationMode = 'round' | 'truncate';

export const DEFAULT_QUANTIZATION: QuantizationMode = 'round';
