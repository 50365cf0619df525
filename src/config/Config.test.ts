import { describe, it, expect } from 'vitest';

// Import from centralized config barrel
import {
  // ColorConfig
  SRGB_DECODE_THRESHOLD,
  SRGB_ENCODE_THRESHOLD,
  SRGB_LINEAR_SLOPE,
  SRGB_OFFSET,
  SRGB_SCALE,
  RGB_TO_LMS,
  LMS_TO_RGB,
  MACHADO_PROTAN,
  STORAGE_MAX,
  DEFAULT_QUANTIZATION,
  // VariantDefaults
  BLEND_DEFAULTS,
  MASKED_SHIFT_DEFAULTS,
  GREEN_OVER_RED_RATIO,
  RED_OVER_BLUE_RATIO,
  // LoggingConfig
  LOG_LEVEL_ENV,
  DEFAULT_LOG_LEVEL_NAME,
} from './index';
import { multiplyMatrixVector } from '../color/Matrix3';

describe('Config barrel exports', () => {
  describe('ColorConfig', () => {
    it('CFG-001: the two sRGB breakpoints describe the same point', () => {
      expect(SRGB_DECODE_THRESHOLD / SRGB_LINEAR_SLOPE).toBeCloseTo(SRGB_ENCODE_THRESHOLD, 6);
      expect(SRGB_SCALE).toBeCloseTo(1 + SRGB_OFFSET, 12);
    });

    it('CFG-002: LMS_TO_RGB inverts RGB_TO_LMS', () => {
      const color = [0.25, 0.5, 0.75] as const;
      const back = multiplyMatrixVector(LMS_TO_RGB, multiplyMatrixVector(RGB_TO_LMS, color));
      back.forEach((value, i) => expect(value).toBeCloseTo(color[i], 6));
    });

    it('CFG-003: matrices are 3x3 row-major', () => {
      expect(RGB_TO_LMS).toHaveLength(9);
      expect(LMS_TO_RGB).toHaveLength(9);
      expect(MACHADO_PROTAN).toHaveLength(9);
    });

    it('CFG-004: storage defaults', () => {
      expect(STORAGE_MAX).toBe(255);
      expect(DEFAULT_QUANTIZATION).toBe('round');
    });
  });

  describe('VariantDefaults', () => {
    it('CFG-010: blend defaults to the strict model', () => {
      expect(BLEND_DEFAULTS.strength).toBe(1);
    });

    it('CFG-011: masked-shift defaults', () => {
      expect(MASKED_SHIFT_DEFAULTS).toEqual({ redToBlue: 1, redToGreen: 0, greenToBlue: 0.5, saturationBoost: 1 });
      expect(GREEN_OVER_RED_RATIO).toBe(0.8);
      expect(RED_OVER_BLUE_RATIO).toBe(1.5);
    });
  });

  describe('LoggingConfig', () => {
    it('CFG-020: reads the level from DICHROMA_LOG_LEVEL, defaulting to warn', () => {
      expect(LOG_LEVEL_ENV).toBe('DICHROMA_LOG_LEVEL');
      expect(DEFAULT_LOG_LEVEL_NAME).toBe('warn');
    });
  });
});
