/**
 * PixelPipeline Integration Tests
 *
 * 8-bit in, 8-bit out: every stage from normalization to quantization.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { decodeToLinear, encodeFromLinear, runPipeline } from './PixelPipeline';
import { createEncodedImage, type EncodedImage } from './ColorImage';
import { resolveCorrection, resolveSimulation, type CorrectionSpec } from './TransformSpec';
import { Logger, LogLevel } from '../utils/Logger';
import { ValidationError } from '../core/errors';

const STRICT = resolveSimulation('strict');
const V3 = resolveCorrection('v3');

function pixel(r: number, g: number, b: number, a = 255): EncodedImage {
  return createEncodedImage(1, 1, 4, { r, g, b, a });
}

describe('PixelPipeline', () => {
  afterEach(() => {
    Logger.setLevel(LogLevel.WARN);
    Logger.setSink(null);
  });

  describe('identity', () => {
    it('PIPE-001: returns every storage value unchanged when no stage is selected', () => {
      const image = createEncodedImage(256, 1, 4);
      for (let v = 0; v < 256; v++) {
        image.data.set([v, 255 - v, v, 9], v * 4);
      }
      const { simulated, corrected } = runPipeline(image);
      expect(Array.from(simulated.data)).toEqual(Array.from(image.data));
      expect(Array.from(corrected.data)).toEqual(Array.from(image.data));
    });

    it('PIPE-002: truncation can lose one step on the identity path', () => {
      const { simulated } = runPipeline(pixel(7, 7, 7), undefined, undefined, { quantization: 'truncate' });
      expect(Array.from(simulated.data)).toEqual([6, 6, 6, 255]);
    });
  });

  describe('simulation', () => {
    it('PIPE-010: strict simulation of pure red', () => {
      expect(Array.from(runPipeline(pixel(255, 0, 0), STRICT).simulated.data)).toEqual([102, 117, 0, 255]);
    });

    it('PIPE-011: strict simulation of pure red under truncation', () => {
      const { simulated } = runPipeline(pixel(255, 0, 0), STRICT, undefined, { quantization: 'truncate' });
      expect(Array.from(simulated.data)).toEqual([101, 117, 0, 255]);
    });

    it('PIPE-012: machado simulation of pure red', () => {
      const { simulated } = runPipeline(pixel(255, 0, 0), resolveSimulation('machado'));
      expect(Array.from(simulated.data)).toEqual([109, 95, 0, 255]);
    });

    it('PIPE-013: strict simulation of magenta, green and white', () => {
      expect(Array.from(runPipeline(pixel(255, 0, 255), STRICT).simulated.data)).toEqual([160, 102, 255, 255]);
      expect(Array.from(runPipeline(pixel(0, 255, 0), STRICT).simulated.data)).toEqual([0, 255, 0, 255]);
      expect(Array.from(runPipeline(pixel(255, 255, 255), STRICT).simulated.data)).toEqual([255, 255, 255, 255]);
    });
  });

  describe('correction', () => {
    it('PIPE-020: v3 turns pure red into magenta', () => {
      expect(Array.from(runPipeline(pixel(255, 0, 0), undefined, V3).corrected.data)).toEqual([255, 0, 255, 255]);
    });

    it('PIPE-021: correction starts from the original, not the simulated image', () => {
      const { simulated, corrected } = runPipeline(pixel(0, 255, 0), STRICT, V3);
      expect(Array.from(simulated.data)).toEqual([0, 255, 0, 255]);
      expect(Array.from(corrected.data)).toEqual([0, 255, 188, 255]);
    });

    it('PIPE-022: v1 adds blue to red', () => {
      const { corrected } = runPipeline(pixel(255, 0, 0), undefined, resolveCorrection('v1'));
      expect(Array.from(corrected.data)).toEqual([255, 0, 231, 255]);
    });

    it('PIPE-023: rejects a hand-built correction with a non-finite weight', () => {
      const correction: CorrectionSpec = {
        variant: 'v1',
        params: { rednessThreshold: 0, blueStrength: Number.POSITIVE_INFINITY },
      };
      expect(() => runPipeline(pixel(255, 0, 0), undefined, correction)).toThrow(ValidationError);
    });
  });

  describe('layout', () => {
    it('PIPE-030: carries alpha through unchanged', () => {
      const { simulated, corrected } = runPipeline(pixel(255, 0, 0, 17), STRICT, V3);
      expect(simulated.data[3]).toBe(17);
      expect(corrected.data[3]).toBe(17);
    });

    it('PIPE-031: keeps RGB images as RGB', () => {
      const image = createEncodedImage(2, 1, 3, { r: 255, g: 0, b: 0 });
      const { simulated } = runPipeline(image, STRICT);
      expect(simulated.channels).toBe(3);
      expect(Array.from(simulated.data)).toEqual([102, 117, 0, 102, 117, 0]);
    });

    it('PIPE-032: does not modify the input image', () => {
      const image = pixel(255, 0, 0);
      runPipeline(image, STRICT, V3);
      expect(Array.from(image.data)).toEqual([255, 0, 0, 255]);
    });

    it('PIPE-033: rejects malformed buffers', () => {
      const image: EncodedImage = { width: 2, height: 2, channels: 4, data: new Uint8Array(4) };
      expect(() => runPipeline(image, STRICT)).toThrow(ValidationError);
    });

    it('PIPE-034: handles empty images', () => {
      const { simulated } = runPipeline(createEncodedImage(0, 0), STRICT, V3);
      expect(simulated.data.length).toBe(0);
    });
  });

  describe('stages', () => {
    it('PIPE-040: decodeToLinear and encodeFromLinear invert each other', () => {
      const image = pixel(128, 64, 200);
      const linear = decodeToLinear(image);
      expect(linear.data[0]).toBeCloseTo(0.2158605, 6);
      expect(Array.from(encodeFromLinear(linear, image).data)).toEqual([128, 64, 200, 255]);
    });

    it('PIPE-041: logs the selected stages at debug level', () => {
      const sink = vi.fn();
      Logger.setLevel(LogLevel.DEBUG);
      Logger.setSink(sink);
      runPipeline(pixel(0, 0, 0), STRICT);
      expect(sink).toHaveBeenCalledWith(LogLevel.DEBUG, '[PixelPipeline]', 'Processing 1x1 image', {
        simulation: 'strict',
        correction: 'none',
        quantization: 'round',
      });
    });
  });
});
