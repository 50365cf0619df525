/**
 * PixelPipeline - simulation and correction over an encoded image
 *
 *   encoded -> normalize -> linearize -+-> simulate -> clamp -> encode -> quantize
 *                                      +-> correct  -> clamp -> encode -> quantize
 *
 * Correction always starts from the original linear image, never from the
 * simulated one. A missing stage passes the linear image through. Pixels
 * are processed independently and the input image is never modified.
 */

import { DEFAULT_QUANTIZATION, type QuantizationMode } from '../config/ColorConfig';
import { Logger } from '../utils/Logger';
import { correctImage } from './ColorCorrector';
import {
  clampImage,
  encodeImage,
  linearizeImage,
  normalizeImage,
  quantizeImage,
  type EncodedImage,
  type LinearImage,
} from './ColorImage';
import { simulateImage } from './DichromacySimulator';
import type { CorrectionSpec, SimulationSpec } from './TransformSpec';

const log = new Logger('PixelPipeline');

export interface PipelineOptions {
  /** How encoded floats return to 8-bit storage (default: round) */
  quantization?: QuantizationMode;
}

export interface PipelineResult {
  readonly simulated: EncodedImage;
  readonly corrected: EncodedImage;
}

/**
 * Encoded image -> linear image (steps 1-2).
 */
export function decodeToLinear(image: EncodedImage): LinearImage {
  return linearizeImage(normalizeImage(image));
}

/**
 * Linear image -> encoded image shaped like `template` (steps 5-6).
 */
export function encodeFromLinear(
  image: LinearImage,
  template: EncodedImage,
  quantization: QuantizationMode = DEFAULT_QUANTIZATION
): EncodedImage {
  return quantizeImage(encodeImage(clampImage(image)), template, quantization);
}

/**
 * Run simulation and correction over an encoded image.
 *
 * @returns the simulated and the corrected image, both shaped like the input
 * @throws ValidationError for malformed input buffers
 */
export function runPipeline(
  image: EncodedImage,
  simulation?: SimulationSpec,
  correction?: CorrectionSpec,
  options: PipelineOptions = {}
): PipelineResult {
  const quantization = options.quantization ?? DEFAULT_QUANTIZATION;
  log.debug(`Processing ${image.width}x${image.height} image`, {
    simulation: simulation?.variant ?? 'none',
    correction: correction?.variant ?? 'none',
    quantization,
  });

  const linear = decodeToLinear(image);
  const simulated = simulation ? simulateImage(linear, simulation) : linear;
  const corrected = correction ? correctImage(linear, correction) : linear;

  return {
    simulated: encodeFromLinear(simulated, image, quantization),
    corrected: encodeFromLinear(corrected, image, quantization),
  };
}
