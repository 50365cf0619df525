/**
 * ComparisonGrid - evaluation composite for a correction
 *
 * Lays four equally sized encoded images out as a 2x2 grid:
 *
 *   +-----------+-------------------------+
 *   | original  | corrected               |
 *   +-----------+-------------------------+
 *   | simulated | simulated after correct |
 *   +-----------+-------------------------+
 *
 * The bottom-right panel is what the simulated observer sees once the
 * correction has been applied.
 */

import { STORAGE_MAX } from '../config/ColorConfig';
import { assertSameShape, validateEncodedImage, type EncodedImage } from './ColorImage';
import { runPipeline, type PipelineOptions } from './PixelPipeline';
import type { SimulationSpec } from './TransformSpec';

const STRICT: SimulationSpec = { variant: 'strict' };

/**
 * Re-run a simulation over an already corrected encoded image.
 */
export function simulateCorrected(
  corrected: EncodedImage,
  simulation: SimulationSpec = STRICT,
  options: PipelineOptions = {}
): EncodedImage {
  return runPipeline(corrected, simulation, undefined, options).simulated;
}

function blit(target: Uint8ClampedArray, targetWidth: number, source: EncodedImage, offsetX: number, offsetY: number): void {
  const { width, height, channels, data } = source;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const src = (y * width + x) * channels;
      const dst = ((y + offsetY) * targetWidth + (x + offsetX)) * 4;
      target[dst] = data[src];
      target[dst + 1] = data[src + 1];
      target[dst + 2] = data[src + 2];
      target[dst + 3] = channels === 4 ? data[src + 3] : STORAGE_MAX;
    }
  }
}

/**
 * Build the 2x2 comparison grid (RGBA, twice the input width and height).
 *
 * @throws ShapeMismatchError unless all three inputs share width and height
 */
export function createComparisonGrid(
  original: EncodedImage,
  simulated: EncodedImage,
  corrected: EncodedImage,
  simulation: SimulationSpec = STRICT,
  options: PipelineOptions = {}
): EncodedImage {
  for (const image of [original, simulated, corrected]) validateEncodedImage(image);
  assertSameShape(original, simulated, corrected);

  const { width, height } = original;
  const gridWidth = width * 2;
  const data = new Uint8ClampedArray(gridWidth * height * 2 * 4);

  blit(data, gridWidth, original, 0, 0);
  blit(data, gridWidth, corrected, width, 0);
  blit(data, gridWidth, simulated, 0, height);
  blit(data, gridWidth, simulateCorrected(corrected, simulation, options), width, height);

  return { width: gridWidth, height: height * 2, channels: 4, data };
}
