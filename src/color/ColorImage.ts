/**
 * ColorImage - image containers and whole-image conversions
 *
 * `EncodedImage` holds 8-bit storage values (RGB or RGBA, row-major,
 * interleaved). `FloatImage<S>` holds RGB float triples tagged with the
 * color space they are expressed in; alpha never enters float images and
 * is carried over from the source when quantizing.
 *
 * Every function returns a new image; inputs are never modified.
 */

import { DEFAULT_QUANTIZATION, STORAGE_MAX, type QuantizationMode } from '../config/ColorConfig';
import { ColorSpaceMismatchError, ShapeMismatchError, ValidationError } from '../core/errors';
import { clamp01 } from '../utils/math';
import { linearToSrgbChannel, srgbToLinearChannel } from './ColorSpaceConverter';
import type { Color, ColorSpace } from './ColorTypes';

export type ChannelCount = 3 | 4;

export interface EncodedImage {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  /** length = width * height * channels */
  readonly data: Uint8Array | Uint8ClampedArray;
}

export interface FloatImage<S extends ColorSpace> {
  readonly space: S;
  readonly width: number;
  readonly height: number;
  /** RGB triples, length = width * height * 3 */
  readonly data: Float32Array;
}

/** Gamma-encoded image normalized to [0, 1] */
export type NormalizedImage = FloatImage<'srgb'>;
export type LinearImage = FloatImage<'linear'>;

export interface ImageShape {
  readonly width: number;
  readonly height: number;
}

// =============================================================================
// Construction and validation
// =============================================================================

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new ValidationError(`Image dimensions must be non-negative integers, got ${width}x${height}`);
  }
}

/**
 * Create an encoded image, optionally filled with a single color.
 */
export function createEncodedImage(
  width: number,
  height: number,
  channels: ChannelCount = 4,
  fill?: { r: number; g: number; b: number; a?: number }
): EncodedImage {
  assertDimensions(width, height);
  const data = new Uint8ClampedArray(width * height * channels);
  if (fill) {
    const { r, g, b, a = STORAGE_MAX } = fill;
    for (let i = 0; i < data.length; i += channels) {
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
      if (channels === 4) data[i + 3] = a;
    }
  }
  return { width, height, channels, data };
}

/**
 * Check that an encoded image's buffer matches its declared shape.
 * @throws ValidationError
 */
export function validateEncodedImage(image: EncodedImage): void {
  assertDimensions(image.width, image.height);
  if (image.channels !== 3 && image.channels !== 4) {
    throw new ValidationError(`Encoded images carry 3 or 4 channels, got ${String(image.channels)}`);
  }
  const expected = image.width * image.height * image.channels;
  if (image.data.length !== expected) {
    throw new ValidationError(
      `Buffer length ${image.data.length} does not match ${image.width}x${image.height}x${image.channels}`
    );
  }
}

/**
 * @throws ShapeMismatchError unless every image has the same width and height
 */
export function assertSameShape(...images: ImageShape[]): void {
  const [first, ...rest] = images;
  if (!first) return;
  for (const other of rest) {
    if (other.width !== first.width || other.height !== first.height) {
      throw new ShapeMismatchError(
        `Image is ${other.width}x${other.height}, expected ${first.width}x${first.height}`
      );
    }
  }
}

function assertImageSpace<S extends ColorSpace>(image: FloatImage<ColorSpace>, space: S): void {
  if (image.space !== space) {
    throw new ColorSpaceMismatchError(`${space} image`, `${String(image.space)} image`);
  }
}

// =============================================================================
// Storage <-> float
// =============================================================================

/**
 * Scale 8-bit storage values to [0, 1]. Alpha is dropped.
 */
export function normalizeImage(image: EncodedImage): NormalizedImage {
  validateEncodedImage(image);
  const { width, height, channels, data } = image;
  const pixels = width * height;
  const out = new Float32Array(pixels * 3);
  for (let p = 0; p < pixels; p++) {
    const src = p * channels;
    const dst = p * 3;
    out[dst] = data[src] / STORAGE_MAX;
    out[dst + 1] = data[src + 1] / STORAGE_MAX;
    out[dst + 2] = data[src + 2] / STORAGE_MAX;
  }
  return { space: 'srgb', width, height, data: out };
}

function quantizeChannel(value: number, mode: QuantizationMode): number {
  const scaled = clamp01(value) * STORAGE_MAX;
  return mode === 'truncate' ? Math.floor(scaled) : Math.round(scaled);
}

/**
 * Clamp encoded floats to [0, 1] and bring them back to 8-bit storage.
 *
 * The result has the channel layout of `template`; for RGBA templates the
 * alpha channel is copied from it.
 */
export function quantizeImage(
  image: NormalizedImage,
  template: EncodedImage,
  mode: QuantizationMode = DEFAULT_QUANTIZATION
): EncodedImage {
  assertImageSpace(image, 'srgb');
  assertSameShape(image, template);
  const { width, height, data } = image;
  const { channels } = template;
  const pixels = width * height;
  const out = new Uint8ClampedArray(pixels * channels);
  for (let p = 0; p < pixels; p++) {
    const src = p * 3;
    const dst = p * channels;
    out[dst] = quantizeChannel(data[src], mode);
    out[dst + 1] = quantizeChannel(data[src + 1], mode);
    out[dst + 2] = quantizeChannel(data[src + 2], mode);
    if (channels === 4) out[dst + 3] = template.data[dst + 3];
  }
  return { width, height, channels, data: out };
}

// =============================================================================
// Whole-image transfer functions
// =============================================================================

/**
 * Apply the sRGB decode curve to every channel.
 * @throws DomainError if any channel lies outside [0, 1]
 */
export function linearizeImage(image: NormalizedImage): LinearImage {
  assertImageSpace(image, 'srgb');
  const out = new Float32Array(image.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = srgbToLinearChannel(image.data[i]);
  }
  return { space: 'linear', width: image.width, height: image.height, data: out };
}

/**
 * Apply the sRGB encode curve to every channel. The result is not clamped.
 */
export function encodeImage(image: LinearImage): NormalizedImage {
  assertImageSpace(image, 'linear');
  const out = new Float32Array(image.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = linearToSrgbChannel(image.data[i]);
  }
  return { space: 'srgb', width: image.width, height: image.height, data: out };
}

// =============================================================================
// Per-pixel mapping
// =============================================================================

export function getPixel<S extends ColorSpace>(image: FloatImage<S>, x: number, y: number): Color<S> {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
    throw new ValidationError(`Pixel (${x}, ${y}) is outside a ${image.width}x${image.height} image`);
  }
  const i = (y * image.width + x) * 3;
  return { space: image.space, value: [image.data[i], image.data[i + 1], image.data[i + 2]] };
}

/**
 * Map every pixel through `fn`, producing an image in the space `fn`
 * returns. Each pixel is read as a complete triple before `fn` sees it.
 */
export function mapImage<S extends ColorSpace, T extends ColorSpace>(
  image: FloatImage<S>,
  space: T,
  fn: (color: Color<S>) => Color<T>
): FloatImage<T> {
  const { width, height, data } = image;
  const out = new Float32Array(data.length);
  for (let i = 0; i < data.length; i += 3) {
    const result = fn({ space: image.space, value: [data[i], data[i + 1], data[i + 2]] });
    if (result.space !== space) {
      throw new ColorSpaceMismatchError(space, result.space);
    }
    out[i] = result.value[0];
    out[i + 1] = result.value[1];
    out[i + 2] = result.value[2];
  }
  return { space, width, height, data: out };
}

/** Clamp every channel to [0, 1]. */
export function clampImage<S extends ColorSpace>(image: FloatImage<S>): FloatImage<S> {
  const out = new Float32Array(image.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = clamp01(image.data[i]);
  }
  return { space: image.space, width: image.width, height: image.height, data: out };
}

/**
 * Build a float image from nested pixel rows, e.g. `[[[1, 0, 0], [0, 1, 0]]]`.
 * @throws ValidationError for ragged rows
 */
export function floatImageFromRows<S extends ColorSpace>(
  space: S,
  rows: ReadonlyArray<ReadonlyArray<readonly [number, number, number]>>
): FloatImage<S> {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const data = new Float32Array(width * height * 3);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new ValidationError(`Row ${y} has ${row.length} pixels, expected ${width}`);
    }
    row.forEach(([r, g, b], x) => {
      const i = (y * width + x) * 3;
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
    });
  });
  return { space, width, height, data };
}
