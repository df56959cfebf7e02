/**
 * Shared types and helpers for the single-file image decoders.
 */

import { IMAGE_LIMITS } from '../config/ImageLimits';
import { DecoderError } from '../core/errors';

export type ImageFormatName = 'png' | 'jpeg' | 'gif' | 'tiff' | 'bmp' | 'pnm';

/**
 * How the values in `DecodedImage.data` are to be read.
 * - gray / rgb: direct intensities, 1 or 3 channels
 * - cmyk: 4 ink channels (TIFF separated images)
 * - indexed: 1 channel of 0-based indices into `palette`
 */
export type ColorModel = 'gray' | 'rgb' | 'cmyk' | 'indexed';

export interface DecodedImage {
  format: ImageFormatName;
  width: number;
  height: number;
  /** Channels per pixel in `data`; alpha is never part of it */
  channels: number;
  colorModel: ColorModel;
  /** Interleaved samples, row-major */
  data: Uint8Array | Uint16Array;
  /** RGB triplets (8-bit) for indexed images */
  palette?: Uint8Array;
  /** Opacity per pixel, same sample type as `data` */
  alpha?: Uint8Array | Uint16Array;
}

/**
 * Validate image dimensions against maximum constraints.
 *
 * @param formatName - Name of the format (used in error messages)
 * @throws DecoderError if dimensions are invalid or exceed limits
 */
export function validateImageDimensions(
  width: number,
  height: number,
  formatName: string,
  maxDimension: number = IMAGE_LIMITS.MAX_DIMENSION,
  maxPixels: number = IMAGE_LIMITS.MAX_PIXELS,
): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new DecoderError(formatName, `Invalid dimensions: ${width}x${height}`);
  }

  if (width > maxDimension || height > maxDimension) {
    throw new DecoderError(
      formatName,
      `Dimensions ${width}x${height} exceed maximum of ${maxDimension}x${maxDimension}`
    );
  }

  const totalPixels = width * height;
  if (totalPixels > maxPixels) {
    throw new DecoderError(formatName, `Image has ${totalPixels} pixels, exceeding maximum of ${maxPixels}`);
  }
}

/**
 * Copy `count` consecutive channels starting at `first` out of an
 * interleaved buffer with `stride` channels per pixel.
 */
export function selectSamples(
  data: Uint8Array | Uint16Array,
  pixelCount: number,
  stride: number,
  first: number,
  count: number,
): Uint8Array | Uint16Array {
  const out = allocateLike(data, pixelCount * count);
  for (let i = 0; i < pixelCount; i++) {
    const src = i * stride + first;
    const dst = i * count;
    for (let c = 0; c < count; c++) {
      out[dst + c] = data[src + c] ?? 0;
    }
  }
  return out;
}

/**
 * Split an interleaved buffer with a trailing alpha channel into colour
 * samples and a separate alpha plane.
 */
export function splitAlpha(
  data: Uint8Array | Uint16Array,
  pixelCount: number,
  channelsWithAlpha: number,
): { color: Uint8Array | Uint16Array; alpha: Uint8Array | Uint16Array } {
  return {
    color: selectSamples(data, pixelCount, channelsWithAlpha, 0, channelsWithAlpha - 1),
    alpha: selectSamples(data, pixelCount, channelsWithAlpha, channelsWithAlpha - 1, 1),
  };
}

/** Allocate an array of the same sample type as `data`. */
export function allocateLike(data: Uint8Array | Uint16Array, length: number): Uint8Array | Uint16Array {
  return data instanceof Uint16Array ? new Uint16Array(length) : new Uint8Array(length);
}

/** True when every sample in the array equals `value`. */
export function isUniform(data: ArrayLike<number>, value: number): boolean {
  for (let i = 0; i < data.length; i++) {
    if (data[i] !== value) return false;
  }
  return true;
}
