/**
 * File-level image reading: loads a file from disk, decodes it through the
 * decoder registry and converts the result into frames.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { MediaIOError } from '../core/errors';
import { Frame, type FrameMetadata } from '../core/image/Frame';
import { decoderRegistry } from './DecoderRegistry';
import type { DecodedImage } from './shared';

/** Background colour as `[r, g, b]`, each in [0, 1] */
export type RgbBackground = readonly [number, number, number];

const CHECKER_DARK = 85;
const CHECKER_LIGHT = 171;

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * Read and decode a single image file.
 *
 * @throws MediaIOError when the file cannot be read, is not a recognised
 * image, or fails to decode (the decoder error is attached as `cause`)
 */
export async function readImage(path: string): Promise<DecodedImage> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new MediaIOError(`Cannot open image file "${path}"`, { cause: err });
  }

  let image: DecodedImage | null;
  try {
    image = decoderRegistry.detectAndDecode(toArrayBuffer(bytes), extname(path));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MediaIOError(`Cannot decode image file "${path}": ${reason}`, { cause: err });
  }
  if (!image) {
    throw new MediaIOError(`Unrecognised image data in "${path}"`);
  }
  return image;
}

/**
 * Expand 0-based palette indices into interleaved 8-bit RGB.
 * Indices past the end of the palette map to black.
 */
export function expandPalette(indices: ArrayLike<number>, palette: Uint8Array): Uint8Array {
  const entries = Math.floor(palette.length / 3);
  const rgb = new Uint8Array(indices.length * 3);
  for (let i = 0; i < indices.length; i++) {
    const index = indices[i] ?? 0;
    if (index >= entries) continue;
    rgb[i * 3] = palette[index * 3] ?? 0;
    rgb[i * 3 + 1] = palette[index * 3 + 1] ?? 0;
    rgb[i * 3 + 2] = palette[index * 3 + 2] ?? 0;
  }
  return rgb;
}

/** Rescale samples to 8 bits. */
export function toUint8(data: Uint8Array | Uint16Array): Uint8Array {
  if (data instanceof Uint8Array) return data;
  const out = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = Math.round((data[i] ?? 0) / 257);
  }
  return out;
}

/**
 * Convert interleaved CMYK to 8-bit RGB: each colour is
 * `(255 - ink) * (255 - k) / 255`.
 */
export function cmykToRgb(cmyk: Uint8Array | Uint16Array, pixelCount: number): Uint8Array {
  const ink = toUint8(cmyk);
  const rgb = new Uint8Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    const white = (255 - (ink[i * 4 + 3] ?? 0)) / 255;
    for (let c = 0; c < 3; c++) {
      rgb[i * 3 + c] = Math.round((255 - (ink[i * 4 + c] ?? 0)) * white);
    }
  }
  return rgb;
}

/**
 * Colour samples of a decoded image with palettes expanded and CMYK
 * converted to RGB. Gray and RGB data are returned unchanged; alpha is not
 * included.
 */
export function toTrueColor(image: DecodedImage): { data: Uint8Array | Uint16Array; channels: number } {
  const pixelCount = image.width * image.height;
  switch (image.colorModel) {
    case 'indexed':
      return { data: expandPalette(image.data, image.palette ?? new Uint8Array(0)), channels: 3 };
    case 'cmyk':
      return { data: cmykToRgb(image.data, pixelCount), channels: 3 };
    default:
      return { data: image.data, channels: image.channels };
  }
}

/**
 * Wrap a decoded image as a frame (see `toTrueColor`).
 */
export function decodedImageToFrame(image: DecodedImage, metadata?: FrameMetadata): Frame {
  const { data, channels } = toTrueColor(image);
  return Frame.fromPixels(data, image.width, image.height, channels, metadata);
}

/**
 * Side length of a transparency checkerboard square for an image whose
 * larger dimension is `size`.
 */
export function checkerboardSquareSize(size: number): number {
  return Math.floor(Math.max(Math.log(size / 100), 0) * 10 + 1 + Math.min(size, 100) / 20);
}

function checkerboard(width: number, height: number): Uint8Array {
  const square = checkerboardSquareSize(Math.max(width, height));
  const plane = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const row = Math.floor(y / square);
    for (let x = 0; x < width; x++) {
      plane[y * width + x] = (row + Math.floor(x / square)) % 2 === 0 ? CHECKER_DARK : CHECKER_LIGHT;
    }
  }
  return plane;
}

/**
 * Convert any decoded image to 8-bit RGB. Gray is replicated across the
 * three channels; an alpha plane is composited over `background`, or over a
 * gray checkerboard when no background is given.
 */
export function toRgb(image: DecodedImage, background?: RgbBackground): Uint8Array {
  const pixelCount = image.width * image.height;
  const { data, channels } = toTrueColor(image);
  const colour = toUint8(data);

  const rgb = new Uint8Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    for (let c = 0; c < 3; c++) {
      rgb[i * 3 + c] = colour[channels === 1 ? i : i * channels + c] ?? 0;
    }
  }

  if (!image.alpha) {
    return rgb;
  }

  const alphaScale = image.alpha instanceof Uint16Array ? 65535 : 255;
  const board = background ? null : checkerboard(image.width, image.height);
  for (let i = 0; i < pixelCount; i++) {
    const a = (image.alpha[i] ?? alphaScale) / alphaScale;
    for (let c = 0; c < 3; c++) {
      const under = board ? board[i] ?? 0 : (background?.[c] ?? 0) * 256;
      const value = Math.round((rgb[i * 3 + c] ?? 0) * a + under * (1 - a));
      rgb[i * 3 + c] = Math.min(255, Math.max(0, value));
    }
  }
  return rgb;
}

/**
 * Read an image file as an 8-bit, 3-channel RGB frame regardless of its
 * stored format.
 *
 * @param background - colour shown through transparent pixels
 */
export async function readImageRgb(path: string, background?: RgbBackground): Promise<Frame> {
  const image = await readImage(path);
  return Frame.fromPixels(toRgb(image, background), image.width, image.height, 3, { sourcePath: path });
}
