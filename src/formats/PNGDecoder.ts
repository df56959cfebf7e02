/**
 * PNG decoder backed by pngjs.
 *
 * pngjs normalises every colour type to interleaved RGBA (palettes are
 * expanded, gray is replicated), so the colour model is recovered from the
 * header flags. 16-bit images are read with rescaling disabled and keep
 * their samples as a Uint16Array; lower depths come back as 8-bit.
 */

import { PNG } from 'pngjs';
import { DecoderError } from '../core/errors';
import { isUniform, selectSamples, validateImageDimensions, type DecodedImage } from './shared';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Signature, IHDR length and type, width and height precede the bit depth */
const IHDR_BIT_DEPTH_OFFSET = 24;

export function isPNGFile(buffer: ArrayBuffer): boolean {
  if (buffer.byteLength < PNG_SIGNATURE.length) return false;
  const bytes = new Uint8Array(buffer, 0, PNG_SIGNATURE.length);
  return PNG_SIGNATURE.every((value, i) => bytes[i] === value);
}

function headerBitDepth(buffer: ArrayBuffer): number {
  if (buffer.byteLength <= IHDR_BIT_DEPTH_OFFSET) return 0;
  return new DataView(buffer).getUint8(IHDR_BIT_DEPTH_OFFSET);
}

export function decodePNG(buffer: ArrayBuffer): DecodedImage {
  let png: ReturnType<typeof PNG.sync.read>;
  try {
    png = PNG.sync.read(Buffer.from(buffer), { skipRescale: headerBitDepth(buffer) === 16 });
  } catch (err) {
    throw new DecoderError('PNG', err instanceof Error ? err.message : String(err), { cause: err });
  }

  const { width, height } = png;
  validateImageDimensions(width, height, 'PNG');

  const pixelCount = width * height;
  // Without rescaling, 16-bit pixels arrive as a Uint16Array despite the declared Buffer type
  const decoded: unknown = png.data;
  const rgba =
    decoded instanceof Uint16Array
      ? decoded
      : new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.byteLength);
  const opaque = rgba instanceof Uint16Array ? 0xffff : 0xff;
  const channels = png.color ? 3 : 1;
  const alpha = png.alpha ? selectSamples(rgba, pixelCount, 4, 3, 1) : undefined;

  return {
    format: 'png',
    width,
    height,
    channels,
    colorModel: png.color ? 'rgb' : 'gray',
    data: selectSamples(rgba, pixelCount, 4, 0, channels),
    // Fully opaque alpha planes carry no information
    alpha: alpha && !isUniform(alpha, opaque) ? alpha : undefined,
  };
}
