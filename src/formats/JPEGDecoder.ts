/**
 * Baseline/progressive JPEG decoder backed by jpeg-js.
 */

import jpeg from 'jpeg-js';
import { DecoderError } from '../core/errors';
import { validateImageDimensions, type DecodedImage } from './shared';

const JPEG_SOI = 0xffd8;

export function isJPEGFile(buffer: ArrayBuffer): boolean {
  if (buffer.byteLength < 3) return false;
  const view = new DataView(buffer);
  return view.getUint16(0, false) === JPEG_SOI && view.getUint8(2) === 0xff;
}

/**
 * Decode to interleaved 8-bit RGB. jpeg-js converts single-component
 * images to RGB as well.
 */
export function decodeJPEG(buffer: ArrayBuffer): DecodedImage {
  let decoded: ReturnType<typeof decodeRaw>;
  try {
    decoded = decodeRaw(new Uint8Array(buffer));
  } catch (err) {
    throw new DecoderError('JPEG', err instanceof Error ? err.message : String(err), { cause: err });
  }

  validateImageDimensions(decoded.width, decoded.height, 'JPEG');

  return {
    format: 'jpeg',
    width: decoded.width,
    height: decoded.height,
    channels: 3,
    colorModel: 'rgb',
    data: decoded.data,
  };
}

function decodeRaw(bytes: Uint8Array) {
  return jpeg.decode(bytes, { useTArray: true, formatAsRGBA: false });
}
