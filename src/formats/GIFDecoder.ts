/**
 * GIF decoder backed by omggif. Only the first frame is decoded.
 */

import omggif from 'omggif';
import { DecoderError } from '../core/errors';
import { isUniform, splitAlpha, validateImageDimensions, type DecodedImage } from './shared';

export function isGIFFile(buffer: ArrayBuffer): boolean {
  if (buffer.byteLength < 6) return false;
  const signature = String.fromCharCode(...new Uint8Array(buffer, 0, 6));
  return signature === 'GIF87a' || signature === 'GIF89a';
}

export function decodeGIF(buffer: ArrayBuffer): DecodedImage {
  const bytes = Buffer.from(buffer);
  let reader: InstanceType<typeof omggif.GifReader>;
  try {
    reader = new omggif.GifReader(bytes);
  } catch (err) {
    throw new DecoderError('GIF', err instanceof Error ? err.message : String(err), { cause: err });
  }
  if (reader.numFrames() < 1) {
    throw new DecoderError('GIF', 'File contains no frames');
  }

  const { width, height } = reader;
  validateImageDimensions(width, height, 'GIF');

  // Pixels outside the frame rectangle or matching the transparent index stay at alpha 0
  const rgba = new Uint8Array(width * height * 4);
  try {
    reader.decodeAndBlitFrameRGBA(0, rgba);
  } catch (err) {
    throw new DecoderError('GIF', err instanceof Error ? err.message : String(err), { cause: err });
  }

  const { color, alpha } = splitAlpha(rgba, width * height, 4);
  return {
    format: 'gif',
    width,
    height,
    channels: 3,
    colorModel: 'rgb',
    data: color,
    alpha: isUniform(alpha, 255) ? undefined : alpha,
  };
}
