/**
 * Windows bitmap decoder.
 *
 * Handles uncompressed (BI_RGB) 1/4/8-bit palette images and 24/32-bit
 * true-colour images, plus BI_BITFIELDS 32-bit with the standard BGRA masks.
 * Rows are bottom-up unless the height is negative; each row is padded to a
 * 4-byte boundary.
 */

import { DecoderError } from '../core/errors';
import { isUniform, validateImageDimensions, type DecodedImage } from './shared';

const BMP_MAGIC = 0x424d; // "BM"
const FILE_HEADER_SIZE = 14;

const BI_RGB = 0;
const BI_BITFIELDS = 3;

export interface BMPInfo {
  width: number;
  height: number;
  bitsPerPixel: number;
  compression: number;
  topDown: boolean;
  dataOffset: number;
  headerSize: number;
  colorsUsed: number;
}

export function isBMPFile(buffer: ArrayBuffer): boolean {
  if (buffer.byteLength < FILE_HEADER_SIZE + 4) return false;
  return new DataView(buffer).getUint16(0, false) === BMP_MAGIC;
}

export function getBMPInfo(buffer: ArrayBuffer): BMPInfo {
  if (!isBMPFile(buffer)) {
    throw new DecoderError('BMP', 'Missing BM signature');
  }
  const view = new DataView(buffer);
  const dataOffset = view.getUint32(10, true);
  const headerSize = view.getUint32(14, true);

  if (headerSize === 12) {
    // OS/2 BITMAPCOREHEADER
    return {
      width: view.getUint16(18, true),
      height: view.getUint16(20, true),
      bitsPerPixel: view.getUint16(24, true),
      compression: BI_RGB,
      topDown: false,
      dataOffset,
      headerSize,
      colorsUsed: 0,
    };
  }

  if (headerSize < 40 || FILE_HEADER_SIZE + headerSize > buffer.byteLength) {
    throw new DecoderError('BMP', `Unsupported header size ${headerSize}`);
  }

  const rawHeight = view.getInt32(22, true);
  return {
    width: view.getInt32(18, true),
    height: Math.abs(rawHeight),
    bitsPerPixel: view.getUint16(28, true),
    compression: view.getUint32(30, true),
    topDown: rawHeight < 0,
    dataOffset,
    headerSize,
    colorsUsed: view.getUint32(46, true),
  };
}

function readBMPPalette(view: DataView, info: BMPInfo): Uint8Array {
  const entrySize = info.headerSize === 12 ? 3 : 4;
  const maxEntries = 1 << info.bitsPerPixel;
  const entries = info.colorsUsed > 0 ? Math.min(info.colorsUsed, maxEntries) : maxEntries;
  const start = FILE_HEADER_SIZE + info.headerSize;
  if (start + entries * entrySize > view.byteLength) {
    throw new DecoderError('BMP', 'Palette truncated');
  }

  // Stored as BGR(X); converted to RGB triplets
  const palette = new Uint8Array(entries * 3);
  for (let i = 0; i < entries; i++) {
    const pos = start + i * entrySize;
    palette[i * 3] = view.getUint8(pos + 2);
    palette[i * 3 + 1] = view.getUint8(pos + 1);
    palette[i * 3 + 2] = view.getUint8(pos);
  }
  return palette;
}

/**
 * Decode a BMP file. Palette images are returned as indexed data with the
 * palette attached; 32-bit images carry an alpha plane unless it is all zero
 * (the common "unused X byte" case).
 */
export function decodeBMP(buffer: ArrayBuffer): DecodedImage {
  const info = getBMPInfo(buffer);
  const { width, height, bitsPerPixel, compression, topDown, dataOffset } = info;

  validateImageDimensions(width, height, 'BMP');

  const paletted = bitsPerPixel === 1 || bitsPerPixel === 4 || bitsPerPixel === 8;
  if (!paletted && bitsPerPixel !== 24 && bitsPerPixel !== 32) {
    throw new DecoderError('BMP', `Unsupported bit depth ${bitsPerPixel}`);
  }
  if (compression !== BI_RGB && !(compression === BI_BITFIELDS && bitsPerPixel === 32)) {
    throw new DecoderError('BMP', `Unsupported compression ${compression}`);
  }

  const view = new DataView(buffer);
  const rowStride = Math.ceil((width * bitsPerPixel) / 32) * 4;
  if (dataOffset + rowStride * height > buffer.byteLength) {
    throw new DecoderError('BMP', 'Pixel data truncated');
  }

  const pixelCount = width * height;
  const rowStart = (y: number): number => dataOffset + (topDown ? y : height - 1 - y) * rowStride;

  if (paletted) {
    const palette = readBMPPalette(view, info);
    const indices = new Uint8Array(pixelCount);
    const perByte = 8 / bitsPerPixel;
    const mask = (1 << bitsPerPixel) - 1;
    for (let y = 0; y < height; y++) {
      const row = rowStart(y);
      for (let x = 0; x < width; x++) {
        const byte = view.getUint8(row + Math.floor(x / perByte));
        const shift = 8 - bitsPerPixel * ((x % perByte) + 1);
        indices[y * width + x] = (byte >> shift) & mask;
      }
    }
    return { format: 'bmp', width, height, channels: 1, colorModel: 'indexed', data: indices, palette };
  }

  const bytesPerPixel = bitsPerPixel / 8;
  const rgb = new Uint8Array(pixelCount * 3);
  const alpha = bytesPerPixel === 4 ? new Uint8Array(pixelCount) : undefined;

  for (let y = 0; y < height; y++) {
    const row = rowStart(y);
    for (let x = 0; x < width; x++) {
      const src = row + x * bytesPerPixel;
      const dst = (y * width + x) * 3;
      rgb[dst] = view.getUint8(src + 2);
      rgb[dst + 1] = view.getUint8(src + 1);
      rgb[dst + 2] = view.getUint8(src);
      if (alpha) {
        alpha[y * width + x] = view.getUint8(src + 3);
      }
    }
  }

  return {
    format: 'bmp',
    width,
    height,
    channels: 3,
    colorModel: 'rgb',
    data: rgb,
    alpha: alpha && !isUniform(alpha, 0) ? alpha : undefined,
  };
}
