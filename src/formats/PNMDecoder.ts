/**
 * Netpbm (PBM / PGM / PPM) decoder.
 *
 * Supports the plain (P1-P3) and raw (P4-P6) variants. Maxval above 255
 * yields 16-bit samples (raw variants store them big-endian). Samples are
 * returned unscaled. Bitmaps decode to 8-bit gray with 1 = white, so a set
 * bit in the file (black) reads as 0.
 */

import { DecoderError } from '../core/errors';
import { validateImageDimensions, type DecodedImage } from './shared';

interface PNMHeader {
  magic: number; // 1-6
  width: number;
  height: number;
  maxval: number;
  channels: number;
  /** Offset of the first pixel byte (raw variants) or token (plain variants) */
  dataOffset: number;
}

const CHAR_HASH = 0x23;
const CHAR_P = 0x50;

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0x0b || byte === 0x0c;
}

/**
 * Tokenizer over ASCII header/body bytes that skips whitespace and
 * `#` comments running to the end of the line.
 */
class TokenReader {
  constructor(
    private readonly bytes: Uint8Array,
    public pos: number,
  ) {}

  private skipSeparators(): void {
    while (this.pos < this.bytes.length) {
      const byte = this.bytes[this.pos] ?? 0;
      if (byte === CHAR_HASH) {
        while (this.pos < this.bytes.length && this.bytes[this.pos] !== 0x0a && this.bytes[this.pos] !== 0x0d) {
          this.pos++;
        }
      } else if (isWhitespace(byte)) {
        this.pos++;
      } else {
        return;
      }
    }
  }

  nextInt(what: string): number {
    this.skipSeparators();
    const start = this.pos;
    let value = 0;
    while (this.pos < this.bytes.length) {
      const byte = this.bytes[this.pos] ?? 0;
      if (byte < 0x30 || byte > 0x39) break;
      value = value * 10 + (byte - 0x30);
      this.pos++;
    }
    if (this.pos === start) {
      throw new DecoderError('PNM', `Expected ${what} at byte ${start}`);
    }
    return value;
  }

  /** Next single 0/1 digit; plain bitmaps may omit separators between them. */
  nextBit(): number {
    this.skipSeparators();
    const byte = this.bytes[this.pos];
    if (byte !== 0x30 && byte !== 0x31) {
      throw new DecoderError('PNM', `Expected bit at byte ${this.pos}`);
    }
    this.pos++;
    return byte - 0x30;
  }
}

/**
 * Check if a buffer starts with a Netpbm magic number (P1-P6)
 */
export function isPNMFile(buffer: ArrayBuffer): boolean {
  if (buffer.byteLength < 3) return false;
  const bytes = new Uint8Array(buffer, 0, 3);
  const kind = (bytes[1] ?? 0) - 0x30;
  return bytes[0] === CHAR_P && kind >= 1 && kind <= 6 && isWhitespace(bytes[2] ?? 0);
}

function parseHeader(bytes: Uint8Array): PNMHeader {
  if (bytes.length < 3 || bytes[0] !== CHAR_P) {
    throw new DecoderError('PNM', 'Missing magic number');
  }
  const magic = (bytes[1] ?? 0) - 0x30;
  if (magic < 1 || magic > 6) {
    throw new DecoderError('PNM', `Unsupported variant P${String.fromCharCode(bytes[1] ?? 0x3f)}`);
  }

  const reader = new TokenReader(bytes, 2);
  const width = reader.nextInt('width');
  const height = reader.nextInt('height');
  const isBitmap = magic === 1 || magic === 4;
  const maxval = isBitmap ? 1 : reader.nextInt('maxval');
  if (maxval < 1 || maxval > 65535) {
    throw new DecoderError('PNM', `Invalid maxval ${maxval}`);
  }

  // Raw variants: exactly one whitespace byte separates the header from the data
  let dataOffset = reader.pos;
  if (magic >= 4) {
    if (!isWhitespace(bytes[dataOffset] ?? 0)) {
      throw new DecoderError('PNM', 'Missing whitespace after header');
    }
    dataOffset++;
  }

  return {
    magic,
    width,
    height,
    maxval,
    channels: magic === 3 || magic === 6 ? 3 : 1,
    dataOffset,
  };
}

/**
 * Decode a PBM, PGM or PPM file
 */
export function decodePNM(buffer: ArrayBuffer): DecodedImage {
  const bytes = new Uint8Array(buffer);
  const header = parseHeader(bytes);
  const { magic, width, height, maxval, channels, dataOffset } = header;

  validateImageDimensions(width, height, 'PNM');

  const sampleCount = width * height * channels;
  const data = maxval > 255 ? new Uint16Array(sampleCount) : new Uint8Array(sampleCount);

  switch (magic) {
    case 1: {
      const reader = new TokenReader(bytes, dataOffset);
      for (let i = 0; i < sampleCount; i++) {
        data[i] = reader.nextBit() === 1 ? 0 : 1;
      }
      break;
    }
    case 2:
    case 3: {
      const reader = new TokenReader(bytes, dataOffset);
      for (let i = 0; i < sampleCount; i++) {
        data[i] = reader.nextInt('sample');
      }
      break;
    }
    case 4: {
      const rowBytes = Math.ceil(width / 8);
      if (dataOffset + rowBytes * height > bytes.length) {
        throw new DecoderError('PNM', 'Pixel data truncated');
      }
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          const byte = bytes[dataOffset + y * rowBytes + (x >> 3)] ?? 0;
          const bit = (byte >> (7 - (x & 7))) & 1;
          data[y * width + x] = bit === 1 ? 0 : 1;
        }
      }
      break;
    }
    default: {
      const bytesPerSample = maxval > 255 ? 2 : 1;
      if (dataOffset + sampleCount * bytesPerSample > bytes.length) {
        throw new DecoderError('PNM', 'Pixel data truncated');
      }
      const view = new DataView(buffer, dataOffset);
      for (let i = 0; i < sampleCount; i++) {
        data[i] = bytesPerSample === 2 ? view.getUint16(i * 2, false) : view.getUint8(i);
      }
      break;
    }
  }

  return {
    format: 'pnm',
    width,
    height,
    channels,
    colorModel: channels === 3 ? 'rgb' : 'gray',
    data,
  };
}
