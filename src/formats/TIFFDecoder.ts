/**
 * TIFF Image Format Decoder
 *
 * Supports:
 * - 8-bit and 16-bit unsigned integer samples
 * - Grayscale (WhiteIsZero / BlackIsZero), RGB, palette and CMYK images
 * - One extra alpha sample (ExtraSamples = associated or unassociated)
 * - Big-endian and little-endian byte order
 * - Uncompressed, chunky (interleaved) strips
 *
 * Not yet supported:
 * - LZW, Deflate and PackBits compression
 * - Tiled and planar images
 * - Float and signed sample formats
 *
 * Based on TIFF 6.0 specification.
 */

import { DecoderError } from '../core/errors';
import { selectSamples, validateImageDimensions, type ColorModel, type DecodedImage } from './shared';

// TIFF byte order marks
const TIFF_LE = 0x4949; // "II" - Intel byte order (little-endian)
const TIFF_BE = 0x4d4d; // "MM" - Motorola byte order (big-endian)
const TIFF_MAGIC = 42;

// TIFF Tag IDs
const TAG_IMAGE_WIDTH = 256;
const TAG_IMAGE_LENGTH = 257;
const TAG_BITS_PER_SAMPLE = 258;
const TAG_COMPRESSION = 259;
const TAG_PHOTOMETRIC = 262;
const TAG_STRIP_OFFSETS = 273;
const TAG_SAMPLES_PER_PIXEL = 277;
const TAG_ROWS_PER_STRIP = 278;
const TAG_STRIP_BYTE_COUNTS = 279;
const TAG_PLANAR_CONFIG = 284;
const TAG_COLOR_MAP = 320;
const TAG_EXTRA_SAMPLES = 338;
const TAG_SAMPLE_FORMAT = 339;

// Photometric interpretations
const PHOTOMETRIC_WHITE_IS_ZERO = 0;
const PHOTOMETRIC_BLACK_IS_ZERO = 1;
const PHOTOMETRIC_RGB = 2;
const PHOTOMETRIC_PALETTE = 3;
const PHOTOMETRIC_SEPARATED = 5;

const SAMPLE_FORMAT_UINT = 1;
const COMPRESSION_NONE = 1;
const PLANAR_CHUNKY = 1;

export interface TIFFInfo {
  width: number;
  height: number;
  bitsPerSample: number;
  samplesPerPixel: number;
  photometric: number;
  compression: number;
  bigEndian: boolean;
}

interface TIFFTag {
  id: number;
  type: number;
  count: number;
  valueOffset: number;
}

interface ParsedTIFF {
  view: DataView;
  tags: Map<number, TIFFTag>;
  le: boolean;
  info: TIFFInfo;
}

/**
 * Check if a buffer contains a TIFF file by checking magic number
 */
export function isTIFFFile(buffer: ArrayBuffer): boolean {
  if (buffer.byteLength < 4) {
    return false;
  }
  const view = new DataView(buffer);
  const byteOrder = view.getUint16(0, false);
  if (byteOrder !== TIFF_LE && byteOrder !== TIFF_BE) {
    return false;
  }
  return view.getUint16(2, byteOrder === TIFF_LE) === TIFF_MAGIC;
}

/**
 * Get the byte size of a TIFF data type
 */
function getTypeSize(type: number): number {
  switch (type) {
    case 1: return 1; // BYTE
    case 2: return 1; // ASCII
    case 3: return 2; // SHORT
    case 4: return 4; // LONG
    case 5: return 8; // RATIONAL
    default: return 1;
  }
}

/**
 * Parse IFD (Image File Directory) tags
 */
function parseIFD(view: DataView, ifdOffset: number, le: boolean): Map<number, TIFFTag> {
  const tags = new Map<number, TIFFTag>();

  if (ifdOffset + 2 > view.byteLength) return tags;

  const numEntries = view.getUint16(ifdOffset, le);
  let pos = ifdOffset + 2;

  for (let i = 0; i < numEntries; i++) {
    if (pos + 12 > view.byteLength) break;

    const id = view.getUint16(pos, le);
    const type = view.getUint16(pos + 2, le);
    const count = view.getUint32(pos + 4, le);

    // Values up to 4 bytes are stored inline at pos+8, larger ones behind a pointer
    const totalSize = getTypeSize(type) * count;
    const valueOffset = totalSize <= 4 ? pos + 8 : view.getUint32(pos + 8, le);

    tags.set(id, { id, type, count, valueOffset });
    pos += 12;
  }

  return tags;
}

function readValue(view: DataView, type: number, offset: number, le: boolean): number | null {
  if (type === 1 && offset + 1 <= view.byteLength) return view.getUint8(offset);
  if (type === 3 && offset + 2 <= view.byteLength) return view.getUint16(offset, le);
  if (type === 4 && offset + 4 <= view.byteLength) return view.getUint32(offset, le);
  return null;
}

/**
 * Read every value of a BYTE, SHORT or LONG tag
 */
function getTagValues(view: DataView, tags: Map<number, TIFFTag>, tagId: number, le: boolean): number[] {
  const tag = tags.get(tagId);
  if (!tag) return [];

  const size = getTypeSize(tag.type);
  const values: number[] = [];
  for (let i = 0; i < tag.count; i++) {
    const value = readValue(view, tag.type, tag.valueOffset + i * size, le);
    if (value === null) break;
    values.push(value);
  }
  return values;
}

function getTagValue(
  view: DataView,
  tags: Map<number, TIFFTag>,
  tagId: number,
  le: boolean,
  defaultValue: number
): number {
  return getTagValues(view, tags, tagId, le)[0] ?? defaultValue;
}

function parseTIFF(buffer: ArrayBuffer): ParsedTIFF {
  if (buffer.byteLength < 8) {
    throw new DecoderError('TIFF', 'File too small');
  }

  const view = new DataView(buffer);
  const byteOrder = view.getUint16(0, false);
  if (byteOrder !== TIFF_LE && byteOrder !== TIFF_BE) {
    throw new DecoderError('TIFF', 'Unrecognized byte order');
  }

  const le = byteOrder === TIFF_LE;
  if (view.getUint16(2, le) !== TIFF_MAGIC) {
    throw new DecoderError('TIFF', 'Wrong magic number');
  }

  const ifdOffset = view.getUint32(4, le);
  if (ifdOffset >= buffer.byteLength) {
    throw new DecoderError('TIFF', 'IFD offset out of range');
  }

  const tags = parseIFD(view, ifdOffset, le);
  const height = getTagValue(view, tags, TAG_IMAGE_LENGTH, le, 0);

  return {
    view,
    tags,
    le,
    info: {
      width: getTagValue(view, tags, TAG_IMAGE_WIDTH, le, 0),
      height,
      bitsPerSample: getTagValue(view, tags, TAG_BITS_PER_SAMPLE, le, 1),
      samplesPerPixel: getTagValue(view, tags, TAG_SAMPLES_PER_PIXEL, le, 1),
      photometric: getTagValue(view, tags, TAG_PHOTOMETRIC, le, PHOTOMETRIC_BLACK_IS_ZERO),
      compression: getTagValue(view, tags, TAG_COMPRESSION, le, COMPRESSION_NONE),
      bigEndian: !le,
    },
  };
}

/**
 * Get basic info from TIFF header without fully decoding
 */
export function getTIFFInfo(buffer: ArrayBuffer): TIFFInfo | null {
  try {
    return parseTIFF(buffer).info;
  } catch {
    return null;
  }
}

function colorModelFor(photometric: number, colorSamples: number): ColorModel {
  switch (photometric) {
    case PHOTOMETRIC_WHITE_IS_ZERO:
    case PHOTOMETRIC_BLACK_IS_ZERO:
      if (colorSamples === 1) return 'gray';
      break;
    case PHOTOMETRIC_RGB:
      if (colorSamples === 3) return 'rgb';
      break;
    case PHOTOMETRIC_PALETTE:
      if (colorSamples === 1) return 'indexed';
      break;
    case PHOTOMETRIC_SEPARATED:
      if (colorSamples === 4) return 'cmyk';
      break;
  }
  throw new DecoderError('TIFF', `Unsupported photometric interpretation ${photometric} with ${colorSamples} samples`);
}

/**
 * Read the ColorMap tag: 3 × 2^bits 16-bit values (all reds, all greens,
 * all blues), reduced to 8-bit RGB triplets.
 */
function readPalette(parsed: ParsedTIFF, bitsPerSample: number): Uint8Array {
  const { view, tags, le } = parsed;
  const values = getTagValues(view, tags, TAG_COLOR_MAP, le);
  const entries = 1 << bitsPerSample;
  if (values.length < entries * 3) {
    throw new DecoderError('TIFF', `ColorMap has ${values.length} values, expected ${entries * 3}`);
  }

  const palette = new Uint8Array(entries * 3);
  for (let i = 0; i < entries; i++) {
    palette[i * 3] = (values[i] ?? 0) >> 8;
    palette[i * 3 + 1] = (values[entries + i] ?? 0) >> 8;
    palette[i * 3 + 2] = (values[2 * entries + i] ?? 0) >> 8;
  }
  return palette;
}

/**
 * Decode an integer TIFF file from an ArrayBuffer
 *
 * @returns Samples in the file's own layout; alpha split off, palette left unexpanded
 */
export function decodeTIFF(buffer: ArrayBuffer): DecodedImage {
  const parsed = parseTIFF(buffer);
  const { view, tags, le, info } = parsed;
  const { width, height, bitsPerSample, samplesPerPixel, photometric, compression } = info;

  validateImageDimensions(width, height, 'TIFF');

  const sampleFormat = getTagValue(view, tags, TAG_SAMPLE_FORMAT, le, SAMPLE_FORMAT_UINT);
  if (sampleFormat !== SAMPLE_FORMAT_UINT) {
    throw new DecoderError('TIFF', `Unsupported sample format ${sampleFormat}; only unsigned integers are supported`);
  }
  if (bitsPerSample !== 8 && bitsPerSample !== 16) {
    throw new DecoderError('TIFF', `Unsupported bits per sample: ${bitsPerSample}. Only 8 and 16 are supported.`);
  }
  if (compression !== COMPRESSION_NONE) {
    throw new DecoderError('TIFF', `Unsupported compression: ${compression}. Only uncompressed (1) is supported.`);
  }
  if (getTagValue(view, tags, TAG_PLANAR_CONFIG, le, PLANAR_CHUNKY) !== PLANAR_CHUNKY) {
    throw new DecoderError('TIFF', 'Planar sample layout is not supported');
  }

  const extraSamples = getTagValues(view, tags, TAG_EXTRA_SAMPLES, le);
  const hasAlpha = extraSamples.length > 0 && samplesPerPixel > 1;
  const colorSamples = samplesPerPixel - extraSamples.length;
  const colorModel = colorModelFor(photometric, colorSamples);

  const stripOffsets = getTagValues(view, tags, TAG_STRIP_OFFSETS, le);
  const stripByteCounts = getTagValues(view, tags, TAG_STRIP_BYTE_COUNTS, le);
  const rowsPerStrip = getTagValue(view, tags, TAG_ROWS_PER_STRIP, le, height);

  if (stripOffsets.length === 0) {
    throw new DecoderError('TIFF', 'No strip offsets found');
  }

  const bytesPerSample = bitsPerSample / 8;
  const samplesPerRow = width * samplesPerPixel;
  const raw = bitsPerSample === 16 ? new Uint16Array(samplesPerRow * height) : new Uint8Array(samplesPerRow * height);

  let currentRow = 0;
  for (let stripIdx = 0; stripIdx < stripOffsets.length && currentRow < height; stripIdx++) {
    const stripOffset = stripOffsets[stripIdx] ?? 0;
    const stripRows = Math.min(rowsPerStrip, height - currentRow);
    const expectedBytes = stripRows * samplesPerRow * bytesPerSample;
    const available = Math.min(stripByteCounts[stripIdx] ?? expectedBytes, buffer.byteLength - stripOffset);
    if (available < expectedBytes) {
      throw new DecoderError('TIFF', `Strip ${stripIdx} is truncated: ${available} of ${expectedBytes} bytes`);
    }

    const base = currentRow * samplesPerRow;
    const count = stripRows * samplesPerRow;
    for (let s = 0; s < count; s++) {
      raw[base + s] = bytesPerSample === 2
        ? view.getUint16(stripOffset + s * 2, le)
        : view.getUint8(stripOffset + s);
    }

    currentRow += stripRows;
  }

  if (currentRow < height) {
    throw new DecoderError('TIFF', `Strips cover ${currentRow} of ${height} rows`);
  }

  if (photometric === PHOTOMETRIC_WHITE_IS_ZERO) {
    const max = bitsPerSample === 16 ? 0xffff : 0xff;
    for (let i = 0; i < raw.length; i += samplesPerPixel) {
      raw[i] = max - (raw[i] ?? 0);
    }
  }

  const pixelCount = width * height;
  let data: Uint8Array | Uint16Array = raw;
  let alpha: Uint8Array | Uint16Array | undefined;
  if (hasAlpha) {
    // The first extra sample is the alpha; any further ones are dropped
    data = selectSamples(raw, pixelCount, samplesPerPixel, 0, colorSamples);
    alpha = selectSamples(raw, pixelCount, samplesPerPixel, colorSamples, 1);
  }

  return {
    format: 'tiff',
    width,
    height,
    channels: colorSamples,
    colorModel,
    data,
    palette: colorModel === 'indexed' ? readPalette(parsed, bitsPerSample) : undefined,
    alpha,
  };
}
