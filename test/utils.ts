/**
 * Test utilities and helpers: tiny image encoders and temporary directories
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { deflateSync } from 'node:zlib';
import jpeg from 'jpeg-js';
import omggif from 'omggif';
import { PNG } from 'pngjs';

/**
 * Copy bytes into a standalone ArrayBuffer (decoders take ArrayBuffers)
 */
export function toArrayBuffer(bytes: ArrayLike<number>): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(Array.from(bytes));
  return buffer;
}

function asciiBytes(text: string): number[] {
  return Array.from(text, ch => ch.charCodeAt(0));
}

/**
 * Binary (P5/P6) Netpbm encoder. 16-bit samples are written big-endian.
 */
function encodeRawPNM(magic: 'P5' | 'P6', width: number, height: number, samples: ArrayLike<number>, maxval: number): Uint8Array {
  const header = asciiBytes(`${magic}\n${width} ${height}\n${maxval}\n`);
  const bytesPerSample = maxval > 255 ? 2 : 1;
  const out = new Uint8Array(header.length + samples.length * bytesPerSample);
  out.set(header);
  const view = new DataView(out.buffer, header.length);
  for (let i = 0; i < samples.length; i++) {
    const value = samples[i] ?? 0;
    if (bytesPerSample === 2) {
      view.setUint16(i * 2, value, false);
    } else {
      view.setUint8(i, value);
    }
  }
  return out;
}

export function encodePGM(width: number, height: number, gray: ArrayLike<number>, maxval = 255): Uint8Array {
  return encodeRawPNM('P5', width, height, gray, maxval);
}

export function encodePPM(width: number, height: number, rgb: ArrayLike<number>, maxval = 255): Uint8Array {
  return encodeRawPNM('P6', width, height, rgb, maxval);
}

/**
 * PNG encoder via pngjs. `rgba` holds 4 values per pixel whatever the
 * output colour type.
 */
export function encodePNG(width: number, height: number, rgba: ArrayLike<number>, colorType: 0 | 2 | 4 | 6 = 6): Buffer {
  const png = new PNG({ width, height });
  png.data.set(Array.from(rgba));
  return PNG.sync.write(png, { colorType });
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  return c >>> 0;
});

function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function pngChunk(type: string, payload: Uint8Array): Buffer {
  const body = Buffer.concat([Buffer.from(type, 'ascii'), payload]);
  const chunk = Buffer.alloc(body.length + 8);
  chunk.writeUInt32BE(payload.length, 0);
  body.copy(chunk, 4);
  chunk.writeUInt32BE(crc32(body), body.length + 4);
  return chunk;
}

const PNG16_CHANNELS: Record<0 | 2 | 4 | 6, number> = { 0: 1, 2: 3, 4: 2, 6: 4 };

/**
 * 16-bit PNG writer (pngjs takes 16-bit input only in host byte order).
 * `samples` holds the stored channels of `colorType`, row-major.
 */
export function encodePNG16(width: number, height: number, samples: ArrayLike<number>, colorType: 0 | 2 | 4 | 6): Buffer {
  const rowBytes = width * PNG16_CHANNELS[colorType] * 2;
  const raw = Buffer.alloc((rowBytes + 1) * height);
  for (let y = 0; y < height; y++) {
    for (let i = 0; i < rowBytes / 2; i++) {
      raw.writeUInt16BE(samples[y * (rowBytes / 2) + i] ?? 0, y * (rowBytes + 1) + 1 + i * 2);
    }
  }

  const header = Buffer.alloc(13);
  header.writeUInt32BE(width, 0);
  header.writeUInt32BE(height, 4);
  header.set([16, colorType, 0, 0, 0], 8);

  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    pngChunk('IHDR', header),
    pngChunk('IDAT', deflateSync(raw)),
    pngChunk('IEND', new Uint8Array(0)),
  ]);
}

/** Solid-colour baseline JPEG via jpeg-js. */
export function encodeSolidJPEG(width: number, height: number, rgb: [number, number, number]): Buffer {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data[i * 4] = rgb[0];
    data[i * 4 + 1] = rgb[1];
    data[i * 4 + 2] = rgb[2];
    data[i * 4 + 3] = 255;
  }
  return jpeg.encode({ data, width, height }, 100).data;
}

/**
 * Single-frame GIF. `palette` holds 0xRRGGBB entries (length a power of two).
 */
export function encodeGIF(
  width: number,
  height: number,
  indices: number[],
  palette: number[],
  transparent?: number
): Uint8Array {
  const out = Buffer.alloc(1024 + width * height * 2);
  const writer = new omggif.GifWriter(out, width, height, { palette });
  writer.addFrame(0, 0, width, height, indices, transparent === undefined ? {} : { transparent });
  return out.subarray(0, writer.end());
}

interface TIFFEntry {
  tag: number;
  type: 3 | 4; // SHORT | LONG
  values: number[];
}

export interface TIFFOptions {
  width: number;
  height: number;
  photometric: number;
  samples: ArrayLike<number>;
  bitsPerSample?: 8 | 16;
  samplesPerPixel?: number;
  colorMap?: number[];
  extraSamples?: number[];
}

/**
 * Little-endian, uncompressed, single-strip TIFF writer.
 * Layout: header, pixel strip, IFD, out-of-line tag values.
 */
export function encodeTIFF(options: TIFFOptions): ArrayBuffer {
  const { width, height, photometric, samples } = options;
  const bitsPerSample = options.bitsPerSample ?? 8;
  const samplesPerPixel = options.samplesPerPixel ?? 1;
  const bytesPerSample = bitsPerSample / 8;
  const stripBytes = samples.length * bytesPerSample;

  const entries: TIFFEntry[] = [
    { tag: 256, type: 4, values: [width] },
    { tag: 257, type: 4, values: [height] },
    { tag: 258, type: 3, values: new Array<number>(samplesPerPixel).fill(bitsPerSample) },
    { tag: 259, type: 3, values: [1] },
    { tag: 262, type: 3, values: [photometric] },
    { tag: 273, type: 4, values: [8] },
    { tag: 277, type: 3, values: [samplesPerPixel] },
    { tag: 278, type: 4, values: [height] },
    { tag: 279, type: 4, values: [stripBytes] },
  ];
  if (options.colorMap) entries.push({ tag: 320, type: 3, values: options.colorMap });
  if (options.extraSamples) entries.push({ tag: 338, type: 3, values: options.extraSamples });
  entries.sort((a, b) => a.tag - b.tag);

  const valueSize = (entry: TIFFEntry): number => entry.values.length * (entry.type === 3 ? 2 : 4);
  const ifdOffset = 8 + stripBytes + (stripBytes % 2);
  const ifdSize = 2 + entries.length * 12 + 4;
  const overflowSize = entries.reduce((sum, e) => sum + (valueSize(e) > 4 ? valueSize(e) : 0), 0);

  const buffer = new ArrayBuffer(ifdOffset + ifdSize + overflowSize);
  const view = new DataView(buffer);
  view.setUint16(0, 0x4949, false);
  view.setUint16(2, 42, true);
  view.setUint32(4, ifdOffset, true);

  for (let i = 0; i < samples.length; i++) {
    const value = samples[i] ?? 0;
    if (bytesPerSample === 2) {
      view.setUint16(8 + i * 2, value, true);
    } else {
      view.setUint8(8 + i, value);
    }
  }

  const writeValues = (entry: TIFFEntry, offset: number): void => {
    entry.values.forEach((value, i) => {
      if (entry.type === 3) view.setUint16(offset + i * 2, value, true);
      else view.setUint32(offset + i * 4, value, true);
    });
  };

  view.setUint16(ifdOffset, entries.length, true);
  let overflow = ifdOffset + ifdSize;
  entries.forEach((entry, i) => {
    const pos = ifdOffset + 2 + i * 12;
    view.setUint16(pos, entry.tag, true);
    view.setUint16(pos + 2, entry.type, true);
    view.setUint32(pos + 4, entry.values.length, true);
    if (valueSize(entry) <= 4) {
      writeValues(entry, pos + 8);
    } else {
      view.setUint32(pos + 8, overflow, true);
      writeValues(entry, overflow);
      overflow += valueSize(entry);
    }
  });
  view.setUint32(ifdOffset + 2 + entries.length * 12, 0, true);

  return buffer;
}

export interface BMPOptions {
  width: number;
  height: number;
  bitsPerPixel: 8 | 24 | 32;
  /** Palette indices (8-bit) or RGB / RGBA values, top row first */
  pixels: ArrayLike<number>;
  /** RGB triplets for 8-bit images */
  palette?: number[];
  topDown?: boolean;
}

/**
 * BITMAPINFOHEADER writer (uncompressed). Rows are stored bottom-up unless
 * `topDown` is set.
 */
export function encodeBMP(options: BMPOptions): ArrayBuffer {
  const { width, height, bitsPerPixel, pixels } = options;
  const palette = options.palette ?? [];
  const paletteEntries = bitsPerPixel === 8 ? palette.length / 3 : 0;
  const rowStride = Math.ceil((width * bitsPerPixel) / 32) * 4;
  const dataOffset = 14 + 40 + paletteEntries * 4;
  const buffer = new ArrayBuffer(dataOffset + rowStride * height);
  const view = new DataView(buffer);

  view.setUint16(0, 0x424d, false);
  view.setUint32(2, buffer.byteLength, true);
  view.setUint32(10, dataOffset, true);
  view.setUint32(14, 40, true);
  view.setInt32(18, width, true);
  view.setInt32(22, options.topDown ? -height : height, true);
  view.setUint16(26, 1, true);
  view.setUint16(28, bitsPerPixel, true);
  view.setUint32(30, 0, true);
  view.setUint32(46, paletteEntries, true);

  for (let i = 0; i < paletteEntries; i++) {
    const pos = 54 + i * 4;
    view.setUint8(pos, palette[i * 3 + 2] ?? 0);
    view.setUint8(pos + 1, palette[i * 3 + 1] ?? 0);
    view.setUint8(pos + 2, palette[i * 3] ?? 0);
  }

  const channels = bitsPerPixel / 8;
  for (let y = 0; y < height; y++) {
    const row = dataOffset + (options.topDown ? y : height - 1 - y) * rowStride;
    for (let x = 0; x < width; x++) {
      const src = (y * width + x) * channels;
      const dst = row + x * channels;
      if (channels === 1) {
        view.setUint8(dst, pixels[src] ?? 0);
        continue;
      }
      view.setUint8(dst, pixels[src + 2] ?? 0);
      view.setUint8(dst + 1, pixels[src + 1] ?? 0);
      view.setUint8(dst + 2, pixels[src] ?? 0);
      if (channels === 4) view.setUint8(dst + 3, pixels[src + 3] ?? 0);
    }
  }

  return buffer;
}

/**
 * Create a fresh temporary directory for a test
 */
export function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'framestream-'));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

/**
 * Write an 8-bit gray PGM per name; file `i` (0-based) is filled with
 * the value `i + 1` so frames can be told apart.
 */
export async function writeGrayFrames(dir: string, names: string[], width = 4, height = 3): Promise<void> {
  for (const [i, name] of names.entries()) {
    const pixels = new Uint8Array(width * height).fill(i + 1);
    await writeFile(join(dir, name), encodePGM(width, height, pixels));
  }
}

/**
 * Write an RGBA PNG per name; file `i` (0-based) has red value `i + 1`.
 */
export async function writePNGFrames(dir: string, names: string[], width = 4, height = 3): Promise<void> {
  for (const [i, name] of names.entries()) {
    const rgba = new Uint8Array(width * height * 4);
    for (let p = 0; p < width * height; p++) {
      rgba.set([i + 1, 0, 0, 255], p * 4);
    }
    await writeFile(join(dir, name), encodePNG(width, height, rgba));
  }
}
