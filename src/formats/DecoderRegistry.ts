/**
 * Decoder Registry
 *
 * Central registry for single-file image decoders.
 * Provides format detection by magic number (with a file-extension
 * fallback) and decoder dispatch.
 */

import { decodeBMP, isBMPFile } from './BMPDecoder';
import { decodeGIF, isGIFFile } from './GIFDecoder';
import { decodeJPEG, isJPEGFile } from './JPEGDecoder';
import { decodePNG, isPNGFile } from './PNGDecoder';
import { decodePNM, isPNMFile } from './PNMDecoder';
import { decodeTIFF, isTIFFFile } from './TIFFDecoder';
import type { DecodedImage, ImageFormatName } from './shared';

export type FormatName = ImageFormatName | null;

export interface FormatDecoder {
  formatName: ImageFormatName;
  /** Lowercase extensions (without the dot) conventionally used for the format */
  extensions: readonly string[];
  canDecode(buffer: ArrayBuffer): boolean;
  decode(buffer: ArrayBuffer): DecodedImage;
}

const pngDecoder: FormatDecoder = {
  formatName: 'png',
  extensions: ['png'],
  canDecode: isPNGFile,
  decode: decodePNG,
};

const jpegDecoder: FormatDecoder = {
  formatName: 'jpeg',
  extensions: ['jpg', 'jpeg'],
  canDecode: isJPEGFile,
  decode: decodeJPEG,
};

const gifDecoder: FormatDecoder = {
  formatName: 'gif',
  extensions: ['gif'],
  canDecode: isGIFFile,
  decode: decodeGIF,
};

const tiffDecoder: FormatDecoder = {
  formatName: 'tiff',
  extensions: ['tif', 'tiff'],
  canDecode: isTIFFFile,
  decode: decodeTIFF,
};

const bmpDecoder: FormatDecoder = {
  formatName: 'bmp',
  extensions: ['bmp'],
  canDecode: isBMPFile,
  decode: decodeBMP,
};

const pnmDecoder: FormatDecoder = {
  formatName: 'pnm',
  extensions: ['pbm', 'pgm', 'ppm', 'pnm'],
  canDecode: isPNMFile,
  decode: decodePNM,
};

/**
 * Registry for image format decoders.
 * Detects format by magic number and dispatches to the appropriate decoder.
 */
export class DecoderRegistry {
  private decoders: FormatDecoder[] = [];

  constructor() {
    // Detection order: formats with long, unambiguous signatures first.
    // PNM's two-byte "Pn" magic is checked last.
    this.decoders.push(pngDecoder);
    this.decoders.push(gifDecoder);
    this.decoders.push(tiffDecoder);
    this.decoders.push(jpegDecoder);
    this.decoders.push(bmpDecoder);
    this.decoders.push(pnmDecoder);
  }

  /**
   * Detect the format of a buffer by checking magic numbers
   */
  detectFormat(buffer: ArrayBuffer): FormatName {
    return this.getDecoder(buffer)?.formatName ?? null;
  }

  /**
   * Get the appropriate decoder for a buffer
   */
  getDecoder(buffer: ArrayBuffer): FormatDecoder | null {
    for (const decoder of this.decoders) {
      if (decoder.canDecode(buffer)) {
        return decoder;
      }
    }
    return null;
  }

  /**
   * Get the decoder conventionally associated with a file extension
   * (case-insensitive, with or without the leading dot).
   */
  getDecoderForExtension(extension: string): FormatDecoder | null {
    const ext = extension.replace(/^\./, '').toLowerCase();
    return this.decoders.find(d => d.extensions.includes(ext)) ?? null;
  }

  /**
   * Detect the format and decode in one step. When no signature matches,
   * the decoder registered for `extension` is tried.
   *
   * @returns The decoded image, or null if no decoder matched
   */
  detectAndDecode(buffer: ArrayBuffer, extension?: string): DecodedImage | null {
    const decoder =
      this.getDecoder(buffer) ?? (extension !== undefined ? this.getDecoderForExtension(extension) : null);
    if (!decoder) {
      return null;
    }
    return decoder.decode(buffer);
  }

  /**
   * Register a new format decoder
   * New decoders are added to the end of the detection chain
   */
  registerDecoder(decoder: FormatDecoder): void {
    // Avoid duplicates
    const existing = this.decoders.findIndex(d => d.formatName === decoder.formatName);
    if (existing >= 0) {
      this.decoders[existing] = decoder;
    } else {
      this.decoders.push(decoder);
    }
  }
}

/** Pre-populated singleton registry with all built-in format decoders */
export const decoderRegistry = new DecoderRegistry();
