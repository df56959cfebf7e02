export type DataType = 'uint8' | 'uint16' | 'float32';

export type PixelArray = Uint8Array | Uint16Array | Float32Array;

export interface FrameMetadata {
  /** 1-based index of the frame within its stream */
  frameNumber?: number;
  sourcePath?: string;
  /** Presentation time in seconds */
  timestamp?: number;
  /**
   * Decoder pixel layout for video frames (e.g. 'I420', 'RGBA').
   * Absent for interleaved image frames.
   */
  pixelFormat?: string;
  attributes?: Record<string, unknown>;
}

export interface FrameOptions {
  width: number;
  height: number;
  channels: number;
  dataType: DataType;
  data?: ArrayBuffer;
  metadata?: FrameMetadata;
}

const VIDEO_FORMAT_PREFIX: Record<number, string> = {
  1: 'Gray',
  2: '',
  3: 'RGB',
  4: 'CMYK',
};

/** Bits per pixel of the decoder layouts a video frame can carry */
const PIXEL_FORMAT_BITS: Record<string, number> = {
  I420: 12,
  I420A: 20,
  I422: 16,
  I422A: 24,
  I444: 24,
  I444A: 32,
  NV12: 12,
  RGBA: 32,
  RGBX: 32,
  BGRA: 32,
  BGRX: 32,
};

/** Bits per pixel of a decoder pixel layout, when the layout is known */
export function pixelFormatBits(pixelFormat: string): number | undefined {
  return PIXEL_FORMAT_BITS[pixelFormat];
}

function toArrayBuffer(pixels: PixelArray): ArrayBuffer {
  const { buffer } = pixels;
  if (buffer instanceof ArrayBuffer && pixels.byteOffset === 0 && pixels.byteLength === buffer.byteLength) {
    return buffer;
  }
  const copy = new ArrayBuffer(pixels.byteLength);
  new Uint8Array(copy).set(new Uint8Array(buffer, pixels.byteOffset, pixels.byteLength));
  return copy;
}

/**
 * Pixel buffer produced by a stream backend. Image frames are interleaved
 * row-major (`channels` values per pixel); video frames keep the decoder's
 * own layout, named by `metadata.pixelFormat`.
 */
export class Frame {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly dataType: DataType;
  readonly data: ArrayBuffer;
  readonly metadata: FrameMetadata;

  // Cached TypedArray view over this.data to avoid re-creating on every getTypedArray() call
  private cachedTypedArray: PixelArray | null = null;

  constructor(options: FrameOptions) {
    this.width = options.width;
    this.height = options.height;
    this.channels = options.channels;
    this.dataType = options.dataType;
    this.metadata = options.metadata ?? {};

    if (options.data) {
      this.data = options.data;
    } else {
      const bytesPerPixel = this.getBytesPerComponent() * this.channels;
      this.data = new ArrayBuffer(this.width * this.height * bytesPerPixel);
    }
  }

  getBytesPerComponent(): number {
    switch (this.dataType) {
      case 'uint8':
        return 1;
      case 'uint16':
        return 2;
      case 'float32':
        return 4;
    }
  }

  /** Bits per pixel across all channels (8 for Gray8, 24 for RGB24, 12 for I420, ...) */
  get bitsPerPixel(): number {
    const layoutBits = this.metadata.pixelFormat ? pixelFormatBits(this.metadata.pixelFormat) : undefined;
    return layoutBits ?? this.getBytesPerComponent() * 8 * this.channels;
  }

  /** Short format name such as `Gray8`, `RGB24` or `CMYK32`. */
  get videoFormat(): string {
    if (this.metadata.pixelFormat) {
      return this.metadata.pixelFormat;
    }
    const prefix = VIDEO_FORMAT_PREFIX[this.channels] ?? `${this.channels}ch`;
    return `${prefix}${this.bitsPerPixel}`;
  }

  isEmpty(): boolean {
    return this.width === 0 || this.height === 0 || this.data.byteLength === 0;
  }

  getTypedArray(): PixelArray {
    if (this.cachedTypedArray !== null) {
      return this.cachedTypedArray;
    }

    switch (this.dataType) {
      case 'uint8':
        this.cachedTypedArray = new Uint8Array(this.data);
        break;
      case 'uint16':
        this.cachedTypedArray = new Uint16Array(this.data);
        break;
      case 'float32':
        this.cachedTypedArray = new Float32Array(this.data);
        break;
    }

    return this.cachedTypedArray;
  }

  getPixel(x: number, y: number): number[] {
    const arr = this.getTypedArray();
    const idx = (y * this.width + x) * this.channels;
    const pixel = new Array<number>(this.channels);
    for (let c = 0; c < this.channels; c++) {
      pixel[c] = arr[idx + c] ?? 0;
    }
    return pixel;
  }

  /**
   * Wrap an interleaved typed array. The array's bytes are copied only when
   * it is a view onto part of a larger buffer.
   */
  static fromPixels(
    pixels: PixelArray,
    width: number,
    height: number,
    channels: number,
    metadata?: FrameMetadata
  ): Frame {
    const dataType: DataType =
      pixels instanceof Float32Array ? 'float32' : pixels instanceof Uint16Array ? 'uint16' : 'uint8';
    return new Frame({ width, height, channels, dataType, data: toArrayBuffer(pixels), metadata });
  }

  static createEmpty(metadata?: FrameMetadata): Frame {
    return new Frame({ width: 0, height: 0, channels: 0, dataType: 'uint8', metadata });
  }
}
