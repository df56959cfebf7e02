/**
 * MediaStream - one frame-indexed interface over video files and image
 * sequences.
 *
 * Frames are numbered from 1. Every read goes through a bounded LRU cache;
 * on a miss the backend is repositioned only when the requested frame does
 * not directly follow the last one decoded, so forward playback decodes
 * sequentially. Reads are serialised through a promise queue because the
 * backend owns a single decode cursor.
 */

import { extname } from 'node:path';
import { DEFAULT_CACHE_CAPACITY } from '../config/StreamConfig';
import {
  EndOfStreamError,
  FrameRangeError,
  UnsupportedFormatError,
  UseAfterCloseError,
  ValidationError,
} from '../core/errors';
import type { Frame } from '../core/image/Frame';
import { getSourceMetadata, type FrameSource, type SourceMetadata } from '../sources/FrameSource';
import { ImageSequenceSource } from '../sources/ImageSequenceSource';
import { VideoFileSource } from '../sources/VideoFileSource';
import { LRUCache } from '../utils/LRUCache';
import { Logger } from '../utils/Logger';
import {
  detectMediaTypeFromName,
  getFileFormats,
  type FileFormatInfo,
} from '../utils/media/SupportedMediaFormats';

const log = new Logger('MediaStream');

export type SourceFactory = (path: string) => Promise<FrameSource>;

export interface MediaStreamOptions {
  /** Frames kept in memory (default DEFAULT_CACHE_CAPACITY) */
  cacheCapacity?: number;
  /** Opens video files; defaults to the mediabunny backend */
  openVideo?: SourceFactory;
  /** Opens the sequence starting at an image file */
  openSequence?: SourceFactory;
}

export class MediaStream {
  private readonly cache: LRUCache<Frame>;
  private currentFrame = 0;
  /** NaN once the backend cursor position is unknown (after a failed decode) */
  private lastDecodedFrame = 0;
  private readQueue: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    private readonly source: FrameSource,
    cacheCapacity: number
  ) {
    this.cache = new LRUCache<Frame>(
      frame => this.decodeFrame(frame),
      cacheCapacity,
      frame => log.debug(`Evicted frame ${frame}`)
    );
  }

  /**
   * Open a video file, the image sequence starting at an image file, or an
   * explicit list of image files.
   *
   * @throws UnsupportedFormatError for a file name outside the known video and image extensions
   */
  static async open(name: string | readonly string[], options: MediaStreamOptions = {}): Promise<MediaStream> {
    const capacity = options.cacheCapacity ?? DEFAULT_CACHE_CAPACITY;

    if (typeof name !== 'string') {
      return new MediaStream(await ImageSequenceSource.fromFiles(name), capacity);
    }

    let source: FrameSource;
    switch (detectMediaTypeFromName(name)) {
      case 'video':
        source = await (options.openVideo ?? VideoFileSource.open)(name);
        break;
      case 'image':
        source = await (options.openSequence ?? ((path: string) => ImageSequenceSource.open(path)))(name);
        break;
      default:
        throw new UnsupportedFormatError(extname(name));
    }

    log.info(`Opened ${source.type} "${name}": ${source.frameCount} frames at ${source.frameRate} fps`);
    return new MediaStream(source, capacity);
  }

  /** Streams run anywhere Node.js does. */
  static isPlatformSupported(): boolean {
    return true;
  }

  static getFileFormats(): FileFormatInfo[] {
    return getFileFormats();
  }

  get name(): string {
    return this.source.name;
  }

  get metadata(): SourceMetadata {
    return getSourceMetadata(this.source);
  }

  /** Index of the frame most recently read, 0 before the first read */
  get currentFrameIndex(): number {
    return this.currentFrame;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  numFrames(): number {
    return this.source.frameCount;
  }

  size(): [number, number] {
    return [this.numFrames(), 1];
  }

  /**
   * Read frame `frame` (1-based); `Infinity` reads the last frame.
   */
  read(frame: number): Promise<Frame> {
    return this.runExclusive(() => this.readUnlocked(frame));
  }

  hasFrame(): boolean {
    return this.currentFrame < this.numFrames();
  }

  /** Read the frame after the current one. */
  readFrame(): Promise<Frame> {
    return this.runExclusive(async () => {
      this.assertOpen();
      if (!this.hasFrame()) {
        throw new EndOfStreamError(this.numFrames());
      }
      return this.readUnlocked(this.currentFrame + 1);
    });
  }

  /**
   * Move to `frame`, resolving `true` when the frame there holds pixels.
   */
  async seek(frame: number): Promise<boolean> {
    const result = await this.read(frame);
    return !result.isEmpty();
  }

  async step(delta: number): Promise<boolean> {
    const result = await this.readRelative(delta);
    return !result.isEmpty();
  }

  next(): Promise<boolean> {
    return this.step(1);
  }

  getFrame(): Promise<Frame> {
    return this.readRelative(0);
  }

  /** Advance one frame and return it. */
  getNext(): Promise<Frame> {
    return this.runExclusive(async () => {
      await this.readUnlocked(this.currentFrame + 1);
      return this.readUnlocked(this.currentFrame);
    });
  }

  /**
   * Read frames `first` through `last` in order.
   */
  async *frames(first = 1, last = this.numFrames()): AsyncGenerator<Frame, void, undefined> {
    for (let n = first; n <= last; n++) {
      yield await this.read(n);
    }
  }

  /**
   * Release the backend. Reads already queued complete first; later reads
   * fail with UseAfterCloseError.
   */
  close(): Promise<void> {
    return this.runExclusive(async () => {
      if (this.closed) return;
      this.closed = true;
      this.cache.clear();
      await this.source.close();
      log.info(`Closed "${this.source.name}"`);
    });
  }

  /** Read relative to the current frame, resolving the target inside the queue. */
  private readRelative(offset: number): Promise<Frame> {
    return this.runExclusive(() => this.readUnlocked(this.currentFrame + offset));
  }

  /** Body of read(); callers must hold the read queue. */
  private async readUnlocked(frame: number): Promise<Frame> {
    this.assertOpen();
    const n = frame === Infinity ? this.numFrames() : frame;
    if (!Number.isInteger(n)) {
      throw new ValidationError(`Frame index must be an integer, got ${frame}`);
    }
    if (n < 1 || n > this.numFrames()) {
      throw new FrameRangeError(n, this.numFrames());
    }

    if (this.cache.has(n)) {
      log.debug(`Cache hit for frame ${n}`);
    }
    const result = await this.cache.get(n);
    this.currentFrame = n;
    return result;
  }

  /** Low-level read of frame `n` from the backend (cache miss path). */
  private async decodeFrame(n: number): Promise<Frame> {
    if (n !== this.lastDecodedFrame + 1) {
      const time = (n - 1) / this.source.frameRate;
      log.debug(`Seeking to frame ${n} (${time.toFixed(3)}s)`);
      this.source.currentTime = time;
    } else {
      log.debug(`Decoding frame ${n} sequentially`);
    }

    try {
      const frame = await this.source.readNextFrame();
      this.lastDecodedFrame = n;
      return frame;
    } catch (err) {
      this.lastDecodedFrame = Number.NaN;
      throw err;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new UseAfterCloseError(this.source.name);
    }
  }

  private async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const ourTurn = new Promise<void>(resolve => {
      release = resolve;
    });

    const previousQueue = this.readQueue;
    this.readQueue = ourTurn;

    try {
      await previousQueue;
      return await task();
    } finally {
      release();
    }
  }
}
