/**
 * ImageSequenceSource - numbered image files presented as a video-like source
 *
 * Frame `n` (1-based) is the file whose number is `n - 1` above the number
 * of the file the sequence was opened from. Sequences have no timing of
 * their own and run at a synthetic IMAGE_SEQUENCE_FRAME_RATE.
 */

import { IMAGE_SEQUENCE_FRAME_RATE } from '../config/StreamConfig';
import { FrameRangeError, MediaIOError, UseAfterCloseError, ValidationError } from '../core/errors';
import type { Frame } from '../core/image/Frame';
import { decodedImageToFrame, readImage } from '../formats/ImageReader';
import { Logger } from '../utils/Logger';
import {
  describePattern,
  detectSequencePattern,
  probeSequenceLength,
  sequenceFramePath,
  type ReadableProbe,
} from '../utils/media/SequenceLoader';
import type { FrameSource } from './FrameSource';

const log = new Logger('ImageSequenceSource');

export interface ImageSequenceSourceOptions {
  /** Existence check used while counting frames */
  probe?: ReadableProbe;
}

/** Path of 1-based frame `frame` */
type FrameLocator = (frame: number) => string;

export class ImageSequenceSource implements FrameSource {
  readonly type = 'imseq';
  readonly frameRate = IMAGE_SEQUENCE_FRAME_RATE;
  readonly duration: number;
  readonly width: number;
  readonly height: number;
  readonly bitsPerPixel: number;
  readonly videoFormat: string;

  currentTime = 0;

  private closed = false;

  private constructor(
    readonly name: string,
    readonly frameCount: number,
    private readonly locate: FrameLocator,
    first: Frame
  ) {
    this.duration = frameCount / this.frameRate;
    this.width = first.width;
    this.height = first.height;
    this.bitsPerPixel = first.bitsPerPixel;
    this.videoFormat = first.videoFormat;
  }

  /**
   * Open the sequence that starts at `path`, counting the consecutive
   * frames that follow it on disk.
   *
   * @throws SequenceDetectionError when the file name carries no number
   * @throws MediaIOError when the first frame cannot be read
   */
  static async open(path: string, options: ImageSequenceSourceOptions = {}): Promise<ImageSequenceSource> {
    const pattern = detectSequencePattern(path);
    const frameCount = await probeSequenceLength(pattern, options.probe);
    log.info(`Opening sequence ${describePattern(pattern)} (${frameCount} frames)`);
    return ImageSequenceSource.create(path, frameCount, frame => sequenceFramePath(pattern, frame));
  }

  /**
   * Open an explicit list of files; frame `n` is `paths[n - 1]`.
   */
  static async fromFiles(paths: readonly string[]): Promise<ImageSequenceSource> {
    const list = [...paths];
    log.info(`Opening file list of ${list.length} frames`);
    return ImageSequenceSource.create(list[0] ?? '', list.length, frame => list[frame - 1] ?? '');
  }

  private static async create(name: string, frameCount: number, locate: FrameLocator): Promise<ImageSequenceSource> {
    if (frameCount < 1) {
      throw new MediaIOError(`No readable frames found for sequence "${name}"`);
    }
    const first = decodedImageToFrame(await readImage(locate(1)));
    return new ImageSequenceSource(name, frameCount, locate, first);
  }

  /**
   * Decode frame `frame`. `Infinity` reads the last frame. The cursor is
   * left just after the requested frame, even when the read fails.
   */
  async read(frame: number): Promise<Frame> {
    if (this.closed) {
      throw new UseAfterCloseError(this.name);
    }
    const n = frame === Infinity ? this.frameCount : frame;
    this.currentTime = n / this.frameRate;
    if (!Number.isInteger(n)) {
      throw new ValidationError(`Frame index must be an integer, got ${frame}`);
    }
    if (n < 1 || n > this.frameCount) {
      throw new FrameRangeError(n, this.frameCount);
    }

    const path = this.locate(n);
    const image = await readImage(path);
    return decodedImageToFrame(image, {
      frameNumber: n,
      sourcePath: path,
      timestamp: (n - 1) / this.frameRate,
    });
  }

  readNextFrame(): Promise<Frame> {
    return this.read(Math.round(this.currentTime * this.frameRate) + 1);
  }

  hasFrameRemaining(): boolean {
    return this.currentTime < this.duration;
  }

  /** Sequences hold no open handles between reads. */
  async close(): Promise<void> {
    this.closed = true;
  }
}
