/**
 * VideoFileSource - video container decoding via mediabunny
 *
 * The frame rate is estimated from packet timing, and the frame count is
 * derived as `round(duration * frameRate)`. Repositioning is time-based
 * and therefore approximate for streams with irregular timestamps.
 *
 * Decoding goes through WebCodecs. Node.js 20 ships no WebCodecs, so under
 * plain Node `track.canDecode()` is always false and `open` fails with
 * MediaIOError for every file. Pass `MediaStreamOptions.openVideo` to supply
 * a decoder there; this class works as is in runtimes that provide
 * `VideoDecoder` (browsers, Deno, or Node with a WebCodecs polyfill).
 */

import type { Input, VideoSample, VideoSampleSink } from 'mediabunny';
import { FALLBACK_VIDEO_FRAME_RATE, VIDEO_PACKET_STATS_SAMPLE } from '../config/StreamConfig';
import { EndOfStreamError, MediaIOError, UseAfterCloseError } from '../core/errors';
import { Frame, pixelFormatBits } from '../core/image/Frame';
import { Logger } from '../utils/Logger';
import type { FrameSource } from './FrameSource';

const log = new Logger('VideoFileSource');

/** Packed layouts with four interleaved 8-bit channels; everything else is planar */
const PACKED_FORMATS = new Set(['RGBA', 'RGBX', 'BGRA', 'BGRX']);

interface VideoTrackInfo {
  width: number;
  height: number;
  frameRate: number;
  duration: number;
  startTime: number;
  pixelFormat: string;
}

export class VideoFileSource implements FrameSource {
  readonly type = 'video';
  readonly width: number;
  readonly height: number;
  readonly frameRate: number;
  readonly duration: number;
  readonly frameCount: number;
  readonly bitsPerPixel: number;
  readonly videoFormat: string;

  private readonly startTime: number;
  private cursor = 0;
  private restartPending = true;
  private samples: AsyncGenerator<VideoSample, void, unknown> | null = null;
  private input: Input | null;

  private constructor(
    readonly name: string,
    input: Input,
    private readonly sink: VideoSampleSink,
    info: VideoTrackInfo
  ) {
    this.input = input;
    this.width = info.width;
    this.height = info.height;
    this.frameRate = info.frameRate;
    this.duration = info.duration;
    this.startTime = info.startTime;
    this.frameCount = Math.round(info.duration * info.frameRate);
    this.videoFormat = info.pixelFormat;
    this.bitsPerPixel = pixelFormatBits(info.pixelFormat) ?? 0;
  }

  /**
   * Open a video file and inspect its primary video track. The first frame
   * is decoded once to learn the decoder's pixel layout.
   *
   * @throws MediaIOError when the container, track or codec is unusable
   */
  static async open(path: string): Promise<VideoFileSource> {
    const mediabunny = await import('mediabunny');

    let input: Input | null = null;
    try {
      input = new mediabunny.Input({
        source: new mediabunny.FilePathSource(path),
        formats: mediabunny.ALL_FORMATS,
      });

      const track = await input.getPrimaryVideoTrack();
      if (!track) {
        throw new MediaIOError(`No video track found in "${path}"`);
      }
      if (!(await track.canDecode())) {
        throw new MediaIOError(`Cannot decode video codec ${track.codec ?? 'unknown'} in "${path}"`);
      }

      const startTime = await track.getFirstTimestamp();
      const endTime = await track.computeDuration();
      const stats = await track.computePacketStats(VIDEO_PACKET_STATS_SAMPLE);
      const frameRate =
        Number.isFinite(stats.averagePacketRate) && stats.averagePacketRate > 0
          ? stats.averagePacketRate
          : FALLBACK_VIDEO_FRAME_RATE;

      const sink = new mediabunny.VideoSampleSink(track);
      const first = await sink.getSample(startTime);
      if (!first) {
        throw new MediaIOError(`No decodable frames in "${path}"`);
      }
      const pixelFormat = first.format ?? 'unknown';
      first.close();

      log.info(`Opened ${path}: ${track.displayWidth}x${track.displayHeight} @ ${frameRate.toFixed(3)} fps, ${pixelFormat}`);

      return new VideoFileSource(path, input, sink, {
        width: track.displayWidth,
        height: track.displayHeight,
        frameRate,
        duration: Math.max(0, endTime - startTime),
        startTime,
        pixelFormat,
      });
    } catch (err) {
      input?.dispose();
      if (err instanceof MediaIOError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new MediaIOError(`Cannot open video file "${path}": ${reason}`, { cause: err });
    }
  }

  get currentTime(): number {
    return this.cursor;
  }

  /** Reposition; the next read restarts decoding at this time. */
  set currentTime(seconds: number) {
    this.cursor = seconds;
    this.restartPending = true;
  }

  async readNextFrame(): Promise<Frame> {
    if (!this.input) {
      throw new UseAfterCloseError(this.name);
    }

    if (this.restartPending || !this.samples) {
      await this.samples?.return(undefined);
      this.samples = this.sink.samples(this.startTime + this.cursor);
      this.restartPending = false;
    }

    const next = await this.samples.next();
    if (next.done) {
      throw new EndOfStreamError(this.frameCount);
    }

    const sample = next.value;
    try {
      const data = new ArrayBuffer(sample.allocationSize());
      await sample.copyTo(data);
      const pixelFormat = sample.format ?? this.videoFormat;
      const timestamp = sample.timestamp - this.startTime;
      this.cursor = timestamp + sample.duration;

      return new Frame({
        width: sample.codedWidth,
        height: sample.codedHeight,
        channels: PACKED_FORMATS.has(pixelFormat) ? 4 : 1,
        dataType: 'uint8',
        data,
        metadata: {
          frameNumber: Math.round(timestamp * this.frameRate) + 1,
          sourcePath: this.name,
          timestamp,
          pixelFormat,
        },
      });
    } finally {
      sample.close();
    }
  }

  hasFrameRemaining(): boolean {
    return this.cursor < this.duration;
  }

  async close(): Promise<void> {
    const input = this.input;
    if (!input) return;
    this.input = null;

    await this.samples?.return(undefined);
    this.samples = null;
    input.dispose();
  }
}
