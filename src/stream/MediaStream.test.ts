/**
 * MediaStream Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { MediaStream } from './MediaStream';
import {
  EndOfStreamError,
  FrameRangeError,
  UnsupportedFormatError,
  UseAfterCloseError,
  ValidationError,
} from '../core/errors';
import type { Frame } from '../core/image/Frame';
import { LogLevel, Logger } from '../utils/Logger';
import { getFileFormats } from '../utils/media/SupportedMediaFormats';
import { FakeVideoSource, type FakeVideoSourceOptions } from '../../test/mocks';
import { createTempDir, removeTempDir, writeGrayFrames, writePNGFrames } from '../../test/utils';

async function openFake(
  sourceOptions: FakeVideoSourceOptions = {},
  cacheCapacity?: number
): Promise<{ stream: MediaStream; source: FakeVideoSource }> {
  const source = new FakeVideoSource(sourceOptions);
  const stream = await MediaStream.open(source.name, { cacheCapacity, openVideo: async () => source });
  return { stream, source };
}

function valueOf(frame: Frame): number {
  return frame.getPixel(0, 0)[0] ?? -1;
}

describe('MediaStream', () => {
  describe('open', () => {
    it('MS-001: sends video names to the video factory', async () => {
      const source = new FakeVideoSource({ name: 'CLIP.MP4' });
      const openVideo = vi.fn(async () => source);
      const openSequence = vi.fn(async () => new FakeVideoSource());

      const stream = await MediaStream.open('CLIP.MP4', { openVideo, openSequence });

      expect(openVideo).toHaveBeenCalledWith('CLIP.MP4');
      expect(openSequence).not.toHaveBeenCalled();
      expect(stream.name).toBe('CLIP.MP4');
    });

    it('MS-002: sends image names to the sequence factory', async () => {
      const openVideo = vi.fn(async () => new FakeVideoSource());
      const openSequence = vi.fn(async () => new FakeVideoSource({ name: 'plate.0001.tif' }));

      await MediaStream.open('plate.0001.tif', { openVideo, openSequence });

      expect(openSequence).toHaveBeenCalledWith('plate.0001.tif');
      expect(openVideo).not.toHaveBeenCalled();
    });

    it('MS-003: rejects unknown extensions', async () => {
      const error = await MediaStream.open('notes.xyz').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(UnsupportedFormatError);
      expect(error instanceof Error ? error.message : '').toBe('File extension .xyz not recognised');
    });

    it('MS-004: rejects names without an extension', async () => {
      await expect(MediaStream.open('README')).rejects.toThrow('File extension (none) not recognised');
    });

    it('MS-005: exposes the backend description', async () => {
      const { stream } = await openFake();

      expect(stream.numFrames()).toBe(10);
      expect(stream.size()).toEqual([10, 1]);
      expect(stream.metadata).toEqual({
        name: 'fake.mp4',
        type: 'video',
        width: 2,
        height: 2,
        frameRate: 25,
        duration: 0.4,
        numberOfFrames: 10,
        bitsPerPixel: 8,
        videoFormat: 'Gray8',
      });
    });
  });

  describe('read', () => {
    it('MS-006: decodes forward playback without repositioning', async () => {
      const { stream, source } = await openFake();

      for (let n = 1; n <= 10; n++) {
        expect(valueOf(await stream.read(n))).toBe(n);
      }

      expect(source.repositions).toEqual([]);
      expect(source.decoded).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    it('MS-007: repositions only for non-consecutive frames', async () => {
      const { stream, source } = await openFake();

      await stream.read(1);
      await stream.read(5);
      await stream.read(2);

      expect(source.repositions).toEqual([4 / 25, 1 / 25]);
      expect(source.decoded).toEqual([1, 5, 2]);
    });

    it('MS-008: serves a repeated read from the cache', async () => {
      const { stream, source } = await openFake();

      const first = await stream.read(3);
      const second = await stream.read(3);

      expect(second).toBe(first);
      expect(source.decoded).toEqual([3]);
      expect(source.repositions).toEqual([2 / 25]);
    });

    it('MS-009: reloads an evicted frame with the default single slot', async () => {
      const { stream, source } = await openFake();

      await stream.read(1);
      await stream.read(2);
      await stream.read(1);

      expect(source.decoded).toEqual([1, 2, 1]);
      expect(source.repositions).toEqual([0]);
    });

    it('MS-010: evicts the least recently used frame', async () => {
      const { stream, source } = await openFake({}, 3);

      await stream.read(1);
      await stream.read(2);
      await stream.read(3);
      await stream.read(1);
      await stream.read(4);
      await stream.read(1);
      await stream.read(2);

      expect(source.decoded).toEqual([1, 2, 3, 4, 2]);
    });

    it('MS-011: validates the index', async () => {
      const { stream } = await openFake();

      await expect(stream.read(0)).rejects.toBeInstanceOf(FrameRangeError);
      await expect(stream.read(11)).rejects.toBeInstanceOf(FrameRangeError);
      await expect(stream.read(2.5)).rejects.toBeInstanceOf(ValidationError);
      await expect(stream.read(Number.NaN)).rejects.toBeInstanceOf(ValidationError);
    });

    it('MS-012: reads the last frame for Infinity', async () => {
      const { stream } = await openFake();
      expect(valueOf(await stream.read(Infinity))).toBe(10);
      expect(stream.currentFrameIndex).toBe(10);
    });

    it('MS-013: tracks the current frame on hits and misses', async () => {
      const { stream } = await openFake({}, 2);

      expect(stream.currentFrameIndex).toBe(0);
      await stream.read(4);
      expect(stream.currentFrameIndex).toBe(4);
      await stream.read(6);
      await stream.read(4);
      expect(stream.currentFrameIndex).toBe(4);
    });

    it('MS-014: leaves the cache untouched and repositions after a failed decode', async () => {
      const { stream, source } = await openFake({ failingFrames: [3] });

      await stream.read(1);
      await stream.read(2);
      await expect(stream.read(3)).rejects.toThrow('decode failed at frame 3');
      expect(stream.currentFrameIndex).toBe(2);

      await stream.read(2);
      expect(source.decoded).toEqual([1, 2]);

      expect(valueOf(await stream.read(4))).toBe(4);
      expect(source.repositions).toEqual([3 / 25]);
      expect(source.decoded).toEqual([1, 2, 4]);
    });

    it('MS-015: serialises concurrent reads', async () => {
      const { stream, source } = await openFake();

      const frames = await Promise.all([stream.read(1), stream.read(2), stream.read(3)]);

      expect(frames.map(valueOf)).toEqual([1, 2, 3]);
      expect(source.decoded).toEqual([1, 2, 3]);
      expect(source.repositions).toEqual([]);
    });
  });

  describe('playback', () => {
    it('MS-016: readFrame walks to the end', async () => {
      const { stream } = await openFake({ frameCount: 3 });

      expect(stream.hasFrame()).toBe(true);
      expect(valueOf(await stream.readFrame())).toBe(1);
      expect(valueOf(await stream.readFrame())).toBe(2);
      expect(valueOf(await stream.readFrame())).toBe(3);
      expect(stream.hasFrame()).toBe(false);
      await expect(stream.readFrame()).rejects.toBeInstanceOf(EndOfStreamError);
    });

    it('MS-017: seek, step and next move the current frame', async () => {
      const { stream } = await openFake();

      expect(await stream.seek(5)).toBe(true);
      expect(stream.currentFrameIndex).toBe(5);
      expect(await stream.step(2)).toBe(true);
      expect(stream.currentFrameIndex).toBe(7);
      expect(await stream.step(-3)).toBe(true);
      expect(stream.currentFrameIndex).toBe(4);
      expect(await stream.next()).toBe(true);
      expect(stream.currentFrameIndex).toBe(5);
    });

    it('MS-018: getFrame returns the current frame and getNext advances', async () => {
      const { stream } = await openFake();

      await stream.seek(5);
      expect(valueOf(await stream.getFrame())).toBe(5);

      const next = await stream.getNext();
      expect(valueOf(next)).toBe(6);
      expect(stream.currentFrameIndex).toBe(6);
    });

    it('MS-019: seek resolves false for an empty frame', async () => {
      const { stream } = await openFake({ width: 0, height: 0 });
      expect(await stream.seek(1)).toBe(false);
    });

    it('MS-020: getFrame before any read is out of range', async () => {
      const { stream } = await openFake();
      await expect(stream.getFrame()).rejects.toBeInstanceOf(FrameRangeError);
    });

    it('MS-021: step past the end rejects and keeps the position', async () => {
      const { stream } = await openFake({ frameCount: 3 });

      await stream.seek(3);
      await expect(stream.next()).rejects.toBeInstanceOf(FrameRangeError);
      expect(stream.currentFrameIndex).toBe(3);
    });

    it('MS-032: concurrent readFrame calls return consecutive frames', async () => {
      const { stream, source } = await openFake();

      const frames = await Promise.all([stream.readFrame(), stream.readFrame(), stream.readFrame()]);

      expect(frames.map(valueOf)).toEqual([1, 2, 3]);
      expect(stream.currentFrameIndex).toBe(3);
      expect(source.repositions).toEqual([]);
    });

    it('MS-033: concurrent steps accumulate', async () => {
      const { stream } = await openFake();

      await stream.seek(2);
      await Promise.all([stream.next(), stream.step(3), stream.next()]);
      expect(stream.currentFrameIndex).toBe(7);

      const [current, following] = await Promise.all([stream.getFrame(), stream.getNext()]);
      expect(valueOf(current)).toBe(7);
      expect(valueOf(following)).toBe(8);
    });

    it('MS-034: concurrent readFrame calls stop at the end of the stream', async () => {
      const { stream } = await openFake({ frameCount: 2 });

      const results = await Promise.allSettled([stream.readFrame(), stream.readFrame(), stream.readFrame()]);

      expect(results.map(result => result.status)).toEqual(['fulfilled', 'fulfilled', 'rejected']);
      const last = results[2];
      expect(last?.status === 'rejected' ? last.reason : null).toBeInstanceOf(EndOfStreamError);
    });

    it('MS-022: frames() iterates a range in order', async () => {
      const { stream } = await openFake();

      const seen: number[] = [];
      for await (const frame of stream.frames(3, 6)) {
        seen.push(frame.metadata.frameNumber ?? -1);
      }
      expect(seen).toEqual([3, 4, 5, 6]);
    });
  });

  describe('close', () => {
    it('MS-023: releases the backend once', async () => {
      const { stream, source } = await openFake();

      await stream.close();
      await stream.close();

      expect(source.closeCount).toBe(1);
      expect(stream.isClosed).toBe(true);
    });

    it('MS-024: rejects reads after close', async () => {
      const { stream } = await openFake();
      await stream.read(1);
      await stream.close();

      await expect(stream.read(1)).rejects.toBeInstanceOf(UseAfterCloseError);
      await expect(stream.readFrame()).rejects.toBeInstanceOf(UseAfterCloseError);
      await expect(stream.seek(2)).rejects.toBeInstanceOf(UseAfterCloseError);
    });

    it('MS-025: lets reads queued before close finish', async () => {
      const { stream } = await openFake();

      const pending = stream.read(1);
      const closing = stream.close();

      expect(valueOf(await pending)).toBe(1);
      await closing;
      await expect(stream.read(2)).rejects.toBeInstanceOf(UseAfterCloseError);
    });
  });

  describe('logging', () => {
    it('MS-026: logs repositioning at debug level', async () => {
      const sink = vi.fn();
      Logger.setLevel(LogLevel.DEBUG);
      Logger.setSink(sink);

      const { stream } = await openFake();
      await stream.read(1);
      await stream.read(5);

      expect(sink).toHaveBeenCalledWith(LogLevel.DEBUG, '[MediaStream]', 'Seeking to frame 5 (0.160s)');
      expect(sink).toHaveBeenCalledWith(LogLevel.DEBUG, '[MediaStream]', 'Decoding frame 1 sequentially');
    });
  });

  describe('static helpers', () => {
    it('MS-027: is supported on every platform', () => {
      expect(MediaStream.isPlatformSupported()).toBe(true);
    });

    it('MS-028: lists the openable formats', () => {
      const formats = MediaStream.getFileFormats();
      expect(formats).toEqual(getFileFormats());
      expect(formats[0]).toEqual({ extension: 'mpg', description: 'MPG video file', isVideo: true });
    });
  });

  describe('image sequences on disk', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('MS-029: opens a numbered sequence from its first frame', async () => {
      const names = Array.from({ length: 10 }, (_, i) => `img.${String(i + 1).padStart(4, '0')}.png`);
      await writePNGFrames(dir, names);

      const stream = await MediaStream.open(join(dir, 'img.0001.png'));

      expect(stream.numFrames()).toBe(10);
      expect(stream.metadata.type).toBe('imseq');
      expect((await stream.read(10)).getPixel(0, 0)).toEqual([10, 0, 0]);
      await expect(stream.read(11)).rejects.toBeInstanceOf(FrameRangeError);
      await stream.close();
    });

    it('MS-030: opens an explicit list of files', async () => {
      await writeGrayFrames(dir, ['x.pgm', 'y.pgm']);

      const stream = await MediaStream.open([join(dir, 'y.pgm'), join(dir, 'x.pgm')]);

      expect(stream.numFrames()).toBe(2);
      expect(valueOf(await stream.read(1))).toBe(2);
      expect(valueOf(await stream.read(2))).toBe(1);
    });

    it('MS-031: plays a sequence forwards through the cursor', async () => {
      await writeGrayFrames(dir, ['s01.pgm', 's02.pgm', 's03.pgm']);
      const stream = await MediaStream.open(join(dir, 's01.pgm'), { cacheCapacity: 2 });

      const values: number[] = [];
      while (stream.hasFrame()) {
        values.push(valueOf(await stream.readFrame()));
      }
      expect(values).toEqual([1, 2, 3]);
    });
  });
});
