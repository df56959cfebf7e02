/**
 * Image Sequence Loader
 * Handles filename pattern detection, length probing and directory listing
 * for numbered image sequences on disk.
 */

import type { Dirent } from 'node:fs';
import { open, readdir, type FileHandle } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { MediaIOError, SequenceDetectionError } from '../../core/errors';
import { Logger } from '../Logger';
import { isListedImageName } from './SupportedMediaFormats';

const log = new Logger('SequenceLoader');

export interface SequencePattern {
  /** Absolute directory holding the frames */
  directory: string;
  /** File name text before the frame number */
  prefix: string;
  /** File name text after the frame number, extension included */
  suffix: string;
  /** Digits in the frame number of the named file (zero padding width) */
  padWidth: number;
  /** On-disk number of frame 1, minus one */
  zeroIndex: number;
}

/**
 * Check whether a path can be opened for reading.
 */
export type ReadableProbe = (path: string) => Promise<boolean>;

const DIGIT_RUN = /[0-9]+/g;

/**
 * Detect the numbering of a sequence from the path of its first frame.
 * The last run of digits in the file name (extension excluded) is the
 * frame number.
 *
 * @example
 * detectSequencePattern('/shots/img.0007.png')
 * // { directory: '/shots', prefix: 'img.', suffix: '.png', padWidth: 4, zeroIndex: 6 }
 */
export function detectSequencePattern(path: string): SequencePattern {
  const fileName = basename(path);
  const ext = extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);

  const runs = Array.from(stem.matchAll(DIGIT_RUN));
  const last = runs[runs.length - 1];
  if (!last || last.index === undefined) {
    throw new SequenceDetectionError(fileName);
  }

  const digits = last[0];
  const frameNumber = Number(digits);
  if (!Number.isSafeInteger(frameNumber)) {
    throw new SequenceDetectionError(fileName, `Image index ${digits} too large`);
  }

  return {
    directory: resolve(dirname(path)),
    prefix: stem.slice(0, last.index),
    suffix: stem.slice(last.index + digits.length) + ext,
    padWidth: digits.length,
    zeroIndex: frameNumber - 1,
  };
}

/**
 * Zero-pad a frame number to `padWidth` digits. Wider numbers are
 * written in full.
 */
export function formatFrameNumber(value: number, padWidth: number): string {
  return String(value).padStart(padWidth, '0');
}

/**
 * Path of 1-based frame `frame` of a sequence.
 */
export function sequenceFramePath(pattern: SequencePattern, frame: number): string {
  const name = pattern.prefix + formatFrameNumber(pattern.zeroIndex + frame, pattern.padWidth) + pattern.suffix;
  return join(pattern.directory, name);
}

/**
 * Human-readable pattern with the frame number replaced by '#'s,
 * e.g. "img.####.png".
 */
export function describePattern(pattern: SequencePattern): string {
  return pattern.prefix + '#'.repeat(pattern.padWidth) + pattern.suffix;
}

/**
 * True when `path` names a regular file that can be opened for reading.
 */
export async function isReadableFile(path: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    log.debug(`Cannot open ${path}:`, err instanceof Error ? err.message : err);
    return false;
  }
  try {
    return (await handle.stat()).isFile();
  } finally {
    await handle.close();
  }
}

/**
 * Count the frames of a sequence by opening frame 1, 2, ... until the
 * first one that cannot be read. Sequences are assumed to have no gaps.
 */
export async function probeSequenceLength(
  pattern: SequencePattern,
  probe: ReadableProbe = isReadableFile
): Promise<number> {
  let count = 0;
  while (await probe(sequenceFramePath(pattern, count + 1))) {
    count++;
  }
  log.debug(`Sequence ${describePattern(pattern)} has ${count} frames`);
  return count;
}

/**
 * Names of the image files in a directory, in the order the file system
 * lists them. Extensions are matched case-insensitively; directories are
 * skipped.
 */
export async function listImageFiles(directory: string = '.'): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (err) {
    throw new MediaIOError(`Cannot list directory "${directory}"`, { cause: err });
  }
  return entries.filter(entry => entry.isFile() && isListedImageName(entry.name)).map(entry => entry.name);
}
