/**
 * FrameSource - capability interface shared by every stream backend
 *
 * A source owns a single decode cursor measured in seconds from the first
 * frame. Repositioning the cursor (`currentTime = t`) may be expensive;
 * `readNextFrame()` decodes the frame at the cursor and advances it.
 */

import type { Frame } from '../core/image/Frame';

export type SourceType = 'imseq' | 'video';

export interface SourceMetadata {
  name: string;
  type: SourceType;
  width: number;
  height: number;
  /** Frames per second */
  frameRate: number;
  /** In seconds */
  duration: number;
  numberOfFrames: number;
  bitsPerPixel: number;
  videoFormat: string;
}

export interface FrameSource {
  readonly name: string;
  readonly type: SourceType;
  readonly frameRate: number;
  readonly duration: number;
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly bitsPerPixel: number;
  readonly videoFormat: string;

  /** Decode cursor in seconds; assigning repositions the source */
  currentTime: number;

  readNextFrame(): Promise<Frame>;
  hasFrameRemaining(): boolean;

  /** Release file handles and decoder state. */
  close(): Promise<void>;
}

/**
 * Snapshot of a source's descriptive properties.
 */
export function getSourceMetadata(source: FrameSource): SourceMetadata {
  return {
    name: source.name,
    type: source.type,
    width: source.width,
    height: source.height,
    frameRate: source.frameRate,
    duration: source.duration,
    numberOfFrames: source.frameCount,
    bitsPerPixel: source.bitsPerPixel,
    videoFormat: source.videoFormat,
  };
}
