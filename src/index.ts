/**
 * framestream public API
 */

export { MediaStream, type MediaStreamOptions, type SourceFactory } from './stream/MediaStream';
export { getSourceMetadata, type FrameSource, type SourceMetadata, type SourceType } from './sources/FrameSource';
export { ImageSequenceSource, type ImageSequenceSourceOptions } from './sources/ImageSequenceSource';
export { VideoFileSource } from './sources/VideoFileSource';
export { Frame, pixelFormatBits, type DataType, type FrameMetadata, type FrameOptions, type PixelArray } from './core/image/Frame';
export * from './core/errors';
export { LRUCache, type CacheLoader } from './utils/LRUCache';
export { Logger, LogLevel, resolveLogLevel, type LogSink } from './utils/Logger';
export {
  detectSequencePattern,
  describePattern,
  formatFrameNumber,
  isReadableFile,
  listImageFiles,
  probeSequenceLength,
  sequenceFramePath,
  type ReadableProbe,
  type SequencePattern,
} from './utils/media/SequenceLoader';
export {
  detectMediaTypeFromName,
  getFileExtension,
  getFileFormats,
  isListedImageName,
  LISTED_IMAGE_EXTENSIONS,
  SEQUENCE_IMAGE_EXTENSIONS,
  SUPPORTED_VIDEO_EXTENSIONS,
  type FileFormatInfo,
  type MediaType,
} from './utils/media/SupportedMediaFormats';
export * from './formats';
export * from './config';
