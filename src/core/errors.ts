/**
 * Base error class for all framestream errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Error thrown when a format decoder fails to parse image data.
 * The error message includes the format name for easy identification.
 */
export class DecoderError extends AppError {
  constructor(format: string, detail: string, options?: { cause?: unknown }) {
    super(`[${format}] ${detail}`, 'DECODER_ERROR', options);
    this.name = 'DecoderError';
  }
}

/**
 * Error thrown when an image sequence is opened from a file name that
 * carries no usable frame number.
 */
export class SequenceDetectionError extends AppError {
  constructor(fileName: string, detail: string = 'No image index found') {
    super(`${detail} in "${fileName}"`, 'SEQUENCE_DETECTION_ERROR');
    this.name = 'SequenceDetectionError';
  }
}

/**
 * Error thrown when a file cannot be opened or decoded.
 */
export class MediaIOError extends AppError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(detail, 'IO_ERROR', options);
    this.name = 'MediaIOError';
  }
}

/**
 * Error thrown when a frame index falls outside `[1, frameCount]`.
 */
export class FrameRangeError extends AppError {
  constructor(
    public readonly frame: number,
    public readonly frameCount: number
  ) {
    super(`Frame ${frame} is not in the range of allowed frames: [1 ${frameCount}]`, 'RANGE_ERROR');
    this.name = 'FrameRangeError';
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(extension: string) {
    super(`File extension ${extension || '(none)'} not recognised`, 'UNSUPPORTED_FORMAT');
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Error thrown by sequential reads once the last frame has been reached.
 */
export class EndOfStreamError extends AppError {
  constructor(frameCount: number) {
    super(`No frames remaining: stream ends at frame ${frameCount}`, 'END_OF_STREAM');
    this.name = 'EndOfStreamError';
  }
}

export class UseAfterCloseError extends AppError {
  constructor(name: string) {
    super(`Stream "${name}" has been closed`, 'USE_AFTER_CLOSE');
    this.name = 'UseAfterCloseError';
  }
}

/**
 * Error thrown when invalid arguments are passed to an API method
 * (e.g., a fractional frame index).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}
