/**
 * Shared media format helpers used by stream dispatch, directory listing
 * and the static format report.
 */

/**
 * Extensions opened as numbered image sequences.
 */
export const SEQUENCE_IMAGE_EXTENSIONS = [
  'bmp', 'tif', 'tiff', 'jpeg', 'jpg', 'png', 'ppm', 'pgm', 'pbm', 'gif',
] as const;

/**
 * Container extensions handed to the video decoder.
 */
export const SUPPORTED_VIDEO_EXTENSIONS = [
  'mpg', 'mpeg',
  // MP4 (ISOBMFF) and QuickTime
  'mp4', 'm4v', 'mov',
  // Motion JPEG 2000, MXF
  'mj2', 'mxf',
  // Windows Media
  'wmv', 'asf', 'asx',
  'avi',
  'ogg',
] as const;

/**
 * Extensions reported by `listImageFiles`. Wider than the sequence set:
 * Sun raster files are listed even though they cannot be opened.
 */
export const LISTED_IMAGE_EXTENSIONS = [
  'png', 'tif', 'jpg', 'bmp', 'ppm', 'pgm', 'pbm', 'gif', 'ras', 'tiff', 'jpeg',
] as const;

export type MediaType = 'image' | 'video';

export interface FileFormatInfo {
  extension: string;
  description: string;
  isVideo: boolean;
}

const IMAGE_EXTENSION_SET = new Set<string>(SEQUENCE_IMAGE_EXTENSIONS);
const VIDEO_EXTENSION_SET = new Set<string>(SUPPORTED_VIDEO_EXTENSIONS);
const LISTED_EXTENSION_SET = new Set<string>(LISTED_IMAGE_EXTENSIONS);

/**
 * Lowercase extension of the last path segment, without the dot.
 * Returns '' when there is none.
 */
export function getFileExtension(filename: string): string {
  const base = filename.slice(Math.max(filename.lastIndexOf('/'), filename.lastIndexOf('\\')) + 1);
  const dotIdx = base.lastIndexOf('.');
  if (dotIdx <= 0 || dotIdx === base.length - 1) {
    return '';
  }
  return base.slice(dotIdx + 1).toLowerCase();
}

/**
 * Classify a file name by extension. Unknown extensions give null.
 */
export function detectMediaTypeFromName(filename: string): MediaType | null {
  const ext = getFileExtension(filename);
  if (IMAGE_EXTENSION_SET.has(ext)) {
    return 'image';
  }
  if (VIDEO_EXTENSION_SET.has(ext)) {
    return 'video';
  }
  return null;
}

export function isListedImageName(filename: string): boolean {
  return LISTED_EXTENSION_SET.has(getFileExtension(filename));
}

/**
 * Every openable format: video containers first, then image sequences.
 */
export function getFileFormats(): FileFormatInfo[] {
  return [
    ...SUPPORTED_VIDEO_EXTENSIONS.map(ext => ({
      extension: ext,
      description: `${ext.toUpperCase()} video file`,
      isVideo: true,
    })),
    ...SEQUENCE_IMAGE_EXTENSIONS.map(ext => ({
      extension: ext,
      description: `${ext.toUpperCase()} file sequence`,
      isVideo: false,
    })),
  ];
}
