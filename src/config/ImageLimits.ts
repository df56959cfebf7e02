/**
 * Dimension limits applied by every image decoder before it allocates
 * a pixel buffer.
 */
export const IMAGE_LIMITS = {
  /** Maximum value for image width or height (65536 pixels) */
  MAX_DIMENSION: 65536,
  /** Maximum total pixel count (256 megapixels) */
  MAX_PIXELS: 268435456,
} as const;
