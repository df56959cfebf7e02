/**
 * Stream and cache defaults.
 */

/** Frames kept by a stream's cache when the caller does not say otherwise */
export const DEFAULT_CACHE_CAPACITY = 1;

/**
 * Rate reported by image sequences. Sequences have no real timing; the
 * value only gives frame indices a time axis for time-based repositioning.
 */
export const IMAGE_SEQUENCE_FRAME_RATE = 30;

/** Packets inspected by mediabunny when estimating a video's frame rate */
export const VIDEO_PACKET_STATS_SAMPLE = 50;

/** Rate assumed when a video track reports no usable packet rate */
export const FALLBACK_VIDEO_FRAME_RATE = 30;
