/**
 * Configuration barrel export.
 */

export * from './ImageLimits';
export * from './StreamConfig';
