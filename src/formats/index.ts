/**
 * Image format decoders
 */

export * from './shared';
export { isPNGFile, decodePNG } from './PNGDecoder';
export { isJPEGFile, decodeJPEG } from './JPEGDecoder';
export { isGIFFile, decodeGIF } from './GIFDecoder';
export { isTIFFFile, getTIFFInfo, decodeTIFF, type TIFFInfo } from './TIFFDecoder';
export { isBMPFile, getBMPInfo, decodeBMP, type BMPInfo } from './BMPDecoder';
export { isPNMFile, decodePNM } from './PNMDecoder';
export { DecoderRegistry, decoderRegistry, type FormatDecoder, type FormatName } from './DecoderRegistry';
export {
  readImage,
  readImageRgb,
  expandPalette,
  cmykToRgb,
  toUint8,
  toTrueColor,
  toRgb,
  decodedImageToFrame,
  checkerboardSquareSize,
  type RgbBackground,
} from './ImageReader';
