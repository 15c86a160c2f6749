/**
 * Color spaces, palette quantization, nearest-color remap and dithering
 */

export * from './types'
export * from './convert'
export { type ColorMatcher, createMatcher, labDistance, nearestColor, remap, rgbDistance, transparentIndex } from './distance'
export { buildHistogram, weightedMean } from './histogram'
export { extractPalette, quantize } from './quantize'
export { dither } from './dither'
