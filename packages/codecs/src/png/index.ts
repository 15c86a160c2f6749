export { type Chunk, type ChunkInput, createChunk, isCriticalChunk, readChunks, writeChunks } from './chunks'
export { type PixelFormat, decodeImageData, decodePng, readPngHeader, validateHeader } from './decoder'
export { type PngEncodeOptions, compressRgba, encodePng, indexBitDepth } from './encoder'
export { filterRows, filterScanline, paethPredictor, selectFilter, unfilterRows, unfilterScanline } from './filter'
export { animationControlChunk, frameControlChunk, frameDataChunk, headerChunk, parseRecord } from './records'
export * from './types'
