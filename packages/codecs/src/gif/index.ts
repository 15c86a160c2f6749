export { decodeGif, deinterlace, parseGif } from './decoder'
export { encodeGif, selectPalettes } from './encoder'
export { lzwCompress, lzwDecompress } from './lzw'
export * from './types'
