/**
 * Raster, animation and sprite-file codecs
 */

export * from './zlib'
export * from './png'
export * from './apng'
export * from './gif'
export * from './aseprite'
