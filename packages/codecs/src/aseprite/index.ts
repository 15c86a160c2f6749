export { blendModeFromId, parseChunk } from './chunks'
export { decodeAseprite, isAseprite, readAsepriteHeader } from './reader'
export { AsepriteSprite, tagFrameOrder } from './sprite'
export * from './types'
