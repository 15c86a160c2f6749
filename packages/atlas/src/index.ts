export { type AddResult, AtlasBuilder } from './builder'
export { type Fit, FreeRectList } from './free-rects'
export { toAtlasJson } from './json'
export { packAtlas, packOrder } from './pack'
export * from './types'
