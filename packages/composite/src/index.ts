/**
 * Blend modes and layer compositing
 */

export * from './types'
export * from './blend'
export * from './composite'
