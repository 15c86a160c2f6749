export * from './bytes'
export * from './crc32'
export * from './errors'
export * from './format'
export * from './types'
export * from './validation'
