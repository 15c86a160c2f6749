export { decodeApng, delayToMs } from './decoder'
export { checkSequenceNumbers, encodeApng, toDelayFraction } from './encoder'
export * from './types'
