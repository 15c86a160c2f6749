export { adler32 } from './adler32'
export { deflate, deflateRaw } from './deflate'
export { type InflateResult, inflate, inflateRaw } from './inflate'
