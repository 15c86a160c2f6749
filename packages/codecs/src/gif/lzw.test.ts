import { CorruptStreamError } from '@pixel-codec/core'
import { describe, expect, it } from 'vitest'
import { lzwCompress, lzwDecompress } from './lzw'

/** Deterministic pseudo-random indices below 2^bits */
function noise(length: number, bits: number, seed = 1): Uint8Array {
	const out = new Uint8Array(length)
	let state = seed
	for (let i = 0; i < length; i++) {
		state = (state * 1103515245 + 12345) >>> 0
		out[i] = (state >>> 16) & ((1 << bits) - 1)
	}
	return out
}

describe('LZW', () => {
	it('should pack codes least significant bit first', () => {
		// clear(4) 0 6 0 end(5): 3-bit codes until the table reaches 8 entries
		expect(Array.from(lzwCompress(new Uint8Array([0, 0, 0, 0]), 2))).toEqual([0x84, 0x51])
		expect(Array.from(lzwDecompress(new Uint8Array([0x84, 0x51]), 2))).toEqual([0, 0, 0, 0])
	})

	it('should round trip small alphabets', () => {
		const data = noise(5000, 2)
		expect(lzwDecompress(lzwCompress(data, 2), 2)).toEqual(data)
	})

	it('should restart the dictionary once it is full', () => {
		const data = noise(60000, 8, 7)
		const compressed = lzwCompress(data, 8)
		expect(lzwDecompress(compressed, 8, data.length)).toEqual(data)
	})

	it('should compress repetitive data', () => {
		const data = new Uint8Array(10000).fill(3)
		const compressed = lzwCompress(data, 2)
		expect(compressed.length).toBeLessThan(300)
		expect(lzwDecompress(compressed, 2)).toEqual(data)
	})

	it('should handle empty input', () => {
		expect(lzwDecompress(lzwCompress(new Uint8Array(0), 4), 4)).toEqual(new Uint8Array(0))
	})

	it('should drop pixels past the expected length', () => {
		const compressed = lzwCompress(new Uint8Array([1, 2, 3, 1, 2, 3]), 2)
		expect(Array.from(lzwDecompress(compressed, 2, 4))).toEqual([1, 2, 3, 1])
	})

	it('should reject short streams', () => {
		const compressed = lzwCompress(new Uint8Array([1, 2, 3]), 2)
		expect(() => lzwDecompress(compressed, 2, 5)).toThrow('LZW data ends after 3 of 5 pixels')
	})

	it('should reject codes outside the table', () => {
		// clear(4) then 7 before any entry exists
		expect(() => lzwDecompress(new Uint8Array([4 | (7 << 3)]), 2)).toThrow(CorruptStreamError)
		expect(() => lzwDecompress(new Uint8Array([4 | (7 << 3)]), 2)).toThrow('Invalid LZW code 7')
	})

	it('should reject invalid code sizes', () => {
		expect(() => lzwDecompress(new Uint8Array([0]), 12)).toThrow(CorruptStreamError)
	})
})
