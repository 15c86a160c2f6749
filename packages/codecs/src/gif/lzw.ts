/**
 * GIF flavour of LZW: LSB-first variable-width codes growing from
 * minCodeSize + 1 to 12 bits, with clear and end-of-information codes.
 */

import { CorruptStreamError, InvalidInputError } from '@pixel-codec/core'

const MAX_CODES = 4096
const MAX_CODE_SIZE = 12

function checkCodeSize(minCodeSize: number, fail: (message: string) => Error): void {
	if (!Number.isInteger(minCodeSize) || minCodeSize < 2 || minCodeSize > 8) {
		throw fail(`Invalid LZW minimum code size ${minCodeSize}`)
	}
}

/**
 * Compress palette indices. The dictionary restarts with a clear code
 * once it holds 4096 entries.
 */
export function lzwCompress(indices: Uint8Array, minCodeSize: number): Uint8Array {
	checkCodeSize(minCodeSize, (message) => new InvalidInputError(message))
	const clearCode = 1 << minCodeSize
	const endCode = clearCode + 1

	let codeSize = minCodeSize + 1
	let nextCode = endCode + 1
	// (prefix code << 8 | symbol) -> code
	let table = new Map<number, number>()

	const output: number[] = []
	let bitBuffer = 0
	let bitCount = 0

	const writeCode = (code: number): void => {
		bitBuffer |= code << bitCount
		bitCount += codeSize
		while (bitCount >= 8) {
			output.push(bitBuffer & 0xff)
			bitBuffer >>>= 8
			bitCount -= 8
		}
	}

	// The decoder widens once its table reaches the next power of two,
	// one code behind the encoder
	const writeData = (code: number): void => {
		writeCode(code)
		if (nextCode >= 1 << codeSize && codeSize < MAX_CODE_SIZE) codeSize++
	}

	writeCode(clearCode)

	if (indices.length > 0) {
		let prefix = indices[0]
		if (prefix >= clearCode) {
			throw new InvalidInputError(`Index ${prefix} does not fit ${minCodeSize}-bit codes`)
		}

		for (let i = 1; i < indices.length; i++) {
			const symbol = indices[i]
			if (symbol >= clearCode) {
				throw new InvalidInputError(`Index ${symbol} does not fit ${minCodeSize}-bit codes`)
			}
			const key = (prefix << 8) | symbol
			const code = table.get(key)
			if (code !== undefined) {
				prefix = code
				continue
			}

			writeData(prefix)
			if (nextCode < MAX_CODES) {
				table.set(key, nextCode++)
			} else {
				writeCode(clearCode)
				table = new Map()
				codeSize = minCodeSize + 1
				nextCode = endCode + 1
			}
			prefix = symbol
		}
		writeData(prefix)
	}

	writeCode(endCode)
	if (bitCount > 0) output.push(bitBuffer & 0xff)
	return new Uint8Array(output)
}

/**
 * Decompress LZW data. With `expectedLength` the output is exactly that
 * long: surplus pixels are dropped and a short stream is an error.
 */
export function lzwDecompress(data: Uint8Array, minCodeSize: number, expectedLength?: number): Uint8Array {
	checkCodeSize(minCodeSize, (message) => new CorruptStreamError(message))
	const clearCode = 1 << minCodeSize
	const endCode = clearCode + 1

	const prefix = new Uint16Array(MAX_CODES)
	const suffix = new Uint8Array(MAX_CODES)
	const first = new Uint8Array(MAX_CODES)
	const length = new Uint16Array(MAX_CODES)
	for (let code = 0; code < clearCode; code++) {
		suffix[code] = code
		first[code] = code
		length[code] = 1
	}

	let out = new Uint8Array(expectedLength ?? Math.max(1024, data.length * 4))
	let size = 0
	const emit = (code: number): void => {
		const n = length[code]
		if (size + n > out.length) {
			if (expectedLength !== undefined) {
				// Surplus pixels past the frame are ignored
				let c = code
				for (let i = n - 1; i >= 0; i--) {
					if (size + i < out.length) out[size + i] = suffix[c]
					c = prefix[c]
				}
				size = out.length
				return
			}
			let capacity = out.length * 2
			while (capacity < size + n) capacity *= 2
			const next = new Uint8Array(capacity)
			next.set(out.subarray(0, size))
			out = next
		}
		let c = code
		for (let i = n - 1; i >= 0; i--) {
			out[size + i] = suffix[c]
			c = prefix[c]
		}
		size += n
	}

	let codeSize = minCodeSize + 1
	let nextCode = endCode + 1
	let previous = -1
	let bitBuffer = 0
	let bitCount = 0
	let pos = 0

	while (true) {
		while (bitCount < codeSize && pos < data.length) {
			bitBuffer |= data[pos++] << bitCount
			bitCount += 8
		}
		// Streams that stop without an end code end here
		if (bitCount < codeSize) break

		const code = bitBuffer & ((1 << codeSize) - 1)
		bitBuffer >>>= codeSize
		bitCount -= codeSize

		if (code === clearCode) {
			codeSize = minCodeSize + 1
			nextCode = endCode + 1
			previous = -1
			continue
		}
		if (code === endCode) break

		if (previous < 0) {
			if (code >= clearCode) throw new CorruptStreamError(`Invalid LZW code ${code}`)
			emit(code)
			previous = code
			continue
		}

		let firstSymbol: number
		if (code < nextCode) {
			firstSymbol = first[code]
			emit(code)
		} else if (code === nextCode && nextCode < MAX_CODES) {
			// The code being defined: previous string plus its own first symbol
			firstSymbol = first[previous]
			prefix[code] = previous
			suffix[code] = firstSymbol
			first[code] = firstSymbol
			length[code] = length[previous] + 1
			emit(code)
		} else {
			throw new CorruptStreamError(`Invalid LZW code ${code}`)
		}

		if (nextCode < MAX_CODES) {
			prefix[nextCode] = previous
			suffix[nextCode] = firstSymbol
			first[nextCode] = first[previous]
			length[nextCode] = length[previous] + 1
			nextCode++
			if (nextCode === 1 << codeSize && codeSize < MAX_CODE_SIZE) codeSize++
		}
		previous = code
		if (expectedLength !== undefined && size >= expectedLength) break
	}

	if (expectedLength !== undefined) {
		if (size < expectedLength) {
			throw new CorruptStreamError(`LZW data ends after ${size} of ${expectedLength} pixels`)
		}
		return out
	}
	return out.slice(0, size)
}
