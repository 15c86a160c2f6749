import { CorruptStreamError } from '@pixel-codec/core'
import type { BitReader } from './bits'
import { MAX_CODE_BITS } from './constants'

/**
 * Canonical Huffman decoding table: code counts per length and symbols
 * ordered by (length, symbol)
 */
export interface HuffmanTable {
	readonly counts: Uint16Array
	readonly symbols: Uint16Array
}

/**
 * Build a decoding table from code lengths. Over-subscribed sets are
 * rejected; incomplete sets only when they hold at most one code.
 */
export function buildHuffmanTable(lengths: ArrayLike<number>, label: string): HuffmanTable {
	const counts = new Uint16Array(MAX_CODE_BITS + 1)
	for (let i = 0; i < lengths.length; i++) counts[lengths[i]]++
	counts[0] = 0

	let used = 0
	let left = 1
	for (let len = 1; len <= MAX_CODE_BITS; len++) {
		used += counts[len]
		left = (left << 1) - counts[len]
		if (left < 0) {
			throw new CorruptStreamError(`Over-subscribed ${label} Huffman table`)
		}
	}
	if (left > 0 && used > 1) {
		throw new CorruptStreamError(`Incomplete ${label} Huffman table`)
	}

	const offsets = new Uint16Array(MAX_CODE_BITS + 2)
	for (let len = 1; len <= MAX_CODE_BITS; len++) {
		offsets[len + 1] = offsets[len] + counts[len]
	}
	const symbols = new Uint16Array(used)
	for (let sym = 0; sym < lengths.length; sym++) {
		const len = lengths[sym]
		if (len !== 0) symbols[offsets[len]++] = sym
	}
	return { counts, symbols }
}

/**
 * Decode one symbol, reading the code MSB first
 */
export function decodeSymbol(reader: BitReader, table: HuffmanTable): number {
	let code = 0
	let first = 0
	let index = 0
	for (let len = 1; len <= MAX_CODE_BITS; len++) {
		code |= reader.bits(1)
		const count = table.counts[len]
		if (code - first < count) return table.symbols[index + code - first]
		index += count
		first = (first + count) << 1
		code <<= 1
	}
	throw new CorruptStreamError('Invalid Huffman code')
}

interface MergeItem {
	readonly weight: number
	readonly symbols: readonly number[]
}

function mergeItems(leaves: readonly MergeItem[], packages: readonly MergeItem[]): MergeItem[] {
	const merged: MergeItem[] = []
	let i = 0
	let j = 0
	while (i < leaves.length || j < packages.length) {
		if (j >= packages.length || (i < leaves.length && leaves[i].weight <= packages[j].weight)) {
			merged.push(leaves[i++])
		} else {
			merged.push(packages[j++])
		}
	}
	return merged
}

/**
 * Optimal length-limited code lengths (package-merge). Always yields at
 * least two codes so the resulting set is complete.
 */
export function buildCodeLengths(freqs: ArrayLike<number>, limit: number): number[] {
	const lengths = new Array<number>(freqs.length).fill(0)
	const used: number[] = []
	for (let i = 0; i < freqs.length; i++) {
		if (freqs[i] > 0) used.push(i)
	}

	if (used.length < 2) {
		const only = used.length === 1 ? used[0] : 0
		lengths[only] = 1
		lengths[only === 0 ? 1 : 0] = 1
		return lengths
	}

	const leaves: MergeItem[] = used
		.map((symbol) => ({ weight: freqs[symbol], symbols: [symbol] }))
		.sort((a, b) => a.weight - b.weight || a.symbols[0] - b.symbols[0])

	let list = leaves
	for (let level = 1; level < limit; level++) {
		const packages: MergeItem[] = []
		for (let k = 0; k + 1 < list.length; k += 2) {
			packages.push({
				weight: list[k].weight + list[k + 1].weight,
				symbols: list[k].symbols.concat(list[k + 1].symbols),
			})
		}
		list = mergeItems(leaves, packages)
	}

	const take = 2 * used.length - 2
	for (let k = 0; k < take; k++) {
		for (const symbol of list[k].symbols) lengths[symbol]++
	}
	return lengths
}

function reverseBits(code: number, length: number): number {
	let result = 0
	for (let i = 0; i < length; i++) {
		result = (result << 1) | (code & 1)
		code >>>= 1
	}
	return result
}

/**
 * Canonical codes for the given lengths, bit-reversed for LSB-first output
 */
export function buildCodes(lengths: readonly number[]): number[] {
	const blCount = new Array<number>(MAX_CODE_BITS + 1).fill(0)
	for (const len of lengths) blCount[len]++
	blCount[0] = 0

	const nextCode = new Array<number>(MAX_CODE_BITS + 2).fill(0)
	let code = 0
	for (let bits = 1; bits <= MAX_CODE_BITS; bits++) {
		code = (code + blCount[bits - 1]) << 1
		nextCode[bits] = code
	}

	return lengths.map((len) => (len === 0 ? 0 : reverseBits(nextCode[len]++, len)))
}
