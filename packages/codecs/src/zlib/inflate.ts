/**
 * Deflate decompression (RFC 1951) with zlib framing (RFC 1950)
 */
import { CorruptStreamError, UnsupportedFormatError } from '@pixel-codec/core'
import { adler32 } from './adler32'
import { BitReader } from './bits'
import {
	BlockType,
	CL_ORDER,
	CL_SYMBOLS,
	DIST_BASE,
	DIST_EXTRA,
	DIST_SYMBOLS,
	END_OF_BLOCK,
	FIXED_DIST_LENGTHS,
	FIXED_LITLEN_LENGTHS,
	LENGTH_BASE,
	LENGTH_EXTRA,
	LITLEN_SYMBOLS,
} from './constants'
import { type HuffmanTable, buildHuffmanTable, decodeSymbol } from './huffman'

const FIXED_LITLEN_TABLE = buildHuffmanTable(FIXED_LITLEN_LENGTHS, 'fixed literal/length')
const FIXED_DIST_TABLE = buildHuffmanTable(FIXED_DIST_LENGTHS, 'fixed distance')

/**
 * Output buffer that grows on demand and serves back-references
 */
class Output {
	private buffer: Uint8Array
	length = 0

	constructor(capacity: number) {
		this.buffer = new Uint8Array(Math.max(1024, capacity))
	}

	push(byte: number): void {
		if (this.length === this.buffer.length) this.grow(1)
		this.buffer[this.length++] = byte
	}

	append(bytes: Uint8Array): void {
		if (this.length + bytes.length > this.buffer.length) this.grow(bytes.length)
		this.buffer.set(bytes, this.length)
		this.length += bytes.length
	}

	copy(distance: number, length: number): void {
		if (distance > this.length) {
			throw new CorruptStreamError('Back-reference before start of output', {
				metadata: { distance, produced: this.length },
			})
		}
		if (this.length + length > this.buffer.length) this.grow(length)
		const buf = this.buffer
		let src = this.length - distance
		// Byte by byte: source and destination may overlap
		for (let i = 0; i < length; i++) buf[this.length++] = buf[src++]
	}

	result(): Uint8Array {
		return this.buffer.slice(0, this.length)
	}

	private grow(extra: number): void {
		let capacity = this.buffer.length * 2
		while (capacity < this.length + extra) capacity *= 2
		const next = new Uint8Array(capacity)
		next.set(this.buffer.subarray(0, this.length))
		this.buffer = next
	}
}

/**
 * Read the code length tables of a dynamic block
 */
function readDynamicTables(reader: BitReader): [HuffmanTable, HuffmanTable] {
	const hlit = reader.bits(5) + 257
	const hdist = reader.bits(5) + 1
	const hclen = reader.bits(4) + 4
	if (hlit > LITLEN_SYMBOLS || hdist > DIST_SYMBOLS) {
		throw new CorruptStreamError('Too many length or distance codes', { metadata: { hlit, hdist } })
	}

	const clLengths = new Uint8Array(CL_SYMBOLS)
	for (let i = 0; i < hclen; i++) clLengths[CL_ORDER[i]] = reader.bits(3)
	const clTable = buildHuffmanTable(clLengths, 'code length')

	const lengths = new Uint8Array(hlit + hdist)
	let index = 0
	while (index < hlit + hdist) {
		const symbol = decodeSymbol(reader, clTable)
		if (symbol < 16) {
			lengths[index++] = symbol
			continue
		}

		let value = 0
		let repeat: number
		if (symbol === 16) {
			if (index === 0) throw new CorruptStreamError('Repeat with no previous code length')
			value = lengths[index - 1]
			repeat = 3 + reader.bits(2)
		} else if (symbol === 17) {
			repeat = 3 + reader.bits(3)
		} else {
			repeat = 11 + reader.bits(7)
		}
		if (index + repeat > hlit + hdist) {
			throw new CorruptStreamError('Code length repeat overflows table')
		}
		lengths.fill(value, index, index + repeat)
		index += repeat
	}

	if (lengths[END_OF_BLOCK] === 0) {
		throw new CorruptStreamError('Missing end-of-block code')
	}

	return [
		buildHuffmanTable(lengths.subarray(0, hlit), 'literal/length'),
		buildHuffmanTable(lengths.subarray(hlit), 'distance'),
	]
}

/**
 * Decode one Huffman-coded block body
 */
function inflateCodes(reader: BitReader, output: Output, litlen: HuffmanTable, dist: HuffmanTable): void {
	for (;;) {
		const symbol = decodeSymbol(reader, litlen)
		if (symbol < 256) {
			output.push(symbol)
			continue
		}
		if (symbol === END_OF_BLOCK) return

		const lengthIndex = symbol - 257
		if (lengthIndex >= 29) {
			throw new CorruptStreamError(`Invalid length symbol ${symbol}`)
		}
		const length = LENGTH_BASE[lengthIndex] + reader.bits(LENGTH_EXTRA[lengthIndex])

		const distSymbol = decodeSymbol(reader, dist)
		if (distSymbol >= DIST_SYMBOLS) {
			throw new CorruptStreamError(`Invalid distance symbol ${distSymbol}`)
		}
		const distance = DIST_BASE[distSymbol] + reader.bits(DIST_EXTRA[distSymbol])
		output.copy(distance, length)
	}
}

/**
 * Result of raw inflation
 */
export interface InflateResult {
	readonly data: Uint8Array
	/** Byte offset just past the final block */
	readonly end: number
}

/**
 * Decompress a raw deflate stream starting at `offset`
 */
export function inflateRaw(data: Uint8Array, offset = 0): InflateResult {
	const reader = new BitReader(data, offset)
	const output = new Output(data.length * 4)

	let isFinal = false
	while (!isFinal) {
		isFinal = reader.bits(1) === 1
		const blockType = reader.bits(2)

		switch (blockType) {
			case BlockType.Stored: {
				reader.alignToByte()
				const header = reader.bytes(4)
				const len = header[0] | (header[1] << 8)
				const nlen = header[2] | (header[3] << 8)
				if ((len ^ 0xffff) !== nlen) {
					throw new CorruptStreamError('Stored block length check failed', { metadata: { len, nlen } })
				}
				output.append(reader.bytes(len))
				break
			}
			case BlockType.Fixed:
				inflateCodes(reader, output, FIXED_LITLEN_TABLE, FIXED_DIST_TABLE)
				break
			case BlockType.Dynamic: {
				const [litlen, dist] = readDynamicTables(reader)
				inflateCodes(reader, output, litlen, dist)
				break
			}
			default:
				throw new CorruptStreamError('Invalid deflate block type 3')
		}
	}

	reader.alignToByte()
	return { data: output.result(), end: reader.offset }
}

/**
 * Decompress a zlib stream and verify its Adler-32 checksum
 */
export function inflate(data: Uint8Array): Uint8Array {
	if (data.length < 6) {
		throw new CorruptStreamError('zlib stream too short', { metadata: { length: data.length } })
	}

	const cmf = data[0]
	const flg = data[1]
	if ((cmf & 0x0f) !== 8 || cmf >> 4 > 7) {
		throw new CorruptStreamError(`Invalid zlib compression method byte 0x${cmf.toString(16)}`)
	}
	if ((cmf * 256 + flg) % 31 !== 0) {
		throw new CorruptStreamError('zlib header check failed')
	}
	if (flg & 0x20) {
		throw new UnsupportedFormatError('zlib preset dictionaries are not supported')
	}

	const { data: output, end } = inflateRaw(data, 2)
	if (end + 4 > data.length) {
		throw new CorruptStreamError('Missing zlib checksum')
	}
	const expected = ((data[end] << 24) | (data[end + 1] << 16) | (data[end + 2] << 8) | data[end + 3]) >>> 0
	const actual = adler32(output)
	if (expected !== actual) {
		throw new CorruptStreamError('Adler-32 checksum mismatch', { metadata: { expected, actual } })
	}
	return output
}
