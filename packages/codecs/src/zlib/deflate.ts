/**
 * Deflate compression (RFC 1951): LZ77 over a 32 KiB window with
 * per-block choice of stored, fixed or dynamic Huffman coding
 */
import { InvalidInputError } from '@pixel-codec/core'
import { adler32 } from './adler32'
import { BitWriter } from './bits'
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
	LENGTH_SYMBOL,
	LITLEN_SYMBOLS,
	MAX_CL_BITS,
	MAX_CODE_BITS,
	MAX_MATCH,
	MAX_STORED,
	MIN_MATCH,
	WINDOW_SIZE,
	distanceSymbol,
} from './constants'
import { buildCodeLengths, buildCodes } from './huffman'

/**
 * Match finder tuning per compression level
 */
interface LevelConfig {
	readonly maxChain: number
	readonly niceLength: number
	readonly lazy: boolean
}

const LEVELS: readonly LevelConfig[] = [
	{ maxChain: 0, niceLength: 0, lazy: false },
	{ maxChain: 4, niceLength: 8, lazy: false },
	{ maxChain: 8, niceLength: 16, lazy: false },
	{ maxChain: 32, niceLength: 32, lazy: false },
	{ maxChain: 16, niceLength: 16, lazy: true },
	{ maxChain: 32, niceLength: 32, lazy: true },
	{ maxChain: 128, niceLength: 128, lazy: true },
	{ maxChain: 256, niceLength: 128, lazy: true },
	{ maxChain: 1024, niceLength: MAX_MATCH, lazy: true },
	{ maxChain: 4096, niceLength: MAX_MATCH, lazy: true },
]

const FIXED_LITLEN_CODES = buildCodes(FIXED_LITLEN_LENGTHS)
const FIXED_DIST_CODES = buildCodes(FIXED_DIST_LENGTHS)

const HASH_BITS = 15
const HASH_SIZE = 1 << HASH_BITS
const WINDOW_MASK = WINDOW_SIZE - 1
const BLOCK_TOKENS = 16384

/**
 * Literal (0..255) or match packed as 256 + ((length - 3) << 15 | (distance - 1))
 */
type Token = number

function matchToken(length: number, distance: number): Token {
	return 256 + (length - MIN_MATCH) * WINDOW_SIZE + (distance - 1)
}

function tokenLength(token: Token): number {
	return Math.floor((token - 256) / WINDOW_SIZE) + MIN_MATCH
}

function tokenDistance(token: Token): number {
	return ((token - 256) & WINDOW_MASK) + 1
}

/**
 * Token run covering input bytes [start, end)
 */
interface Block {
	readonly tokens: Token[]
	readonly start: number
	readonly end: number
}

/**
 * LZ77 tokenizer with hash chains
 */
class MatchFinder {
	private readonly head = new Int32Array(HASH_SIZE).fill(-1)
	private readonly prev = new Int32Array(WINDOW_SIZE).fill(-1)
	matchLength = 0
	matchDistance = 0

	constructor(
		private readonly data: Uint8Array,
		private readonly config: LevelConfig
	) {}

	private hash(pos: number): number {
		const d = this.data
		return ((d[pos] << 10) ^ (d[pos + 1] << 5) ^ d[pos + 2]) & (HASH_SIZE - 1)
	}

	insert(pos: number): void {
		if (pos + MIN_MATCH > this.data.length) return
		const h = this.hash(pos)
		this.prev[pos & WINDOW_MASK] = this.head[h]
		this.head[h] = pos
	}

	/**
	 * Longest match for `pos`; sets matchLength (0 when none) and matchDistance
	 */
	find(pos: number): number {
		const d = this.data
		const maxLength = Math.min(MAX_MATCH, d.length - pos)
		this.matchLength = 0
		this.matchDistance = 0
		if (maxLength < MIN_MATCH) return 0

		let best = MIN_MATCH - 1
		let candidate = this.head[this.hash(pos)]
		let chain = this.config.maxChain
		while (candidate >= 0 && candidate < pos && pos - candidate <= WINDOW_SIZE && chain-- > 0) {
			if (d[candidate + best] === d[pos + best]) {
				let len = 0
				while (len < maxLength && d[candidate + len] === d[pos + len]) len++
				if (len > best) {
					best = len
					this.matchLength = len
					this.matchDistance = pos - candidate
					if (len >= this.config.niceLength) break
				}
			}
			const next = this.prev[candidate & WINDOW_MASK]
			if (next >= candidate) break
			candidate = next
		}
		return this.matchLength
	}
}

/**
 * Split input into token blocks
 */
function tokenize(data: Uint8Array, config: LevelConfig): Block[] {
	const blocks: Block[] = []
	const finder = new MatchFinder(data, config)
	let tokens: Token[] = []
	let blockStart = 0
	let pos = 0

	while (pos < data.length) {
		const length = finder.find(pos)
		const distance = finder.matchDistance
		finder.insert(pos)

		if (length >= MIN_MATCH) {
			// One-step lazy evaluation: prefer a literal when the next byte starts a longer match
			if (config.lazy && length < config.niceLength && finder.find(pos + 1) > length) {
				tokens.push(data[pos])
				pos++
			} else {
				tokens.push(matchToken(length, distance))
				for (let i = 1; i < length; i++) finder.insert(pos + i)
				pos += length
			}
		} else {
			tokens.push(data[pos])
			pos++
		}

		if (tokens.length >= BLOCK_TOKENS) {
			blocks.push({ tokens, start: blockStart, end: pos })
			tokens = []
			blockStart = pos
		}
	}

	if (tokens.length > 0 || blocks.length === 0) {
		blocks.push({ tokens, start: blockStart, end: pos })
	}
	return blocks
}

/**
 * Symbol frequencies of a block (end-of-block included)
 */
function countSymbols(tokens: readonly Token[]): { litlen: number[]; dist: number[] } {
	const litlen = new Array<number>(LITLEN_SYMBOLS).fill(0)
	const dist = new Array<number>(DIST_SYMBOLS).fill(0)
	for (const token of tokens) {
		if (token < 256) {
			litlen[token]++
		} else {
			litlen[257 + LENGTH_SYMBOL[tokenLength(token)]]++
			dist[distanceSymbol(tokenDistance(token))]++
		}
	}
	litlen[END_OF_BLOCK]++
	return { litlen, dist }
}

/**
 * Bits needed to code the given frequencies, extra bits included
 */
function codedBits(
	litlenFreq: readonly number[],
	distFreq: readonly number[],
	litlenLengths: readonly number[],
	distLengths: readonly number[]
): number {
	let bits = 0
	for (let s = 0; s < LITLEN_SYMBOLS; s++) {
		const freq = litlenFreq[s]
		if (freq === 0) continue
		bits += freq * litlenLengths[s]
		if (s > END_OF_BLOCK) bits += freq * LENGTH_EXTRA[s - 257]
	}
	for (let s = 0; s < DIST_SYMBOLS; s++) {
		bits += distFreq[s] * (distLengths[s] + DIST_EXTRA[s])
	}
	return bits
}

/**
 * Run-length coded code lengths of a dynamic header
 */
interface CodeLengthSymbol {
	readonly symbol: number
	readonly extra: number
	readonly extraBits: number
}

function runLengthEncode(lengths: readonly number[]): CodeLengthSymbol[] {
	const out: CodeLengthSymbol[] = []
	let i = 0
	while (i < lengths.length) {
		const value = lengths[i]
		let run = 1
		while (i + run < lengths.length && lengths[i + run] === value) run++
		i += run

		if (value === 0) {
			while (run >= 11) {
				const n = Math.min(run, 138)
				out.push({ symbol: 18, extra: n - 11, extraBits: 7 })
				run -= n
			}
			if (run >= 3) {
				out.push({ symbol: 17, extra: run - 3, extraBits: 3 })
				run = 0
			}
		} else {
			out.push({ symbol: value, extra: 0, extraBits: 0 })
			run--
			while (run >= 3) {
				const n = Math.min(run, 6)
				out.push({ symbol: 16, extra: n - 3, extraBits: 2 })
				run -= n
			}
		}
		for (; run > 0; run--) out.push({ symbol: value, extra: 0, extraBits: 0 })
	}
	return out
}

/**
 * Everything needed to write a dynamic block
 */
interface DynamicPlan {
	readonly litlenLengths: number[]
	readonly distLengths: number[]
	readonly hlit: number
	readonly hdist: number
	readonly hclen: number
	readonly clLengths: number[]
	readonly clSymbols: CodeLengthSymbol[]
	readonly headerBits: number
}

function planDynamic(litlenFreq: readonly number[], distFreq: readonly number[]): DynamicPlan {
	const litlenLengths = buildCodeLengths(litlenFreq, MAX_CODE_BITS)
	const distLengths = buildCodeLengths(distFreq, MAX_CODE_BITS)

	let hlit = LITLEN_SYMBOLS
	while (hlit > 257 && litlenLengths[hlit - 1] === 0) hlit--
	let hdist = DIST_SYMBOLS
	while (hdist > 1 && distLengths[hdist - 1] === 0) hdist--

	const clSymbols = runLengthEncode([...litlenLengths.slice(0, hlit), ...distLengths.slice(0, hdist)])
	const clFreq = new Array<number>(CL_SYMBOLS).fill(0)
	for (const { symbol } of clSymbols) clFreq[symbol]++
	const clLengths = buildCodeLengths(clFreq, MAX_CL_BITS)

	let hclen = CL_SYMBOLS
	while (hclen > 4 && clLengths[CL_ORDER[hclen - 1]] === 0) hclen--

	let headerBits = 5 + 5 + 4 + 3 * hclen
	for (const { symbol, extraBits } of clSymbols) headerBits += clLengths[symbol] + extraBits

	return { litlenLengths, distLengths, hlit, hdist, hclen, clLengths, clSymbols, headerBits }
}

function writeTokens(
	writer: BitWriter,
	tokens: readonly Token[],
	litlenCodes: readonly number[],
	litlenLengths: readonly number[],
	distCodes: readonly number[],
	distLengths: readonly number[]
): void {
	for (const token of tokens) {
		if (token < 256) {
			writer.bits(litlenCodes[token], litlenLengths[token])
			continue
		}
		const length = tokenLength(token)
		const distance = tokenDistance(token)
		const ls = LENGTH_SYMBOL[length]
		writer.bits(litlenCodes[257 + ls], litlenLengths[257 + ls])
		writer.bits(length - LENGTH_BASE[ls], LENGTH_EXTRA[ls])
		const ds = distanceSymbol(distance)
		writer.bits(distCodes[ds], distLengths[ds])
		writer.bits(distance - DIST_BASE[ds], DIST_EXTRA[ds])
	}
	writer.bits(litlenCodes[END_OF_BLOCK], litlenLengths[END_OF_BLOCK])
}

function writeStored(writer: BitWriter, data: Uint8Array, isFinal: boolean): void {
	let offset = 0
	do {
		const len = Math.min(MAX_STORED, data.length - offset)
		const last = isFinal && offset + len >= data.length
		writer.bits(last ? 1 : 0, 1)
		writer.bits(BlockType.Stored, 2)
		writer.u16le(len)
		writer.u16le(len ^ 0xffff)
		writer.bytes(data.subarray(offset, offset + len))
		offset += len
	} while (offset < data.length)
}

function storedBits(writer: BitWriter, length: number): number {
	const pieces = Math.max(1, Math.ceil(length / MAX_STORED))
	const pad = (8 - ((writer.bitLength + 3) % 8)) % 8
	return pieces * (3 + 32) + pad + (pieces - 1) * 5 + length * 8
}

function writeBlock(writer: BitWriter, data: Uint8Array, block: Block, isFinal: boolean): void {
	const { litlen, dist } = countSymbols(block.tokens)
	const plan = planDynamic(litlen, dist)

	const stored = storedBits(writer, block.end - block.start)
	const fixed = 3 + codedBits(litlen, dist, FIXED_LITLEN_LENGTHS, FIXED_DIST_LENGTHS)
	const dynamic = 3 + plan.headerBits + codedBits(litlen, dist, plan.litlenLengths, plan.distLengths)

	if (stored <= fixed && stored <= dynamic) {
		writeStored(writer, data.subarray(block.start, block.end), isFinal)
		return
	}

	writer.bits(isFinal ? 1 : 0, 1)
	if (fixed <= dynamic) {
		writer.bits(BlockType.Fixed, 2)
		writeTokens(writer, block.tokens, FIXED_LITLEN_CODES, FIXED_LITLEN_LENGTHS, FIXED_DIST_CODES, FIXED_DIST_LENGTHS)
		return
	}

	writer.bits(BlockType.Dynamic, 2)
	writer.bits(plan.hlit - 257, 5)
	writer.bits(plan.hdist - 1, 5)
	writer.bits(plan.hclen - 4, 4)
	for (let i = 0; i < plan.hclen; i++) writer.bits(plan.clLengths[CL_ORDER[i]], 3)
	const clCodes = buildCodes(plan.clLengths)
	for (const { symbol, extra, extraBits } of plan.clSymbols) {
		writer.bits(clCodes[symbol], plan.clLengths[symbol])
		if (extraBits > 0) writer.bits(extra, extraBits)
	}
	writeTokens(
		writer,
		block.tokens,
		buildCodes(plan.litlenLengths),
		plan.litlenLengths,
		buildCodes(plan.distLengths),
		plan.distLengths
	)
}

function assertLevel(level: number): void {
	if (!Number.isInteger(level) || level < 0 || level > 9) {
		throw new InvalidInputError(`Compression level must be an integer 0..9, got ${level}`)
	}
}

/**
 * Compress to a raw deflate stream (no zlib framing)
 */
export function deflateRaw(data: Uint8Array, level = 6): Uint8Array {
	assertLevel(level)
	const writer = new BitWriter(Math.max(64, data.length >> 1))

	if (level === 0) {
		writeStored(writer, data, true)
		return writer.finish()
	}

	const blocks = tokenize(data, LEVELS[level])
	for (let i = 0; i < blocks.length; i++) {
		writeBlock(writer, data, blocks[i], i === blocks.length - 1)
	}
	return writer.finish()
}

/**
 * Compress to a zlib stream: 2-byte header, deflate data, big-endian Adler-32
 */
export function deflate(data: Uint8Array, level = 6): Uint8Array {
	const body = deflateRaw(data, level)
	const cmf = 0x78 // deflate, 32 KiB window
	const flevel = level < 2 ? 0 : level < 6 ? 1 : level === 6 ? 2 : 3
	let flg = flevel << 6
	flg += (31 - ((cmf * 256 + flg) % 31)) % 31

	const out = new Uint8Array(body.length + 6)
	out[0] = cmf
	out[1] = flg
	out.set(body, 2)
	const checksum = adler32(data)
	const end = body.length + 2
	out[end] = (checksum >>> 24) & 0xff
	out[end + 1] = (checksum >>> 16) & 0xff
	out[end + 2] = (checksum >>> 8) & 0xff
	out[end + 3] = checksum & 0xff
	return out
}
