import { ByteReader, ByteWriter, CorruptStreamError, InvalidInputError, crc32 } from '@pixel-codec/core'
import { PNG_SIGNATURE } from './types'

const MAX_CHUNK_LENGTH = 0x7fffffff

/**
 * Decoded chunk: type, payload view and stored CRC
 */
export interface Chunk {
	readonly type: string
	readonly data: Uint8Array
	readonly crc: number
}

/**
 * Chunk to be written; length and CRC are computed
 */
export interface ChunkInput {
	readonly type: string
	readonly data: Uint8Array
}

function isChunkType(type: string): boolean {
	return /^[A-Za-z]{4}$/.test(type)
}

/**
 * Whether decoders must understand the chunk (uppercase first letter)
 */
export function isCriticalChunk(type: string): boolean {
	return (type.charCodeAt(0) & 0x20) === 0
}

/**
 * Lazily read chunks after the signature. Each chunk is yielded only
 * after its CRC checks out; the first violation throws.
 */
export function* readChunks(data: Uint8Array, signature: Uint8Array = PNG_SIGNATURE): Generator<Chunk, void, undefined> {
	if (data.length < signature.length || signature.some((byte, i) => data[i] !== byte)) {
		throw new CorruptStreamError('Invalid signature')
	}

	const reader = new ByteReader(data, signature.length, 'chunk')
	while (reader.remaining > 0) {
		const length = reader.u32be()
		const typeStart = reader.position
		const type = reader.ascii(4)
		if (!isChunkType(type)) {
			throw new CorruptStreamError('Invalid chunk type', { metadata: { offset: typeStart } })
		}
		if (length > MAX_CHUNK_LENGTH || length + 4 > reader.remaining) {
			throw new CorruptStreamError(`Truncated ${type} chunk`, {
				metadata: { length, remaining: reader.remaining },
			})
		}

		const payload = reader.bytes(length)
		const crc = reader.u32be()
		const actual = crc32(data, typeStart, typeStart + 4 + length)
		if (crc !== actual) {
			throw new CorruptStreamError(`CRC mismatch in chunk ${type}`, { metadata: { expected: crc, actual } })
		}

		yield { type, data: payload, crc }
	}
}

/**
 * Serialize one chunk: length, type, payload, CRC over type and payload
 */
export function createChunk(type: string, data: Uint8Array): Uint8Array {
	return new ByteWriter(12 + data.length).u32be(data.length).ascii(type).bytes(data).u32be(chunkCrc(type, data)).toBytes()
}

function chunkCrc(type: string, data: Uint8Array): number {
	if (!isChunkType(type)) {
		throw new InvalidInputError(`Invalid chunk type "${type}"`)
	}
	const typed = new Uint8Array(4 + data.length)
	for (let i = 0; i < 4; i++) typed[i] = type.charCodeAt(i)
	typed.set(data, 4)
	return crc32(typed)
}

/**
 * Signature followed by the chunks in the given order
 */
export function writeChunks(chunks: readonly ChunkInput[], signature: Uint8Array = PNG_SIGNATURE): Uint8Array {
	let total = signature.length
	for (const chunk of chunks) total += 12 + chunk.data.length

	const writer = new ByteWriter(total)
	writer.bytes(signature)
	for (const { type, data } of chunks) {
		writer.u32be(data.length).ascii(type).bytes(data).u32be(chunkCrc(type, data))
	}
	return writer.toBytes()
}
