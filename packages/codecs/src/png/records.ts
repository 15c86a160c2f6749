import { ByteReader, ByteWriter, CorruptStreamError, UnsupportedFormatError } from '@pixel-codec/core'
import type { Rgba } from '@pixel-codec/core'
import { type Chunk, type ChunkInput, isCriticalChunk } from './chunks'
import {
	type AnimationControl,
	BlendOp,
	type ColorType,
	DisposeOp,
	type FrameControl,
	type PngHeader,
	type PngRecord,
} from './types'

function expectLength(chunk: Chunk, length: number): void {
	if (chunk.data.length !== length) {
		throw new CorruptStreamError(`Invalid ${chunk.type} chunk length ${chunk.data.length}`)
	}
}

function parseHeader(chunk: Chunk): PngHeader {
	expectLength(chunk, 13)
	const reader = new ByteReader(chunk.data, 0, 'IHDR')
	const width = reader.u32be()
	const height = reader.u32be()
	const bitDepth = reader.u8()
	const colorType = reader.u8()
	if (colorType !== 0 && colorType !== 2 && colorType !== 3 && colorType !== 4 && colorType !== 6) {
		throw new UnsupportedFormatError(`Unsupported color type ${colorType}`)
	}
	return {
		width,
		height,
		bitDepth,
		colorType,
		compressionMethod: reader.u8(),
		filterMethod: reader.u8(),
		interlaceMethod: reader.u8(),
	}
}

function parsePalette(chunk: Chunk): Rgba[] {
	const { data } = chunk
	if (data.length === 0 || data.length % 3 !== 0 || data.length > 256 * 3) {
		throw new CorruptStreamError(`Invalid PLTE chunk length ${data.length}`)
	}
	const palette: Rgba[] = []
	for (let i = 0; i < data.length; i += 3) {
		palette.push([data[i], data[i + 1], data[i + 2], 255])
	}
	return palette
}

function parseFrameControl(chunk: Chunk): FrameControl {
	expectLength(chunk, 26)
	const reader = new ByteReader(chunk.data, 0, 'fcTL')
	const sequenceNumber = reader.u32be()
	const width = reader.u32be()
	const height = reader.u32be()
	const xOffset = reader.u32be()
	const yOffset = reader.u32be()
	const delayNum = reader.u16be()
	const delayDen = reader.u16be()
	const disposeOp = reader.u8()
	const blendOp = reader.u8()
	if (disposeOp !== DisposeOp.None && disposeOp !== DisposeOp.Background && disposeOp !== DisposeOp.Previous) {
		throw new CorruptStreamError(`Invalid dispose op ${disposeOp}`)
	}
	if (blendOp !== BlendOp.Source && blendOp !== BlendOp.Over) {
		throw new CorruptStreamError(`Invalid blend op ${blendOp}`)
	}
	return { sequenceNumber, width, height, xOffset, yOffset, delayNum, delayDen, disposeOp, blendOp }
}

/**
 * Interpret a chunk. Unknown critical chunks are unsupported; unknown
 * ancillary chunks are reported as such and can be skipped.
 */
export function parseRecord(chunk: Chunk): PngRecord {
	switch (chunk.type) {
		case 'IHDR':
			return { kind: 'header', header: parseHeader(chunk) }
		case 'PLTE':
			return { kind: 'palette', palette: parsePalette(chunk) }
		case 'tRNS':
			return { kind: 'transparency', data: chunk.data }
		case 'IDAT':
			return { kind: 'data', data: chunk.data }
		case 'IEND':
			return { kind: 'end' }
		case 'acTL': {
			expectLength(chunk, 8)
			const reader = new ByteReader(chunk.data, 0, 'acTL')
			return { kind: 'animationControl', control: { numFrames: reader.u32be(), numPlays: reader.u32be() } }
		}
		case 'fcTL':
			return { kind: 'frameControl', control: parseFrameControl(chunk) }
		case 'fdAT': {
			if (chunk.data.length < 4) throw new CorruptStreamError('Truncated fdAT chunk')
			const reader = new ByteReader(chunk.data, 0, 'fdAT')
			return { kind: 'frameData', sequenceNumber: reader.u32be(), data: chunk.data.subarray(4) }
		}
		default:
			if (isCriticalChunk(chunk.type)) {
				throw new UnsupportedFormatError(`Unsupported critical chunk ${chunk.type}`)
			}
			return { kind: 'ancillary', type: chunk.type }
	}
}

/**
 * IHDR chunk for the given layout
 */
export function headerChunk(width: number, height: number, colorType: ColorType, bitDepth: number): ChunkInput {
	const data = new ByteWriter(13)
		.u32be(width)
		.u32be(height)
		.u8(bitDepth)
		.u8(colorType)
		.u8(0) // Compression method
		.u8(0) // Filter method
		.u8(0) // Interlace method
		.toBytes()
	return { type: 'IHDR', data }
}

/**
 * acTL chunk
 */
export function animationControlChunk(control: AnimationControl): ChunkInput {
	return { type: 'acTL', data: new ByteWriter(8).u32be(control.numFrames).u32be(control.numPlays).toBytes() }
}

/**
 * fcTL chunk
 */
export function frameControlChunk(control: FrameControl): ChunkInput {
	const data = new ByteWriter(26)
		.u32be(control.sequenceNumber)
		.u32be(control.width)
		.u32be(control.height)
		.u32be(control.xOffset)
		.u32be(control.yOffset)
		.u16be(control.delayNum)
		.u16be(control.delayDen)
		.u8(control.disposeOp)
		.u8(control.blendOp)
		.toBytes()
	return { type: 'fcTL', data }
}

/**
 * fdAT chunk: sequence number followed by compressed data
 */
export function frameDataChunk(sequenceNumber: number, compressed: Uint8Array): ChunkInput {
	return { type: 'fdAT', data: new ByteWriter(4 + compressed.length).u32be(sequenceNumber).bytes(compressed).toBytes() }
}
