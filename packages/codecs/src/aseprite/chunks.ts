import { BLEND_MODES, type BlendMode } from '@pixel-codec/composite'
import { ByteReader, CorruptStreamError, type Rgba, UnsupportedFormatError } from '@pixel-codec/core'
import { inflate } from '../zlib'
import {
	type AsepriteChunk,
	type AsepriteHeader,
	type AsepriteTag,
	type CelRecord,
	CelType,
	ChunkType,
	FLAG_LAYER_OPACITY,
	LayerType,
	type PaletteEntry,
	type TagDirection,
} from './types'

const DIRECTIONS: readonly TagDirection[] = ['forward', 'reverse', 'ping-pong', 'ping-pong-reverse']

const utf8 = new TextDecoder()

function readString(reader: ByteReader): string {
	return utf8.decode(reader.bytes(reader.u16le()))
}

/**
 * Aseprite blend mode id as a compositing mode; unknown ids blend normally
 */
export function blendModeFromId(id: number): BlendMode {
	return id < BLEND_MODES.length ? BLEND_MODES[id] : 'normal'
}

function parsePalette(reader: ByteReader): AsepriteChunk {
	const size = reader.u32le()
	const first = reader.u32le()
	const last = reader.u32le()
	reader.skip(8)
	if (last < first || size > 256 || last >= size) {
		throw new CorruptStreamError(`Invalid palette range ${first}..${last} of ${size}`)
	}

	const entries: PaletteEntry[] = []
	for (let index = first; index <= last; index++) {
		const flags = reader.u16le()
		const color: Rgba = [reader.u8(), reader.u8(), reader.u8(), reader.u8()]
		entries.push(flags & 1 ? { index, color, name: readString(reader) } : { index, color })
	}
	return { kind: 'palette', size, entries }
}

/**
 * Packets of [skip, count, rgb...]; skips accumulate across packets
 */
function parseOldPalette(reader: ByteReader, sixBit: boolean): AsepriteChunk {
	const scale = (value: number): number => (sixBit ? Math.round((value * 255) / 63) : value)
	const entries: PaletteEntry[] = []
	let index = 0
	const packets = reader.u16le()
	for (let p = 0; p < packets; p++) {
		index += reader.u8()
		const count = reader.u8() || 256
		for (let i = 0; i < count; i++) {
			entries.push({ index: index++, color: [scale(reader.u8()), scale(reader.u8()), scale(reader.u8()), 255] })
		}
	}
	if (index > 256) throw new CorruptStreamError('Old palette chunk runs past 256 colors')
	return { kind: 'oldPalette', entries }
}

function parseLayer(reader: ByteReader, header: AsepriteHeader): AsepriteChunk {
	const flags = reader.u16le()
	const type = reader.u16le()
	const childLevel = reader.u16le()
	reader.skip(4) // Default width and height
	const blendMode = blendModeFromId(reader.u16le())
	const opacity = reader.u8()
	reader.skip(3)
	const name = readString(reader)

	if (type !== LayerType.Image && type !== LayerType.Group && type !== LayerType.Tilemap) {
		throw new CorruptStreamError(`Unknown layer type ${type}`)
	}
	return {
		kind: 'layer',
		layer: {
			name,
			flags,
			type,
			childLevel,
			blendMode,
			opacity: header.flags & FLAG_LAYER_OPACITY ? opacity : 255,
			visible: (flags & 1) !== 0,
		},
	}
}

function parseCel(reader: ByteReader, header: AsepriteHeader): AsepriteChunk {
	const layerIndex = reader.u16le()
	const x = reader.i16le()
	const y = reader.i16le()
	const opacity = reader.u8()
	const celType = reader.u16le()
	const zIndex = reader.i16le()
	reader.skip(5)

	const bytesPerPixel = header.colorDepth / 8
	const base = { layerIndex, x, y, opacity, zIndex }
	let cel: CelRecord

	switch (celType) {
		case CelType.Raw: {
			const width = reader.u16le()
			const height = reader.u16le()
			const samples = reader.bytes(width * height * bytesPerPixel)
			cel = { ...base, type: 'raw', payload: { kind: 'pixels', width, height, samples } }
			break
		}
		case CelType.Linked:
			cel = { ...base, type: 'linked', payload: { kind: 'link', frame: reader.u16le() } }
			break
		case CelType.Compressed: {
			const width = reader.u16le()
			const height = reader.u16le()
			const samples = inflate(reader.bytes(reader.remaining))
			if (samples.length < width * height * bytesPerPixel) {
				throw new CorruptStreamError(`Truncated cel on layer ${layerIndex}`)
			}
			cel = {
				...base,
				type: 'compressed',
				payload: { kind: 'pixels', width, height, samples: samples.subarray(0, width * height * bytesPerPixel) },
			}
			break
		}
		case CelType.CompressedTilemap:
			throw new UnsupportedFormatError('Tilemap cels are not supported')
		default:
			throw new CorruptStreamError(`Unknown cel type ${celType}`)
	}
	return { kind: 'cel', cel }
}

function parseTags(reader: ByteReader): AsepriteChunk {
	const count = reader.u16le()
	reader.skip(8)
	const tags: AsepriteTag[] = []
	for (let i = 0; i < count; i++) {
		const from = reader.u16le()
		const to = reader.u16le()
		const directionId = reader.u8()
		const repeat = reader.u16le()
		reader.skip(6)
		const color: Rgba = [reader.u8(), reader.u8(), reader.u8(), 255]
		reader.skip(1)
		const name = readString(reader)
		if (directionId >= DIRECTIONS.length) {
			throw new CorruptStreamError(`Tag ${name} has unknown direction ${directionId}`)
		}
		tags.push({ name, from, to, direction: DIRECTIONS[directionId], repeat, color })
	}
	return { kind: 'tags', tags }
}

/**
 * Parse one chunk body; types this reader does not use come back as unknown
 */
export function parseChunk(type: number, data: Uint8Array, header: AsepriteHeader): AsepriteChunk {
	const reader = new ByteReader(data, 0, `chunk 0x${type.toString(16).padStart(4, '0')}`)
	switch (type) {
		case ChunkType.Palette:
			return parsePalette(reader)
		case ChunkType.OldPalette:
			return parseOldPalette(reader, false)
		case ChunkType.OldPalette64:
			return parseOldPalette(reader, true)
		case ChunkType.Layer:
			return parseLayer(reader, header)
		case ChunkType.Cel:
			return parseCel(reader, header)
		case ChunkType.Tags:
			return parseTags(reader)
		default:
			return { kind: 'unknown', type }
	}
}
