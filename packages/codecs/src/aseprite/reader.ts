import { ByteReader, CorruptStreamError, type Palette, type PixelBuffer, type Rgba, UnsupportedFormatError } from '@pixel-codec/core'
import { parseChunk } from './chunks'
import { AsepriteSprite } from './sprite'
import {
	type AsepriteCel,
	type AsepriteFrame,
	type AsepriteHeader,
	type AsepriteLayer,
	type AsepriteTag,
	type CelRecord,
	ColorDepth,
	FILE_MAGIC,
	FRAME_MAGIC,
	HEADER_SIZE,
	LayerType,
} from './types'

const CHUNK_HEADER_SIZE = 6
const FRAME_HEADER_SIZE = 16

interface RawFrame {
	readonly duration: number
	readonly cels: Map<number, CelRecord>
}

/**
 * Check for the Aseprite magic number at offset 4
 */
export function isAseprite(data: Uint8Array): boolean {
	return data.length >= 6 && (data[4] | (data[5] << 8)) === FILE_MAGIC
}

export function readAsepriteHeader(data: Uint8Array): AsepriteHeader {
	const reader = new ByteReader(data, 0, 'Aseprite header')
	if (data.length < HEADER_SIZE) {
		throw new CorruptStreamError('Truncated Aseprite header')
	}
	const fileSize = reader.u32le()
	const magic = reader.u16le()
	if (magic !== FILE_MAGIC) {
		throw new CorruptStreamError(`Invalid Aseprite magic 0x${magic.toString(16)}`)
	}
	const frameCount = reader.u16le()
	const width = reader.u16le()
	const height = reader.u16le()
	const colorDepth = reader.u16le()
	if (colorDepth !== ColorDepth.Indexed && colorDepth !== ColorDepth.Grayscale && colorDepth !== ColorDepth.Rgba) {
		throw new UnsupportedFormatError(`Unsupported Aseprite color depth ${colorDepth}`)
	}
	const flags = reader.u32le()
	reader.skip(2 + 8) // Deprecated speed, reserved
	const transparentIndex = reader.u8()
	reader.skip(3)
	const colorCount = reader.u16le()
	const pixelWidth = reader.u8()
	const pixelHeight = reader.u8()

	return {
		fileSize,
		frameCount,
		width,
		height,
		colorDepth,
		flags,
		transparentIndex,
		// 0 means 256 in older files
		colorCount: colorCount || 256,
		pixelWidth,
		pixelHeight,
	}
}

/**
 * Group membership from the flat layer list: a layer belongs to the closest
 * earlier layer one child level up
 */
function assignParents(layers: readonly Omit<AsepriteLayer, 'parent'>[]): AsepriteLayer[] {
	const lastAtLevel: number[] = []
	return layers.map((layer, index) => {
		const level = layer.childLevel
		const parentIndex = level > 0 ? lastAtLevel[level - 1] : undefined
		lastAtLevel[level] = index
		lastAtLevel.length = level + 1
		const parent = parentIndex !== undefined && layers[parentIndex].type === LayerType.Group ? parentIndex : null
		return { ...layer, parent }
	})
}

function samplesToPixels(
	header: AsepriteHeader,
	palette: Palette,
	width: number,
	height: number,
	samples: Uint8Array
): PixelBuffer {
	const data = new Uint8Array(width * height * 4)
	const count = width * height

	switch (header.colorDepth) {
		case ColorDepth.Rgba:
			data.set(samples.subarray(0, count * 4))
			break
		case ColorDepth.Grayscale:
			for (let i = 0; i < count; i++) {
				const v = samples[i * 2]
				data[i * 4] = v
				data[i * 4 + 1] = v
				data[i * 4 + 2] = v
				data[i * 4 + 3] = samples[i * 2 + 1]
			}
			break
		case ColorDepth.Indexed:
			for (let i = 0; i < count; i++) {
				const index = samples[i]
				if (index === header.transparentIndex) continue
				// Indices past the palette read as gray
				const color: Rgba = index < palette.length ? palette[index] : [index, index, index, 255]
				data.set(color, i * 4)
			}
			break
	}
	return { width, height, data }
}

/**
 * Turn cel records into cels; linked cels reuse the image of the cel they point to
 */
function resolveCels(
	rawFrames: readonly RawFrame[],
	layerCount: number,
	header: AsepriteHeader,
	palette: Palette
): AsepriteFrame[] {
	const frames: AsepriteFrame[] = []

	rawFrames.forEach((raw, frameIndex) => {
		const cels = new Map<number, AsepriteCel>()
		for (const [layerIndex, record] of raw.cels) {
			if (layerIndex >= layerCount) {
				throw new CorruptStreamError(`Cel in frame ${frameIndex} refers to missing layer ${layerIndex}`)
			}
			const { payload, ...placement } = record
			if (payload.kind === 'pixels') {
				const image = samplesToPixels(header, palette, payload.width, payload.height, payload.samples)
				cels.set(layerIndex, { ...placement, linkedFrame: null, image })
				continue
			}
			if (payload.frame >= frameIndex) {
				throw new CorruptStreamError(`Cel in frame ${frameIndex} links to later frame ${payload.frame}`)
			}
			const source = frames[payload.frame].cels.get(layerIndex)
			if (!source) {
				throw new CorruptStreamError(`Cel in frame ${frameIndex} links to frame ${payload.frame} with no cel on layer ${layerIndex}`)
			}
			cels.set(layerIndex, { ...placement, linkedFrame: payload.frame, image: source.image })
		}
		frames.push({ duration: raw.duration, cels })
	})
	return frames
}

/**
 * Decode an Aseprite (.ase/.aseprite) document
 */
export function decodeAseprite(data: Uint8Array): AsepriteSprite {
	const header = readAsepriteHeader(data)
	const reader = new ByteReader(data, HEADER_SIZE, 'Aseprite frame')

	const layers: Omit<AsepriteLayer, 'parent'>[] = []
	const tags: AsepriteTag[] = []
	const rawFrames: RawFrame[] = []
	const paletteNames = new Map<number, string>()
	let palette: Rgba[] = []
	let hasNewPalette = false

	for (let frameIndex = 0; frameIndex < header.frameCount; frameIndex++) {
		const frameStart = reader.position
		const frameSize = reader.u32le()
		const magic = reader.u16le()
		if (magic !== FRAME_MAGIC) {
			throw new CorruptStreamError(`Invalid magic 0x${magic.toString(16)} in frame ${frameIndex}`)
		}
		const oldChunkCount = reader.u16le()
		const duration = reader.u16le()
		reader.skip(2)
		const newChunkCount = reader.u32le()
		const chunkCount = newChunkCount || oldChunkCount

		const frameEnd = frameStart + frameSize
		if (frameSize < FRAME_HEADER_SIZE || frameEnd > data.length) {
			throw new CorruptStreamError(`Truncated Aseprite frame ${frameIndex}`)
		}

		const cels = new Map<number, CelRecord>()
		for (let c = 0; c < chunkCount; c++) {
			const chunkStart = reader.position
			const chunkSize = reader.u32le()
			const chunkType = reader.u16le()
			if (chunkSize < CHUNK_HEADER_SIZE || chunkStart + chunkSize > frameEnd) {
				throw new CorruptStreamError(`Truncated chunk 0x${chunkType.toString(16)} in frame ${frameIndex}`)
			}
			const chunk = parseChunk(chunkType, reader.bytes(chunkSize - CHUNK_HEADER_SIZE), header)

			switch (chunk.kind) {
				case 'palette':
					hasNewPalette = true
					palette = palette.slice(0, chunk.size)
					while (palette.length < chunk.size) palette.push([0, 0, 0, 255])
					for (const entry of chunk.entries) {
						palette[entry.index] = entry.color
						if (entry.name !== undefined) paletteNames.set(entry.index, entry.name)
					}
					break
				case 'oldPalette':
					// Kept for compatibility; the newer chunk wins when both exist
					if (hasNewPalette) break
					for (const entry of chunk.entries) {
						while (palette.length <= entry.index) palette.push([0, 0, 0, 255])
						palette[entry.index] = entry.color
					}
					break
				case 'layer':
					layers.push(chunk.layer)
					break
				case 'cel':
					cels.set(chunk.cel.layerIndex, chunk.cel)
					break
				case 'tags':
					tags.push(...chunk.tags)
					break
				case 'unknown':
					break
			}
		}
		reader.seek(frameEnd)
		rawFrames.push({ duration, cels })
	}

	for (const tag of tags) {
		if (tag.from > tag.to || tag.to >= header.frameCount) {
			throw new CorruptStreamError(`Tag ${tag.name} covers frames ${tag.from}..${tag.to} of ${header.frameCount}`)
		}
	}

	const frames = resolveCels(rawFrames, layers.length, header, palette)
	return new AsepriteSprite(header, assignParents(layers), frames, tags, palette, paletteNames)
}
