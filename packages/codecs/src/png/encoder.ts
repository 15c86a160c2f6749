import {
	InvalidInputError,
	type Palette,
	type PixelBuffer,
	assertPalette,
	assertPixelBuffer,
	packRgba,
	parseOptions,
} from '@pixel-codec/core'
import { z } from 'zod'
import { deflate } from '../zlib'
import { type ChunkInput, writeChunks } from './chunks'
import { filterRows } from './filter'
import { headerChunk } from './records'
import { ColorType, type PngMode } from './types'

/**
 * PNG encode options
 */
export interface PngEncodeOptions {
	/** Color layout, default truecolor with alpha */
	mode?: PngMode
	/** Required in indexed mode */
	palette?: Palette
	/** Per-pixel palette indices; looked up exactly from the palette when omitted */
	indices?: Uint8Array
	/** Deflate level 0-9 */
	level?: number
}

const optionsSchema = z.object({
	mode: z.enum(['truecolor-alpha', 'indexed']).default('truecolor-alpha'),
	level: z.number().int().min(0).max(9).default(6),
})

/**
 * Filter and compress RGBA rows (color type 6, 8-bit)
 */
export function compressRgba(image: PixelBuffer, level = 6): Uint8Array {
	return deflate(filterRows(image.data, image.width * 4, image.height, 4), level)
}

/**
 * Smallest bit depth that can index the palette
 */
export function indexBitDepth(paletteSize: number): number {
	if (paletteSize <= 2) return 1
	if (paletteSize <= 4) return 2
	if (paletteSize <= 16) return 4
	return 8
}

/**
 * Palette index of every pixel, by exact color match
 */
function lookupIndices(image: PixelBuffer, palette: Palette): Uint8Array {
	const lookup = new Map<number, number>()
	palette.forEach(([r, g, b, a], i) => {
		const key = packRgba(r, g, b, a)
		if (!lookup.has(key)) lookup.set(key, i)
	})

	const { data } = image
	const indices = new Uint8Array(image.width * image.height)
	for (let i = 0; i < indices.length; i++) {
		const o = i * 4
		const index = lookup.get(packRgba(data[o], data[o + 1], data[o + 2], data[o + 3]))
		if (index === undefined) {
			throw new InvalidInputError(`Pixel ${i % image.width},${Math.floor(i / image.width)} is not in the palette`)
		}
		indices[i] = index
	}
	return indices
}

/**
 * Pack indices MSB first into rows of the given bit depth
 */
function packIndices(indices: Uint8Array, width: number, height: number, bitDepth: number): Uint8Array {
	if (bitDepth === 8) return indices
	const rowBytes = Math.ceil((width * bitDepth) / 8)
	const packed = new Uint8Array(rowBytes * height)
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const bit = x * bitDepth
			packed[y * rowBytes + (bit >> 3)] |= indices[y * width + x] << (8 - bitDepth - (bit & 7))
		}
	}
	return packed
}

function indexedChunks(image: PixelBuffer, palette: Palette, indices: Uint8Array, level: number): ChunkInput[] {
	const { width, height } = image
	const bitDepth = indexBitDepth(palette.length)

	const plte = new Uint8Array(palette.length * 3)
	palette.forEach(([r, g, b], i) => plte.set([r, g, b], i * 3))

	let lastTranslucent = -1
	palette.forEach(([, , , a], i) => {
		if (a < 255) lastTranslucent = i
	})

	const rowBytes = Math.ceil((width * bitDepth) / 8)
	const packed = packIndices(indices, width, height, bitDepth)

	const chunks: ChunkInput[] = [headerChunk(width, height, ColorType.Indexed, bitDepth), { type: 'PLTE', data: plte }]
	if (lastTranslucent >= 0) {
		chunks.push({ type: 'tRNS', data: Uint8Array.from(palette.slice(0, lastTranslucent + 1), ([, , , a]) => a) })
	}
	chunks.push({ type: 'IDAT', data: deflate(filterRows(packed, rowBytes, height, 1), level) })
	return chunks
}

/**
 * Encode a pixel buffer as PNG
 */
export function encodePng(image: PixelBuffer, options: PngEncodeOptions = {}): Uint8Array {
	const { mode, level } = parseOptions(optionsSchema, options, 'PNG encode')
	assertPixelBuffer(image)

	if (mode === 'truecolor-alpha') {
		return writeChunks([
			headerChunk(image.width, image.height, ColorType.RGBA, 8),
			{ type: 'IDAT', data: compressRgba(image, level) },
			{ type: 'IEND', data: new Uint8Array(0) },
		])
	}

	const { palette } = options
	if (!palette) {
		throw new InvalidInputError('Indexed PNG requires a palette')
	}
	assertPalette(palette)

	let indices = options.indices
	if (indices) {
		if (indices.length !== image.width * image.height) {
			throw new InvalidInputError(`Expected ${image.width * image.height} indices, got ${indices.length}`)
		}
		const outOfRange = indices.findIndex((index) => index >= palette.length)
		if (outOfRange >= 0) {
			throw new InvalidInputError(`Index ${indices[outOfRange]} at pixel ${outOfRange} exceeds palette size`)
		}
	} else {
		indices = lookupIndices(image, palette)
	}

	return writeChunks([...indexedChunks(image, palette, indices, level), { type: 'IEND', data: new Uint8Array(0) }])
}
