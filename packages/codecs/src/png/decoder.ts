import {
	CorruptStreamError,
	type PixelBuffer,
	type Rgba,
	UnsupportedFormatError,
	concatBytes,
} from '@pixel-codec/core'
import { inflate } from '../zlib'
import { readChunks } from './chunks'
import { unfilterRows } from './filter'
import { parseRecord } from './records'
import { ColorType, type PngHeader } from './types'

const ALLOWED_DEPTHS: Record<ColorType, readonly number[]> = {
	[ColorType.Grayscale]: [1, 2, 4, 8, 16],
	[ColorType.RGB]: [8, 16],
	[ColorType.Indexed]: [1, 2, 4, 8],
	[ColorType.GrayscaleAlpha]: [8, 16],
	[ColorType.RGBA]: [8, 16],
}

const CHANNELS: Record<ColorType, number> = {
	[ColorType.Grayscale]: 1,
	[ColorType.RGB]: 3,
	[ColorType.Indexed]: 1,
	[ColorType.GrayscaleAlpha]: 2,
	[ColorType.RGBA]: 4,
}

/**
 * Palette and transparency needed to expand samples
 */
export interface PixelFormat {
	readonly header: PngHeader
	readonly palette?: readonly Rgba[]
	readonly transparency?: Uint8Array
}

/**
 * Reject layouts this decoder does not implement
 */
export function validateHeader(header: PngHeader): void {
	if (header.width === 0 || header.height === 0) {
		throw new CorruptStreamError(`Invalid image size ${header.width}x${header.height}`)
	}
	if (!ALLOWED_DEPTHS[header.colorType].includes(header.bitDepth)) {
		throw new UnsupportedFormatError(
			`Unsupported bit depth ${header.bitDepth} for color type ${header.colorType}`
		)
	}
	if (header.compressionMethod !== 0) {
		throw new UnsupportedFormatError(`Unknown compression method ${header.compressionMethod}`)
	}
	if (header.filterMethod !== 0) {
		throw new UnsupportedFormatError(`Unknown filter method ${header.filterMethod}`)
	}
	if (header.interlaceMethod !== 0) {
		throw new UnsupportedFormatError(
			header.interlaceMethod === 1 ? 'Adam7 interlacing is not supported' : 'Unknown interlace method'
		)
	}
}

/**
 * Read one sample of `depth` bits; 16-bit samples return their full value
 */
function sample(row: Uint8Array, index: number, depth: number): number {
	if (depth === 8) return row[index]
	if (depth === 16) return (row[index * 2] << 8) | row[index * 2 + 1]
	const bit = index * depth
	return (row[bit >> 3] >> (8 - depth - (bit & 7))) & ((1 << depth) - 1)
}

/**
 * Scale a sample to 8 bits
 */
function to8(value: number, depth: number): number {
	if (depth === 8) return value
	if (depth === 16) return value >> 8
	return Math.round((value * 255) / ((1 << depth) - 1))
}

/**
 * Expand unfiltered rows to RGBA
 */
function expand(raw: Uint8Array, width: number, height: number, rowBytes: number, format: PixelFormat): Uint8Array {
	const { colorType, bitDepth } = format.header
	const { palette, transparency } = format
	const out = new Uint8Array(width * height * 4)

	const trnsGray = colorType === ColorType.Grayscale && transparency && transparency.length >= 2
		? (transparency[0] << 8) | transparency[1]
		: -1
	const trnsRgb =
		colorType === ColorType.RGB && transparency && transparency.length >= 6
			? [
					(transparency[0] << 8) | transparency[1],
					(transparency[2] << 8) | transparency[3],
					(transparency[4] << 8) | transparency[5],
				]
			: null

	for (let y = 0; y < height; y++) {
		const row = raw.subarray(y * rowBytes, (y + 1) * rowBytes)
		for (let x = 0; x < width; x++) {
			const o = (y * width + x) * 4
			switch (colorType) {
				case ColorType.Grayscale: {
					const v = sample(row, x, bitDepth)
					const g = to8(v, bitDepth)
					out[o] = out[o + 1] = out[o + 2] = g
					out[o + 3] = v === trnsGray ? 0 : 255
					break
				}
				case ColorType.RGB: {
					const r = sample(row, x * 3, bitDepth)
					const g = sample(row, x * 3 + 1, bitDepth)
					const b = sample(row, x * 3 + 2, bitDepth)
					out[o] = to8(r, bitDepth)
					out[o + 1] = to8(g, bitDepth)
					out[o + 2] = to8(b, bitDepth)
					out[o + 3] = trnsRgb && r === trnsRgb[0] && g === trnsRgb[1] && b === trnsRgb[2] ? 0 : 255
					break
				}
				case ColorType.Indexed: {
					const index = sample(row, x, bitDepth)
					if (!palette || index >= palette.length) {
						throw new CorruptStreamError(`Palette index ${index} out of range`)
					}
					const [r, g, b] = palette[index]
					out[o] = r
					out[o + 1] = g
					out[o + 2] = b
					out[o + 3] = transparency && index < transparency.length ? transparency[index] : 255
					break
				}
				case ColorType.GrayscaleAlpha: {
					const g = to8(sample(row, x * 2, bitDepth), bitDepth)
					out[o] = out[o + 1] = out[o + 2] = g
					out[o + 3] = to8(sample(row, x * 2 + 1, bitDepth), bitDepth)
					break
				}
				case ColorType.RGBA:
					out[o] = to8(sample(row, x * 4, bitDepth), bitDepth)
					out[o + 1] = to8(sample(row, x * 4 + 1, bitDepth), bitDepth)
					out[o + 2] = to8(sample(row, x * 4 + 2, bitDepth), bitDepth)
					out[o + 3] = to8(sample(row, x * 4 + 3, bitDepth), bitDepth)
					break
			}
		}
	}
	return out
}

/**
 * Decompress, unfilter and expand one image of the given size
 */
export function decodeImageData(compressed: Uint8Array, width: number, height: number, format: PixelFormat): PixelBuffer {
	const { colorType, bitDepth } = format.header
	const bitsPerPixel = CHANNELS[colorType] * bitDepth
	const rowBytes = Math.ceil((width * bitsPerPixel) / 8)
	const bpp = Math.max(1, bitsPerPixel >> 3)

	const raw = unfilterRows(inflate(compressed), rowBytes, height, bpp)
	return { width, height, data: expand(raw, width, height, rowBytes, format) }
}

/**
 * Read the IHDR fields without decoding pixels
 */
export function readPngHeader(data: Uint8Array): PngHeader {
	for (const chunk of readChunks(data)) {
		const record = parseRecord(chunk)
		if (record.kind !== 'header') break
		return record.header
	}
	throw new CorruptStreamError('IHDR must be the first chunk')
}

/**
 * Decode PNG to a pixel buffer (the default image of an animated PNG)
 */
export function decodePng(data: Uint8Array): PixelBuffer {
	let header: PngHeader | undefined
	let palette: Rgba[] | undefined
	let transparency: Uint8Array | undefined
	const idat: Uint8Array[] = []
	let ended = false

	for (const chunk of readChunks(data)) {
		const record = parseRecord(chunk)
		if (!header && record.kind !== 'header') {
			throw new CorruptStreamError('IHDR must be the first chunk')
		}

		switch (record.kind) {
			case 'header':
				if (header) throw new CorruptStreamError('Duplicate IHDR chunk')
				validateHeader(record.header)
				header = record.header
				break
			case 'palette':
				palette = record.palette
				break
			case 'transparency':
				transparency = new Uint8Array(record.data)
				break
			case 'data':
				idat.push(record.data)
				break
			case 'end':
				ended = true
				break
			case 'animationControl':
			case 'frameControl':
			case 'frameData':
			case 'ancillary':
				break
			default: {
				const unreachable: never = record
				throw new CorruptStreamError(`Unhandled record ${JSON.stringify(unreachable)}`)
			}
		}
		if (ended) break
	}

	if (!header) throw new CorruptStreamError('Missing IHDR chunk')
	if (!ended) throw new CorruptStreamError('Missing IEND chunk')
	if (idat.length === 0) throw new CorruptStreamError('Missing IDAT chunk')
	if (header.colorType === ColorType.Indexed && !palette) {
		throw new CorruptStreamError('Indexed image without PLTE chunk')
	}

	return decodeImageData(concatBytes(idat), header.width, header.height, { header, palette, transparency })
}
