import { quantize } from '@pixel-codec/color'
import {
	ByteWriter,
	InvalidInputError,
	type Palette,
	type PixelBuffer,
	assertPixelBuffer,
	packRgba,
	parseOptions,
	unpackRgba,
} from '@pixel-codec/core'
import { z } from 'zod'
import { lzwCompress } from './lzw'
import {
	APPLICATION_EXTENSION,
	DisposalCode,
	EXTENSION_INTRODUCER,
	GIF89A,
	GRAPHIC_CONTROL_EXTENSION,
	type GifDisposal,
	type GifEncodeOptions,
	type GifFrameInput,
	IMAGE_SEPARATOR,
	TRAILER,
} from './types'

/** Pixels below this alpha are written as transparent */
const ALPHA_CUTOFF = 128
const MAX_COLORS = 256
const TRANSPARENT_KEY = packRgba(0, 0, 0, 0)

const optionsSchema = z.object({
	width: z.number().int().min(1).max(0xffff).optional(),
	height: z.number().int().min(1).max(0xffff).optional(),
	loopCount: z.number().int().min(0).max(0xffff).default(0),
	quantizer: z.enum(['median-cut', 'octree', 'popularity', 'k-means']).default('median-cut'),
})

const DISPOSAL_CODES: Record<GifDisposal, DisposalCode> = {
	none: DisposalCode.Unspecified,
	keep: DisposalCode.Keep,
	background: DisposalCode.RestoreBackground,
	previous: DisposalCode.RestorePrevious,
}

/**
 * Palette and indices for one frame
 */
interface IndexedFrame {
	readonly palette: Palette
	readonly indices: Uint8Array
	readonly local: boolean
}

/**
 * Snap alpha to the two levels GIF can show; transparent pixels become 0,0,0,0
 */
function binarizeAlpha(image: PixelBuffer): PixelBuffer {
	const data = new Uint8Array(image.data)
	for (let i = 0; i < data.length; i += 4) {
		if (data[i + 3] < ALPHA_CUTOFF) {
			data.fill(0, i, i + 4)
		} else {
			data[i + 3] = 255
		}
	}
	return { width: image.width, height: image.height, data }
}

/**
 * Unique colors of all frames in order of first appearance, or null past 256
 */
function sharedColors(images: readonly PixelBuffer[]): number[] | null {
	const seen = new Set<number>()
	for (const { data } of images) {
		for (let i = 0; i < data.length; i += 4) {
			seen.add(packRgba(data[i], data[i + 1], data[i + 2], data[i + 3]))
			if (seen.size > MAX_COLORS) return null
		}
	}
	return [...seen]
}

function lookup(image: PixelBuffer, palette: Palette): Uint8Array {
	const slots = new Map<number, number>()
	palette.forEach(([r, g, b, a], i) => slots.set(packRgba(r, g, b, a), i))

	const { data } = image
	const indices = new Uint8Array(image.width * image.height)
	for (let i = 0; i < indices.length; i++) {
		const o = i * 4
		indices[i] = slots.get(packRgba(data[o], data[o + 1], data[o + 2], data[o + 3])) ?? 0
	}
	return indices
}

/**
 * One global palette when every frame's colors fit together, otherwise a
 * local palette per frame, quantized when a frame alone has too many colors.
 */
export function selectPalettes(
	images: readonly PixelBuffer[],
	quantizer: NonNullable<GifEncodeOptions['quantizer']>
): IndexedFrame[] {
	const shared = sharedColors(images)
	if (shared) {
		const palette: Palette = shared.map(unpackRgba)
		return images.map((image) => ({ palette, indices: lookup(image, palette), local: false }))
	}
	return images.map((image) => ({ ...quantize(image, MAX_COLORS, quantizer), local: true }))
}

/**
 * Size field N of a color table holding 2^(N+1) entries
 */
function tableSizeField(colors: number): number {
	let field = 0
	while (1 << (field + 1) < colors) field++
	return field
}

function writeColorTable(out: ByteWriter, palette: Palette, sizeField: number): void {
	const entries = 1 << (sizeField + 1)
	for (let i = 0; i < entries; i++) {
		if (i < palette.length) {
			const [r, g, b] = palette[i]
			out.u8(r).u8(g).u8(b)
		} else {
			out.u8(0).u8(0).u8(0)
		}
	}
}

function writeSubBlocks(out: ByteWriter, data: Uint8Array): void {
	for (let pos = 0; pos < data.length; pos += 255) {
		const block = data.subarray(pos, pos + 255)
		out.u8(block.length).bytes(block)
	}
	out.u8(0)
}

function transparentSlot(palette: Palette): number {
	return palette.findIndex(([r, g, b, a]) => packRgba(r, g, b, a) === TRANSPARENT_KEY)
}

function validateFrames(frames: readonly GifFrameInput[], width: number, height: number): void {
	frames.forEach((frame, index) => {
		const x = frame.x ?? 0
		const y = frame.y ?? 0
		if (x + frame.image.width > width || y + frame.image.height > height) {
			throw new InvalidInputError(`Frame ${index} extends outside the ${width}x${height} screen`)
		}
		const delay = Math.round(frame.delay / 10)
		if (!Number.isFinite(frame.delay) || frame.delay < 0 || delay > 0xffff) {
			throw new InvalidInputError(`Frame ${index} has invalid delay ${frame.delay}`)
		}
		if (frame.disposal !== undefined && !(frame.disposal in DISPOSAL_CODES)) {
			throw new InvalidInputError(`Frame ${index} has unknown disposal ${frame.disposal}`)
		}
	})
}

/**
 * Encode frames as an animated GIF89a
 */
export function encodeGif(frames: readonly GifFrameInput[], options: GifEncodeOptions = {}): Uint8Array {
	const opts = parseOptions(optionsSchema, options, 'GIF encode')
	if (frames.length === 0) {
		throw new InvalidInputError('Animation needs at least one frame')
	}
	frames.forEach((frame, index) => {
		assertPixelBuffer(frame.image, `frame ${index}`)
		const x = frame.x ?? 0
		const y = frame.y ?? 0
		if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x > 0xffff || y > 0xffff) {
			throw new InvalidInputError(`Frame ${index} has invalid offset ${x},${y}`)
		}
	})

	const width = opts.width ?? Math.max(...frames.map((f) => (f.x ?? 0) + f.image.width))
	const height = opts.height ?? Math.max(...frames.map((f) => (f.y ?? 0) + f.image.height))
	if (width > 0xffff || height > 0xffff) {
		throw new InvalidInputError(`Screen size ${width}x${height} exceeds 65535`)
	}
	validateFrames(frames, width, height)

	const indexed = selectPalettes(
		frames.map((frame) => binarizeAlpha(frame.image)),
		opts.quantizer
	)
	const first = indexed[0]
	const global = first.local ? null : first.palette

	const out = new ByteWriter(4096).ascii(GIF89A).u16le(width).u16le(height)
	if (global) {
		const sizeField = tableSizeField(global.length)
		out.u8(0x80 | (7 << 4) | sizeField).u8(0).u8(0)
		writeColorTable(out, global, sizeField)
	} else {
		out.u8(7 << 4).u8(0).u8(0)
	}

	out.u8(EXTENSION_INTRODUCER).u8(APPLICATION_EXTENSION).u8(11).ascii('NETSCAPE2.0')
	out.u8(3).u8(1).u16le(opts.loopCount).u8(0)

	frames.forEach((frame, index) => {
		const { palette, indices, local } = indexed[index]
		const transparent = transparentSlot(palette)
		const disposal = DISPOSAL_CODES[frame.disposal ?? 'none']

		out.u8(EXTENSION_INTRODUCER).u8(GRAPHIC_CONTROL_EXTENSION).u8(4)
		out.u8((disposal << 2) | (transparent >= 0 ? 1 : 0))
		out.u16le(Math.round(frame.delay / 10))
		out.u8(Math.max(0, transparent)).u8(0)

		const sizeField = tableSizeField(palette.length)
		out.u8(IMAGE_SEPARATOR)
			.u16le(frame.x ?? 0)
			.u16le(frame.y ?? 0)
			.u16le(frame.image.width)
			.u16le(frame.image.height)
			.u8(local ? 0x80 | sizeField : 0)
		if (local) writeColorTable(out, palette, sizeField)

		const minCodeSize = Math.max(2, sizeField + 1)
		out.u8(minCodeSize)
		writeSubBlocks(out, lzwCompress(indices, minCodeSize))
	})

	return out.u8(TRAILER).toBytes()
}
